// ============================================================================
// Telemetry Stats
// ============================================================================
// Read-side aggregation and text reporting over telemetry log entries.
// ============================================================================

import type { TelemetryEntry } from './sizeTracker.js';

export interface StatsFilter {
  /** Keep entries at or after this date (YYYY-MM-DD) or ISO timestamp */
  since?: string;
  tool?: string;
}

export interface ToolStats {
  calls: number;
  totalQueryMiB: number;
  totalResponseMiB: number;
  avgResponseMiB: number;
  maxResponseMiB: number;
  /** Mean over the calls that recorded a duration; null when none did */
  avgDurationMs: number | null;
}

export interface TelemetryStats {
  totalCalls: number;
  totalQueryMiB: number;
  totalResponseMiB: number;
  firstTimestamp?: string;
  lastTimestamp?: string;
  byTool: Record<string, ToolStats>;
}

const DETAIL_ENTRIES = 20;
const RULE_WIDTH = 80;

// ============================================================================
// Filtering
// ============================================================================

/** Milliseconds since epoch for a --since value, or null if unparsable. */
export function parseSince(since: string): number | null {
  const ms = Date.parse(since);
  return Number.isNaN(ms) ? null : ms;
}

export function filterEntries(entries: TelemetryEntry[], filter: StatsFilter = {}): TelemetryEntry[] {
  const sinceMs = filter.since !== undefined ? parseSince(filter.since) : null;

  return entries.filter(entry => {
    if (sinceMs !== null && !(Date.parse(entry.timestamp) >= sinceMs)) return false;
    if (filter.tool !== undefined && entry.tool !== filter.tool) return false;
    return true;
  });
}

// ============================================================================
// Aggregation
// ============================================================================

export function computeStats(entries: TelemetryEntry[], filter: StatsFilter = {}): TelemetryStats {
  const selected = filterEntries(entries, filter);
  const byTool: Record<string, ToolStats> = {};
  const durations = new Map<string, { total: number; count: number }>();

  for (const entry of selected) {
    const stats = (byTool[entry.tool] ??= {
      calls: 0,
      totalQueryMiB: 0,
      totalResponseMiB: 0,
      avgResponseMiB: 0,
      maxResponseMiB: 0,
      avgDurationMs: null,
    });
    stats.calls++;
    stats.totalQueryMiB += entry.querySizeMiB;
    stats.totalResponseMiB += entry.responseSizeMiB;
    stats.maxResponseMiB = Math.max(stats.maxResponseMiB, entry.responseSizeMiB);

    if (entry.durationMs !== null) {
      const d = durations.get(entry.tool) ?? { total: 0, count: 0 };
      d.total += entry.durationMs;
      d.count++;
      durations.set(entry.tool, d);
    }
  }

  for (const [tool, stats] of Object.entries(byTool)) {
    stats.avgResponseMiB = stats.totalResponseMiB / stats.calls;
    const d = durations.get(tool);
    stats.avgDurationMs = d ? d.total / d.count : null;
  }

  return {
    totalCalls: selected.length,
    totalQueryMiB: selected.reduce((sum, e) => sum + e.querySizeMiB, 0),
    totalResponseMiB: selected.reduce((sum, e) => sum + e.responseSizeMiB, 0),
    firstTimestamp: selected[0]?.timestamp,
    lastTimestamp: selected[selected.length - 1]?.timestamp,
    byTool,
  };
}

// ============================================================================
// Reporting
// ============================================================================

export function formatMiB(mib: number): string {
  if (mib < 1) {
    return `${(mib * 1024).toFixed(2)} KiB`;
  }
  return `${mib.toFixed(2)} MiB`;
}

function row(label: string, value: string): string {
  return `  ${label.padEnd(18)}${value}`;
}

export function renderStatsReport(
  stats: TelemetryStats,
  entries: TelemetryEntry[],
  options: { detail?: boolean } = {}
): string[] {
  const heavy = '='.repeat(RULE_WIDTH);
  const light = '-'.repeat(RULE_WIDTH);
  const lines: string[] = [
    heavy,
    'INSIGHTS TOOL CALL SIZE SUMMARY',
    heavy,
    `Total calls: ${stats.totalCalls}`,
    `Date range: ${(stats.firstTimestamp ?? '').slice(0, 10)} to ${(stats.lastTimestamp ?? '').slice(0, 10)}`,
    '',
    'BY TOOL:',
    light,
  ];

  for (const tool of Object.keys(stats.byTool).sort()) {
    const s = stats.byTool[tool];
    lines.push(
      '',
      `${tool}:`,
      row('Calls:', String(s.calls)),
      row('Total Query:', formatMiB(s.totalQueryMiB)),
      row('Total Response:', formatMiB(s.totalResponseMiB)),
      row('Avg Response:', formatMiB(s.avgResponseMiB)),
      row('Max Response:', formatMiB(s.maxResponseMiB))
    );
    if (s.avgDurationMs !== null) {
      lines.push(row('Avg Duration:', `${s.avgDurationMs.toFixed(0)} ms`));
    }
  }

  lines.push(
    '',
    heavy,
    'OVERALL TOTALS:',
    `  Total Query Data:    ${formatMiB(stats.totalQueryMiB)}`,
    `  Total Response Data: ${formatMiB(stats.totalResponseMiB)}`,
    `  Combined:            ${formatMiB(stats.totalQueryMiB + stats.totalResponseMiB)}`,
    heavy
  );

  if (options.detail) {
    lines.push('', 'DETAILED LOGS:', light);
    for (const entry of entries.slice(-DETAIL_ENTRIES)) {
      lines.push(
        '',
        entry.timestamp,
        `  Tool:     ${entry.tool}`,
        `  Query:    ${formatMiB(entry.querySizeMiB)}`,
        `  Response: ${formatMiB(entry.responseSizeMiB)}`,
        `  Summary:  ${JSON.stringify(entry.querySummary)}`
      );
      if (entry.durationMs !== null) {
        lines.push(`  Duration: ${entry.durationMs.toFixed(0)} ms`);
      }
    }
  }

  return lines;
}
