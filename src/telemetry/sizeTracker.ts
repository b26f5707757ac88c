// ============================================================================
// Size Tracker
// ============================================================================
// Records the serialized size and duration of every tool call in a JSON log,
// and rotates that log on demand. Appends are best-effort: a telemetry failure
// is logged and never reaches the tool caller.
// ============================================================================

import { constants as fsConstants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import { DEFAULT_KEEP_DAYS, log } from '../config.js';
import { TelemetryError, errorMessage, isNotFoundError } from '../errors.js';
import { StatsFilter, TelemetryStats, computeStats } from './stats.js';

export const BYTES_PER_MIB = 1024 * 1024;
const SUMMARY_MAX_CHARS = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Log Entries
// ============================================================================

const telemetryEntrySchema = z.object({
  timestamp: z.string(),
  tool: z.string(),
  querySizeMiB: z.number().nonnegative(),
  responseSizeMiB: z.number().nonnegative(),
  durationMs: z.number().nonnegative().nullable(),
  querySummary: z.union([z.string(), z.record(z.string(), z.unknown())]),
});

const telemetryLogSchema = z.array(telemetryEntrySchema);

export type TelemetryEntry = z.infer<typeof telemetryEntrySchema>;

export interface RotationResult {
  archivePath: string;
  total: number;
  kept: number;
  /** Entries that fell outside the retention window */
  archived: number;
}

// ============================================================================
// Measurement
// ============================================================================

export function sizeInMiB(data: unknown): number {
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text === undefined ? 0 : Buffer.byteLength(text, 'utf8') / BYTES_PER_MIB;
}

/**
 * Compact view of a call's input: long strings are cut, collections are
 * reduced to their length.
 */
export function summarizeQuery(query: unknown): TelemetryEntry['querySummary'] {
  if (typeof query !== 'object' || query === null || Array.isArray(query)) {
    return String(query).slice(0, SUMMARY_MAX_CHARS);
  }

  // fromEntries defines own properties, so a "__proto__" key survives
  return Object.fromEntries(
    Object.entries(query)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => [key, summarizeValue(value)])
  );
}

function summarizeValue(value: unknown): unknown {
  if (typeof value === 'string' && value.length > SUMMARY_MAX_CHARS) {
    return `${value.slice(0, SUMMARY_MAX_CHARS)}...`;
  }
  if (Array.isArray(value)) {
    return `<list, length=${value.length}>`;
  }
  if (typeof value === 'object' && value !== null) {
    return `<mapping, length=${Object.keys(value).length}>`;
  }
  return value;
}

// ============================================================================
// Log File Access
// ============================================================================

// Read-modify-write cycles on one file run one at a time: queued within this
// process, and behind a lock directory shared with other processes (the
// server appending while the CLI rotates).
const pendingWrites = new Map<string, Promise<void>>();

const FILE_LOCK_OPTIONS = {
  realpath: false,
  stale: 10_000,
  retries: { retries: 50, minTimeout: 10, maxTimeout: 200 },
};

async function withFileLock<T>(file: string, task: () => Promise<T>): Promise<T> {
  let release: () => Promise<void>;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    release = await lockfile.lock(file, {
      ...FILE_LOCK_OPTIONS,
      onCompromised: (err) => log(`Lock on ${file} compromised: ${errorMessage(err)}`),
    });
  } catch (err) {
    throw new TelemetryError(`Cannot lock ${file}: ${errorMessage(err)}`, { cause: err });
  }

  try {
    return await task();
  } finally {
    await release();
  }
}

function withLogLock<T>(file: string, task: () => Promise<T>): Promise<T> {
  const previous = pendingWrites.get(file) ?? Promise.resolve();
  const run = previous.then(() => withFileLock(file, task));
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  pendingWrites.set(file, settled);
  void settled.then(() => {
    if (pendingWrites.get(file) === settled) pendingWrites.delete(file);
  });
  return run;
}

export async function readLog(file: string): Promise<TelemetryEntry[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw new TelemetryError(`Cannot read ${file}: ${errorMessage(err)}`, { cause: err });
  }

  if (text.trim() === '') return [];

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new TelemetryError(`${file} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = telemetryLogSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TelemetryError(`${file} is not a telemetry log (${issue.path.join('.')}: ${issue.message})`);
  }
  return parsed.data;
}

async function writeLog(file: string, entries: TelemetryEntry[]): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(entries, null, 2), 'utf-8');
    await fs.rename(tmp, file);
  } catch (err) {
    throw new TelemetryError(`Cannot write ${file}: ${errorMessage(err)}`, { cause: err });
  }
}

function archiveStamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

async function copyToArchive(file: string, now: Date): Promise<string> {
  const { dir, name } = path.parse(file);
  const base = path.join(dir, `${name}_${archiveStamp(now)}`);

  for (let attempt = 0; ; attempt++) {
    const archivePath = attempt === 0 ? `${base}.json` : `${base}_${attempt}.json`;
    try {
      await fs.copyFile(file, archivePath, fsConstants.COPYFILE_EXCL);
      return archivePath;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') continue;
      throw new TelemetryError(`Cannot archive ${file}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

// ============================================================================
// Tracker
// ============================================================================

export class SizeTracker {
  readonly logFile: string;

  constructor(logFile: string) {
    this.logFile = path.resolve(logFile);
  }

  /**
   * Append one entry for a finished call. Never throws. An entry that would
   * not read back (a negative duration, say) is refused instead of written.
   */
  async logCall(tool: string, query: unknown, response: unknown, durationMs?: number): Promise<TelemetryEntry> {
    const entry: TelemetryEntry = {
      timestamp: new Date().toISOString(),
      tool,
      querySizeMiB: sizeInMiB(query),
      responseSizeMiB: sizeInMiB(response),
      durationMs: durationMs ?? null,
      querySummary: summarizeQuery(query),
    };

    const checked = telemetryEntrySchema.safeParse(entry);
    if (!checked.success) {
      const issue = checked.error.issues[0];
      log(`Failed to log size: refusing entry for ${tool} (${issue.path.join('.')}: ${issue.message})`);
      return entry;
    }

    try {
      await withLogLock(this.logFile, async () => {
        const entries = await readLog(this.logFile);
        entries.push(entry);
        await writeLog(this.logFile, entries);
      });
    } catch (err) {
      log(`Failed to log size: ${errorMessage(err)}`);
    }

    return entry;
  }

  async readEntries(): Promise<TelemetryEntry[]> {
    return readLog(this.logFile);
  }

  async getStats(filter: StatsFilter = {}): Promise<TelemetryStats> {
    return computeStats(await readLog(this.logFile), filter);
  }

  /**
   * Archive the live log, then keep only entries inside the retention window.
   * Returns null when there is no log to rotate.
   */
  async rotate(keepDays: number = DEFAULT_KEEP_DAYS, now: Date = new Date()): Promise<RotationResult | null> {
    return withLogLock(this.logFile, async () => {
      try {
        await fs.access(this.logFile);
      } catch (err) {
        if (isNotFoundError(err)) return null;
        throw new TelemetryError(`Cannot access ${this.logFile}: ${errorMessage(err)}`, { cause: err });
      }

      const archivePath = await copyToArchive(this.logFile, now);
      const entries = await readLog(this.logFile);
      const cutoff = now.getTime() - keepDays * DAY_MS;
      const recent = entries.filter(entry => Date.parse(entry.timestamp) >= cutoff);
      await writeLog(this.logFile, recent);

      log(`Rotated ${this.logFile}: kept ${recent.length} of ${entries.length} entries, archive at ${archivePath}`);
      return {
        archivePath,
        total: entries.length,
        kept: recent.length,
        archived: entries.length - recent.length,
      };
    });
  }
}

// ============================================================================
// Handler Wrapper
// ============================================================================

export interface TrackedRun<R> {
  response: R;
  /** Payload measured as the call's query size */
  input: unknown;
}

/**
 * Wrap a tool runner so each call is timed and logged. The wrapper hands back
 * the runner's response untouched.
 */
export function withSizeTracking<A, R>(
  tracker: SizeTracker,
  toolName: string,
  run: (args: A) => Promise<TrackedRun<R>>
): (args: A) => Promise<R> {
  return async (args: A) => {
    // performance.now() is monotonic
    const start = performance.now();
    const { response, input } = await run(args);
    const durationMs = performance.now() - start;

    await tracker.logCall(toolName, input, response, durationMs);

    return response;
  };
}
