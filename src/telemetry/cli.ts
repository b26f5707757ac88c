// ============================================================================
// Telemetry CLI
// ============================================================================
// `rotate` and `view-stats` over the size log. An absent or empty log is a
// normal state, reported on stdout with exit code 0.
// ============================================================================

import { existsSync } from 'fs';
import { Config, getConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { SizeTracker, TelemetryEntry } from './sizeTracker.js';
import { computeStats, filterEntries, parseSince, renderStatsReport } from './stats.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export const USAGE = `Usage: insights-stats <command> [options]

Commands:
  rotate       Archive the log and keep only recent entries
               --log-file PATH   Log file (default: configured size log)
               --keep-days N     Days of entries to keep (default: configured retention)
  view-stats   Print a size summary of logged tool calls
               --log-file PATH   Log file (default: configured size log)
               --since DATE      Only entries at or after DATE (YYYY-MM-DD)
               --tool NAME       Only entries for one tool
               --detail          List the most recent entries`;

const VALUE_FLAGS = ['--log-file', '--keep-days', '--since', '--tool'];

function optionValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 ? args[index + 1] : undefined;
}

/** First value flag that is given without a value after it. */
function flagMissingValue(args: string[]): string | undefined {
  return VALUE_FLAGS.find(flag => {
    const index = args.indexOf(flag);
    if (index === -1) return false;
    const value = args[index + 1];
    return value === undefined || value.startsWith('--');
  });
}

/**
 * Run a CLI command and return its exit code.
 */
export async function runCli(args: string[], io: CliIO = consoleIO, config: Config = getConfig()): Promise<number> {
  const [command, ...rest] = args;

  const missing = flagMissingValue(rest);
  if (missing !== undefined) {
    io.err(`Missing value for ${missing}`);
    io.err(USAGE);
    return 1;
  }

  const logFile = optionValue(rest, '--log-file') ?? config.sizeLogFile;

  switch (command) {
    case 'rotate': {
      const keepDaysArg = optionValue(rest, '--keep-days');
      const keepDays = keepDaysArg !== undefined ? Number(keepDaysArg) : config.keepDays;
      if (!Number.isInteger(keepDays) || keepDays < 0) {
        io.err(`Invalid --keep-days value: ${keepDaysArg}`);
        io.err(USAGE);
        return 1;
      }
      return rotate(logFile, keepDays, io);
    }

    case 'view-stats': {
      const since = optionValue(rest, '--since');
      if (since !== undefined && parseSince(since) === null) {
        io.err(`Invalid --since date: ${since}`);
        io.err(USAGE);
        return 1;
      }
      return viewStats(logFile, { since, tool: optionValue(rest, '--tool'), detail: rest.includes('--detail') }, io);
    }

    default:
      io.err(command ? `Unknown command: ${command}` : 'No command given');
      io.err(USAGE);
      return 1;
  }
}

async function rotate(logFile: string, keepDays: number, io: CliIO): Promise<number> {
  try {
    const result = await new SizeTracker(logFile).rotate(keepDays);
    if (!result) {
      io.out(`No log file found at ${logFile}`);
      return 0;
    }
    io.out(`Archived ${result.archived} old entries`);
    io.out(`Archive written to ${result.archivePath}`);
  } catch (err) {
    io.err(`Rotation failed: ${errorMessage(err)}`);
  }
  return 0;
}

async function viewStats(
  logFile: string,
  options: { since?: string; tool?: string; detail: boolean },
  io: CliIO
): Promise<number> {
  if (!existsSync(logFile)) {
    io.out(`No log file found at ${logFile}`);
    return 0;
  }

  let entries: TelemetryEntry[];
  try {
    entries = filterEntries(await new SizeTracker(logFile).readEntries(), options);
  } catch (err) {
    io.err(`Cannot read stats: ${errorMessage(err)}`);
    return 1;
  }

  if (entries.length === 0) {
    io.out('No matching logs found');
    return 0;
  }

  for (const line of renderStatsReport(computeStats(entries), entries, { detail: options.detail })) {
    io.out(line);
  }
  return 0;
}
