import { existsSync, readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface Config {
  env: string;
  /** Base URL of the service gateway the data engine client talks to */
  apiUrl: string;
  apiToken?: string;
  /** JSON telemetry log written by the size tracker */
  sizeLogFile: string;
  /** Retention window used by log rotation */
  keepDays: number;
  /** YAML file consulted for settings not given through the environment */
  configFile: string;
}

export const DEFAULT_KEEP_DAYS = 30;

// ============================================================================
// Config File
// ============================================================================

const fileConfigSchema = z.object({
  upstream: z
    .object({
      url: z.string().min(1).optional(),
      token: z.string().min(1).optional(),
    })
    .optional(),
  telemetry: z
    .object({
      log_file: z.string().min(1).optional(),
      keep_days: z.number().int().positive().optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function getConfigPath(): string {
  return process.env.INSIGHTS_CONFIG || path.join(os.homedir(), '.insights-mcp', 'config.yaml');
}

/**
 * Load the YAML config file. A missing file yields an empty config; an
 * unreadable or malformed one is logged and ignored.
 */
export function loadConfigFile(configPath: string = getConfigPath()): FileConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const parsed: unknown = YAML.parse(readFileSync(configPath, 'utf-8'));
    if (parsed === null || parsed === undefined) return {};

    const result = fileConfigSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      log(`Config: Ignoring ${configPath}: ${issue.path.join('.')} ${issue.message}`);
      return {};
    }
    return result.data;
  } catch (err) {
    log(`Config: Failed to parse ${configPath}: ${err}`);
    return {};
  }
}

// ============================================================================
// Resolved Config
// ============================================================================

function parseKeepDays(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const days = Number(value);
  return Number.isInteger(days) && days > 0 ? days : undefined;
}

export function getConfig(): Config {
  const projectRoot = path.resolve(__dirname, '..');
  const configFile = getConfigPath();
  const file = loadConfigFile(configFile);

  return {
    env: currentEnv(),
    apiUrl: process.env.INSIGHTS_API_URL || file.upstream?.url || 'http://localhost:8080',
    apiToken: process.env.INSIGHTS_API_TOKEN || file.upstream?.token,
    sizeLogFile:
      process.env.INSIGHTS_SIZE_LOG ||
      file.telemetry?.log_file ||
      path.join(projectRoot, 'data', 'insights_size_log.json'),
    keepDays:
      parseKeepDays(process.env.INSIGHTS_KEEP_DAYS) ?? file.telemetry?.keep_days ?? DEFAULT_KEEP_DAYS,
    configFile,
  };
}

function currentEnv(): string {
  return process.env.INSIGHTS_ENV || 'dev';
}

// stdout belongs to the stdio transport, so diagnostics go to stderr.
export function log(message: string, ...args: unknown[]): void {
  if (currentEnv() === 'dev') {
    console.error(`[insights-mcp] ${message}`, ...args);
  }
}
