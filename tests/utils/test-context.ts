import fs from 'fs/promises';
import path from 'path';
import os from 'os';

export interface TestContext {
  rootDir: string;
  /** Size log path exported through INSIGHTS_SIZE_LOG */
  logFile: string;
  cleanup: () => Promise<void>;
}

const ENV_KEYS = [
  'INSIGHTS_ENV',
  'INSIGHTS_API_URL',
  'INSIGHTS_API_TOKEN',
  'INSIGHTS_SIZE_LOG',
  'INSIGHTS_KEEP_DAYS',
  'INSIGHTS_CONFIG',
];

/**
 * Creates an isolated test context with a temporary directory.
 * Each test gets its own size log and an absent config file.
 */
export async function createTestContext(): Promise<TestContext> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'insights-mcp-test-'));
  const logFile = path.join(rootDir, 'insights_size_log.json');

  process.env.INSIGHTS_ENV = 'test';
  process.env.INSIGHTS_SIZE_LOG = logFile;
  process.env.INSIGHTS_CONFIG = path.join(rootDir, 'config.yaml');

  return {
    rootDir,
    logFile,
    cleanup: async () => {
      await fs.rm(rootDir, { recursive: true, force: true });
    },
  };
}

/**
 * Cleans up the test context after tests complete.
 */
export async function cleanupTestContext(ctx: TestContext): Promise<void> {
  await ctx.cleanup();
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
}

/**
 * Write a raw size log the way an earlier run would have left it.
 */
export async function seedLog(file: string, entries: unknown[]): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(entries, null, 2), 'utf-8');
}

/** An entry as the size tracker writes it */
export function logEntry(timestamp: string, tool = 'insights_get_data', responseSizeMiB = 0.5) {
  return {
    timestamp,
    tool,
    querySizeMiB: 0.001,
    responseSizeMiB,
    durationMs: 100,
    querySummary: { table: 'trades' },
  };
}
