/**
 * Shared CLI plumbing: exit codes, config loading and store lifetime
 *
 * @module cli/lib/context
 */

import { loadConfig, type KeySyncConfig, type LoadConfigOptions } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import { configureLogging } from '../../core/utils/logger.js';
import { RunStateStore } from '../../persistence/run-state-store.js';
import { printError } from './output.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  RUN_FAILED: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommonOptions {
  readonly config?: string;
  readonly db?: string;
  readonly verbose?: boolean;
}

/**
 * Load configuration and apply its log level (--verbose wins)
 */
export async function loadCliConfig(
  options: CommonOptions,
  overrides: LoadConfigOptions['overrides'] = {}
): Promise<KeySyncConfig> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      ...overrides,
      databasePath: options.db ?? overrides.databasePath,
      logLevel: options.verbose ? 'debug' : overrides.logLevel,
    },
  });
  configureLogging({ level: config.logging.level });
  return config;
}

/**
 * Open the configured store, run migrations, and close it when `fn` settles
 */
export async function withStore<T>(
  config: KeySyncConfig,
  fn: (store: RunStateStore) => Promise<T>
): Promise<T> {
  const store = new RunStateStore(config.database.path);
  try {
    await store.runMigrations();
    return await fn(store);
  } finally {
    store.close();
  }
}

/**
 * Report an error and map it to an exit code
 */
export function reportFailure(error: unknown, exitCode: ExitCode = EXIT_CODES.ERRORS): ExitCode {
  if (error instanceof ConfigurationError) {
    printError(error.getSummary());
    return EXIT_CODES.CONFIG_ERROR;
  }
  printError(error instanceof Error ? error.message : String(error));
  return exitCode;
}

/**
 * Parse a positive integer CLI argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
