/**
 * Registry Commands
 *
 * Inspect and maintain the master key registry.
 *
 * Usage:
 *   keysync registry list [--status <s>] [--format <fmt>]
 *   keysync registry stats [--json]
 *   keysync registry deprecate <masterKeyId>
 *
 * @module cli/commands/registry
 */

import type { Command } from 'commander';
import {
  isMasterKeyStatus,
  MASTER_KEY_STATUSES,
  type MasterKeyRecord,
  type MasterKeyStatus,
} from '../../core/types.js';
import { MASTER_KEY_COLUMNS } from '../../services/report-writer.js';
import {
  EXIT_CODES,
  loadCliConfig,
  parsePositiveInt,
  reportFailure,
  withStore,
  type CommonOptions,
  type ExitCode,
} from '../lib/context.js';
import {
  formatJson,
  formatOutput,
  formatters,
  isOutputFormat,
  OUTPUT_FORMATS,
  printOutput,
  printSuccess,
  type TableColumn,
} from '../lib/output.js';

interface ListOptions extends CommonOptions {
  readonly status?: string;
  readonly format: string;
}

interface StatsOptions extends CommonOptions {
  readonly json?: boolean;
}

const REGISTRY_TABLE_COLUMNS: readonly TableColumn<MasterKeyRecord>[] = MASTER_KEY_COLUMNS.map(
  (column): TableColumn<MasterKeyRecord> =>
    column.key === 'createdAt' || column.key === 'activatedAt'
      ? { ...column, formatter: formatters.datetime }
      : column.key === 'runId'
        ? { ...column, align: 'right', formatter: formatters.optional }
        : column
);

/**
 * Register all registry subcommands
 */
export function registerRegistryCommands(program: Command): void {
  const registry = program.command('registry').description('Master key registry operations');

  registry
    .command('list')
    .description('List master keys, newest first')
    .option('--status <status>', `Filter by status: ${MASTER_KEY_STATUSES.join('|')}`)
    .option('--format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'table')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .action(async (options: ListOptions) => {
      const exitCode = await executeList(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  registry
    .command('stats')
    .description('Registry counts by status, strategy and source system')
    .option('--json', 'Output as JSON')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .action(async (options: StatsOptions) => {
      const exitCode = await executeStats(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  registry
    .command('deprecate <masterKeyId>')
    .description('Mark a master key deprecated')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .action(async (masterKeyId: string, options: CommonOptions) => {
      const exitCode = await executeDeprecate(masterKeyId, options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

async function executeList(options: ListOptions): Promise<ExitCode> {
  try {
    if (!isOutputFormat(options.format)) {
      throw new Error(`Invalid format: ${options.format}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    const format = options.format;

    let status: MasterKeyStatus | undefined;
    if (options.status !== undefined) {
      if (!isMasterKeyStatus(options.status)) {
        throw new Error(
          `Invalid status: ${options.status}. Must be one of: ${MASTER_KEY_STATUSES.join(', ')}`
        );
      }
      status = options.status;
    }

    const config = await loadCliConfig(options);
    const keys = await withStore(config, (store) => store.getMasterKeys(status));
    printOutput(formatOutput(keys, format, REGISTRY_TABLE_COLUMNS));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

async function executeStats(options: StatsOptions): Promise<ExitCode> {
  try {
    const config = await loadCliConfig(options);
    const stats = await withStore(config, (store) => store.getRegistryStatistics());

    if (options.json) {
      printOutput(formatJson(stats));
      return EXIT_CODES.SUCCESS;
    }

    const lines = [`Total master keys: ${stats.totalKeys}`, '', 'By status:'];
    for (const [status, count] of Object.entries(stats.byStatus)) {
      lines.push(`  ${status.padEnd(12)} ${count}`);
    }
    lines.push('', 'By strategy:');
    for (const [strategy, count] of Object.entries(stats.byStrategy)) {
      lines.push(`  ${strategy.padEnd(12)} ${count}`);
    }
    lines.push('', 'By source system:');
    for (const [system, count] of Object.entries(stats.bySourceSystem)) {
      lines.push(`  ${system.padEnd(12)} ${count}`);
    }
    printOutput(lines.join('\n'));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

async function executeDeprecate(masterKeyId: string, options: CommonOptions): Promise<ExitCode> {
  try {
    const id = parsePositiveInt(masterKeyId, 'masterKeyId');
    const config = await loadCliConfig(options);
    const deprecated = await withStore(config, (store) => store.deprecateMasterKey(id));
    if (!deprecated) {
      throw new Error(`Master key ${id} not found or already deprecated`);
    }
    printSuccess(`Master key ${id} deprecated`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}
