/**
 * Runs Commands
 *
 * Usage:
 *   keysync runs list [--limit <n>] [--format <fmt>]
 *   keysync runs show <runId>
 *
 * @module cli/commands/runs
 */

import type { Command } from 'commander';
import type { ReconciliationRun } from '../../core/types.js';
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
  type TableColumn,
} from '../lib/output.js';

interface ListOptions extends CommonOptions {
  readonly limit: string;
  readonly format: string;
}

const RUN_COLUMNS: readonly TableColumn<ReconciliationRun>[] = [
  { key: 'id', header: 'Run', align: 'right' },
  { key: 'timestamp', header: 'Started', formatter: formatters.datetime },
  { key: 'mode', header: 'Mode' },
  { key: 'executionMode', header: 'Execution' },
  { key: 'status', header: 'Status' },
  { key: 'completedAt', header: 'Completed', formatter: formatters.datetime },
  { key: 'errorMessage', header: 'Error', formatter: formatters.optional },
];

/**
 * Register all runs subcommands
 */
export function registerRunsCommands(program: Command): void {
  const runs = program.command('runs').description('Reconciliation run history');

  runs
    .command('list')
    .description('List recent runs, newest first')
    .option('-l, --limit <n>', 'Maximum runs', '10')
    .option('--format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'table')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .action(async (options: ListOptions) => {
      const exitCode = await executeList(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });

  runs
    .command('show <runId>')
    .description('Show one run with its stats, checkpoints and audit trail')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .action(async (runId: string, options: CommonOptions) => {
      const exitCode = await executeShow(runId, options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

async function executeList(options: ListOptions): Promise<ExitCode> {
  try {
    const limit = parsePositiveInt(options.limit, 'limit');
    if (!isOutputFormat(options.format)) {
      throw new Error(`Invalid format: ${options.format}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    const format = options.format;

    const config = await loadCliConfig(options);
    const runs = await withStore(config, (store) => store.listRuns(limit));
    printOutput(formatOutput(runs, format, RUN_COLUMNS));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

async function executeShow(runIdArg: string, options: CommonOptions): Promise<ExitCode> {
  try {
    const runId = parsePositiveInt(runIdArg, 'runId');
    const config = await loadCliConfig(options);

    const details = await withStore(config, async (store) => {
      const run = await store.getRun(runId);
      if (!run) return null;
      return {
        run,
        masterKeys: await store.getMasterKeysForRun(runId),
        auditEvents: await store.getAuditEvents(runId),
      };
    });

    if (!details) {
      throw new Error(`Run ${runId} not found`);
    }

    printOutput(formatJson(details));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}
