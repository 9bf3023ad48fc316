/**
 * Recover Command
 *
 * Restart a failed run. The failed run's checkpoints must be valid; the new
 * run reuses its mode, execution mode and source files.
 *
 * Usage:
 *   keysync recover <runId> [--output-dir <dir>]
 *
 * @module cli/commands/recover
 */

import type { Command } from 'commander';
import type { KeySyncConfig } from '../../core/config.js';
import { createOrchestrator } from '../../services/reconciliation-orchestrator.js';
import { ReportWriter } from '../../services/report-writer.js';
import {
  EXIT_CODES,
  loadCliConfig,
  parsePositiveInt,
  reportFailure,
  withStore,
  type CommonOptions,
  type ExitCode,
} from '../lib/context.js';
import { printSuccess, printWarning } from '../lib/output.js';

interface RecoverOptions extends CommonOptions {
  readonly outputDir?: string;
}

/**
 * Register the recover command
 */
export function registerRecoverCommand(program: Command): void {
  program
    .command('recover <runId>')
    .description('Restart a failed reconciliation run')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .option('--output-dir <dir>', 'Override report output directory')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (runId: string, options: RecoverOptions) => {
      const exitCode = await executeRecover(runId, options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

async function executeRecover(runIdArg: string, options: RecoverOptions): Promise<ExitCode> {
  let runId: number;
  let config: KeySyncConfig;
  try {
    runId = parsePositiveInt(runIdArg, 'runId');
    config = await loadCliConfig(options, { outputDir: options.outputDir });
  } catch (error) {
    return reportFailure(error, EXIT_CODES.CONFIG_ERROR);
  }
  const outputDir = config.output.directory;

  try {
    await withStore(config, async (store) => {
      const result = await createOrchestrator(config, store).recoverRun(runId);
      printSuccess(`Run ${runId} restarted as run ${result.runId}`);

      if (result.executionMode === 'dry-run') {
        printWarning('Dry run: reports were not written');
        return;
      }
      const files = await new ReportWriter(store, outputDir).writeAll(result);
      printSuccess(`Wrote ${files.length} reports to ${outputDir}`);
    });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error, EXIT_CODES.RUN_FAILED);
  }
}
