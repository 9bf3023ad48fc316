/**
 * Run Command
 *
 * Execute one reconciliation run over the configured sources and write its
 * reports.
 *
 * Usage:
 *   keysync run [options]
 *
 * Options:
 *   --config <path>      Config file (default: keysync-config.yaml)
 *   --db <path>          Override database path
 *   --mode <mode>        full|incremental (default from config)
 *   --dry-run            Run every step but skip activation and reports
 *   --auto-approve       Activate proposed master keys immediately
 *   --output-dir <dir>   Override report directory
 *   --json               Print the run summary as JSON
 *   -v, --verbose        Debug logging
 *
 * @module cli/commands/run
 */

import type { Command } from 'commander';
import type { KeySyncConfig } from '../../core/config.js';
import { isRunMode, RUN_MODES, type ExecutionMode, type RunMode } from '../../core/types.js';
import { reconcileFromConfig } from '../../services/reconciliation-orchestrator.js';
import type { ReconciliationResult } from '../../services/reconciliation-orchestrator.types.js';
import { ReportWriter } from '../../services/report-writer.js';
import {
  EXIT_CODES,
  loadCliConfig,
  reportFailure,
  withStore,
  type CommonOptions,
  type ExitCode,
} from '../lib/context.js';
import { formatJson, formatters, printOutput, printSuccess, printWarning } from '../lib/output.js';

interface RunOptions extends CommonOptions {
  readonly mode?: string;
  readonly dryRun?: boolean;
  readonly autoApprove?: boolean;
  readonly outputDir?: string;
  readonly json?: boolean;
}

/**
 * Register the run command
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a reconciliation across all configured systems')
    .option('--config <path>', 'Path to config file')
    .option('--db <path>', 'Override database path')
    .option('--mode <mode>', `Run mode: ${RUN_MODES.join('|')}`)
    .option('--dry-run', 'Run every step but skip activation and reports')
    .option('--auto-approve', 'Activate proposed master keys immediately')
    .option('--output-dir <dir>', 'Override report output directory')
    .option('--json', 'Print the run summary as JSON')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (options: RunOptions) => {
      const exitCode = await executeRun(options);
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

/**
 * Resolve the execution mode from flags; dry-run wins over auto-approve
 */
export function resolveExecutionMode(options: {
  readonly dryRun?: boolean;
  readonly autoApprove?: boolean;
  readonly configAutoApprove: boolean;
}): ExecutionMode {
  if (options.dryRun) return 'dry-run';
  if (options.autoApprove || options.configAutoApprove) return 'auto-approve';
  return 'normal';
}

/**
 * Execute the run command
 */
export async function executeRun(options: RunOptions): Promise<ExitCode> {
  let mode: RunMode | undefined;
  if (options.mode !== undefined) {
    if (!isRunMode(options.mode)) {
      return reportFailure(
        new Error(`Invalid mode: ${options.mode}. Must be one of: ${RUN_MODES.join(', ')}`),
        EXIT_CODES.CONFIG_ERROR
      );
    }
    mode = options.mode;
  }

  let config: KeySyncConfig;
  try {
    config = await loadCliConfig(options, { mode, outputDir: options.outputDir });
  } catch (error) {
    return reportFailure(error, EXIT_CODES.CONFIG_ERROR);
  }

  const executionMode = resolveExecutionMode({
    dryRun: options.dryRun,
    autoApprove: options.autoApprove,
    configAutoApprove: config.provisioning.autoApprove,
  });

  try {
    await withStore(config, async (store) => {
      const result = await reconcileFromConfig(config, store, { executionMode });

      if (executionMode === 'dry-run') {
        printWarning('Dry run: reports were not written');
      } else {
        const writer = new ReportWriter(store, config.output.directory);
        const files = await writer.writeAll(result);
        printSuccess(`Wrote ${files.length} reports to ${config.output.directory}`);
      }

      printOutput(options.json ? formatJson(summarizeRun(result)) : formatRunSummary(result));
    });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(error, EXIT_CODES.RUN_FAILED);
  }
}

/**
 * Compact, JSON-friendly view of a run
 */
export function summarizeRun(result: ReconciliationResult): Record<string, unknown> {
  return {
    runId: result.runId,
    mode: result.mode,
    executionMode: result.executionMode,
    statistics: result.stats.comparison,
    unavailableSystems: result.stats.unavailableSystems,
    discrepancies: result.stats.discrepancies,
    provisioning: result.stats.provisioning,
    errors: result.stats.errors,
    incrementalChanges: result.incrementalChanges,
    durationMs: result.stats.durationMs,
  };
}

function formatRunSummary(result: ReconciliationResult): string {
  const stats = result.stats.comparison;
  const summary = result.stats.discrepancies;
  const provisioning = result.stats.provisioning;
  const lines = [
    '',
    `Reconciliation run ${result.runId} (${result.mode}, ${result.executionMode})`,
    '='.repeat(60),
    `Total unique keys:       ${stats.totalUniqueKeys}`,
    `Keys in all systems:     ${stats.keysInAllSystems}`,
    `Match rate:              ${formatters.percent(stats.matchPercentage)}`,
    `Out of authority:        ${summary.totalOutOfAuthority}`,
    `Propagation gaps:        ${summary.totalPropagationGaps}`,
    `Duplicate groups:        ${summary.totalDuplicateGroups}`,
    `Master keys proposed:    ${provisioning.keysProposed} (${provisioning.strategy})`,
    `Master keys activated:   ${provisioning.keysActivated}`,
    `Errors recorded:         ${result.stats.errors.totalErrors}`,
  ];

  if (result.stats.unavailableSystems.length > 0) {
    lines.push(`Unavailable systems:     ${result.stats.unavailableSystems.join(', ')}`);
  }

  const changes = result.incrementalChanges;
  if (changes) {
    lines.push(
      '',
      `Changes since run ${changes.previousRunId}:`,
      `  new: ${changes.newKeys.length}, removed: ${changes.removedKeys.length}, ` +
        `synchronized: ${changes.newlySynchronized.length}, diverged: ${changes.newlyDiverged.length}`
    );
  }

  return lines.join('\n');
}
