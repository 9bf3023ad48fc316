/**
 * Reconciliation Orchestrator
 *
 * Sequences one reconciliation run:
 *   start -> compare -> classify -> track -> provision -> incremental diff -> complete
 *
 * Run lifecycle is `running -> completed | failed`. Any error after the run
 * starts completes a still-running run as `failed` with the message, is
 * audited when the audit log still accepts writes, and is rethrown to the
 * caller unchanged.
 *
 * Checkpoints record which stage a run reached (with a type/size summary);
 * they are not resumable state. Recovering a failed run restarts it in full.
 */

import { z } from 'zod';
import { getSystemFiles, type KeySyncConfig } from '../core/config.js';
import { RunStateError, SystemUnavailableError, toError } from '../core/errors.js';
import { KeyNormalizer } from '../core/key-normalizer.js';
import { SystemComparator } from '../core/system-comparator.js';
import type {
  CheckpointSummary,
  ComparisonResult,
  DiscrepancyAnalysis,
  IncrementalChanges,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { RunStateStore, TrackKeyInput } from '../persistence/run-state-store.js';
import { createRetryExecutor } from '../resilience/retry.js';
import { analyzeDiscrepancies } from './discrepancy-analyzer.js';
import { ErrorHandler } from './error-handler.js';
import {
  calculateIncrementalChanges,
  createSnapshot,
  readSnapshot,
} from './incremental-diff.js';
import { MasterKeyProvisioner } from './master-key-provisioner.js';
import type {
  CheckpointStage,
  ProvisioningOutcome,
  ReconcileOptions,
  ReconciliationEventType,
  ReconciliationResult,
  RunStatistics,
} from './reconciliation-orchestrator.types.js';

const log = createLogger({ module: 'orchestrator' });

const RecordedSystemFilesSchema = z.object({
  systemFiles: z.record(z.string()),
});

export interface OrchestratorDependencies {
  readonly store: RunStateStore;
  readonly normalizer: KeyNormalizer;
  readonly comparator: SystemComparator;
  readonly provisioner: MasterKeyProvisioner;
  readonly errorHandler: ErrorHandler;
}

export class ReconciliationOrchestrator {
  private readonly store: RunStateStore;
  private readonly normalizer: KeyNormalizer;
  private readonly comparator: SystemComparator;
  private readonly provisioner: MasterKeyProvisioner;
  private readonly errorHandler: ErrorHandler;

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.normalizer = deps.normalizer;
    this.comparator = deps.comparator;
    this.provisioner = deps.provisioner;
    this.errorHandler = deps.errorHandler;
  }

  /**
   * Execute a full reconciliation run
   *
   * @returns Result of the completed run
   * @throws Whatever failed the run, after the run has been marked `failed`
   *
   * @example
   * ```typescript
   * const orchestrator = createOrchestrator(config, store);
   * const result = await orchestrator.reconcile({
   *   systemFiles: getSystemFiles(config),
   *   executionMode: 'auto-approve',
   * });
   * console.log(`Run ${result.runId}: ${result.stats.comparison.matchPercentage}% match`);
   * ```
   */
  async reconcile(options: ReconcileOptions): Promise<ReconciliationResult> {
    const startTime = Date.now();
    const mode = options.mode ?? 'full';
    const executionMode = options.executionMode ?? 'normal';
    const timestamp = new Date().toISOString();

    this.normalizer.resetStatistics();
    this.provisioner.resetStatistics();
    this.errorHandler.reset();

    // Step 1: start run
    const runId = await this.store.startRun(mode, executionMode, {
      ...options.configSnapshot,
      systemFiles: options.systemFiles,
    });
    log.info(`Started reconciliation run ${runId}`, { mode, executionMode });

    const checkpoints: Record<string, CheckpointSummary> = {};
    let runCompleted = false;

    try {
      await this.audit(runId, 'run_started', {
        details: `Reconciliation started in ${mode} mode with ${executionMode} execution`,
      });

      if (options.recoveredFrom) {
        await this.audit(runId, 'run_recovered', {
          details: `Restarted failed run ${options.recoveredFrom.runId} (last checkpoint: ${options.recoveredFrom.checkpointName})`,
          result: 'restarted',
        });
      }

      // Step 2: compare
      const comparison = await this.comparator.compareAll(options.systemFiles);
      if (!comparison.authorityPresent) {
        throw new SystemUnavailableError(
          `Authority system ${comparison.authoritySystem} is unavailable`,
          [comparison.authoritySystem]
        );
      }
      await this.saveCheckpoint(
        runId,
        checkpoints,
        'comparison_complete',
        'ComparisonResult',
        comparison.allKeys.size
      );

      // Step 3: classify
      const discrepancies = analyzeDiscrepancies(comparison);
      log.info('Discrepancy analysis complete', { ...discrepancies.summary });
      await this.saveCheckpoint(
        runId,
        checkpoints,
        'discrepancy_analysis_complete',
        'DiscrepancyAnalysis',
        discrepancies.discrepancies.length
      );

      // Step 4: track
      const keysTracked = await this.trackKeys(runId, comparison);

      // Step 5: provision
      const provisioning = await this.provision(runId, executionMode, discrepancies);

      // Step 6: incremental diff
      const incrementalChanges =
        mode === 'incremental' ? await this.diffAgainstLastRun(runId, comparison) : null;

      // Step 7: complete
      const stats = this.buildStatistics({
        comparison,
        discrepancies,
        keysTracked,
        incrementalChanges,
        durationMs: Date.now() - startTime,
      });

      await this.store.completeRun(runId, stats);
      runCompleted = true;
      await this.audit(runId, 'reconciliation_complete', {
        details: 'Reconciliation completed successfully',
        result: 'success',
      });
      log.info(`Reconciliation run ${runId} completed`, { durationMs: stats.durationMs });

      return {
        runId,
        timestamp,
        mode,
        executionMode,
        comparison,
        discrepancies,
        provisioning,
        incrementalChanges,
        stats,
      };
    } catch (error) {
      const err = toError(error);
      this.errorHandler.recordOperationFailure(`reconciliation run ${runId}`, err);

      if (!runCompleted) {
        try {
          await this.store.completeRun(
            runId,
            {
              errors: this.errorHandler.getErrorSummary(),
              checkpointsReached: Object.keys(checkpoints),
              durationMs: Date.now() - startTime,
            },
            err.message
          );
        } catch (completeError) {
          log.error(`Could not mark run ${runId} failed`, { error: toError(completeError).message });
        }
      }
      log.error(`Reconciliation run ${runId} failed`, { error: err.message });

      try {
        await this.audit(runId, 'reconciliation_failed', { details: err.message, result: 'failure' });
      } catch (auditError) {
        log.error(`Could not audit failure of run ${runId}`, { error: toError(auditError).message });
      }
      throw error;
    }
  }

  /**
   * Restart a failed run from scratch
   *
   * The failed run's checkpoints are validated first; the new run reuses its
   * mode, execution mode, system files and configuration snapshot.
   *
   * @throws RunStateError if the run does not exist or did not fail
   * @throws CheckpointRecoveryError if the run has no valid checkpoint
   */
  async recoverRun(runId: number): Promise<ReconciliationResult> {
    const run = await this.store.getRun(runId);
    if (!run) {
      throw new RunStateError(`Run ${runId} not found`, runId);
    }
    if (run.status !== 'failed') {
      throw new RunStateError(`Run ${runId} is not recoverable (status: ${run.status})`, runId);
    }

    const recovery = this.errorHandler.recoverFromCheckpoint(run.checkpoints);

    const recorded = RecordedSystemFilesSchema.safeParse(run.configSnapshot);
    if (!recorded.success) {
      throw new RunStateError(`Run ${runId} has no recorded system files`, runId);
    }

    log.info(`Recovering run ${runId} by restarting it`, { lastCheckpoint: recovery.checkpointName });

    return this.reconcile({
      systemFiles: recorded.data.systemFiles,
      mode: run.mode,
      executionMode: run.executionMode,
      configSnapshot: run.configSnapshot ?? {},
      recoveredFrom: { runId, checkpointName: recovery.checkpointName },
    });
  }

  // ============================================================================
  // Steps
  // ============================================================================

  private async saveCheckpoint(
    runId: number,
    checkpoints: Record<string, CheckpointSummary>,
    stage: CheckpointStage,
    type: string,
    size: number
  ): Promise<void> {
    checkpoints[stage] = {
      timestamp: new Date().toISOString(),
      dataSummary: { type, size },
    };
    await this.store.saveCheckpoint(runId, checkpoints);
    log.debug(`Checkpoint saved: ${stage}`, { runId });
  }

  /**
   * Record every raw key of every loaded system
   */
  private async trackKeys(runId: number, comparison: ComparisonResult): Promise<number> {
    const entries: TrackKeyInput[] = [];
    for (const [system, groups] of comparison.systemKeys) {
      for (const [normalizedKey, rawKeys] of groups) {
        for (const rawValue of rawKeys) {
          entries.push({ system, rawValue, normalizedKey });
        }
      }
    }

    const tracked = await this.store.trackKeys(runId, entries);
    await this.audit(runId, 'keys_tracked', {
      details: `Tracked ${tracked} keys across ${comparison.systemKeys.size} systems`,
    });
    log.info(`Tracked ${tracked} keys for temporal analysis`);
    return tracked;
  }

  private async provision(
    runId: number,
    executionMode: ReconcileOptions['executionMode'],
    discrepancies: DiscrepancyAnalysis
  ): Promise<ProvisioningOutcome | null> {
    if (discrepancies.outOfAuthority.size === 0) {
      return null;
    }

    log.info('Provisioning master keys...', { candidates: discrepancies.outOfAuthority.size });
    const proposed = await this.provisioner.propose(runId, discrepancies.outOfAuthority);

    for (const key of proposed) {
      await this.audit(runId, 'master_key_proposed', {
        details: `Proposed master key for normalized key ${key.normalizedKey}`,
        system: key.sourceSystem,
        key: key.masterKey,
        action: 'propose',
        result: 'proposed',
      });
    }

    let activated = 0;
    if (executionMode === 'auto-approve') {
      activated = await this.provisioner.activate(runId, true);
      await this.audit(runId, 'master_keys_activated', {
        details: `Activated ${activated} master keys`,
        action: 'activate',
        result: 'active',
      });
    }

    return { proposed, activated };
  }

  private async diffAgainstLastRun(
    runId: number,
    comparison: ComparisonResult
  ): Promise<IncrementalChanges | null> {
    const lastRun = await this.store.getLastSuccessfulRun(runId);
    const previous = lastRun ? readSnapshot(lastRun) : null;

    if (!lastRun || !previous) {
      log.info('No previous completed run with a comparison snapshot; skipping incremental diff');
      await this.audit(runId, 'incremental_diff', {
        details: 'No previous completed run to diff against',
        result: 'skipped',
      });
      return null;
    }

    const changes = calculateIncrementalChanges(lastRun.id, previous, createSnapshot(comparison));
    const counts = {
      newKeys: changes.newKeys.length,
      removedKeys: changes.removedKeys.length,
      newlySynchronized: changes.newlySynchronized.length,
      newlyDiverged: changes.newlyDiverged.length,
    };
    log.info(`Calculated incremental changes since run ${lastRun.id}`, counts);
    await this.audit(runId, 'incremental_diff', {
      details: `Changes since run ${lastRun.id}: ${JSON.stringify(counts)}`,
      result: 'success',
    });
    return changes;
  }

  private buildStatistics(input: {
    readonly comparison: ComparisonResult;
    readonly discrepancies: DiscrepancyAnalysis;
    readonly keysTracked: number;
    readonly incrementalChanges: IncrementalChanges | null;
    readonly durationMs: number;
  }): RunStatistics {
    const provisioning = this.provisioner.getStatistics();
    const normalizer = this.normalizer.getStatistics();

    return {
      comparison: input.comparison.statistics,
      unavailableSystems: input.comparison.unavailableSystems,
      discrepancies: input.discrepancies.summary,
      keysTracked: input.keysTracked,
      provisioning: {
        keysProposed: provisioning.keysProposed,
        keysActivated: provisioning.keysActivated,
        keysSkipped: provisioning.keysSkipped,
        keysFailed: provisioning.keysFailed,
        strategy: this.provisioner.getStrategy(),
      },
      normalizer: {
        totalNormalized: normalizer.totalNormalized,
        transformations: normalizer.transformations,
      },
      errors: this.errorHandler.getErrorSummary(),
      incrementalChanges: input.incrementalChanges,
      comparisonSnapshot: createSnapshot(input.comparison),
      durationMs: input.durationMs,
    };
  }

  private async audit(
    runId: number,
    eventType: ReconciliationEventType,
    event: {
      readonly details: string;
      readonly system?: string;
      readonly key?: string;
      readonly action?: string;
      readonly result?: string;
    }
  ): Promise<void> {
    await this.store.logEvent({ runId, eventType, ...event });
  }
}

/**
 * Wire every component from a loaded configuration
 */
export function createOrchestrator(config: KeySyncConfig, store: RunStateStore): ReconciliationOrchestrator {
  const errorHandler = new ErrorHandler(config.errorHandling, config.authoritySystem);
  const normalizer = new KeyNormalizer(config.normalize);
  const comparator = new SystemComparator(normalizer, errorHandler, {
    authoritySystem: config.authoritySystem,
    processing: config.processing,
    retry: createRetryExecutor(
      config.errorHandling,
      (error) => !('code' in error && error.code === 'ENOENT')
    ),
  });
  const provisioner = new MasterKeyProvisioner(store, { config: config.provisioning });

  return new ReconciliationOrchestrator({ store, normalizer, comparator, provisioner, errorHandler });
}

/**
 * Reconcile the configured sources in the configured mode
 */
export async function reconcileFromConfig(
  config: KeySyncConfig,
  store: RunStateStore,
  options: Pick<ReconcileOptions, 'executionMode' | 'mode'> = {}
): Promise<ReconciliationResult> {
  const orchestrator = createOrchestrator(config, store);
  return orchestrator.reconcile({
    systemFiles: getSystemFiles(config),
    mode: options.mode ?? config.processing.mode,
    executionMode: options.executionMode ?? 'normal',
    configSnapshot: toConfigSnapshot(config),
  });
}

/**
 * JSON-friendly copy of the configuration stored with each run
 */
export function toConfigSnapshot(config: KeySyncConfig): Record<string, unknown> {
  return {
    authoritySystem: config.authoritySystem,
    normalize: config.normalize,
    provisioning: config.provisioning,
    processing: config.processing,
    errorHandling: config.errorHandling,
    sources: config.sources,
    configPath: config.configPath,
  };
}
