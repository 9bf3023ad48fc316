/**
 * Reconciliation Orchestrator Type Definitions
 */

import type {
  ComparisonResult,
  ComparisonSnapshot,
  ComparisonStatistics,
  DiscrepancyAnalysis,
  DiscrepancySummary,
  ExecutionMode,
  IncrementalChanges,
  ProvisioningStrategy,
  RunMode,
} from '../core/types.js';
import type { TransformationKind } from '../core/key-normalizer.js';
import type { ErrorSummary } from './error-handler.js';
import type { ProposedMasterKey } from './master-key-provisioner.js';

/**
 * Named stages a run records a checkpoint after
 */
export type CheckpointStage = 'comparison_complete' | 'discrepancy_analysis_complete';

/**
 * Audit event types written by the orchestrator
 */
export type ReconciliationEventType =
  | 'run_started'
  | 'run_recovered'
  | 'keys_tracked'
  | 'master_key_proposed'
  | 'master_keys_activated'
  | 'incremental_diff'
  | 'reconciliation_complete'
  | 'reconciliation_failed';

export interface ReconcileOptions {
  /** system name -> CSV path */
  readonly systemFiles: Readonly<Record<string, string>>;
  readonly mode?: RunMode;
  readonly executionMode?: ExecutionMode;
  /** Stored with the run; `systemFiles` is always added */
  readonly configSnapshot?: Readonly<Record<string, unknown>>;
  /** Set when this run restarts a failed one */
  readonly recoveredFrom?: {
    readonly runId: number;
    readonly checkpointName: string;
  };
}

export interface ProvisioningOutcome {
  readonly proposed: readonly ProposedMasterKey[];
  readonly activated: number;
}

/**
 * Aggregate statistics stored with a completed run (JSON-serializable)
 */
export interface RunStatistics {
  readonly comparison: ComparisonStatistics;
  readonly unavailableSystems: readonly string[];
  readonly discrepancies: DiscrepancySummary;
  readonly keysTracked: number;
  readonly provisioning: {
    readonly keysProposed: number;
    readonly keysActivated: number;
    readonly keysSkipped: number;
    readonly keysFailed: number;
    readonly strategy: ProvisioningStrategy;
  };
  readonly normalizer: {
    readonly totalNormalized: number;
    readonly transformations: Readonly<Record<TransformationKind, number>>;
  };
  readonly errors: ErrorSummary;
  readonly incrementalChanges: IncrementalChanges | null;
  /** Read by the next incremental run */
  readonly comparisonSnapshot: ComparisonSnapshot;
  readonly durationMs: number;
}

export interface ReconciliationResult {
  readonly runId: number;
  readonly timestamp: string;
  readonly mode: RunMode;
  readonly executionMode: ExecutionMode;
  readonly comparison: ComparisonResult;
  readonly discrepancies: DiscrepancyAnalysis;
  /** Null when there was nothing out of authority */
  readonly provisioning: ProvisioningOutcome | null;
  /** Null outside incremental mode or without a previous completed run */
  readonly incrementalChanges: IncrementalChanges | null;
  readonly stats: RunStatistics;
}
