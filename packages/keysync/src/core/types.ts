/**
 * KeySync Core Types
 *
 * Data model shared by the comparator, provisioner, state store and
 * orchestrator. Sets and maps are exposed read-only: a ComparisonResult is an
 * immutable snapshot once the comparator returns it.
 */

// ============================================================================
// Enumerations
// ============================================================================

export type RunMode = 'full' | 'incremental';

export type ExecutionMode = 'normal' | 'dry-run' | 'auto-approve';

export type RunStatus = 'running' | 'completed' | 'failed';

export type MasterKeyStatus = 'proposed' | 'active' | 'deprecated';

export type ProvisioningStrategy = 'mirror' | 'namespaced';

export type MissingFilePolicy = 'skip' | 'fail';

export type CorruptDataPolicy = 'log' | 'skip' | 'fail';

export const RUN_MODES: readonly RunMode[] = ['full', 'incremental'];
export const MASTER_KEY_STATUSES: readonly MasterKeyStatus[] = ['proposed', 'active', 'deprecated'];
export const PROVISIONING_STRATEGIES: readonly ProvisioningStrategy[] = ['mirror', 'namespaced'];

export function isRunMode(value: string): value is RunMode {
  return value === 'full' || value === 'incremental';
}

export function isMasterKeyStatus(value: string): value is MasterKeyStatus {
  return value === 'proposed' || value === 'active' || value === 'deprecated';
}

export function isProvisioningStrategy(value: string): value is ProvisioningStrategy {
  return value === 'mirror' || value === 'namespaced';
}

// ============================================================================
// Source Records
// ============================================================================

/**
 * One data line of a system's source file
 */
export interface RawKeyRecord {
  readonly system: string;
  readonly rawValue: string;
  /** Every non-key column of the row */
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * normalized key -> distinct raw spellings seen in one system
 */
export type NormalizedKeyGroup = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * (system, raw key) pair a normalized key was observed under
 */
export interface SourceKeyRef {
  readonly system: string;
  readonly rawKey: string;
}

// ============================================================================
// Error Log
// ============================================================================

export type ErrorLogType = 'missing_file' | 'corrupt_data' | 'load_failure' | 'operation_failure';

export interface ErrorLogEntry {
  readonly type: ErrorLogType;
  readonly system: string | null;
  readonly filePath: string | null;
  readonly rowNumber: number | null;
  readonly message: string;
  /** Policy applied (`skip`, `log`, `fail`, `record`) */
  readonly action: string;
  readonly timestamp: string;
}

// ============================================================================
// Comparison
// ============================================================================

export interface ComparisonStatistics {
  readonly totalUniqueKeys: number;
  readonly keysInAuthority: number;
  readonly keysOnlyInAuthority: number;
  readonly keysMissingInAuthority: number;
  readonly keysInAllSystems: number;
  readonly matchPercentage: number;
  readonly systemCounts: Readonly<Record<string, number>>;
  readonly totalKeysProcessed: number;
  readonly duplicateGroups: Readonly<Record<string, number>>;
}

export interface ComparisonResult {
  readonly authoritySystem: string;
  readonly authorityPresent: boolean;
  /** Systems whose data loaded, in input order */
  readonly systems: readonly string[];
  /** Systems whose file was missing or failed to load, in input order */
  readonly unavailableSystems: readonly string[];
  readonly systemKeys: ReadonlyMap<string, NormalizedKeyGroup>;
  readonly allKeys: ReadonlySet<string>;
  readonly keysInAllSystems: ReadonlySet<string>;
  readonly keysOnlyInAuthority: ReadonlySet<string>;
  readonly keysMissingInAuthority: ReadonlySet<string>;
  /** dependent system -> authority keys it lacks */
  readonly systemGaps: ReadonlyMap<string, ReadonlySet<string>>;
  /** system -> duplicate groups (normalized keys with 2+ raw spellings) */
  readonly duplicates: ReadonlyMap<string, NormalizedKeyGroup>;
  readonly statistics: ComparisonStatistics;
  readonly processingErrors: readonly ErrorLogEntry[];
}

// ============================================================================
// Discrepancies
// ============================================================================

export type Discrepancy =
  | {
      readonly kind: 'out_of_authority';
      readonly normalizedKey: string;
      readonly sources: readonly SourceKeyRef[];
    }
  | {
      readonly kind: 'propagation_gap';
      readonly system: string;
      readonly normalizedKey: string;
    }
  | {
      readonly kind: 'duplicate_group';
      readonly system: string;
      readonly normalizedKey: string;
      readonly rawKeys: readonly string[];
    };

export interface DiscrepancySummary {
  readonly totalOutOfAuthority: number;
  readonly totalPropagationGaps: number;
  readonly totalDuplicateGroups: number;
  readonly affectedSystems: readonly string[];
}

export interface DiscrepancyAnalysis {
  readonly discrepancies: readonly Discrepancy[];
  readonly outOfAuthority: ReadonlyMap<string, readonly SourceKeyRef[]>;
  readonly propagationGaps: ReadonlyMap<string, readonly string[]>;
  readonly duplicateGroups: ReadonlyMap<string, NormalizedKeyGroup>;
  readonly summary: DiscrepancySummary;
}

// ============================================================================
// Persistent Records
// ============================================================================

export interface MasterKeyRecord {
  readonly id: number;
  readonly masterKey: string;
  readonly normalizedKey: string | null;
  readonly sourceSystem: string;
  readonly sourceKey: string;
  readonly status: MasterKeyStatus;
  readonly strategy: string;
  readonly runId: number | null;
  readonly createdAt: string;
  readonly activatedAt: string | null;
  readonly deprecatedAt: string | null;
}

export interface CheckpointSummary {
  readonly timestamp: string;
  readonly dataSummary: {
    readonly type: string;
    readonly size: number;
  };
}

/**
 * stage name -> summary, in the order stages were reached
 */
export type CheckpointMap = Readonly<Record<string, CheckpointSummary>>;

export interface ReconciliationRun {
  readonly id: number;
  readonly timestamp: string;
  readonly mode: RunMode;
  readonly executionMode: ExecutionMode;
  readonly status: RunStatus;
  readonly configSnapshot: Readonly<Record<string, unknown>> | null;
  readonly stats: Readonly<Record<string, unknown>> | null;
  readonly checkpoints: CheckpointMap;
  readonly errorMessage: string | null;
  readonly completedAt: string | null;
}

export interface KeyTrackingEntry {
  readonly system: string;
  readonly rawValue: string;
  readonly normalizedKey: string;
  readonly firstSeenAt: string;
  readonly lastSeenAt: string;
  readonly runId: number | null;
}

export interface AuditEventInput {
  readonly runId: number | null;
  readonly eventType: string;
  readonly details: string;
  readonly system?: string;
  readonly key?: string;
  readonly action?: string;
  readonly result?: string;
}

export interface AuditEvent {
  readonly id: number;
  readonly runId: number | null;
  readonly timestamp: string;
  readonly eventType: string;
  readonly details: string | null;
  readonly system: string | null;
  readonly key: string | null;
  readonly action: string | null;
  readonly result: string | null;
}

// ============================================================================
// Incremental Mode
// ============================================================================

/**
 * Minimal comparison state kept in a run's stats for the next incremental diff
 */
export interface ComparisonSnapshot {
  readonly allKeys: readonly string[];
  readonly keysInAllSystems: readonly string[];
}

export interface IncrementalChanges {
  readonly previousRunId: number;
  /** Present now, absent from every system last run */
  readonly newKeys: readonly string[];
  /** Present last run, absent from every system now */
  readonly removedKeys: readonly string[];
  /** In all systems now, not in all systems last run */
  readonly newlySynchronized: readonly string[];
  /** In all systems last run, still present somewhere but no longer in all */
  readonly newlyDiverged: readonly string[];
}
