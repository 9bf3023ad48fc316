/**
 * KeySync
 *
 * Cross-system key reconciliation: normalize keys from every system, compare
 * them against the authority, provision master keys for keys the authority
 * lacks, and keep a durable record of every run.
 *
 * @example
 * ```typescript
 * import { loadConfig, RunStateStore, reconcileFromConfig } from '@keysync/reconciler';
 *
 * const config = await loadConfig({ configPath: 'keysync-config.yaml' });
 * const store = new RunStateStore(config.database.path);
 * await store.runMigrations();
 * const result = await reconcileFromConfig(config, store);
 * store.close();
 * ```
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  loadConfig,
  buildConfig,
  parseConfigFile,
  validateConfig,
  getSystemFiles,
  resolveConfigPath,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  type KeySyncConfig,
  type NormalizerConfig,
  type ProvisioningConfig,
  type ProcessingConfig,
  type ErrorHandlingConfig,
  type SourceConfig,
  type SandboxConfig,
  type LoadConfigOptions,
} from './core/config.js';
export { KeyNormalizer, type NormalizerStatistics, type TransformationKind } from './core/key-normalizer.js';
export { SystemComparator, type SystemComparatorOptions } from './core/system-comparator.js';
export { parseCSV, parseCSVLine, type ParsedCSV, type ParsedCSVRow } from './core/utils/csv.js';
export { createLogger, configureLogging, Logger, type LogLevel } from './core/utils/logger.js';

// Persistence
export {
  RunStateStore,
  DEFAULT_DATABASE_PATH,
  type ProposeMasterKeyInput,
  type RegistryStatistics,
  type TrackKeyInput,
} from './persistence/run-state-store.js';

// Resilience
export {
  RetryExecutor,
  RetryExhaustedError,
  createRetryExecutor,
  type RetryAttempt,
  type RetryConfig,
} from './resilience/retry.js';

// Services
export { ErrorHandler, type CheckpointRecovery, type ErrorSummary } from './services/error-handler.js';
export {
  MasterKeyProvisioner,
  selectFirstSource,
  type MasterKeyProvisionerOptions,
  type ProposedMasterKey,
  type ProvisioningStatistics,
  type ProvisioningSummary,
  type SourceSelector,
} from './services/master-key-provisioner.js';
export { analyzeDiscrepancies } from './services/discrepancy-analyzer.js';
export {
  calculateIncrementalChanges,
  createSnapshot,
  readSnapshot,
  SNAPSHOT_STATS_KEY,
} from './services/incremental-diff.js';
export {
  ReconciliationOrchestrator,
  createOrchestrator,
  reconcileFromConfig,
  toConfigSnapshot,
  type OrchestratorDependencies,
} from './services/reconciliation-orchestrator.js';
export type * from './services/reconciliation-orchestrator.types.js';
export { ReportWriter, REPORT_FILES, detailsFileName } from './services/report-writer.js';
export {
  SandboxStateManager,
  createSandboxManager,
  ensureKeys,
  ensureSystems,
  loadKeysFromFile,
  sanitizeKey,
  SANDBOX_STATUSES,
  type KeyRename,
  type SandboxRecord,
  type SandboxStatus,
  type SandboxStatusReport,
  type SnapshotInfo,
  type SnapshotMetadata,
} from './services/sandbox-state.js';
