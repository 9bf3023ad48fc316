/**
 * Run State Store
 *
 * SQLite persistence for reconciliation runs, the master key registry, key
 * presence tracking and the audit log.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, one connection per process
 * - Every mutating call commits immediately (no transaction spans a run)
 * - WAL mode so reports and CLI queries can read while a run writes
 * - Versioned migrations recorded in schema_migrations
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { RunStateError } from '../core/errors.js';
import type {
  AuditEvent,
  AuditEventInput,
  CheckpointMap,
  CheckpointSummary,
  ExecutionMode,
  KeyTrackingEntry,
  MasterKeyRecord,
  MasterKeyStatus,
  ReconciliationRun,
  RunMode,
  RunStatus,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'state-store' });

// ============================================================================
// Public Types
// ============================================================================

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

export interface ProposeMasterKeyInput {
  readonly runId: number;
  readonly masterKey: string;
  readonly normalizedKey: string;
  readonly sourceSystem: string;
  readonly sourceKey: string;
  readonly strategy: string;
}

export interface TrackKeyInput {
  readonly system: string;
  readonly rawValue: string;
  readonly normalizedKey: string;
}

export interface RegistryStatistics {
  readonly totalKeys: number;
  readonly byStatus: Readonly<Record<MasterKeyStatus, number>>;
  readonly byStrategy: Readonly<Record<string, number>>;
  readonly bySourceSystem: Readonly<Record<string, number>>;
}

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface RunRow {
  readonly run_id: number;
  readonly run_timestamp: string;
  readonly run_mode: RunMode;
  readonly execution_mode: ExecutionMode;
  readonly status: RunStatus;
  readonly config_snapshot: string | null;
  readonly stats_json: string | null;
  readonly error_message: string | null;
  readonly checkpoint_data: string | null;
  readonly completed_at: string | null;
}

interface MasterKeyRow {
  readonly master_key_id: number;
  readonly master_key: string;
  readonly normalized_key: string | null;
  readonly source_system: string;
  readonly source_key: string;
  readonly status: MasterKeyStatus;
  readonly provisioning_strategy: string;
  readonly created_at: string;
  readonly activated_at: string | null;
  readonly deprecated_at: string | null;
  readonly run_id: number | null;
}

interface KeyTrackingRow {
  readonly tracking_id: number;
  readonly system_name: string;
  readonly key_value: string;
  readonly normalized_key: string;
  readonly first_seen_at: string;
  readonly last_seen_at: string;
  readonly run_id: number | null;
}

interface AuditRow {
  readonly audit_id: number;
  readonly timestamp: string;
  readonly run_id: number | null;
  readonly event_type: string;
  readonly event_details: string | null;
  readonly system_name: string | null;
  readonly key_value: string | null;
  readonly action_taken: string | null;
  readonly result: string | null;
}

interface CountRow {
  readonly label: string;
  readonly count: number;
}

// Stored JSON is re-validated on the way out
const JsonObjectSchema = z.record(z.unknown());

const CheckpointSchema = z.object({
  timestamp: z.string(),
  dataSummary: z.object({
    type: z.string(),
    size: z.number(),
  }),
});

export const DEFAULT_DATABASE_PATH = './data/keysync.db';

// ============================================================================
// Run State Store
// ============================================================================

export class RunStateStore {
  private db: Database.Database;

  constructor(dbPath: string = DEFAULT_DATABASE_PATH) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);

    // Enable WAL mode for concurrent reads
    this.db.pragma('journal_mode = WAL');

    // Enable foreign keys
    this.db.pragma('foreign_keys = ON');

    this.db.pragma('synchronous = NORMAL');
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  /**
   * Run all pending migrations
   */
  async runMigrations(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = await this.getDatabaseVersion();
    const migrations = this.getMigrations();

    const runMigrations = this.db.transaction(() => {
      for (const migration of migrations) {
        if (migration.version > currentVersion) {
          migration.up(this.db);
          this.db
            .prepare<[number, string]>('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
          log.debug(`Applied migration ${migration.version}: ${migration.name}`);
        }
      }
    });

    runMigrations();
  }

  /**
   * @returns Current schema version (0 if no migrations applied)
   */
  async getDatabaseVersion(): Promise<number> {
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  private getMigrations(): readonly Migration[] {
    return [
      {
        version: 1,
        name: 'initial_schema',
        up: (db) => {
          db.exec(`
            CREATE TABLE reconciliation_runs (
              run_id INTEGER PRIMARY KEY AUTOINCREMENT,
              run_timestamp TEXT NOT NULL,
              run_mode TEXT NOT NULL CHECK (run_mode IN ('full', 'incremental')),
              execution_mode TEXT NOT NULL CHECK (execution_mode IN ('normal', 'dry-run', 'auto-approve')),
              status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'failed')),
              config_snapshot TEXT,
              stats_json TEXT,
              error_message TEXT,
              checkpoint_data TEXT,
              completed_at TEXT
            );

            CREATE TABLE master_key_registry (
              master_key_id INTEGER PRIMARY KEY AUTOINCREMENT,
              master_key TEXT NOT NULL UNIQUE,
              normalized_key TEXT,
              source_system TEXT NOT NULL,
              source_key TEXT NOT NULL,
              status TEXT NOT NULL CHECK (status IN ('proposed', 'active', 'deprecated')),
              provisioning_strategy TEXT NOT NULL,
              created_at TEXT NOT NULL,
              activated_at TEXT,
              deprecated_at TEXT,
              run_id INTEGER REFERENCES reconciliation_runs(run_id)
            );

            CREATE TABLE key_tracking (
              tracking_id INTEGER PRIMARY KEY AUTOINCREMENT,
              system_name TEXT NOT NULL,
              key_value TEXT NOT NULL,
              normalized_key TEXT NOT NULL,
              first_seen_at TEXT NOT NULL,
              last_seen_at TEXT NOT NULL,
              run_id INTEGER REFERENCES reconciliation_runs(run_id),
              UNIQUE (system_name, normalized_key)
            );

            CREATE TABLE audit_log (
              audit_id INTEGER PRIMARY KEY AUTOINCREMENT,
              timestamp TEXT NOT NULL,
              run_id INTEGER REFERENCES reconciliation_runs(run_id),
              event_type TEXT NOT NULL,
              event_details TEXT,
              system_name TEXT,
              key_value TEXT,
              action_taken TEXT,
              result TEXT
            );

            CREATE INDEX idx_runs_timestamp ON reconciliation_runs(run_timestamp DESC);
            CREATE INDEX idx_master_key_status ON master_key_registry(status, created_at DESC);
            CREATE INDEX idx_master_key_normalized ON master_key_registry(normalized_key, status);
            CREATE INDEX idx_audit_log_run ON audit_log(run_id, timestamp DESC);
          `);
        },
      },
    ];
  }

  // ============================================================================
  // Run Lifecycle
  // ============================================================================

  /**
   * Insert a new run in `running` state
   *
   * @returns Run ID
   */
  async startRun(
    mode: RunMode,
    executionMode: ExecutionMode,
    configSnapshot: object
  ): Promise<number> {
    const result = this.db
      .prepare<[string, RunMode, ExecutionMode, string]>(`
        INSERT INTO reconciliation_runs (run_timestamp, run_mode, execution_mode, status, config_snapshot)
        VALUES (?, ?, ?, 'running', ?)
      `)
      .run(new Date().toISOString(), mode, executionMode, JSON.stringify(configSnapshot));

    return Number(result.lastInsertRowid);
  }

  /**
   * Move a running run to `failed` (when `error` is given) or `completed`
   *
   * @throws RunStateError if the run does not exist or is no longer running
   */
  async completeRun(
    runId: number,
    stats: object,
    error?: string
  ): Promise<void> {
    const status: RunStatus = error === undefined ? 'completed' : 'failed';

    const result = this.db
      .prepare<[RunStatus, string, string | null, string, number]>(`
        UPDATE reconciliation_runs
        SET status = ?, stats_json = ?, error_message = ?, completed_at = ?
        WHERE run_id = ? AND status = 'running'
      `)
      .run(status, JSON.stringify(stats), error ?? null, new Date().toISOString(), runId);

    if (result.changes === 0) {
      const run = await this.getRun(runId);
      if (!run) {
        throw new RunStateError(`Run ${runId} not found`, runId);
      }
      throw new RunStateError(`Run ${runId} is already ${run.status}`, runId);
    }
  }

  /**
   * Replace the run's checkpoint summaries. Finished runs keep their last
   * checkpoints.
   */
  async saveCheckpoint(runId: number, checkpoints: CheckpointMap): Promise<void> {
    this.db
      .prepare<[string, number]>(
        "UPDATE reconciliation_runs SET checkpoint_data = ? WHERE run_id = ? AND status = 'running'"
      )
      .run(JSON.stringify(checkpoints), runId);
  }

  async getRun(runId: number): Promise<ReconciliationRun | null> {
    const row = this.db
      .prepare<[number], RunRow>('SELECT * FROM reconciliation_runs WHERE run_id = ?')
      .get(runId);
    return row ? this.rowToRun(row) : null;
  }

  /**
   * @returns Runs, newest first
   */
  async listRuns(limit = 10): Promise<readonly ReconciliationRun[]> {
    const rows = this.db
      .prepare<[number], RunRow>(`
        SELECT * FROM reconciliation_runs
        ORDER BY run_timestamp DESC, run_id DESC
        LIMIT ?
      `)
      .all(limit);
    return rows.map((row) => this.rowToRun(row));
  }

  /**
   * Most recent completed run, optionally excluding one (the current run)
   */
  async getLastSuccessfulRun(excludeRunId?: number): Promise<ReconciliationRun | null> {
    const row = this.db
      .prepare<[number], RunRow>(`
        SELECT * FROM reconciliation_runs
        WHERE status = 'completed' AND run_id != ?
        ORDER BY run_timestamp DESC, run_id DESC
        LIMIT 1
      `)
      .get(excludeRunId ?? -1);
    return row ? this.rowToRun(row) : null;
  }

  // ============================================================================
  // Key Tracking
  // ============================================================================

  /**
   * Upsert key presence rows in one transaction
   *
   * New (system, normalized key) pairs are inserted; known pairs get a new
   * last-seen timestamp and owning run. The first raw spelling is kept.
   *
   * @returns Number of entries written
   */
  async trackKeys(runId: number, entries: readonly TrackKeyInput[]): Promise<number> {
    const now = new Date().toISOString();
    const stmt = this.db.prepare<[string, string, string, string, string, number]>(`
      INSERT INTO key_tracking (system_name, key_value, normalized_key, first_seen_at, last_seen_at, run_id)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (system_name, normalized_key)
      DO UPDATE SET last_seen_at = excluded.last_seen_at, run_id = excluded.run_id
    `);

    const trackTx = this.db.transaction((batch: readonly TrackKeyInput[]) => {
      for (const entry of batch) {
        stmt.run(entry.system, entry.rawValue, entry.normalizedKey, now, now, runId);
      }
    });

    trackTx(entries);
    return entries.length;
  }

  async getTrackedKeys(system?: string): Promise<readonly KeyTrackingEntry[]> {
    const rows =
      system === undefined
        ? this.db
            .prepare<[], KeyTrackingRow>(
              'SELECT * FROM key_tracking ORDER BY system_name, normalized_key'
            )
            .all()
        : this.db
            .prepare<[string], KeyTrackingRow>(
              'SELECT * FROM key_tracking WHERE system_name = ? ORDER BY normalized_key'
            )
            .all(system);

    return rows.map((row) => ({
      system: row.system_name,
      rawValue: row.key_value,
      normalizedKey: row.normalized_key,
      firstSeenAt: row.first_seen_at,
      lastSeenAt: row.last_seen_at,
      runId: row.run_id,
    }));
  }

  // ============================================================================
  // Audit Log
  // ============================================================================

  async logEvent(event: AuditEventInput): Promise<number> {
    const result = this.db
      .prepare<
        [string, number | null, string, string, string | null, string | null, string | null, string | null]
      >(`
        INSERT INTO audit_log
          (timestamp, run_id, event_type, event_details, system_name, key_value, action_taken, result)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        new Date().toISOString(),
        event.runId,
        event.eventType,
        event.details,
        event.system ?? null,
        event.key ?? null,
        event.action ?? null,
        event.result ?? null
      );

    return Number(result.lastInsertRowid);
  }

  /**
   * @returns Events in insertion order, for one run or all runs
   */
  async getAuditEvents(runId?: number): Promise<readonly AuditEvent[]> {
    const rows =
      runId === undefined
        ? this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY audit_id').all()
        : this.db
            .prepare<[number], AuditRow>('SELECT * FROM audit_log WHERE run_id = ? ORDER BY audit_id')
            .all(runId);

    return rows.map((row) => ({
      id: row.audit_id,
      runId: row.run_id,
      timestamp: row.timestamp,
      eventType: row.event_type,
      details: row.event_details,
      system: row.system_name,
      key: row.key_value,
      action: row.action_taken,
      result: row.result,
    }));
  }

  // ============================================================================
  // Master Key Registry
  // ============================================================================

  /**
   * Find a live (proposed or active) record for a normalized key, or one that
   * already holds the given master key
   */
  async findLiveMasterKey(normalizedKey: string, masterKey: string): Promise<MasterKeyRecord | null> {
    const row = this.db
      .prepare<[string, string], MasterKeyRow>(`
        SELECT * FROM master_key_registry
        WHERE status IN ('proposed', 'active')
          AND (normalized_key = ? OR master_key = ?)
        ORDER BY master_key_id
        LIMIT 1
      `)
      .get(normalizedKey, masterKey);
    return row ? rowToMasterKey(row) : null;
  }

  /**
   * Insert a `proposed` record
   *
   * @returns Master key ID
   * @throws SqliteError on a master_key uniqueness violation
   */
  async proposeMasterKey(input: ProposeMasterKeyInput): Promise<number> {
    const result = this.db
      .prepare<[string, string, string, string, string, string, number]>(`
        INSERT INTO master_key_registry
          (master_key, normalized_key, source_system, source_key, status, provisioning_strategy, created_at, run_id)
        VALUES (?, ?, ?, ?, 'proposed', ?, ?, ?)
      `)
      .run(
        input.masterKey,
        input.normalizedKey,
        input.sourceSystem,
        input.sourceKey,
        input.strategy,
        new Date().toISOString(),
        input.runId
      );

    return Number(result.lastInsertRowid);
  }

  /**
   * Flip every `proposed` record of a run to `active`
   *
   * @returns Number of records activated
   */
  async activateMasterKeys(runId: number): Promise<number> {
    const result = this.db
      .prepare<[string, number]>(`
        UPDATE master_key_registry
        SET status = 'active', activated_at = ?
        WHERE run_id = ? AND status = 'proposed'
      `)
      .run(new Date().toISOString(), runId);
    return result.changes;
  }

  /**
   * Retire a record. Deprecation is terminal.
   *
   * @returns false if the record does not exist or is already deprecated
   */
  async deprecateMasterKey(masterKeyId: number): Promise<boolean> {
    const result = this.db
      .prepare<[string, number]>(`
        UPDATE master_key_registry
        SET status = 'deprecated', deprecated_at = ?
        WHERE master_key_id = ? AND status != 'deprecated'
      `)
      .run(new Date().toISOString(), masterKeyId);
    return result.changes > 0;
  }

  /**
   * @returns Records, newest first
   */
  async getMasterKeys(status?: MasterKeyStatus): Promise<readonly MasterKeyRecord[]> {
    const rows =
      status === undefined
        ? this.db
            .prepare<[], MasterKeyRow>(
              'SELECT * FROM master_key_registry ORDER BY created_at DESC, master_key_id DESC'
            )
            .all()
        : this.db
            .prepare<[MasterKeyStatus], MasterKeyRow>(`
              SELECT * FROM master_key_registry WHERE status = ?
              ORDER BY created_at DESC, master_key_id DESC
            `)
            .all(status);
    return rows.map(rowToMasterKey);
  }

  /**
   * @returns Records proposed by one run, in proposal order
   */
  async getMasterKeysForRun(runId: number): Promise<readonly MasterKeyRecord[]> {
    const rows = this.db
      .prepare<[number], MasterKeyRow>(
        'SELECT * FROM master_key_registry WHERE run_id = ? ORDER BY master_key_id'
      )
      .all(runId);
    return rows.map(rowToMasterKey);
  }

  async getRegistryStatistics(): Promise<RegistryStatistics> {
    const countBy = (column: 'status' | 'provisioning_strategy' | 'source_system'): CountRow[] =>
      this.db
        .prepare<[], CountRow>(
          `SELECT ${column} AS label, COUNT(*) AS count FROM master_key_registry GROUP BY ${column} ORDER BY ${column}`
        )
        .all();

    const byStatus: Record<MasterKeyStatus, number> = { proposed: 0, active: 0, deprecated: 0 };
    let totalKeys = 0;
    for (const row of countBy('status')) {
      totalKeys += row.count;
      if (row.label === 'proposed' || row.label === 'active' || row.label === 'deprecated') {
        byStatus[row.label] = row.count;
      }
    }

    return {
      totalKeys,
      byStatus,
      byStrategy: toCountRecord(countBy('provisioning_strategy')),
      bySourceSystem: toCountRecord(countBy('source_system')),
    };
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  // ============================================================================
  // Row Mapping
  // ============================================================================

  private rowToRun(row: RunRow): ReconciliationRun {
    return {
      id: row.run_id,
      timestamp: row.run_timestamp,
      mode: row.run_mode,
      executionMode: row.execution_mode,
      status: row.status,
      configSnapshot: parseJsonObject(row.config_snapshot, row.run_id, 'config_snapshot'),
      stats: parseJsonObject(row.stats_json, row.run_id, 'stats_json'),
      checkpoints: parseCheckpoints(row.checkpoint_data, row.run_id),
      errorMessage: row.error_message,
      completedAt: row.completed_at,
    };
  }
}

function rowToMasterKey(row: MasterKeyRow): MasterKeyRecord {
  return {
    id: row.master_key_id,
    masterKey: row.master_key,
    normalizedKey: row.normalized_key,
    sourceSystem: row.source_system,
    sourceKey: row.source_key,
    status: row.status,
    strategy: row.provisioning_strategy,
    runId: row.run_id,
    createdAt: row.created_at,
    activatedAt: row.activated_at,
    deprecatedAt: row.deprecated_at,
  };
}

function toCountRecord(rows: readonly CountRow[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    counts[row.label] = row.count;
  }
  return counts;
}

function parseJson(text: string, runId: number, column: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    log.warn(`Run ${runId} has unreadable ${column}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function parseJsonObject(
  text: string | null,
  runId: number,
  column: string
): Record<string, unknown> | null {
  if (text === null) return null;
  const result = JsonObjectSchema.safeParse(parseJson(text, runId, column));
  return result.success ? result.data : null;
}

/**
 * Checkpoints that fail validation are dropped so recovery only sees usable ones
 */
function parseCheckpoints(text: string | null, runId: number): CheckpointMap {
  if (text === null) return {};
  const raw = JsonObjectSchema.safeParse(parseJson(text, runId, 'checkpoint_data'));
  if (!raw.success) return {};

  const checkpoints: Record<string, CheckpointSummary> = {};
  for (const [name, value] of Object.entries(raw.data)) {
    const checkpoint = CheckpointSchema.safeParse(value);
    if (checkpoint.success) {
      checkpoints[name] = checkpoint.data;
    } else {
      log.warn(`Run ${runId} has an invalid checkpoint '${name}'`);
    }
  }
  return checkpoints;
}
