/**
 * Sandbox State Manager
 *
 * Interactive editing of the system CSV exports the reconciliation reads:
 * seed a synchronized baseline, add, remove and rename keys per system, and
 * save or restore named snapshots of every file.
 *
 * Mutations are ordered through a promise chain, applied to a copy of the
 * in-memory state and committed only after every file has been written.
 * Each system file is written atomically under its own `.lock` file, and
 * snapshot saves and loads hold `<snapshotDir>/.sandbox_snapshot.lock`, so
 * concurrent CLI processes do not interleave.
 */

import { existsSync } from 'node:fs';
import { mkdir, readdir, readFile, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { z } from 'zod';
import { formatCsv, type TableColumn } from '../cli/lib/output.js';
import { getSystemFiles, resolveConfigPath, type KeySyncConfig } from '../core/config.js';
import { SandboxError } from '../core/errors.js';
import { atomicWriteFile, atomicWriteJSON } from '../core/utils/atomic-write.js';
import { parseCSV } from '../core/utils/csv.js';
import { FileLock } from '../core/utils/file-lock.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'sandbox' });

// ============================================================================
// Types
// ============================================================================

export const SANDBOX_STATUSES = ['active', 'inactive', 'proposed'] as const;
export type SandboxStatus = (typeof SANDBOX_STATUSES)[number];

function isSandboxStatus(value: string): value is SandboxStatus {
  return value === 'active' || value === 'inactive' || value === 'proposed';
}

export interface SandboxRecord {
  readonly key: string;
  readonly system: string;
  readonly lastSeenAt: Date;
  readonly status: SandboxStatus;
}

export interface SandboxOptions {
  /** system name -> CSV file path */
  readonly systemFiles: Readonly<Record<string, string>>;
  readonly snapshotDir: string;
  /** Per-system key cap (default 10000) */
  readonly maxKeys?: number;
  /** Prefix of generated baseline keys (default `CUST`) */
  readonly defaultKeyPrefix?: string;
  /** Clock for record and snapshot timestamps */
  readonly now?: () => Date;
}

export interface SystemSandboxSummary {
  readonly total: number;
  /** Keys held by this system alone */
  readonly unique: number;
  /** Keys some other system holds and this one lacks */
  readonly missingFromUnion: number;
}

export interface SandboxStatusReport {
  readonly systems: Readonly<Record<string, SystemSandboxSummary>>;
  readonly totalUniqueKeys: number;
  readonly keysCommonToAll: number;
  /** system -> sorted keys it lacks */
  readonly discrepancies: Readonly<Record<string, readonly string[]>>;
  readonly snapshotCount: number;
}

export interface AddKeysResult {
  readonly added: number;
  readonly bySystem: Readonly<Record<string, readonly string[]>>;
}

export interface RemoveKeysOptions {
  readonly keys?: readonly string[];
  /** Defaults to every system */
  readonly systems?: readonly string[];
  /** Case-insensitive substring */
  readonly pattern?: string;
}

export type KeyRename = readonly [oldKey: string, newKey: string];

export const SnapshotMetadataSchema = z
  .object({
    name: z.string().min(1),
    created_at: z.string(),
    systems: z.array(z.string()),
    creator: z.string(),
    description: z.string().optional(),
  })
  .passthrough();

export type SnapshotMetadata = z.infer<typeof SnapshotMetadataSchema>;

export interface SnapshotInfo {
  readonly path: string;
  /** null when metadata.json is missing or invalid */
  readonly metadata: SnapshotMetadata | null;
}

type SystemRecords = Map<string, SandboxRecord>;
type SandboxRecords = Map<string, SystemRecords>;

const SNAPSHOT_LOCK_NAME = '.sandbox_snapshot';
const METADATA_FILE = 'metadata.json';

const SANDBOX_COLUMNS: readonly TableColumn<SandboxRecord>[] = [
  { key: 'key', header: 'key' },
  {
    key: 'lastSeenAt',
    header: 'last_seen_at',
    formatter: (value) => (value instanceof Date ? formatTimestamp(value) : String(value ?? '')),
  },
  { key: 'system', header: 'system' },
  { key: 'status', header: 'status' },
];

// ============================================================================
// Input Helpers
// ============================================================================

/** `YYYY-MM-DDTHH:MM:SS` in UTC */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

function parseTimestamp(value: string | undefined, fallback: Date): Date {
  if (!value) return fallback;
  const parsed = new Date(`${value.trim().replace(/Z$/, '')}Z`);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}

/**
 * @throws SandboxError for a blank key
 */
export function sanitizeKey(rawKey: string): string {
  const key = rawKey.trim();
  if (!key) {
    throw new SandboxError('Key value cannot be empty');
  }
  return key;
}

/**
 * Sanitize keys and drop repeats, keeping first-seen order
 *
 * @throws SandboxError when no key remains
 */
export function ensureKeys(keys: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const raw of keys) {
    seen.add(sanitizeKey(raw));
  }
  if (seen.size === 0) {
    throw new SandboxError('No valid keys supplied');
  }
  return [...seen];
}

/**
 * Match requested systems case-insensitively against the configured ones
 *
 * @returns Configured system names, sorted
 * @throws SandboxError for an empty request or an unknown system
 */
export function ensureSystems(systems: Iterable<string>, allowed: readonly string[]): string[] {
  const byUpper = new Map(allowed.map((system) => [system.toUpperCase(), system]));
  const requested = new Set<string>();
  const unknown = new Set<string>();

  for (const raw of systems) {
    const upper = raw.trim().toUpperCase();
    if (!upper) continue;
    const system = byUpper.get(upper);
    if (system === undefined) {
      unknown.add(upper);
    } else {
      requested.add(system);
    }
  }

  if (unknown.size > 0) {
    throw new SandboxError(`Unsupported systems requested: ${[...unknown].sort().join(', ')}`);
  }
  if (requested.size === 0) {
    throw new SandboxError('At least one system must be specified');
  }
  return [...requested].sort();
}

/**
 * Read keys from a CSV file with a `key` column, or one key per line otherwise
 */
export async function loadKeysFromFile(filePath: string): Promise<string[]> {
  if (!existsSync(filePath)) {
    throw new SandboxError(`Key source not found: ${filePath}`);
  }
  const content = await readFile(filePath, 'utf-8');

  if (extname(filePath).toLowerCase() !== '.csv') {
    return ensureKeys(content.split(/\r?\n/).filter((line) => line.trim()));
  }

  const parsed = parseCSV(content);
  const keyIndex = parsed.headers.indexOf('key');
  if (keyIndex === -1) {
    throw new SandboxError(`CSV file ${filePath} must contain a 'key' column`);
  }
  return ensureKeys(parsed.rows.map((row) => row.values[keyIndex] ?? ''));
}

function isDirectory(path: string): Promise<boolean> {
  return stat(path).then(
    (stats) => stats.isDirectory(),
    () => false
  );
}

// ============================================================================
// Manager
// ============================================================================

export class SandboxStateManager {
  readonly allowedSystems: readonly string[];
  readonly snapshotDir: string;
  readonly maxKeys: number;
  readonly defaultKeyPrefix: string;

  private readonly systemFiles: Readonly<Record<string, string>>;
  private readonly now: () => Date;
  private records: SandboxRecords;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: SandboxOptions) {
    this.systemFiles = options.systemFiles;
    this.allowedSystems = Object.keys(options.systemFiles).sort();
    this.snapshotDir = options.snapshotDir;
    this.maxKeys = options.maxKeys ?? 10000;
    this.defaultKeyPrefix = options.defaultKeyPrefix ?? 'CUST';
    this.now = options.now ?? (() => new Date());
    this.records = this.emptyRecords();

    if (this.allowedSystems.length === 0) {
      throw new SandboxError('Sandbox needs at least one system file');
    }
  }

  // ==========================================================================
  // State lifecycle
  // ==========================================================================

  /**
   * Read every system file; missing files load as empty systems
   */
  async load(): Promise<void> {
    const records = this.emptyRecords();
    for (const system of this.allowedSystems) {
      records.set(system, await this.readSystem(system));
    }
    this.records = records;
  }

  /**
   * Keys currently held by a system, in file order
   */
  getKeys(system: string): string[] {
    return [...(this.records.get(system)?.keys() ?? [])];
  }

  getRecord(system: string, key: string): SandboxRecord | undefined {
    return this.records.get(system)?.get(key);
  }

  // ==========================================================================
  // Core operations
  // ==========================================================================

  /**
   * Replace every system with the same `keyCount` generated keys
   * (`<prefix>-00001`, ...)
   */
  async initialize(keyCount: number): Promise<void> {
    if (!Number.isInteger(keyCount) || keyCount <= 0) {
      throw new SandboxError('Key count must be greater than zero');
    }

    await this.mutate((records, timestamp) => {
      for (const system of this.allowedSystems) {
        const systemRecords: SystemRecords = new Map();
        for (let i = 1; i <= keyCount; i++) {
          const key = `${this.defaultKeyPrefix}-${String(i).padStart(5, '0')}`;
          systemRecords.set(key, { key, system, lastSeenAt: timestamp, status: 'active' });
        }
        records.set(system, systemRecords);
      }
    });
    log.info(`Initialized sandbox with ${keyCount} keys per system`);
  }

  /**
   * Empty every system file
   */
  async clear(): Promise<void> {
    await this.mutate((records) => {
      for (const system of this.allowedSystems) {
        records.set(system, new Map());
      }
    });
    log.info('Cleared sandbox state');
  }

  /**
   * Add keys to the given systems; keys a system already holds are left alone
   */
  async addKeys(keys: Iterable<string>, systems: Iterable<string>): Promise<AddKeysResult> {
    const keyList = ensureKeys(keys);
    const targets = ensureSystems(systems, this.allowedSystems);
    const bySystem: Record<string, string[]> = {};

    await this.mutate((records, timestamp) => {
      for (const system of targets) {
        const systemRecords = records.get(system) ?? new Map<string, SandboxRecord>();
        const added: string[] = [];
        for (const key of keyList) {
          if (!systemRecords.has(key)) {
            systemRecords.set(key, { key, system, lastSeenAt: timestamp, status: 'active' });
            added.push(key);
          }
        }
        records.set(system, systemRecords);
        bySystem[system] = added;
      }
    });

    const added = Object.values(bySystem).reduce((sum, list) => sum + list.length, 0);
    log.info(`Added ${added} keys across systems ${targets.join(', ')}`);
    return { added, bySystem };
  }

  /**
   * Remove the listed keys and every key containing `pattern`
   *
   * @returns system -> removed keys
   */
  async removeKeys(options: RemoveKeysOptions): Promise<Record<string, string[]>> {
    const pattern = options.pattern?.trim().toUpperCase() ?? '';
    const explicit =
      options.keys !== undefined && options.keys.length > 0 ? ensureKeys(options.keys) : [];
    if (explicit.length === 0 && !pattern) {
      throw new SandboxError('Specify keys and/or a pattern to remove');
    }

    const targets = ensureSystems(options.systems ?? this.allowedSystems, this.allowedSystems);
    const keySet = new Set(explicit);
    const removed: Record<string, string[]> = {};

    await this.mutate((records) => {
      for (const system of targets) {
        const systemRecords = records.get(system) ?? new Map<string, SandboxRecord>();
        const systemRemoved: string[] = [];
        for (const key of [...systemRecords.keys()]) {
          if (keySet.has(key) || (pattern && key.toUpperCase().includes(pattern))) {
            systemRecords.delete(key);
            systemRemoved.push(key);
          }
        }
        removed[system] = systemRemoved;
      }
    });

    log.info(`Removed keys across systems ${targets.join(', ')}`);
    return removed;
  }

  /**
   * Rename keys in the given systems. A rename onto a key the system already
   * holds replaces that record.
   *
   * @returns system -> applied renames
   */
  async modifyKeys(
    renames: readonly KeyRename[],
    systems?: readonly string[]
  ): Promise<Record<string, KeyRename[]>> {
    if (renames.length === 0) {
      throw new SandboxError('No replacements provided');
    }
    const pairs = renames.map(([oldKey, newKey]): KeyRename => [sanitizeKey(oldKey), sanitizeKey(newKey)]);
    const targets = ensureSystems(systems ?? this.allowedSystems, this.allowedSystems);
    const changes: Record<string, KeyRename[]> = {};
    for (const system of targets) {
      changes[system] = [];
    }

    await this.mutate((records, timestamp) => {
      for (const [oldKey, newKey] of pairs) {
        if (oldKey === newKey) continue;
        for (const system of targets) {
          const systemRecords = records.get(system);
          const record = systemRecords?.get(oldKey);
          if (!systemRecords || !record) continue;
          systemRecords.delete(oldKey);
          systemRecords.set(newKey, { ...record, key: newKey, lastSeenAt: timestamp });
          changes[system]?.push([oldKey, newKey]);
        }
      }
    });

    return changes;
  }

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  /**
   * Copy the current state into `<snapshotDir>/<YYYYMMDD-HHMMSS>_<name>/`
   * with a `metadata.json` beside the system files
   *
   * @returns The snapshot directory
   */
  async saveSnapshot(name: string, metadata: Readonly<Record<string, string>> = {}): Promise<string> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new SandboxError('Snapshot name is required');
    }
    if (/[\\/]|\.\./.test(trimmed)) {
      throw new SandboxError(`Snapshot name must not contain path separators: ${trimmed}`);
    }

    return this.enqueue(async () => {
      const createdAt = this.now();
      const stamp = formatTimestamp(createdAt).replace(/-/g, '').replace('T', '-').replace(/:/g, '');
      const snapshotPath = join(this.snapshotDir, `${stamp}_${trimmed.replace(/ /g, '_')}`);

      await mkdir(this.snapshotDir, { recursive: true });
      await this.snapshotLock().withLock(async () => {
        if (existsSync(snapshotPath)) {
          throw new SandboxError(`Snapshot already exists: ${snapshotPath}`);
        }
        await mkdir(snapshotPath);
        for (const system of this.allowedSystems) {
          await atomicWriteFile(
            join(snapshotPath, this.snapshotFileName(system)),
            this.renderSystem(this.records, system)
          );
        }

        const description = metadata['description'] ?? metadata['note'];
        const payload: SnapshotMetadata = {
          ...metadata,
          name: trimmed,
          created_at: formatTimestamp(createdAt),
          systems: [...this.allowedSystems],
          creator: process.env['USER'] ?? process.env['USERNAME'] ?? 'unknown',
          ...(description !== undefined ? { description } : {}),
        };
        await atomicWriteJSON(join(snapshotPath, METADATA_FILE), payload);
      });

      log.info(`Saved snapshot to ${snapshotPath}`);
      return snapshotPath;
    });
  }

  /**
   * Overwrite every system file with the snapshot's copy and reload
   *
   * @throws SandboxError when the directory or any system's file is missing
   */
  async loadSnapshot(snapshotPath: string): Promise<void> {
    const source = resolve(snapshotPath);
    if (!(await isDirectory(source))) {
      throw new SandboxError(`Snapshot directory not found: ${source}`);
    }

    await this.enqueue(async () => {
      await mkdir(this.snapshotDir, { recursive: true });
      await this.snapshotLock().withLock(async () => {
        const contents = new Map<string, string>();
        for (const system of this.allowedSystems) {
          const file = join(source, this.snapshotFileName(system));
          if (!existsSync(file)) {
            throw new SandboxError(`Snapshot missing data for system ${system}: ${file}`);
          }
          contents.set(system, await readFile(file, 'utf-8'));
        }
        for (const [system, content] of contents) {
          await this.writeSystemFile(system, content);
        }
      });
      await this.load();
    });

    log.info(`Loaded snapshot from ${source}`);
  }

  /**
   * @returns Snapshots, newest first
   */
  async listSnapshots(): Promise<SnapshotInfo[]> {
    if (!(await isDirectory(this.snapshotDir))) {
      return [];
    }

    const entries = await readdir(this.snapshotDir, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .reverse();

    const snapshots: SnapshotInfo[] = [];
    for (const name of names) {
      const path = join(this.snapshotDir, name);
      snapshots.push({ path, metadata: await this.readMetadata(path) });
    }
    return snapshots;
  }

  // ==========================================================================
  // Reporting
  // ==========================================================================

  async buildStatusReport(): Promise<SandboxStatusReport> {
    this.ensureCapacity(this.records);

    const frequencies = new Map<string, number>();
    for (const systemRecords of this.records.values()) {
      for (const key of systemRecords.keys()) {
        frequencies.set(key, (frequencies.get(key) ?? 0) + 1);
      }
    }
    const union = [...frequencies.keys()].sort();
    const systemCount = this.allowedSystems.length;

    const systems: Record<string, SystemSandboxSummary> = {};
    const discrepancies: Record<string, string[]> = {};
    for (const system of this.allowedSystems) {
      const systemRecords = this.records.get(system) ?? new Map<string, SandboxRecord>();
      const missing = union.filter((key) => !systemRecords.has(key));
      systems[system] = {
        total: systemRecords.size,
        unique: [...systemRecords.keys()].filter((key) => frequencies.get(key) === 1).length,
        missingFromUnion: missing.length,
      };
      discrepancies[system] = missing;
    }

    return {
      systems,
      totalUniqueKeys: union.length,
      keysCommonToAll: union.filter((key) => frequencies.get(key) === systemCount).length,
      discrepancies,
      snapshotCount: (await this.listSnapshots()).length,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Run `task` after every earlier queued task has settled
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Failures reach the caller through `run`; the queue only orders work
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Apply `change` to a copy of the state, write it, then commit the copy
   */
  private mutate(change: (records: SandboxRecords, timestamp: Date) => void): Promise<void> {
    return this.enqueue(async () => {
      const next = this.cloneRecords();
      change(next, this.now());
      this.ensureCapacity(next);
      for (const system of this.allowedSystems) {
        await this.writeSystemFile(system, this.renderSystem(next, system));
      }
      this.records = next;
    });
  }

  private ensureCapacity(records: SandboxRecords): void {
    for (const [system, systemRecords] of records) {
      if (systemRecords.size > this.maxKeys) {
        throw new SandboxError(`System ${system} exceeds maximum of ${this.maxKeys} keys`);
      }
    }
  }

  private async readSystem(system: string): Promise<SystemRecords> {
    const records: SystemRecords = new Map();
    const filePath = this.systemFiles[system];
    if (filePath === undefined || !existsSync(filePath)) {
      log.debug(`Sandbox load: ${system} has no file, treating as empty`, { filePath });
      return records;
    }

    const parsed = parseCSV(await readFile(filePath, 'utf-8'));
    const column = (name: string): number => parsed.headers.indexOf(name);
    const keyIndex = column('key');
    if (keyIndex === -1) {
      throw new SandboxError(`System file ${filePath} has no 'key' column`);
    }
    const timestampIndex = column('last_seen_at');
    const statusIndex = column('status');
    const loadedAt = this.now();

    for (const row of parsed.rows) {
      const key = (row.values[keyIndex] ?? '').trim();
      if (!key) {
        log.warn(`Skipping row without a key in ${filePath}`, { lineNumber: row.lineNumber });
        continue;
      }
      const status = (row.values[statusIndex] ?? '').trim().toLowerCase();
      records.set(key, {
        key,
        system,
        lastSeenAt: parseTimestamp(row.values[timestampIndex], loadedAt),
        status: isSandboxStatus(status) ? status : 'active',
      });
    }
    return records;
  }

  private renderSystem(records: SandboxRecords, system: string): string {
    const rows = [...(records.get(system)?.values() ?? [])].sort((a, b) =>
      a.key < b.key ? -1 : a.key > b.key ? 1 : 0
    );
    return `${formatCsv(rows, SANDBOX_COLUMNS)}\n`;
  }

  private async writeSystemFile(system: string, content: string): Promise<void> {
    const filePath = this.systemFiles[system];
    if (filePath === undefined) {
      throw new SandboxError(`No file configured for system ${system}`);
    }
    await mkdir(dirname(filePath), { recursive: true });
    await new FileLock(filePath).withLock(() => atomicWriteFile(filePath, content));
  }

  private async readMetadata(snapshotPath: string): Promise<SnapshotMetadata | null> {
    const metadataPath = join(snapshotPath, METADATA_FILE);
    if (!existsSync(metadataPath)) {
      return null;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(metadataPath, 'utf-8'));
    } catch (error) {
      log.warn(`Unreadable snapshot metadata ${metadataPath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    const result = SnapshotMetadataSchema.safeParse(raw);
    if (!result.success) {
      log.warn(`Invalid snapshot metadata ${metadataPath}`, { issues: result.error.issues.length });
      return null;
    }
    return result.data;
  }

  private snapshotFileName(system: string): string {
    const filePath = this.systemFiles[system];
    return filePath === undefined ? `${system}.csv` : basename(filePath);
  }

  private snapshotLock(): FileLock {
    return new FileLock(join(this.snapshotDir, SNAPSHOT_LOCK_NAME));
  }

  private emptyRecords(): SandboxRecords {
    return new Map(this.allowedSystems.map((system) => [system, new Map<string, SandboxRecord>()]));
  }

  private cloneRecords(): SandboxRecords {
    return new Map(
      [...this.records].map(([system, systemRecords]) => [system, new Map(systemRecords)])
    );
  }
}

/**
 * Build a manager over the configured sources and load their current state
 */
export async function createSandboxManager(config: KeySyncConfig): Promise<SandboxStateManager> {
  const manager = new SandboxStateManager({
    systemFiles: getSystemFiles(config),
    snapshotDir: resolveConfigPath(config, config.sandbox.snapshotDir),
    maxKeys: config.sandbox.maxKeys,
    defaultKeyPrefix: config.sandbox.defaultKeyPrefix,
  });
  await manager.load();
  return manager;
}
