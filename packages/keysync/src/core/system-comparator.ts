/**
 * System Comparator
 *
 * Loads each system's key export, normalizes every key and computes the
 * cross-system set algebra against the authority.
 *
 * ARCHITECTURE:
 * - Bounded worker queue (manual, shared index) loads systems concurrently
 * - Each task fills its own SystemLoad accumulator; nothing shared is mutated
 *   while workers run
 * - Accumulators are merged after the join in `systemFiles` order, so the
 *   result does not depend on completion order or on batch size
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { DEFAULT_PROCESSING_CONFIG, type ProcessingConfig } from './config.js';
import {
  DataValidationError,
  MissingFileError,
  SystemUnavailableError,
  toError,
} from './errors.js';
import type { KeyNormalizer } from './key-normalizer.js';
import type {
  ComparisonResult,
  ComparisonStatistics,
  ErrorLogEntry,
  NormalizedKeyGroup,
  RawKeyRecord,
} from './types.js';
import { parseCSV } from './utils/csv.js';
import { createLogger } from './utils/logger.js';
import type { ErrorHandler } from '../services/error-handler.js';
import { RetryExecutor } from '../resilience/retry.js';

const log = createLogger({ module: 'comparator' });

const KEY_COLUMN = 'key';

export interface SystemComparatorOptions {
  readonly authoritySystem?: string;
  readonly processing?: Partial<Pick<ProcessingConfig, 'batchSize' | 'parallel' | 'maxWorkers'>>;
  /** Wraps file reads; defaults to a single attempt */
  readonly retry?: RetryExecutor;
}

/**
 * Everything one system contributes, built by a single task
 */
interface SystemLoad {
  readonly system: string;
  readonly filePath: string;
  status: 'loaded' | 'missing' | 'failed';
  readonly groups: Map<string, Set<string>>;
  keysProcessed: number;
  readonly errors: ErrorLogEntry[];
  /** Policy abort (`fail`), rethrown after the join */
  fatal: Error | null;
}

export class SystemComparator {
  private readonly authoritySystem: string;
  private readonly batchSize: number;
  private readonly parallel: boolean;
  private readonly maxWorkers: number;
  private readonly retry: RetryExecutor;

  constructor(
    private readonly normalizer: KeyNormalizer,
    private readonly errorHandler: ErrorHandler,
    options: SystemComparatorOptions = {}
  ) {
    this.authoritySystem = options.authoritySystem ?? 'A';
    this.batchSize = options.processing?.batchSize ?? DEFAULT_PROCESSING_CONFIG.batchSize;
    this.parallel = options.processing?.parallel ?? DEFAULT_PROCESSING_CONFIG.parallel;
    this.maxWorkers = options.processing?.maxWorkers ?? DEFAULT_PROCESSING_CONFIG.maxWorkers;
    this.retry = options.retry ?? new RetryExecutor({ maxAttempts: 1, delayMs: 0 });

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  /**
   * Compare every system against the authority
   *
   * @param systemFiles - system name -> CSV file path
   * @throws MissingFileError / DataValidationError when a `fail` policy triggers
   * @throws SystemUnavailableError when a dependent is missing and partial processing is disabled
   * @throws ErrorCeilingExceededError when the error log reaches its ceiling
   */
  async compareAll(systemFiles: Readonly<Record<string, string>>): Promise<ComparisonResult> {
    const entries = Object.entries(systemFiles);
    const loads = await this.loadSystems(entries);

    // Merge per-task accumulators in input order
    for (const load of loads) {
      this.errorHandler.record(load.errors);
    }
    const fatal = loads.find((load) => load.fatal !== null)?.fatal;
    if (fatal) {
      throw fatal;
    }
    this.errorHandler.checkErrorCeiling();

    const loaded = loads.filter((load) => load.status === 'loaded');
    const systems = loaded.map((load) => load.system);
    const unavailableSystems = loads
      .filter((load) => load.status !== 'loaded')
      .map((load) => load.system);
    const processingErrors = loads.flatMap((load) => load.errors);

    const systemKeys = new Map<string, NormalizedKeyGroup>();
    const duplicates = new Map<string, NormalizedKeyGroup>();
    for (const load of loaded) {
      systemKeys.set(load.system, load.groups);
      const systemDuplicates = findDuplicateGroups(load.groups);
      if (systemDuplicates.size > 0) {
        duplicates.set(load.system, systemDuplicates);
        log.info(`Found ${systemDuplicates.size} duplicate groups in system ${load.system}`);
      }
    }
    const totalKeysProcessed = loads.reduce((sum, load) => sum + load.keysProcessed, 0);

    if (!this.errorHandler.handlePartialSystemAvailability(systems, entries.map(([system]) => system))) {
      if (!systems.includes(this.authoritySystem)) {
        log.error(`System ${this.authoritySystem} data not found - cannot perform comparison`);
        return emptyComparison(this.authoritySystem, {
          systems,
          unavailableSystems,
          systemKeys,
          duplicates,
          totalKeysProcessed,
          processingErrors,
        });
      }
      throw new SystemUnavailableError(
        `Systems unavailable and partial processing is disabled: ${unavailableSystems.join(', ')}`,
        unavailableSystems
      );
    }

    const authorityKeys = new Set(systemKeys.get(this.authoritySystem)?.keys() ?? []);
    const dependents = systems.filter((system) => system !== this.authoritySystem);
    const dependentKeySets = dependents.map(
      (system) => new Set(systemKeys.get(system)?.keys() ?? [])
    );

    const allKeys = new Set<string>();
    for (const group of systemKeys.values()) {
      for (const key of group.keys()) allKeys.add(key);
    }

    const keysInDependents = new Set<string>();
    for (const keySet of dependentKeySets) {
      for (const key of keySet) keysInDependents.add(key);
    }

    const keysOnlyInAuthority = difference(authorityKeys, keysInDependents);
    const keysMissingInAuthority = difference(keysInDependents, authorityKeys);

    const keysInAllSystems = new Set<string>();
    for (const key of authorityKeys) {
      if (dependentKeySets.every((keySet) => keySet.has(key))) {
        keysInAllSystems.add(key);
      }
    }

    const systemGaps = new Map<string, ReadonlySet<string>>();
    dependents.forEach((system, i) => {
      systemGaps.set(system, difference(authorityKeys, dependentKeySets[i] ?? new Set()));
    });

    const statistics = buildStatistics({
      allKeys: allKeys.size,
      authorityKeys: authorityKeys.size,
      keysOnlyInAuthority: keysOnlyInAuthority.size,
      keysMissingInAuthority: keysMissingInAuthority.size,
      keysInAllSystems: keysInAllSystems.size,
      systemKeys,
      duplicates,
      totalKeysProcessed,
    });

    log.info(`Comparison complete: ${statistics.matchPercentage.toFixed(1)}% match rate`, {
      systems,
      unavailableSystems,
      totalUniqueKeys: statistics.totalUniqueKeys,
    });

    return {
      authoritySystem: this.authoritySystem,
      authorityPresent: true,
      systems,
      unavailableSystems,
      systemKeys,
      allKeys,
      keysInAllSystems,
      keysOnlyInAuthority,
      keysMissingInAuthority,
      systemGaps,
      duplicates,
      statistics,
      processingErrors,
    };
  }

  /**
   * Load systems on a bounded worker queue (sequentially when parallel is off)
   *
   * @returns one accumulator per input entry, in input order
   */
  private async loadSystems(
    entries: readonly (readonly [string, string])[]
  ): Promise<SystemLoad[]> {
    const loads: SystemLoad[] = entries.map(([system, filePath]) => ({
      system,
      filePath,
      status: 'failed',
      groups: new Map(),
      keysProcessed: 0,
      errors: [],
      fatal: null,
    }));

    const concurrency = this.parallel ? Math.min(this.maxWorkers, loads.length) : 1;
    let currentIndex = 0;
    let aborted = false;

    // Worker function
    const worker = async (): Promise<void> => {
      while (!aborted && currentIndex < loads.length) {
        const load = loads[currentIndex++];
        if (!load) break;

        await this.loadSystem(load);
        if (load.fatal !== null) {
          aborted = true;
        }
      }
    };

    const runningWorkers: Array<Promise<void>> = [];
    for (let i = 0; i < concurrency; i++) {
      runningWorkers.push(worker());
    }
    await Promise.all(runningWorkers);

    return loads;
  }

  /**
   * Fill one system's accumulator. Never throws: policy aborts are stored on
   * `load.fatal`, anything else becomes a load failure.
   */
  private async loadSystem(load: SystemLoad): Promise<void> {
    try {
      if (!existsSync(load.filePath)) {
        load.errors.push(this.errorHandler.handleMissingFile(load.system, load.filePath));
        // Skipped dependents take part with an empty key set; the authority cannot
        load.status = load.system === this.authoritySystem ? 'missing' : 'loaded';
        return;
      }

      const records = await this.readRecords(load);
      load.keysProcessed = records.length;

      for (let i = 0; i < records.length; i += this.batchSize) {
        const batch = records.slice(i, i + this.batchSize);
        mergeGroups(load.groups, this.normalizeBatch(load, batch));
      }

      load.status = 'loaded';
      log.info(`Loaded ${records.length} keys from ${load.filePath}`, {
        system: load.system,
        normalizedKeys: load.groups.size,
      });
    } catch (error) {
      const err = toError(error);
      if (isPolicyAbort(err)) {
        load.fatal = err;
      } else {
        load.errors.push(this.errorHandler.describeLoadFailure(load.system, load.filePath, err));
      }
      load.status = 'failed';
    }
  }

  /**
   * Read and validate a system file
   *
   * Rows without a key, or whose column count does not match the header, are
   * corrupt and handled by policy; a file without a `key` column yields no rows.
   */
  private async readRecords(load: SystemLoad): Promise<RawKeyRecord[]> {
    const content = await this.retry.execute(
      () => readFile(load.filePath, 'utf-8'),
      `read ${load.filePath}`
    );
    const { headers, rows } = parseCSV(content);

    const keyIndex = headers.indexOf(KEY_COLUMN);
    if (keyIndex === -1) {
      if (headers.length > 0 || rows.length > 0) {
        load.errors.push(
          this.errorHandler.handleCorruptData(load.system, load.filePath, null, "Missing 'key' column")
        );
      }
      return [];
    }

    const records: RawKeyRecord[] = [];
    for (const row of rows) {
      if (row.values.length !== headers.length) {
        load.errors.push(
          this.errorHandler.handleCorruptData(
            load.system,
            load.filePath,
            row.lineNumber,
            `Expected ${headers.length} columns, found ${row.values.length}`
          )
        );
        continue;
      }

      const rawValue = row.values[keyIndex] ?? '';
      if (!rawValue) {
        load.errors.push(
          this.errorHandler.handleCorruptData(load.system, load.filePath, row.lineNumber, 'Empty key field')
        );
        continue;
      }

      const metadata: Record<string, string> = {};
      headers.forEach((header, i) => {
        if (i !== keyIndex) {
          metadata[header] = row.values[i] ?? '';
        }
      });

      records.push({ system: load.system, rawValue, metadata });
    }

    return records;
  }

  private normalizeBatch(load: SystemLoad, batch: readonly RawKeyRecord[]): Map<string, Set<string>> {
    const groups = new Map<string, Set<string>>();
    for (const record of batch) {
      const normalized = this.normalizer.normalize(record.rawValue);
      if (!normalized) {
        load.errors.push(
          this.errorHandler.handleCorruptData(
            load.system,
            load.filePath,
            null,
            `Key ${JSON.stringify(record.rawValue)} normalizes to an empty key`
          )
        );
        continue;
      }
      const group = groups.get(normalized);
      if (group) {
        group.add(record.rawValue);
      } else {
        groups.set(normalized, new Set([record.rawValue]));
      }
    }
    return groups;
  }
}

function isPolicyAbort(error: Error): boolean {
  return error instanceof MissingFileError || error instanceof DataValidationError;
}

function mergeGroups(target: Map<string, Set<string>>, source: ReadonlyMap<string, ReadonlySet<string>>): void {
  for (const [normalized, rawKeys] of source) {
    const existing = target.get(normalized);
    if (existing) {
      for (const raw of rawKeys) existing.add(raw);
    } else {
      target.set(normalized, new Set(rawKeys));
    }
  }
}

function findDuplicateGroups(groups: NormalizedKeyGroup): Map<string, ReadonlySet<string>> {
  const duplicates = new Map<string, ReadonlySet<string>>();
  for (const [normalized, rawKeys] of groups) {
    if (rawKeys.size > 1) {
      duplicates.set(normalized, rawKeys);
    }
  }
  return duplicates;
}

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  const result = new Set<string>();
  for (const key of a) {
    if (!b.has(key)) result.add(key);
  }
  return result;
}

function buildStatistics(input: {
  readonly allKeys: number;
  readonly authorityKeys: number;
  readonly keysOnlyInAuthority: number;
  readonly keysMissingInAuthority: number;
  readonly keysInAllSystems: number;
  readonly systemKeys: ReadonlyMap<string, NormalizedKeyGroup>;
  readonly duplicates: ReadonlyMap<string, NormalizedKeyGroup>;
  readonly totalKeysProcessed: number;
}): ComparisonStatistics {
  const systemCounts: Record<string, number> = {};
  for (const [system, group] of input.systemKeys) {
    systemCounts[system] = group.size;
  }
  const duplicateGroups: Record<string, number> = {};
  for (const [system, groups] of input.duplicates) {
    duplicateGroups[system] = groups.size;
  }

  return {
    totalUniqueKeys: input.allKeys,
    keysInAuthority: input.authorityKeys,
    keysOnlyInAuthority: input.keysOnlyInAuthority,
    keysMissingInAuthority: input.keysMissingInAuthority,
    keysInAllSystems: input.keysInAllSystems,
    matchPercentage: input.allKeys > 0 ? (input.keysInAllSystems / input.allKeys) * 100 : 0,
    systemCounts,
    totalKeysProcessed: input.totalKeysProcessed,
    duplicateGroups,
  };
}

function emptyComparison(
  authoritySystem: string,
  partial: Pick<
    ComparisonResult,
    'systems' | 'unavailableSystems' | 'systemKeys' | 'duplicates' | 'processingErrors'
  > & { readonly totalKeysProcessed: number }
): ComparisonResult {
  return {
    authoritySystem,
    authorityPresent: false,
    systems: partial.systems,
    unavailableSystems: partial.unavailableSystems,
    systemKeys: partial.systemKeys,
    allKeys: new Set(),
    keysInAllSystems: new Set(),
    keysOnlyInAuthority: new Set(),
    keysMissingInAuthority: new Set(),
    systemGaps: new Map(),
    duplicates: partial.duplicates,
    statistics: buildStatistics({
      allKeys: 0,
      authorityKeys: 0,
      keysOnlyInAuthority: 0,
      keysMissingInAuthority: 0,
      keysInAllSystems: 0,
      systemKeys: new Map(),
      duplicates: new Map(),
      totalKeysProcessed: partial.totalKeysProcessed,
    }),
    processingErrors: partial.processingErrors,
  };
}
