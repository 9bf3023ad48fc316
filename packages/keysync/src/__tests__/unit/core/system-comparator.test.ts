/**
 * SystemComparator Tests
 *
 * Cross-system set algebra, duplicate detection and error policies over
 * temporary CSV exports.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';
import { SystemComparator } from '../../../core/system-comparator.js';
import { KeyNormalizer } from '../../../core/key-normalizer.js';
import { ErrorHandler } from '../../../services/error-handler.js';
import {
  DataValidationError,
  ErrorCeilingExceededError,
  MissingFileError,
  SystemUnavailableError,
} from '../../../core/errors.js';
import type { ErrorHandlingConfig } from '../../../core/config.js';
import { createTempDir, removeTempDir, writeRawFile, writeSystems } from '../../utils/fixtures.js';

function createComparator(
  errorConfig: Partial<ErrorHandlingConfig> = {},
  processing: { batchSize?: number; parallel?: boolean; maxWorkers?: number } = {}
): { comparator: SystemComparator; errorHandler: ErrorHandler } {
  const errorHandler = new ErrorHandler(errorConfig);
  const comparator = new SystemComparator(new KeyNormalizer(), errorHandler, { processing });
  return { comparator, errorHandler };
}

describe('SystemComparator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  // ==========================================================================
  // Set algebra
  // ==========================================================================

  describe('compareAll', () => {
    it('computes the set algebra against the authority', async () => {
      const files = await writeSystems(dir, {
        A: ['K1', 'K2', 'K3'],
        B: ['K1', 'K2', 'K4'],
      });
      const { comparator } = createComparator();

      const result = await comparator.compareAll(files);

      expect(result.authorityPresent).toBe(true);
      expect(result.systems).toEqual(['A', 'B']);
      expect(result.unavailableSystems).toEqual([]);
      expect([...result.allKeys].sort()).toEqual(['K000001', 'K000002', 'K000003', 'K000004']);
      expect([...result.keysInAllSystems].sort()).toEqual(['K000001', 'K000002']);
      expect([...result.keysOnlyInAuthority]).toEqual(['K000003']);
      expect([...result.keysMissingInAuthority]).toEqual(['K000004']);
      expect([...(result.systemGaps.get('B') ?? [])]).toEqual(['K000003']);
      expect(result.statistics.matchPercentage).toBe(50);
      expect(result.statistics.systemCounts).toEqual({ A: 3, B: 3 });
      expect(result.statistics.totalKeysProcessed).toBe(6);
    });

    it('treats differently spelled keys as the same normalized key', async () => {
      const files = await writeSystems(dir, {
        A: ['cust-001'],
        B: ['  CUST_1 '],
      });
      const { comparator } = createComparator();

      const result = await comparator.compareAll(files);

      expect([...result.keysInAllSystems]).toEqual(['CUST-000001']);
      expect(result.statistics.matchPercentage).toBe(100);
    });

    it('intersects across every dependent system', async () => {
      const files = await writeSystems(dir, {
        A: ['K1', 'K2'],
        B: ['K1', 'K2'],
        C: ['K1'],
      });
      const { comparator } = createComparator();

      const result = await comparator.compareAll(files);

      expect([...result.keysInAllSystems]).toEqual(['K000001']);
      expect([...(result.systemGaps.get('B') ?? [])]).toEqual([]);
      expect([...(result.systemGaps.get('C') ?? [])]).toEqual(['K000002']);
    });

    it('reports zero match for empty inputs', async () => {
      const files = await writeSystems(dir, { A: [], B: [] });
      const { comparator } = createComparator();

      const result = await comparator.compareAll(files);

      expect(result.allKeys.size).toBe(0);
      expect(result.statistics.matchPercentage).toBe(0);
    });

    it('groups raw spellings that collide after normalization', async () => {
      const files = await writeSystems(dir, {
        A: ['K1'],
        B: ['cust-1', 'CUST_1', 'K1'],
      });
      const { comparator } = createComparator();

      const result = await comparator.compareAll(files);

      const groups = result.duplicates.get('B');
      expect(groups?.size).toBe(1);
      expect([...(groups?.get('CUST-000001') ?? [])]).toEqual(['cust-1', 'CUST_1']);
      expect(result.duplicates.has('A')).toBe(false);
      expect(result.statistics.duplicateGroups).toEqual({ B: 1 });
    });

    it('keeps raw spellings that differ only in surrounding whitespace', async () => {
      const authority = await writeRawFile(dir, 'A.csv', 'key\nKEY-001\n"  KEY-001"\n');
      const { comparator } = createComparator();

      const result = await comparator.compareAll({ A: authority });

      expect([...(result.duplicates.get('A')?.get('KEY-000001') ?? [])]).toEqual([
        'KEY-001',
        '  KEY-001',
      ]);
    });

    it('passes untrimmed file values to the normalizer', async () => {
      const authority = await writeRawFile(dir, 'A.csv', 'key\n K1\n');
      const normalizer = new KeyNormalizer({
        trimWhitespace: false,
        stripNonAlnum: false,
        collapseDelims: false,
      });
      const comparator = new SystemComparator(normalizer, new ErrorHandler());

      const result = await comparator.compareAll({ A: authority });

      expect([...result.allKeys]).toEqual([' K1']);
    });

    it('produces the same result for any batch size or concurrency', async () => {
      const files = await writeSystems(dir, {
        A: ['a1', 'a2', 'A_2', 'a3', 'b9'],
        B: ['a1', 'A-1', 'c7', 'a3'],
        C: ['a2', 'b9', 'z1'],
      });

      const snapshot = async (processing: { batchSize: number; parallel: boolean }) => {
        const { comparator } = createComparator({}, processing);
        const result = await comparator.compareAll(files);
        return {
          systems: result.systems,
          allKeys: [...result.allKeys].sort(),
          keysInAllSystems: [...result.keysInAllSystems].sort(),
          missing: [...result.keysMissingInAuthority].sort(),
          duplicates: [...result.duplicates].map(([system, groups]) => [
            system,
            [...groups].map(([key, raws]) => [key, [...raws]]),
          ]),
        };
      };

      const sequentialSmall = await snapshot({ batchSize: 1, parallel: false });
      const parallelLarge = await snapshot({ batchSize: 1000, parallel: true });
      const parallelOdd = await snapshot({ batchSize: 3, parallel: true });

      expect(parallelLarge).toEqual(sequentialSmall);
      expect(parallelOdd).toEqual(sequentialSmall);
    });

    it('rejects a non-positive batch size', () => {
      expect(() => createComparator({}, { batchSize: 0 })).toThrow(RangeError);
    });
  });

  // ==========================================================================
  // Missing files
  // ==========================================================================

  describe('missing files', () => {
    it('treats a missing dependent as an empty system under the skip policy', async () => {
      const files = await writeSystems(dir, { A: ['K1', 'K2'] });
      const { comparator, errorHandler } = createComparator({ onMissingFile: 'skip' });

      const result = await comparator.compareAll({ ...files, B: join(dir, 'B.csv') });

      expect(result.systems).toEqual(['A', 'B']);
      expect(result.unavailableSystems).toEqual([]);
      expect([...(result.systemGaps.get('B') ?? [])]).toEqual(['K000001', 'K000002']);
      expect([...result.keysInAllSystems]).toEqual([]);
      expect(result.statistics.matchPercentage).toBe(0);
      expect(result.statistics.systemCounts).toEqual({ A: 2, B: 0 });
      expect(result.processingErrors).toHaveLength(1);
      expect(result.processingErrors[0]?.type).toBe('missing_file');
      expect(result.processingErrors[0]?.system).toBe('B');
      expect(errorHandler.getErrorLog()).toHaveLength(1);
    });

    it('throws under the fail policy', async () => {
      const files = await writeSystems(dir, { A: ['K1'] });
      const { comparator } = createComparator({ onMissingFile: 'fail' });

      await expect(comparator.compareAll({ ...files, B: join(dir, 'B.csv') })).rejects.toThrow(
        MissingFileError
      );
    });

    it('returns an empty comparison when the authority is missing', async () => {
      const files = await writeSystems(dir, { B: ['K1'] });
      const { comparator } = createComparator();

      const result = await comparator.compareAll({ A: join(dir, 'A.csv'), ...files });

      expect(result.authorityPresent).toBe(false);
      expect(result.allKeys.size).toBe(0);
      expect(result.unavailableSystems).toEqual(['A']);
      expect(result.statistics.matchPercentage).toBe(0);
    });

    it('throws when a dependent fails to load and partial processing is disabled', async () => {
      const files = await writeSystems(dir, { A: ['K1'] });
      const unreadable = join(dir, 'B.csv');
      await mkdir(unreadable);
      const { comparator } = createComparator({ enablePartialProcessing: false });

      await expect(comparator.compareAll({ ...files, B: unreadable })).rejects.toThrow(
        SystemUnavailableError
      );
    });

    it('records a load failure when a path cannot be read', async () => {
      const files = await writeSystems(dir, { A: ['K1'] });
      const unreadable = join(dir, 'B.csv');
      await mkdir(unreadable);
      const { comparator } = createComparator();

      const result = await comparator.compareAll({ ...files, B: unreadable });

      expect(result.unavailableSystems).toEqual(['B']);
      expect(result.processingErrors[0]?.type).toBe('load_failure');
    });
  });

  // ==========================================================================
  // Corrupt data
  // ==========================================================================

  describe('corrupt data', () => {
    const CORRUPT_CONTENT = 'key,name\nK1,one\n,two\nK2\n';

    it('logs corrupt rows and keeps the valid ones', async () => {
      const files = await writeSystems(dir, { B: ['K1'] });
      const authority = await writeRawFile(dir, 'A.csv', CORRUPT_CONTENT);
      const { comparator } = createComparator({ onCorruptData: 'log' });

      const result = await comparator.compareAll({ A: authority, ...files });

      expect([...result.allKeys]).toEqual(['K000001']);
      expect(result.processingErrors.map((entry) => [entry.rowNumber, entry.message])).toEqual([
        [3, 'Empty key field'],
        [4, 'Expected 2 columns, found 1'],
      ]);
      expect(result.processingErrors.every((entry) => entry.action === 'log')).toBe(true);
    });

    it('throws under the fail policy', async () => {
      const authority = await writeRawFile(dir, 'A.csv', CORRUPT_CONTENT);
      const { comparator } = createComparator({ onCorruptData: 'fail' });

      await expect(comparator.compareAll({ A: authority })).rejects.toThrow(DataValidationError);
    });

    it('reports a file without a key column', async () => {
      const authority = await writeRawFile(dir, 'A.csv', 'id,name\n1,one\n');
      const { comparator } = createComparator();

      const result = await comparator.compareAll({ A: authority });

      expect(result.systems).toEqual(['A']);
      expect(result.allKeys.size).toBe(0);
      expect(result.processingErrors[0]?.message).toBe("Missing 'key' column");
      expect(result.processingErrors[0]?.rowNumber).toBeNull();
    });

    it('treats a key that normalizes to nothing as corrupt', async () => {
      const authority = await writeRawFile(dir, 'A.csv', 'key\n!!!\nK1\n');
      const { comparator } = createComparator();

      const result = await comparator.compareAll({ A: authority });

      expect([...result.allKeys]).toEqual(['K000001']);
      expect(result.processingErrors).toHaveLength(1);
      expect(result.processingErrors[0]?.type).toBe('corrupt_data');
    });

    it('fails once the error log reaches its ceiling', async () => {
      const authority = await writeRawFile(dir, 'A.csv', CORRUPT_CONTENT);
      const { comparator } = createComparator({ maxErrorsBeforeFail: 2 });

      await expect(comparator.compareAll({ A: authority })).rejects.toThrow(
        ErrorCeilingExceededError
      );
    });
  });
});
