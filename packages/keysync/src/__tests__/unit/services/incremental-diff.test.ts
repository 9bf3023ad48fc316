/**
 * Incremental Diff Tests
 */

import { describe, it, expect } from 'vitest';
import {
  calculateIncrementalChanges,
  createSnapshot,
  readSnapshot,
  SNAPSHOT_STATS_KEY,
} from '../../../services/incremental-diff.js';
import type { ComparisonSnapshot, ReconciliationRun } from '../../../core/types.js';
import { compareSystems, createTempDir, removeTempDir } from '../../utils/fixtures.js';

function completedRun(stats: Record<string, unknown> | null): ReconciliationRun {
  return {
    id: 7,
    timestamp: '2026-01-05T10:00:00.000Z',
    mode: 'full',
    executionMode: 'normal',
    status: 'completed',
    configSnapshot: null,
    stats,
    checkpoints: {},
    errorMessage: null,
    completedAt: '2026-01-05T10:00:02.000Z',
  };
}

describe('incremental diff', () => {
  describe('calculateIncrementalChanges', () => {
    const previous: ComparisonSnapshot = {
      allKeys: ['K1', 'K2', 'K3', 'K4'],
      keysInAllSystems: ['K1', 'K2', 'K4'],
    };

    it('classifies new, removed, synchronized and diverged keys', () => {
      const current: ComparisonSnapshot = {
        allKeys: ['K1', 'K2', 'K3', 'K5'],
        keysInAllSystems: ['K1', 'K3'],
      };

      expect(calculateIncrementalChanges(7, previous, current)).toEqual({
        previousRunId: 7,
        newKeys: ['K5'],
        removedKeys: ['K4'],
        newlySynchronized: ['K3'],
        newlyDiverged: ['K2'],
      });
    });

    it('does not count a vanished key as diverged', () => {
      const current: ComparisonSnapshot = { allKeys: ['K1', 'K2', 'K3'], keysInAllSystems: ['K1', 'K2'] };

      const changes = calculateIncrementalChanges(7, previous, current);

      expect(changes.removedKeys).toEqual(['K4']);
      expect(changes.newlyDiverged).toEqual([]);
    });

    it('reports no changes for identical snapshots', () => {
      expect(calculateIncrementalChanges(7, previous, previous)).toEqual({
        previousRunId: 7,
        newKeys: [],
        removedKeys: [],
        newlySynchronized: [],
        newlyDiverged: [],
      });
    });
  });

  describe('readSnapshot', () => {
    it('reads the snapshot stored in run stats', () => {
      const snapshot = { allKeys: ['K1'], keysInAllSystems: [] };
      expect(readSnapshot(completedRun({ [SNAPSHOT_STATS_KEY]: snapshot }))).toEqual(snapshot);
    });

    it('returns null for runs without a valid snapshot', () => {
      expect(readSnapshot(completedRun(null))).toBeNull();
      expect(readSnapshot(completedRun({ [SNAPSHOT_STATS_KEY]: { allKeys: 'K1' } }))).toBeNull();
    });
  });

  describe('createSnapshot', () => {
    it('sorts key sets from a comparison', async () => {
      const dir = await createTempDir();
      try {
        const comparison = await compareSystems(dir, {
          A: ['K3', 'K1', 'K2'],
          B: ['K2', 'K1'],
        });

        expect(createSnapshot(comparison)).toEqual({
          allKeys: ['K000001', 'K000002', 'K000003'],
          keysInAllSystems: ['K000001', 'K000002'],
        });
      } finally {
        await removeTempDir(dir);
      }
    });
  });
});
