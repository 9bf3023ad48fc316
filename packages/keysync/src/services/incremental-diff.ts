/**
 * Incremental diff between two comparison snapshots
 *
 * Every completed run stores a ComparisonSnapshot in its stats; an
 * incremental run diffs its own snapshot against the last completed run's.
 */

import { z } from 'zod';
import type {
  ComparisonResult,
  ComparisonSnapshot,
  IncrementalChanges,
  ReconciliationRun,
} from '../core/types.js';

/** Key under which the snapshot is stored in a run's stats */
export const SNAPSHOT_STATS_KEY = 'comparisonSnapshot';

const ComparisonSnapshotSchema = z.object({
  allKeys: z.array(z.string()),
  keysInAllSystems: z.array(z.string()),
});

export function createSnapshot(comparison: ComparisonResult): ComparisonSnapshot {
  return {
    allKeys: [...comparison.allKeys].sort(),
    keysInAllSystems: [...comparison.keysInAllSystems].sort(),
  };
}

/**
 * Read the snapshot a completed run stored, or null when it has none
 * (runs written before snapshots existed, or failed runs)
 */
export function readSnapshot(run: ReconciliationRun): ComparisonSnapshot | null {
  const result = ComparisonSnapshotSchema.safeParse(run.stats?.[SNAPSHOT_STATS_KEY]);
  return result.success ? result.data : null;
}

/**
 * Compute key-level changes since the previous snapshot
 *
 * - newKeys: present now, absent everywhere before
 * - removedKeys: present before, absent everywhere now
 * - newlySynchronized: in every system now, not before
 * - newlyDiverged: in every system before, still present but no longer everywhere
 */
export function calculateIncrementalChanges(
  previousRunId: number,
  previous: ComparisonSnapshot,
  current: ComparisonSnapshot
): IncrementalChanges {
  const previousAll = new Set(previous.allKeys);
  const previousInAll = new Set(previous.keysInAllSystems);
  const currentAll = new Set(current.allKeys);
  const currentInAll = new Set(current.keysInAllSystems);

  return {
    previousRunId,
    newKeys: current.allKeys.filter((key) => !previousAll.has(key)).sort(),
    removedKeys: previous.allKeys.filter((key) => !currentAll.has(key)).sort(),
    newlySynchronized: current.keysInAllSystems.filter((key) => !previousInAll.has(key)).sort(),
    newlyDiverged: previous.keysInAllSystems
      .filter((key) => !currentInAll.has(key) && currentAll.has(key))
      .sort(),
  };
}
