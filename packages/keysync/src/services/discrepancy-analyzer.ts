/**
 * Discrepancy classification over a comparison result
 */

import type {
  ComparisonResult,
  Discrepancy,
  DiscrepancyAnalysis,
  NormalizedKeyGroup,
  SourceKeyRef,
} from '../core/types.js';

/**
 * Classify a comparison into out-of-authority keys, propagation gaps and
 * duplicate groups. Keys are sorted; sources follow system order, then the
 * order raw spellings appeared in the file.
 */
export function analyzeDiscrepancies(comparison: ComparisonResult): DiscrepancyAnalysis {
  const dependents = comparison.systems.filter((system) => system !== comparison.authoritySystem);
  const discrepancies: Discrepancy[] = [];

  const outOfAuthority = new Map<string, readonly SourceKeyRef[]>();
  for (const normalizedKey of [...comparison.keysMissingInAuthority].sort()) {
    const sources: SourceKeyRef[] = [];
    for (const system of dependents) {
      const rawKeys = comparison.systemKeys.get(system)?.get(normalizedKey);
      for (const rawKey of rawKeys ?? []) {
        sources.push({ system, rawKey });
      }
    }
    if (sources.length > 0) {
      outOfAuthority.set(normalizedKey, sources);
      discrepancies.push({ kind: 'out_of_authority', normalizedKey, sources });
    }
  }

  const propagationGaps = new Map<string, readonly string[]>();
  for (const system of dependents) {
    const gap = [...(comparison.systemGaps.get(system) ?? [])].sort();
    if (gap.length > 0) {
      propagationGaps.set(system, gap);
      for (const normalizedKey of gap) {
        discrepancies.push({ kind: 'propagation_gap', system, normalizedKey });
      }
    }
  }

  const duplicateGroups = new Map<string, NormalizedKeyGroup>();
  for (const system of comparison.systems) {
    const groups = comparison.duplicates.get(system);
    if (!groups || groups.size === 0) continue;
    duplicateGroups.set(system, groups);
    for (const [normalizedKey, rawKeys] of groups) {
      discrepancies.push({ kind: 'duplicate_group', system, normalizedKey, rawKeys: [...rawKeys] });
    }
  }

  let totalPropagationGaps = 0;
  for (const gap of propagationGaps.values()) totalPropagationGaps += gap.length;
  let totalDuplicateGroups = 0;
  for (const groups of duplicateGroups.values()) totalDuplicateGroups += groups.size;

  return {
    discrepancies,
    outOfAuthority,
    propagationGaps,
    duplicateGroups,
    summary: {
      totalOutOfAuthority: outOfAuthority.size,
      totalPropagationGaps,
      totalDuplicateGroups,
      affectedSystems: comparison.systems.filter(
        (system) => propagationGaps.has(system) || duplicateGroups.has(system)
      ),
    },
  };
}
