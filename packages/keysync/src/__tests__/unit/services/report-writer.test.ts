/**
 * ReportWriter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { buildConfig } from '../../../core/config.js';
import { RunStateStore } from '../../../persistence/run-state-store.js';
import { createOrchestrator } from '../../../services/reconciliation-orchestrator.js';
import type { ReconciliationResult } from '../../../services/reconciliation-orchestrator.types.js';
import {
  detailsFileName,
  REPORT_FILES,
  ReportWriter,
  toSerializable,
} from '../../../services/report-writer.js';
import { createTempDir, removeTempDir, writeSystems } from '../../utils/fixtures.js';

describe('ReportWriter', () => {
  let dir: string;
  let outputDir: string;
  let store: RunStateStore;

  beforeEach(async () => {
    dir = await createTempDir();
    outputDir = join(dir, 'reports');
    store = new RunStateStore(':memory:');
    await store.runMigrations();
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  async function reconcile(systemFiles: Record<string, string>): Promise<ReconciliationResult> {
    const orchestrator = createOrchestrator(
      buildConfig({ error_handling: { retry_delay_seconds: 0 } }),
      store
    );
    return orchestrator.reconcile({ systemFiles });
  }

  async function readLines(fileName: string): Promise<string[]> {
    const content = await readFile(join(outputDir, fileName), 'utf-8');
    return content.trimEnd().split('\n');
  }

  describe('writeAll', () => {
    let result: ReconciliationResult;
    let written: string[];

    beforeEach(async () => {
      result = await reconcile(
        await writeSystems(dir, {
          A: ['K1', 'K2', 'K3'],
          B: ['K1', 'K2', 'K4', 'k4'],
          C: ['K1', 'K3', 'K4'],
        })
      );
      written = await new ReportWriter(store, outputDir).writeAll(result);
    });

    it('writes every report in order, without an error report for a clean run', () => {
      expect(written).toEqual(
        [
          REPORT_FILES.summary,
          REPORT_FILES.missingInAuthority,
          REPORT_FILES.missingFromSystems,
          REPORT_FILES.duplicates,
          REPORT_FILES.registry,
          REPORT_FILES.auditLog,
          detailsFileName(result.runId),
        ].map((name) => join(outputDir, name))
      );
      expect(existsSync(join(outputDir, REPORT_FILES.errors))).toBe(false);
    });

    it('writes the summary metrics', async () => {
      const t = result.timestamp;
      expect(await readLines(REPORT_FILES.summary)).toEqual([
        'Metric,Value,Timestamp',
        `Run ID,${result.runId},${t}`,
        `Total Unique Keys,4,${t}`,
        `Keys in System A,3,${t}`,
        `Keys Only in A (Propagation Gaps),0,${t}`,
        `Keys Missing in A (Out of Authority),1,${t}`,
        `Keys in All Systems,1,${t}`,
        `Overall Match Rate,25.0%,${t}`,
        `Total Out of Authority Keys,1,${t}`,
        `Total Propagation Gaps,2,${t}`,
        `Total Duplicate Groups,1,${t}`,
        `Keys in System B,3,${t}`,
        `Keys in System C,3,${t}`,
      ]);
    });

    it('joins out-of-authority keys to their proposed master key', async () => {
      const t = result.timestamp;
      expect(await readLines(REPORT_FILES.missingInAuthority)).toEqual([
        'Normalized Key,Source System,Original Key,Proposed Master Key,Provisioning Strategy,Status,Timestamp',
        `K000004,B,K4,K000004,mirror,proposed,${t}`,
        `K000004,B,k4,K000004,mirror,proposed,${t}`,
        `K000004,C,K4,K000004,mirror,proposed,${t}`,
      ]);
    });

    it('lists propagation gaps per system', async () => {
      const t = result.timestamp;
      expect(await readLines(REPORT_FILES.missingFromSystems)).toEqual([
        'System,Normalized Key,Present in Authority,Action Required,Timestamp',
        `B,K000003,Yes,Propagate from A,${t}`,
        `C,K000002,Yes,Propagate from A,${t}`,
      ]);
    });

    it('lists duplicate groups with their raw spellings', async () => {
      expect(await readLines(REPORT_FILES.duplicates)).toEqual([
        'System,Normalized Key,Original Keys,Count',
        'B,K000004,K4; k4,2',
      ]);
    });

    it('dumps the registry with empty cells for missing values', async () => {
      const [header, row, ...rest] = await readLines(REPORT_FILES.registry);
      expect(header).toBe(
        'Master Key ID,Master Key,Source System,Source Key,Status,Provisioning Strategy,Created At,Activated At,Run ID'
      );
      expect(rest).toEqual([]);

      const cells = row?.split(',') ?? [];
      expect(cells.slice(0, 6)).toEqual(['1', 'K000004', 'B', 'K4', 'proposed', 'mirror']);
      expect(cells.slice(7)).toEqual(['', String(result.runId)]);
    });

    it('writes the run\'s audit trail', async () => {
      const [header, ...rows] = await readLines(REPORT_FILES.auditLog);
      expect(header).toBe('Audit ID,Timestamp,Event Type,Event Details,System,Key,Action Taken,Result');
      expect(rows.map((row) => row.split(',')[2])).toEqual([
        'run_started',
        'keys_tracked',
        'master_key_proposed',
        'reconciliation_complete',
      ]);
    });

    it('writes a JSON detail dump with collections as arrays and objects', async () => {
      const details: unknown = JSON.parse(
        await readFile(join(outputDir, detailsFileName(result.runId)), 'utf-8')
      );

      expect(details).toMatchObject({
        runId: result.runId,
        mode: 'full',
        comparison: {
          systems: ['A', 'B', 'C'],
          keysMissingInAuthority: ['K000004'],
          duplicates: { B: { K000004: ['K4', 'k4'] } },
        },
        discrepancies: { propagationGaps: { B: ['K000003'], C: ['K000002'] } },
      });
    });
  });

  it('writes an error report when the comparison recorded errors', async () => {
    const missing = join(dir, 'C.csv');
    const result = await reconcile({
      ...(await writeSystems(dir, { A: ['K1'], B: ['K1'] })),
      C: missing,
    });

    const written = await new ReportWriter(store, outputDir).writeAll(result);

    expect(written).toContain(join(outputDir, REPORT_FILES.errors));
    const [header, row] = await readLines(REPORT_FILES.errors);
    expect(header).toBe('Timestamp,Type,System,File,Row,Error,Action');
    expect(row?.split(',').slice(1)).toEqual(['missing_file', 'C', missing, '', `File not found: ${missing}`, 'skip']);
  });

  describe('toSerializable', () => {
    it('converts nested sets and maps', () => {
      const value = { keys: new Set(['K1']), groups: new Map([['B', new Map([['K1', new Set(['k1'])]])]]) };
      expect(toSerializable(value)).toEqual({ keys: ['K1'], groups: { B: { K1: ['k1'] } } });
    });
  });
});
