/**
 * Run Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { executeRun, resolveExecutionMode } from '../../../cli/commands/run.js';
import { EXIT_CODES } from '../../../cli/lib/context.js';
import { RunStateStore } from '../../../persistence/run-state-store.js';
import { REPORT_FILES } from '../../../services/report-writer.js';
import { createTempDir, removeTempDir, writeRawFile, writeSystems } from '../../utils/fixtures.js';

const CONFIG_YAML = `
authority_system: A
sources:
  A:
    path: A.csv
  B:
    path: B.csv
error_handling:
  retry_delay_seconds: 0
logging:
  level: error
`;

describe('run command', () => {
  describe('resolveExecutionMode', () => {
    it.each([
      [{ configAutoApprove: false }, 'normal'],
      [{ configAutoApprove: true }, 'auto-approve'],
      [{ autoApprove: true, configAutoApprove: false }, 'auto-approve'],
      [{ dryRun: true, autoApprove: true, configAutoApprove: true }, 'dry-run'],
    ] as const)('%o -> %s', (options, expected) => {
      expect(resolveExecutionMode(options)).toBe(expected);
    });
  });

  describe('executeRun', () => {
    let dir: string;
    let configPath: string;
    let dbPath: string;
    let outputDir: string;
    let logSpy: MockInstance<typeof console.log>;

    beforeEach(async () => {
      dir = await createTempDir();
      configPath = await writeRawFile(dir, 'keysync-config.yaml', CONFIG_YAML);
      dbPath = join(dir, 'keysync.db');
      outputDir = join(dir, 'output');
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await removeTempDir(dir);
    });

    function printedJson(): unknown {
      const output = logSpy.mock.calls.map((call) => String(call[0])).find((line) => line.startsWith('{'));
      return output === undefined ? undefined : JSON.parse(output);
    }

    it('runs, writes reports and prints a JSON summary', async () => {
      await writeSystems(dir, { A: ['K1', 'K2'], B: ['K1', 'K3'] });

      const exitCode = await executeRun({ config: configPath, db: dbPath, outputDir, json: true });

      expect(exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(existsSync(join(outputDir, REPORT_FILES.summary))).toBe(true);
      expect(printedJson()).toMatchObject({
        runId: 1,
        mode: 'full',
        executionMode: 'normal',
        unavailableSystems: [],
        discrepancies: { totalOutOfAuthority: 1, totalPropagationGaps: 1 },
        provisioning: { keysProposed: 1, keysActivated: 0, strategy: 'mirror' },
        incrementalChanges: null,
      });

      const store = new RunStateStore(dbPath);
      try {
        expect((await store.getRun(1))?.status).toBe('completed');
      } finally {
        store.close();
      }
    });

    it('skips reports in dry-run', async () => {
      await writeSystems(dir, { A: ['K1'], B: ['K1'] });

      const exitCode = await executeRun({ config: configPath, db: dbPath, outputDir, dryRun: true });

      expect(exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(existsSync(outputDir)).toBe(false);
    });

    it('rejects an unknown mode as a configuration error', async () => {
      const exitCode = await executeRun({ config: configPath, db: dbPath, mode: 'partial' });
      expect(exitCode).toBe(EXIT_CODES.CONFIG_ERROR);
    });

    it('reports a missing config file as a configuration error', async () => {
      const exitCode = await executeRun({ config: join(dir, 'missing.yaml'), db: dbPath });
      expect(exitCode).toBe(EXIT_CODES.CONFIG_ERROR);
    });

    it('returns RUN_FAILED when the authority is unavailable', async () => {
      await writeSystems(dir, { B: ['K1'] });

      const exitCode = await executeRun({ config: configPath, db: dbPath, outputDir });

      expect(exitCode).toBe(EXIT_CODES.RUN_FAILED);
      const store = new RunStateStore(dbPath);
      try {
        expect((await store.getRun(1))?.status).toBe('failed');
      } finally {
        store.close();
      }
    });
  });
});
