/**
 * SandboxStateManager Tests
 *
 * Key edits and snapshots over temporary system files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ensureKeys,
  ensureSystems,
  loadKeysFromFile,
  SandboxStateManager,
} from '../../../services/sandbox-state.js';
import { SandboxError } from '../../../core/errors.js';
import { KeyNormalizer } from '../../../core/key-normalizer.js';
import { SystemComparator } from '../../../core/system-comparator.js';
import { ErrorHandler } from '../../../services/error-handler.js';
import { createTempDir, removeTempDir, writeRawFile } from '../../utils/fixtures.js';

const NOW = new Date('2026-01-15T10:00:00.000Z');
const HEADER = 'key,last_seen_at,system,status';

describe('SandboxStateManager', () => {
  let dir: string;
  let systemFiles: Record<string, string>;
  let snapshotDir: string;

  function createManager(maxKeys = 100): SandboxStateManager {
    return new SandboxStateManager({ systemFiles, snapshotDir, maxKeys, now: () => NOW });
  }

  beforeEach(async () => {
    dir = await createTempDir();
    systemFiles = {
      A: join(dir, 'input', 'A.csv'),
      B: join(dir, 'input', 'B.csv'),
      C: join(dir, 'input', 'C.csv'),
    };
    snapshotDir = join(dir, 'snapshots');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  // ==========================================================================
  // Baseline
  // ==========================================================================

  describe('initialize', () => {
    it('writes the same generated keys to every system', async () => {
      const manager = createManager();

      await manager.initialize(2);

      expect(await readFile(systemFiles['B'] ?? '', 'utf-8')).toBe(
        [HEADER, 'CUST-00001,2026-01-15T10:00:00,B,active', 'CUST-00002,2026-01-15T10:00:00,B,active', ''].join('\n')
      );
      const report = await manager.buildStatusReport();
      expect(report.totalUniqueKeys).toBe(2);
      expect(report.keysCommonToAll).toBe(2);
      expect(report.systems['A']).toEqual({ total: 2, unique: 0, missingFromUnion: 0 });
      expect(report.snapshotCount).toBe(0);
    });

    it('rejects a non-positive key count', async () => {
      await expect(createManager().initialize(0)).rejects.toThrow(SandboxError);
    });

    it('writes nothing when a system would exceed the key cap', async () => {
      const manager = createManager(2);

      await expect(manager.initialize(3)).rejects.toThrow('System A exceeds maximum of 2 keys');

      expect(existsSync(systemFiles['A'] ?? '')).toBe(false);
      expect(manager.getKeys('A')).toEqual([]);
    });

    it('produces files the comparator reads', async () => {
      const manager = createManager();
      await manager.initialize(2);
      await manager.addKeys(['UNAUTH-001'], ['B']);

      const comparator = new SystemComparator(new KeyNormalizer(), new ErrorHandler());
      const result = await comparator.compareAll(systemFiles);

      expect([...result.keysInAllSystems].sort()).toEqual(['CUST-000001', 'CUST-000002']);
      expect([...result.keysMissingInAuthority]).toEqual(['UNAUTH-000001']);
      expect(result.processingErrors).toEqual([]);
    });
  });

  // ==========================================================================
  // Loading
  // ==========================================================================

  describe('load', () => {
    it('treats missing files as empty systems', async () => {
      const manager = createManager();
      await manager.load();
      expect(manager.getKeys('A')).toEqual([]);
    });

    it('reads plain key exports and defaults the sandbox columns', async () => {
      await writeRawFile(dir, 'A.csv', 'key,name,status\n K1 ,one,retired\nK2,two,INACTIVE\n,blank,active\n');
      systemFiles['A'] = join(dir, 'A.csv');
      const manager = createManager();

      await manager.load();

      expect(manager.getKeys('A')).toEqual(['K1', 'K2']);
      expect(manager.getRecord('A', 'K1')).toEqual({
        key: 'K1',
        system: 'A',
        lastSeenAt: NOW,
        status: 'active',
      });
      expect(manager.getRecord('A', 'K2')?.status).toBe('inactive');
    });
  });

  // ==========================================================================
  // Key edits
  // ==========================================================================

  describe('key edits', () => {
    let manager: SandboxStateManager;

    beforeEach(async () => {
      manager = createManager();
      await manager.initialize(2);
    });

    it('adds trimmed keys to the requested systems only', async () => {
      const result = await manager.addKeys(['UNAUTH-001', ' UNAUTH-002 ', 'CUST-00001'], ['b', 'C']);

      expect(result.added).toBe(4);
      expect(result.bySystem).toEqual({
        B: ['UNAUTH-001', 'UNAUTH-002'],
        C: ['UNAUTH-001', 'UNAUTH-002'],
      });
      const report = await manager.buildStatusReport();
      expect(report.discrepancies['A']).toEqual(['UNAUTH-001', 'UNAUTH-002']);
      expect(report.systems['A']).toEqual({ total: 2, unique: 0, missingFromUnion: 2 });
    });

    it('rejects an unknown system without touching the files', async () => {
      const before = await readFile(systemFiles['A'] ?? '', 'utf-8');

      await expect(manager.addKeys(['K9'], ['Z'])).rejects.toThrow('Unsupported systems requested: Z');

      expect(await readFile(systemFiles['A'] ?? '', 'utf-8')).toBe(before);
    });

    it('removes keys matching a pattern across every system', async () => {
      await manager.addKeys(['UNAUTH-001', 'UNAUTH-002'], ['B', 'C']);

      const removed = await manager.removeKeys({ pattern: 'unauth' });

      expect(removed).toEqual({
        A: [],
        B: ['UNAUTH-001', 'UNAUTH-002'],
        C: ['UNAUTH-001', 'UNAUTH-002'],
      });
      expect(manager.getKeys('B')).toEqual(['CUST-00001', 'CUST-00002']);
    });

    it('removes listed keys from selected systems', async () => {
      const removed = await manager.removeKeys({ keys: ['CUST-00002'], systems: ['A'] });

      expect(removed).toEqual({ A: ['CUST-00002'] });
      expect(manager.getKeys('A')).toEqual(['CUST-00001']);
      expect(manager.getKeys('B')).toEqual(['CUST-00001', 'CUST-00002']);
    });

    it('requires keys or a pattern to remove', async () => {
      await expect(manager.removeKeys({})).rejects.toThrow(SandboxError);
    });

    it('renames a key in the selected systems', async () => {
      await manager.addKeys(['LEGACY-001'], ['A', 'B']);

      const changes = await manager.modifyKeys([['LEGACY-001', 'LEGACY-RENAMED']], ['A']);

      expect(changes).toEqual({ A: [['LEGACY-001', 'LEGACY-RENAMED']] });
      expect(manager.getKeys('A')).toContain('LEGACY-RENAMED');
      expect(manager.getKeys('A')).not.toContain('LEGACY-001');
      expect(manager.getKeys('B')).toContain('LEGACY-001');
    });

    it('clears every system', async () => {
      await manager.clear();

      expect(await readFile(systemFiles['C'] ?? '', 'utf-8')).toBe(`${HEADER}\n`);
      expect((await manager.buildStatusReport()).totalUniqueKeys).toBe(0);
    });
  });

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  describe('snapshots', () => {
    it('saves metadata beside a copy of every system file', async () => {
      const manager = createManager();
      await manager.initialize(1);

      const path = await manager.saveSnapshot('baseline', { note: 'initial sandbox' });

      expect(path).toBe(join(snapshotDir, '20260115-100000_baseline'));
      const metadata: unknown = JSON.parse(await readFile(join(path, 'metadata.json'), 'utf-8'));
      expect(metadata).toMatchObject({
        name: 'baseline',
        note: 'initial sandbox',
        description: 'initial sandbox',
        created_at: '2026-01-15T10:00:00',
        systems: ['A', 'B', 'C'],
      });
      expect(await readFile(join(path, 'A.csv'), 'utf-8')).toBe(
        `${HEADER}\nCUST-00001,2026-01-15T10:00:00,A,active\n`
      );
      expect(existsSync(join(snapshotDir, '.sandbox_snapshot.lock'))).toBe(false);
    });

    it('restores the files and state from a snapshot', async () => {
      const manager = createManager();
      await manager.initialize(2);
      const path = await manager.saveSnapshot('baseline');
      await manager.clear();

      await manager.loadSnapshot(path);

      expect(manager.getKeys('A')).toEqual(['CUST-00001', 'CUST-00002']);
      const reread = createManager();
      await reread.load();
      expect(reread.getKeys('C')).toEqual(['CUST-00001', 'CUST-00002']);
    });

    it('lists snapshots newest first with their metadata', async () => {
      let now = NOW;
      const manager = new SandboxStateManager({ systemFiles, snapshotDir, now: () => now });
      await manager.saveSnapshot('first');
      now = new Date('2026-01-15T11:30:00.000Z');
      await manager.saveSnapshot('second try');

      const snapshots = await manager.listSnapshots();

      expect(snapshots.map((snapshot) => snapshot.path)).toEqual([
        join(snapshotDir, '20260115-113000_second_try'),
        join(snapshotDir, '20260115-100000_first'),
      ]);
      expect(snapshots[0]?.metadata?.name).toBe('second try');
      expect((await manager.buildStatusReport()).snapshotCount).toBe(2);
    });

    it('refuses to overwrite an existing snapshot', async () => {
      const manager = createManager();
      await manager.saveSnapshot('baseline');

      await expect(manager.saveSnapshot('baseline')).rejects.toThrow('Snapshot already exists');
    });

    it('rejects names that would leave the snapshot directory', async () => {
      await expect(createManager().saveSnapshot('../escape')).rejects.toThrow(SandboxError);
      await expect(createManager().saveSnapshot('  ')).rejects.toThrow('Snapshot name is required');
    });

    it('leaves the files alone when a snapshot lacks a system', async () => {
      const manager = createManager();
      await manager.initialize(1);
      const path = await manager.saveSnapshot('partial');
      await rm(join(path, 'B.csv'));
      await manager.clear();

      await expect(manager.loadSnapshot(path)).rejects.toThrow('Snapshot missing data for system B');

      expect(await readFile(systemFiles['A'] ?? '', 'utf-8')).toBe(`${HEADER}\n`);
    });

    it('rejects a missing snapshot directory', async () => {
      await expect(createManager().loadSnapshot(join(dir, 'nope'))).rejects.toThrow(
        'Snapshot directory not found'
      );
    });

    it('applies concurrent edits and snapshot writes in call order', async () => {
      const manager = createManager();

      const [, , path] = await Promise.all([
        manager.addKeys(['K1'], ['A']),
        manager.addKeys(['K2'], ['A']),
        manager.saveSnapshot('both'),
      ]);

      expect(await readFile(join(path, 'A.csv'), 'utf-8')).toBe(
        `${HEADER}\nK1,2026-01-15T10:00:00,A,active\nK2,2026-01-15T10:00:00,A,active\n`
      );
      expect(await readFile(join(path, 'B.csv'), 'utf-8')).toBe(`${HEADER}\n`);
    });

    it('keeps working after a queued edit fails', async () => {
      const manager = createManager(1);

      const results = await Promise.allSettled([
        manager.addKeys(['K1', 'K2'], ['A']),
        manager.addKeys(['K3'], ['A']),
      ]);

      expect(results.map((result) => result.status)).toEqual(['rejected', 'fulfilled']);
      expect(manager.getKeys('A')).toEqual(['K3']);
    });
  });

  // ==========================================================================
  // Input helpers
  // ==========================================================================

  describe('input helpers', () => {
    it('trims and de-duplicates keys', () => {
      expect(ensureKeys([' K1 ', 'K1', 'K2'])).toEqual(['K1', 'K2']);
      expect(() => ensureKeys([])).toThrow(SandboxError);
      expect(() => ensureKeys(['K1', '  '])).toThrow('Key value cannot be empty');
    });

    it('matches systems case-insensitively', () => {
      expect(ensureSystems(['b', 'a', 'B'], ['A', 'B', 'C'])).toEqual(['A', 'B']);
      expect(() => ensureSystems(['Z'], ['A', 'B'])).toThrow(SandboxError);
      expect(() => ensureSystems([' '], ['A'])).toThrow('At least one system must be specified');
    });

    it('reads keys from text and CSV files', async () => {
      const text = await writeRawFile(dir, 'keys.txt', 'foo\n\nbar\nfoo\n');
      const csv = await writeRawFile(dir, 'keys.csv', 'id,key\n1,foo\n2,bar\n');
      const noKey = await writeRawFile(dir, 'other.csv', 'id\n1\n');

      expect(await loadKeysFromFile(text)).toEqual(['foo', 'bar']);
      expect(await loadKeysFromFile(csv)).toEqual(['foo', 'bar']);
      await expect(loadKeysFromFile(noKey)).rejects.toThrow("must contain a 'key' column");
      await expect(loadKeysFromFile(join(dir, 'missing.txt'))).rejects.toThrow('Key source not found');
    });
  });
});
