/**
 * Test Fixtures
 *
 * Temporary directories and system CSV exports for file-based tests.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { KeyNormalizer } from '../../core/key-normalizer.js';
import { SystemComparator } from '../../core/system-comparator.js';
import type { ComparisonResult } from '../../core/types.js';
import { ErrorHandler } from '../../services/error-handler.js';

export async function createTempDir(prefix = 'keysync-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write `<system>.csv` with a `key,name` header, one row per key
 *
 * @returns Path of the written file
 */
export async function writeSystemFile(
  dir: string,
  system: string,
  keys: readonly string[]
): Promise<string> {
  const lines = ['key,name', ...keys.map((key, i) => `${key},record ${i + 1}`)];
  return writeRawFile(dir, `${system}.csv`, `${lines.join('\n')}\n`);
}

export async function writeRawFile(dir: string, fileName: string, content: string): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Write one file per system and return system -> path
 */
export async function writeSystems(
  dir: string,
  systems: Readonly<Record<string, readonly string[]>>
): Promise<Record<string, string>> {
  const files: Record<string, string> = {};
  for (const [system, keys] of Object.entries(systems)) {
    files[system] = await writeSystemFile(dir, system, keys);
  }
  return files;
}

/**
 * Write the systems and run a default comparator over them (authority `A`)
 */
export async function compareSystems(
  dir: string,
  systems: Readonly<Record<string, readonly string[]>>
): Promise<ComparisonResult> {
  const files = await writeSystems(dir, systems);
  const comparator = new SystemComparator(new KeyNormalizer(), new ErrorHandler());
  return comparator.compareAll(files);
}
