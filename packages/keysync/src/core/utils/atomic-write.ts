/**
 * Atomic Write Utilities
 *
 * Write to a temporary file beside the target, then rename it into place, so
 * readers see either the old content or the new content and never a partial
 * file.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write string data to file, creating the parent directory
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keep concurrent writers apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.warn(`Could not remove ${tempPath}`, {
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`);
}
