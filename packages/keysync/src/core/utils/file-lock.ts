/**
 * Filesystem lock shared between processes
 *
 * The lock is a `<path>.lock` file created with `wx` (O_CREAT | O_EXCL).
 * Whoever creates it holds the lock until `release()` removes it.
 */

import { open, unlink, type FileHandle } from 'node:fs/promises';
import { SandboxError } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'file-lock' });

export interface FileLockOptions {
  /** Acquisition attempts before giving up (default 50) */
  readonly maxRetries?: number;
  /** Base delay between attempts; each wait adds up to the same again as jitter (default 100) */
  readonly retryDelayMs?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileLock {
  readonly lockPath: string;
  private lockHandle: FileHandle | null = null;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(filePath: string, options: FileLockOptions = {}) {
    this.lockPath = `${filePath}.lock`;
    this.maxRetries = options.maxRetries ?? 50;
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  /**
   * Acquire the lock, waiting while another holder has it
   *
   * @throws SandboxError once every attempt found the lock taken
   */
  async acquire(): Promise<void> {
    if (this.lockHandle) {
      throw new SandboxError(`Lock already held: ${this.lockPath}`);
    }

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        this.lockHandle = await open(this.lockPath, 'wx');
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
        if (attempt === this.maxRetries - 1) {
          break;
        }
        const delay = this.retryDelayMs * (1 + Math.random());
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw new SandboxError(
      `Unable to acquire lock ${this.lockPath} after ${this.maxRetries} attempts`
    );
  }

  /**
   * Release the lock. The handle is closed before the lock file is removed.
   */
  async release(): Promise<void> {
    if (!this.lockHandle) {
      return;
    }

    try {
      await this.lockHandle.close();
    } catch (error) {
      log.warn('Failed to close lock handle', {
        lockPath: this.lockPath,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.lockHandle = null;
    }

    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
  }

  /**
   * Run `fn` while holding the lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
