/**
 * Retry with Fixed Delay
 *
 * Re-runs a failed operation a fixed number of times with a constant pause
 * between attempts. Only operations explicitly wrapped by an executor are
 * retried; nothing in the pipeline is retried transparently.
 */

import type { ErrorHandlingConfig } from '../core/config.js';
import { toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'retry' });

export interface RetryConfig {
  /** Total attempts including the first (>= 1) */
  readonly maxAttempts: number;
  readonly delayMs: number;
  /** Errors for which this returns false are rethrown immediately */
  readonly isRetryable?: (error: Error) => boolean;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly error: Error;
  readonly retryable: boolean;
}

/**
 * Retry exhausted error (thrown after max attempts)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Retry executor with a constant delay
 *
 * @example
 * ```typescript
 * const retry = new RetryExecutor({ maxAttempts: 3, delayMs: 5000 });
 * const content = await retry.execute(() => readFile(path, 'utf-8'), `read ${path}`);
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;

  constructor(config: RetryConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
    }
    this.config = config;
  }

  /**
   * Execute function with retry logic
   *
   * @param operation - Label used in log lines
   * @throws RetryExhaustedError once every attempt has failed, or on the
   *   first non-retryable error
   */
  async execute<T>(fn: () => Promise<T>, operation = 'operation'): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const lastError = toError(error);
        const retryable = this.config.isRetryable?.(lastError) ?? true;
        attempts.push({ attemptNumber: attempt, error: lastError, retryable });

        if (!retryable || attempt === this.config.maxAttempts) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        log.warn(`Attempt ${attempt}/${this.config.maxAttempts} of ${operation} failed, retrying`, {
          error: lastError.message,
          delayMs: this.config.delayMs,
        });
        await this.sleep(this.config.delayMs);
      }
    }

    // Unreachable: maxAttempts >= 1 and the last attempt always returns or throws
    throw new Error(`Retry loop for ${operation} exited without a result`);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Build a retry executor from the error handling configuration
 */
export function createRetryExecutor(
  config: Pick<ErrorHandlingConfig, 'retryAttempts' | 'retryDelaySeconds'>,
  isRetryable?: (error: Error) => boolean
): RetryExecutor {
  return new RetryExecutor({
    maxAttempts: config.retryAttempts,
    delayMs: config.retryDelaySeconds * 1000,
    isRetryable,
  });
}
