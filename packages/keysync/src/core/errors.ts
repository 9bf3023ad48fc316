/**
 * KeySync Error Types
 *
 * Custom error classes for reconciliation failures. Each error carries the
 * structured context needed to decide whether a run can continue.
 */

import type { CheckpointMap } from './types.js';

/**
 * Base class for every error raised by the reconciliation pipeline
 */
export class ReconciliationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReconciliationError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A system's input file does not exist and the policy is `fail`
 */
export class MissingFileError extends ReconciliationError {
  constructor(
    public readonly system: string,
    public readonly filePath: string
  ) {
    super(`Required file missing for system ${system}: ${filePath}`);
    this.name = 'MissingFileError';
  }
}

/**
 * Corrupt row or file content and the policy is `fail`
 */
export class DataValidationError extends ReconciliationError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly rowNumber: number | null
  ) {
    super(message);
    this.name = 'DataValidationError';
  }
}

/**
 * The authority is absent, or a dependent is absent while partial processing is disabled
 */
export class SystemUnavailableError extends ReconciliationError {
  constructor(
    message: string,
    public readonly missingSystems: readonly string[]
  ) {
    super(message);
    this.name = 'SystemUnavailableError';
  }
}

/**
 * No valid checkpoint could be found for a failed run
 */
export class CheckpointRecoveryError extends ReconciliationError {
  constructor(
    message: string,
    public readonly checkpoints: CheckpointMap
  ) {
    super(message);
    this.name = 'CheckpointRecoveryError';
  }
}

/**
 * Accumulated local errors exceeded the configured ceiling
 */
export class ErrorCeilingExceededError extends ReconciliationError {
  constructor(
    public readonly errorCount: number,
    public readonly ceiling: number
  ) {
    super(`Error count ${errorCount} exceeded the configured ceiling of ${ceiling}`);
    this.name = 'ErrorCeilingExceededError';
  }
}

/**
 * Illegal run lifecycle transition or unknown run
 */
export class RunStateError extends ReconciliationError {
  constructor(
    message: string,
    public readonly runId: number
  ) {
    super(message);
    this.name = 'RunStateError';
  }
}

/**
 * Configuration file or override failed validation
 */
export class ConfigurationError extends ReconciliationError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  /**
   * Get formatted summary of validation issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * Sandbox input was rejected, or a sandbox file could not be locked
 */
export class SandboxError extends ReconciliationError {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
