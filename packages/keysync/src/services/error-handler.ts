/**
 * Error Handler
 *
 * Applies the configured error policies and owns the run's error log.
 *
 * The `handle*` methods only decide: they return the log entry for the event
 * (or throw when the policy is `fail`) and leave recording to the caller, so
 * parallel loaders can collect entries locally and merge them after joining.
 * `record()` and `recordOperationFailure()` append to the shared log.
 */

import { DEFAULT_ERROR_HANDLING_CONFIG, type ErrorHandlingConfig } from '../core/config.js';
import {
  CheckpointRecoveryError,
  DataValidationError,
  ErrorCeilingExceededError,
  MissingFileError,
} from '../core/errors.js';
import type {
  CheckpointMap,
  CheckpointSummary,
  ErrorLogEntry,
  ErrorLogType,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'error-handler' });

export interface CheckpointRecovery {
  readonly checkpointName: string;
  readonly checkpoint: CheckpointSummary;
}

export interface ErrorSummary {
  readonly totalErrors: number;
  readonly errorsByType: Readonly<Partial<Record<ErrorLogType, number>>>;
  readonly canContinue: boolean;
}

export class ErrorHandler {
  readonly config: ErrorHandlingConfig;
  private errorLog: ErrorLogEntry[] = [];

  constructor(
    config: Partial<ErrorHandlingConfig> = {},
    private readonly authoritySystem = 'A'
  ) {
    this.config = { ...DEFAULT_ERROR_HANDLING_CONFIG, ...config };
  }

  /**
   * Decide what to do about a system whose input file does not exist
   *
   * @throws MissingFileError when the policy is `fail`
   */
  handleMissingFile(system: string, filePath: string): ErrorLogEntry {
    const policy = this.config.onMissingFile;

    if (policy === 'fail') {
      throw new MissingFileError(system, filePath);
    }

    log.warn(`File not found for system ${system}: ${filePath} - skipping`);
    return createEntry('missing_file', {
      system,
      filePath,
      message: `File not found: ${filePath}`,
      action: policy,
    });
  }

  /**
   * Decide what to do about a corrupt row (or a file without a key column,
   * reported with a null row number)
   *
   * @throws DataValidationError when the policy is `fail`
   */
  handleCorruptData(
    system: string,
    filePath: string,
    rowNumber: number | null,
    reason: string
  ): ErrorLogEntry {
    const policy = this.config.onCorruptData;
    const location = rowNumber === null ? filePath : `${filePath} row ${rowNumber}`;

    if (policy === 'fail') {
      throw new DataValidationError(`Corrupt data in ${location}: ${reason}`, filePath, rowNumber);
    }

    if (policy === 'log') {
      log.warn(`Corrupt data in ${location}: ${reason}`, { system });
    } else {
      log.debug(`Skipping corrupt data in ${location}`, { system });
    }

    return createEntry('corrupt_data', {
      system,
      filePath,
      rowNumber,
      message: reason,
      action: policy,
    });
  }

  /**
   * Entry for a system that could not be loaded at all (read failure after retries)
   */
  describeLoadFailure(system: string, filePath: string, error: Error): ErrorLogEntry {
    log.error(`Error loading system ${system} from ${filePath}`, { error: error.message });
    return createEntry('load_failure', {
      system,
      filePath,
      message: error.message,
      action: 'record',
    });
  }

  /**
   * Append a failure of a wrapped operation to the log
   */
  recordOperationFailure(operation: string, error: Error): ErrorLogEntry {
    log.error(`Operation failed: ${operation}`, { error: error.message });
    const entry = createEntry('operation_failure', {
      message: `${operation}: ${error.message}`,
      action: 'record',
    });
    this.errorLog.push(entry);
    return entry;
  }

  record(entries: readonly ErrorLogEntry[]): void {
    this.errorLog.push(...entries);
  }

  getErrorLog(): readonly ErrorLogEntry[] {
    return [...this.errorLog];
  }

  /**
   * Whether the log is still below `maxErrorsBeforeFail`
   */
  canContinue(): boolean {
    return this.errorLog.length < this.config.maxErrorsBeforeFail;
  }

  /**
   * @throws ErrorCeilingExceededError once the log reaches `maxErrorsBeforeFail`
   */
  checkErrorCeiling(): void {
    if (!this.canContinue()) {
      throw new ErrorCeilingExceededError(this.errorLog.length, this.config.maxErrorsBeforeFail);
    }
  }

  /**
   * Determine whether processing can continue with the systems that loaded
   *
   * The authority is always required; missing dependents are tolerated only
   * with partial processing enabled.
   */
  handlePartialSystemAvailability(
    availableSystems: readonly string[],
    requiredSystems: readonly string[]
  ): boolean {
    if (!availableSystems.includes(this.authoritySystem)) {
      log.error(`System ${this.authoritySystem} is required but not available`);
      return false;
    }

    const missing = requiredSystems.filter((system) => !availableSystems.includes(system));
    if (missing.length === 0) {
      return true;
    }

    log.warn('Missing systems', { missing });
    if (this.config.enablePartialProcessing) {
      log.info('Continuing with partial system availability');
      return true;
    }

    log.error('Partial processing disabled - all systems required');
    return false;
  }

  /**
   * Find the latest valid checkpoint of a run
   *
   * Checkpoints are stage summaries, not resumable state: the result names
   * the last stage the run reached.
   *
   * @throws CheckpointRecoveryError when there are no checkpoints or none is valid
   */
  recoverFromCheckpoint(checkpoints: CheckpointMap): CheckpointRecovery {
    const names = Object.keys(checkpoints);
    log.info('Attempting recovery from checkpoint', { checkpoints: names });

    if (names.length === 0) {
      throw new CheckpointRecoveryError('No checkpoint data available', checkpoints);
    }

    for (const name of [...names].reverse()) {
      const checkpoint = checkpoints[name];
      if (checkpoint !== undefined && isValidCheckpoint(checkpoint)) {
        log.info(`Recovering from checkpoint: ${name}`);
        return { checkpointName: name, checkpoint };
      }
    }

    throw new CheckpointRecoveryError('No valid checkpoint found', checkpoints);
  }

  getErrorSummary(): ErrorSummary {
    const errorsByType: Partial<Record<ErrorLogType, number>> = {};
    for (const entry of this.errorLog) {
      errorsByType[entry.type] = (errorsByType[entry.type] ?? 0) + 1;
    }

    return {
      totalErrors: this.errorLog.length,
      errorsByType,
      canContinue: this.canContinue(),
    };
  }

  reset(): void {
    this.errorLog = [];
  }
}

function isValidCheckpoint(checkpoint: CheckpointSummary): boolean {
  return (
    typeof checkpoint.timestamp === 'string' &&
    !Number.isNaN(Date.parse(checkpoint.timestamp)) &&
    typeof checkpoint.dataSummary === 'object' &&
    checkpoint.dataSummary !== null &&
    typeof checkpoint.dataSummary.type === 'string' &&
    typeof checkpoint.dataSummary.size === 'number'
  );
}

function createEntry(
  type: ErrorLogType,
  fields: {
    readonly system?: string;
    readonly filePath?: string;
    readonly rowNumber?: number | null;
    readonly message: string;
    readonly action: string;
  }
): ErrorLogEntry {
  return {
    type,
    system: fields.system ?? null,
    filePath: fields.filePath ?? null,
    rowNumber: fields.rowNumber ?? null,
    message: fields.message,
    action: fields.action,
    timestamp: new Date().toISOString(),
  };
}
