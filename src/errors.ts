/**
 * @fileoverview Error types raised at the plan store boundary.
 *
 * @module errors
 */

export type PlanErrorCode = 'validation_error' | 'storage_error';

export class PlanError extends Error {
  constructor(
    public readonly code: PlanErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PlanError';
  }

  toJSON(): { error: PlanErrorCode; message: string } {
    return {
      error: this.code,
      message: this.message,
    };
  }
}

/**
 * A merge batch was rejected. Nothing was written.
 */
export class ValidationError extends PlanError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('validation_error', `Invalid plan update: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Reading, writing or parsing the plan file failed.
 * Never retried by the store.
 */
export class StorageError extends PlanError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super('storage_error', message, { cause });
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

export function isStorageError(err: unknown): err is StorageError {
  return err instanceof StorageError;
}
