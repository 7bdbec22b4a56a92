/**
 * Custom Error Classes
 */

/**
 * Base error class for all modelfetch errors
 */
export class ModelFetchError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ModelFetchError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid flags, job counts or index edits. Raised before any work starts.
 */
export class ConfigurationError extends ModelFetchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 1, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Not found error for names without a resource entry
 */
export class NotFoundError extends ModelFetchError {
  constructor(resource: string, identifier: string) {
    super(
      `no entry for ${resource} '${identifier}'`,
      'NOT_FOUND',
      1,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * A group that (directly or transitively) contains itself
 */
export class CycleError extends ModelFetchError {
  public readonly at: string;

  constructor(at: string, path: readonly string[]) {
    super(
      `cyclic group reference detected at '${at}'`,
      'CYCLE_ERROR',
      1,
      { at, path: [...path] }
    );
    this.name = 'CycleError';
    this.at = at;
  }
}

/**
 * Network or filesystem fault while fetching one resource
 */
export class TransferError extends ModelFetchError {
  public readonly task: string;
  public readonly reason: string;

  constructor(task: string, url: string, message: string, cause?: unknown) {
    super(
      `[${task}] ${message}`,
      'TRANSFER_ERROR',
      1,
      { task, url }
    );
    this.name = 'TransferError';
    this.task = task;
    this.reason = message;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Transfer stopped by an abort signal
 */
export class CancelledError extends ModelFetchError {
  constructor(task: string) {
    super(`[${task}] cancelled`, 'CANCELLED', 130, { task });
    this.name = 'CancelledError';
  }
}

export function isModelFetchError(error: unknown): error is ModelFetchError {
  return error instanceof ModelFetchError;
}
