/**
 * Base error for every failure raised by the pipeline.
 * Callers can switch on `code` without importing the subclasses.
 */
export class PdfToolsError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'PdfToolsError';
    this.code = code;
    this.details = details;
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

/**
 * One or more named input paths do not exist.
 */
export class NotFoundError extends PdfToolsError {
  public readonly paths: string[];

  constructor(paths: string[], what = 'File') {
    const label = paths.length === 1 ? `${what} not found` : `${what}s not found`;
    super(`${label}: ${paths.join(', ')}`, 'NOT_FOUND', { paths });
    this.name = 'NotFoundError';
    this.paths = paths;
  }
}

/**
 * Decode, encode or external tool failure.
 */
export class ProcessingError extends PdfToolsError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, 'PROCESSING_ERROR', details, cause);
    this.name = 'ProcessingError';
  }
}

export class ValidationError extends PdfToolsError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', { field, ...details });
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ConfigurationError extends PdfToolsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class OperationInProgressError extends PdfToolsError {
  public readonly running: string;

  constructor(running: string) {
    super('Another operation is already running.', 'OPERATION_IN_PROGRESS', { running });
    this.name = 'OperationInProgressError';
    this.running = running;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown throwable into the given error class.
 * Errors that already belong to the taxonomy pass through untouched.
 */
export function wrapError(
  error: unknown,
  ErrorClass: new (message: string, details?: Record<string, unknown>, cause?: Error) => PdfToolsError,
  context?: string
): PdfToolsError {
  if (error instanceof PdfToolsError) {
    return error;
  }

  const original = error instanceof Error ? error : new Error(String(error));
  const message = context ? `${context}: ${original.message}` : original.message;
  return new ErrorClass(message, { originalError: original.name }, original);
}
