// ============================================
// Tierlink Error Types
// ============================================

import { ErrorCode } from "@tierlink/shared";

export { ErrorCode };

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Unavailable backend, lock timeout → RECOVERABLE
 * - Configuration, allocation, failed apply → USER_ACTION
 * - Unknown → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.BACKEND_UNAVAILABLE:
    case ErrorCode.LOCK_TIMEOUT:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_READ_ERROR:
    case ErrorCode.ALLOCATION_INVALID:
    case ErrorCode.CURVE_INVALID:
    case ErrorCode.CLASSIFICATION_INVALID:
    case ErrorCode.BACKEND_APPLY_FAILED:
    case ErrorCode.BACKEND_COMMAND_FAILED:
    case ErrorCode.OPERATION_ABORTED:
    case ErrorCode.PERMISSION_DENIED:
      return ErrorSeverity.USER_ACTION;
    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a TierlinkError.
 */
export interface TierlinkErrorOptions {
  /** The underlying cause of this error */
  cause?: Error;
  /** Additional context about the error (tier id, offending value, ...) */
  context?: Record<string, unknown>;
  /** Whether this error can be retried */
  isRetryable?: boolean;
}

/**
 * Base error class for all tierlink errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class TierlinkError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;

  constructor(message: string, code: ErrorCode, options?: TierlinkErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "TierlinkError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Whether this error can be retried.
   * If not explicitly set, defaults to true for RECOVERABLE severity.
   */
  get isRetryable(): boolean {
    if (this._isRetryable !== undefined) {
      return this._isRetryable;
    }
    return this.severity === ErrorSeverity.RECOVERABLE;
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard to check if an error is a TierlinkError with FATAL severity.
 */
export function isFatalError(error: unknown): error is TierlinkError {
  return error instanceof TierlinkError && error.severity === ErrorSeverity.FATAL;
}

/**
 * Checks if an error is retryable.
 * Returns true if error is a TierlinkError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TierlinkError && error.isRetryable;
}
