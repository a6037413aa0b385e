// ============================================
// Shaping Errors
// ============================================

import { ErrorCode, TierlinkError, type TierlinkErrorOptions } from "./types.js";

/**
 * Invalid share or capacity arithmetic. Fatal to the reconfiguration
 * attempt; nothing has been applied when it is thrown.
 */
export class AllocationError extends TierlinkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.ALLOCATION_INVALID, { context });
    this.name = "AllocationError";
  }
}

export class InvalidCurveError extends TierlinkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CURVE_INVALID, { context });
    this.name = "InvalidCurveError";
  }
}

/**
 * A match specification that cannot be turned into a rule
 * (malformed address, port out of range, unknown tier).
 */
export class ClassificationError extends TierlinkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CLASSIFICATION_INVALID, { context });
    this.name = "ClassificationError";
  }
}

/**
 * A single step of a shaping plan failed. The whole plan is torn down and
 * retried as one unit; there is no partial success.
 */
export class BackendApplyError extends TierlinkError {
  readonly stepIndex: number;
  readonly operation: string;

  constructor(message: string, stepIndex: number, operation: string, options?: TierlinkErrorOptions) {
    super(message, ErrorCode.BACKEND_APPLY_FAILED, {
      ...options,
      context: { ...options?.context, stepIndex, operation },
    });
    this.name = "BackendApplyError";
    this.stepIndex = stepIndex;
    this.operation = operation;
  }
}

/**
 * The shaping backend could not be queried. Recoverable on the next poll.
 */
export class BackendUnavailableError extends TierlinkError {
  constructor(message: string, options?: TierlinkErrorOptions) {
    super(message, ErrorCode.BACKEND_UNAVAILABLE, options);
    this.name = "BackendUnavailableError";
  }
}

/**
 * A backend command exited unsuccessfully.
 */
export class BackendCommandError extends TierlinkError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`Command failed (${exitCode ?? "no exit code"}): ${command}`, ErrorCode.BACKEND_COMMAND_FAILED, {
      context: { command, exitCode, stderr: stderr.trim() },
    });
    this.name = "BackendCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class LockTimeoutError extends TierlinkError {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for the reconfiguration lock`, ErrorCode.LOCK_TIMEOUT, {
      context: { timeoutMs },
    });
    this.name = "LockTimeoutError";
  }
}
