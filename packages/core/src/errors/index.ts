// ============================================
// Tierlink Errors - Barrel Export
// ============================================

export { AbortError, abortableSleep, type RetryOptions, withRetry } from "./retry.js";
export {
  AllocationError,
  BackendApplyError,
  BackendCommandError,
  BackendUnavailableError,
  ClassificationError,
  InvalidCurveError,
  LockTimeoutError,
} from "./shaping.js";
export {
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isFatalError,
  isRetryableError,
  TierlinkError,
  type TierlinkErrorOptions,
} from "./types.js";
