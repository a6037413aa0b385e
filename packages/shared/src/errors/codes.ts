// ============================================
// Tierlink Error Codes
// ============================================

/**
 * Centralized error codes for tierlink.
 * Error code ranges:
 * - 1xxx: Configuration and compilation errors
 * - 2xxx: Backend errors
 * - 3xxx: Session/concurrency errors
 * - 9xxx: Unclassified
 */
export enum ErrorCode {
  // Configuration (10xx)
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,
  CONFIG_READ_ERROR = 1004,

  // Compilation (11xx)
  ALLOCATION_INVALID = 1101,
  CURVE_INVALID = 1102,
  CLASSIFICATION_INVALID = 1103,

  // Backend (2xxx)
  BACKEND_APPLY_FAILED = 2001,
  BACKEND_UNAVAILABLE = 2002,
  BACKEND_COMMAND_FAILED = 2003,

  // Session (3xxx)
  LOCK_TIMEOUT = 3001,
  OPERATION_ABORTED = 3002,
  PERMISSION_DENIED = 3003,

  UNKNOWN = 9999,
}
