/**
 * Process exit codes.
 *
 * Following Unix conventions:
 * - 0: Success
 * - 1: General error (failed apply, failed self-test, unreadable backend)
 * - 2: Usage or configuration error
 * - 77: Missing privileges (EX_NOPERM)
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/exit-codes
 */

import { AbortError, ConfigError, ErrorCode, TierlinkError } from "@tierlink/core";

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage or configuration error */
  USAGE_ERROR: 2,
  /** Command needs root */
  NO_PERMISSION: 77,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to an exit code.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof AbortError || (error instanceof Error && error.name === "AbortError")) {
    return EXIT_CODES.INTERRUPTED;
  }
  if (error instanceof ConfigError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof TierlinkError && error.code === ErrorCode.PERMISSION_DENIED) {
    return EXIT_CODES.NO_PERMISSION;
  }
  return EXIT_CODES.ERROR;
}
