/**
 * Helpers for turning log payloads into printable values.
 *
 * @module logger/serialize
 */

import { TierlinkError } from "../errors/types.js";

/**
 * Serialize an error into a structured log-safe format.
 * TierlinkErrors keep their code and context so a failed tier or command
 * can be identified from the log line alone.
 *
 * @example
 * ```typescript
 * serializeError(new AllocationError("share sum 110 exceeds 100", { parentId: 1 }));
 * // { name: 'AllocationError', message: '...', code: 1101, context: { parentId: 1 } }
 * ```
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof TierlinkError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      context: error.context,
    };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
    };
  }
  return { raw: String(error) };
}

/**
 * Render log data as a single-line string.
 */
export function formatData(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  if (data instanceof Error) {
    return JSON.stringify(serializeError(data));
  }
  return JSON.stringify(data, (_key, value: unknown) =>
    value instanceof Error ? serializeError(value) : value
  );
}
