/**
 * Environment handed to backend commands.
 *
 * Backend output is parsed by label, so the locale is pinned to C. Loader
 * hooks never reach the child.
 */

/**
 * Variables that change how the child loads code.
 */
const BLOCKED_NAMES = new Set(["LD_PRELOAD", "LD_LIBRARY_PATH", "LD_AUDIT", "NODE_OPTIONS"]);

/** Locale overrides applied last */
export const COMMAND_LOCALE: Readonly<Record<string, string>> = { LC_ALL: "C", LANG: "C" };

/**
 * Drops unset variables and the loader blocklist.
 */
export function sanitizeEnvironment(env: Record<string, string | undefined>): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || BLOCKED_NAMES.has(key)) {
      continue;
    }
    sanitized[key] = value;
  }

  return sanitized;
}

/**
 * Sanitized base environment plus overrides, with the C locale forced on top.
 */
export function buildCommandEnvironment(
  base: Record<string, string | undefined>,
  overrides: Record<string, string> = {}
): Record<string, string> {
  return { ...sanitizeEnvironment({ ...base, ...overrides }), ...COMMAND_LOCALE };
}
