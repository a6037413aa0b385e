/**
 * Command execution contracts shared by the tc and iptables backends.
 */

export interface CommandOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Extra environment variables, merged over the sanitized process environment */
  env?: Record<string, string>;
}

export type TerminationReason = "timeout" | "aborted";

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  terminated: boolean;
  terminationReason?: TerminationReason;
}

/**
 * Anything that can run an argument vector. The subprocess executor is the
 * production implementation; the recording runner stands in for dry runs.
 */
export interface CommandRunner {
  execute(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}
