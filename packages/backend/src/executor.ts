/**
 * Subprocess command executor.
 *
 * Runs backend binaries with a sanitized environment, an optional timeout
 * (SIGTERM, then SIGKILL after a grace period) and abort support. A
 * non-zero exit resolves normally; {@link runChecked} turns it into an error.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { BackendCommandError, type Logger } from "@tierlink/core";
import { buildCommandEnvironment } from "./environment.js";
import type { CommandOptions, CommandResult, CommandRunner, TerminationReason } from "./types.js";

const KILL_GRACE_MS = 5000;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface CommandExecutorOptions {
  /** Applied when a call passes no timeout */
  defaultTimeoutMs?: number;
  /** Output beyond this many bytes per stream is dropped */
  maxOutputBytes?: number;
  /** Base environment (default: process.env) */
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

export class CommandExecutor implements CommandRunner {
  private readonly options: CommandExecutorOptions;

  constructor(options: CommandExecutorOptions = {}) {
    this.options = options;
  }

  async execute(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const maxOutputBytes = this.options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const env = buildCommandEnvironment(this.options.env ?? process.env, options.env);
    const abortSignal = options.signal;

    this.options.logger?.debug(formatCommand(command, args));

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let terminationReason: TerminationReason | undefined;
      let killSignal: NodeJS.Signals | null = null;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      let killTimerId: ReturnType<typeof setTimeout> | undefined;

      if (abortSignal?.aborted) {
        resolve({
          exitCode: null,
          signal: null,
          stdout: "",
          stderr: "Operation aborted",
          durationMs: Date.now() - startTime,
          terminated: true,
          terminationReason: "aborted",
        });
        return;
      }

      const child: ChildProcess = spawn(command, [...args], {
        env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const terminate = (reason: TerminationReason) => {
        if (child.exitCode !== null || child.killed) {
          return;
        }
        terminationReason = reason;
        killSignal = "SIGTERM";
        child.kill("SIGTERM");
        killTimerId = setTimeout(() => {
          if (child.exitCode === null) {
            killSignal = "SIGKILL";
            child.kill("SIGKILL");
          }
        }, KILL_GRACE_MS);
      };

      const abortHandler = () => terminate("aborted");
      abortSignal?.addEventListener("abort", abortHandler, { once: true });

      const cleanup = () => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        if (killTimerId) {
          clearTimeout(killTimerId);
        }
        abortSignal?.removeEventListener("abort", abortHandler);
      };

      child.stdout?.on("data", (data: Buffer) => {
        if (stdout.length + data.length <= maxOutputBytes) {
          stdout += data.toString();
        }
      });

      child.stderr?.on("data", (data: Buffer) => {
        if (stderr.length + data.length <= maxOutputBytes) {
          stderr += data.toString();
        }
      });

      if (timeoutMs !== undefined && timeoutMs > 0) {
        timeoutId = setTimeout(() => terminate("timeout"), timeoutMs);
      }

      child.on("close", (exitCode, signal) => {
        cleanup();
        resolve({
          exitCode,
          signal: signal ?? killSignal,
          stdout,
          stderr,
          durationMs: Date.now() - startTime,
          terminated: terminationReason !== undefined,
          terminationReason,
        });
      });

      child.on("error", (error) => {
        cleanup();
        resolve({
          exitCode: null,
          signal: null,
          stdout,
          stderr: stderr || error.message,
          durationMs: Date.now() - startTime,
          terminated: false,
        });
      });
    });
  }
}

/**
 * Run a command and return its stdout; anything but exit code 0 throws.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions
): Promise<string> {
  const result = await runner.execute(command, args, options);
  if (result.exitCode !== 0) {
    throw new BackendCommandError(formatCommand(command, args), result.exitCode, result.stderr);
  }
  return result.stdout;
}

/**
 * Run a command whose non-zero exit means "already in the wanted state"
 * (deleting something that is not there). Returns whether it succeeded.
 * Failing to run at all still throws.
 */
export async function runTolerant(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
  logger?: Logger
): Promise<boolean> {
  const result = await runner.execute(command, args, options);
  if (result.exitCode === 0) {
    return true;
  }
  if (result.exitCode === null) {
    throw new BackendCommandError(formatCommand(command, args), result.exitCode, result.stderr);
  }
  logger?.debug(`Ignored exit ${result.exitCode}: ${formatCommand(command, args)}`, {
    stderr: result.stderr.trim(),
  });
  return false;
}
