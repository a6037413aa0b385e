/**
 * In-memory command runner for dry runs and tests: records every command
 * line instead of running it.
 */

import { formatCommand } from "./executor.js";
import type { CommandOptions, CommandResult, CommandRunner } from "./types.js";

export interface RecordedCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export type CommandResponder = (command: string, args: readonly string[]) => Partial<CommandResult> | undefined;

export class RecordingRunner implements CommandRunner {
  readonly recorded: RecordedCommand[] = [];
  private readonly responder?: CommandResponder;

  /**
   * @param responder - Overrides the default result (exit 0, no output) per command
   */
  constructor(responder?: CommandResponder) {
    this.responder = responder;
  }

  /** Recorded commands as shell-style lines */
  get lines(): string[] {
    return this.recorded.map((entry) => formatCommand(entry.command, entry.args));
  }

  async execute(command: string, args: readonly string[], _options?: CommandOptions): Promise<CommandResult> {
    this.recorded.push({ command, args: [...args] });
    return {
      exitCode: 0,
      signal: null,
      stdout: "",
      stderr: "",
      durationMs: 0,
      terminated: false,
      ...this.responder?.(command, args),
    };
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
