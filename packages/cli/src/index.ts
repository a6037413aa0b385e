#!/usr/bin/env node
import { defaultDeps } from "./context.js";
import { EXIT_CODES } from "./exit-codes.js";
import { run } from "./program.js";

const controller = new AbortController();

/**
 * The first signal stops a running monitor; a second one exits at once.
 */
function onSignal(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.INTERRUPTED);
  }
  controller.abort(new Error(`Received ${signal}`));
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

process.exitCode = await run(process.argv, defaultDeps(controller.signal));

process.off("SIGINT", onSignal);
process.off("SIGTERM", onSignal);
