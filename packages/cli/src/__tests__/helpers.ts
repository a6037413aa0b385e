import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type CommandResponder, createBackendsWith, RecordingRunner } from "@tierlink/backend";
import type { CliDeps } from "../context.js";

export const NOW = new Date("2024-05-01T10:00:00.000Z");

export interface Harness {
  readonly dir: string;
  readonly configPath: string;
  readonly sessionFile: string;
  readonly backupDir: string;
  readonly lockFile: string;
  /** The `[state]` table of the config file, for tests that rewrite it */
  readonly stateToml: string;
  readonly runner: RecordingRunner;
  readonly logged: string[];
  readonly errors: string[];
  readonly deps: CliDeps;
  argv(...args: string[]): string[];
}

/**
 * A temporary state directory, a config file pointing at it and commands
 * recorded instead of run.
 */
export async function createHarness(responder?: CommandResponder, overrides: Partial<CliDeps> = {}): Promise<Harness> {
  const dir = await mkdtemp(join(tmpdir(), "tierlink-cli-"));
  const configPath = join(dir, "tierlink.toml");
  const sessionFile = join(dir, "state", "session.json");
  const backupDir = join(dir, "backups");
  const lockFile = join(dir, "run", "tierlink.lock");
  const stateToml = `[state]\nsessionFile = "${sessionFile}"\nbackupDir = "${backupDir}"\nlockFile = "${lockFile}"\n`;
  await writeFile(configPath, stateToml, "utf-8");

  const runner = new RecordingRunner(responder);
  const logged: string[] = [];
  const errors: string[] = [];
  const deps: CliDeps = {
    out: {
      log: (text) => {
        logged.push(text);
      },
      error: (text) => {
        errors.push(text);
      },
    },
    env: {},
    getuid: () => 0,
    now: () => NOW,
    createBackends: (config, options) => createBackendsWith(runner, config, options.logger),
    ...overrides,
  };

  return {
    dir,
    configPath,
    sessionFile,
    backupDir,
    lockFile,
    stateToml,
    runner,
    logged,
    errors,
    deps,
    argv: (...args) => ["node", "tierlink", "-c", configPath, ...args],
  };
}

const CLASS_MINORS = ["1", "10", "20", "100", "200", "300", "999"];
const FILTER_MARKS = [10, 20, 100, 200, 300];

/**
 * Listings of a system where the stock profile is fully applied.
 */
export const appliedListings: CommandResponder = (command, args) => {
  if (command === "iptables" && args.includes("-L")) {
    return {
      stdout: [
        "Chain TIERLINK_MARK (1 references)",
        "target     prot opt source               destination",
        ...Array.from({ length: 15 }, () => "MARK       all  --  0.0.0.0/0            0.0.0.0/0            MARK set 0xa"),
      ].join("\n"),
    };
  }
  const object = args[0] === "-s" ? args[1] : args[0];
  if (command !== "tc" || !args.includes("show")) {
    return undefined;
  }
  switch (object) {
    case "qdisc":
      return { stdout: "qdisc hfsc 1: root refcnt 2 default 999\n" };
    case "class":
      return {
        stdout: CLASS_MINORS.map((minor) => `class hfsc 1:${minor} parent 1:1 ls m2 100Kbit\n Sent 0 bytes 0 pkt (dropped 0, overlimits 0 requeues 0)`).join("\n"),
      };
    case "filter":
      return {
        stdout: FILTER_MARKS.map((mark) => `filter parent 1: protocol ip pref 1 fw chain 0 handle 0x${mark.toString(16)} classid 1:${mark}`).join("\n"),
      };
    default:
      return undefined;
  }
};
