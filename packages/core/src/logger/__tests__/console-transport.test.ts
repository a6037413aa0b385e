import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackendApplyError } from "../../errors/shaping.js";
import { ConsoleTransport } from "../transports/console.js";
import type { LogEntry } from "../types.js";

describe("ConsoleTransport", () => {
  const mockEntry: LogEntry = {
    level: "info",
    message: "Shaping applied",
    timestamp: new Date("2025-12-26T10:00:00.000Z"),
  };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes informational lines to stdout", () => {
    const transport = new ConsoleTransport({ colors: false });
    transport.log(mockEntry);

    expect(console.log).toHaveBeenCalledWith("[2025-12-26 10:00:00] [INFO ] Shaping applied");
  });

  it("writes warnings and errors to stderr", () => {
    const transport = new ConsoleTransport({ colors: false });
    transport.log({ ...mockEntry, level: "warn", message: "unclaimed share" });
    transport.log({ ...mockEntry, level: "error", message: "apply failed" });

    expect(console.error).toHaveBeenNthCalledWith(1, "[2025-12-26 10:00:00] [WARN ] unclaimed share");
    expect(console.error).toHaveBeenNthCalledWith(2, "[2025-12-26 10:00:00] [ERROR] apply failed");
    expect(console.log).not.toHaveBeenCalled();
  });

  it("shows the component and data", () => {
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    transport.log({
      ...mockEntry,
      level: "debug",
      message: "run",
      context: { logger: "tierlink", component: "tc" },
      data: { args: ["class", "add"] },
    });

    expect(console.log).toHaveBeenCalledWith('[DEBUG] (tc) run {"args":["class","add"]}');
  });

  it("serializes error payloads with code and context", () => {
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    transport.log({
      ...mockEntry,
      level: "error",
      message: "apply failed",
      data: new BackendApplyError("tc failed", 2, "class"),
    });

    expect(console.error).toHaveBeenCalledWith(
      '[ERROR] apply failed {"name":"BackendApplyError","message":"tc failed","code":2001,"context":{"stepIndex":2,"operation":"class"}}'
    );
  });

  it("prints string data verbatim", () => {
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    transport.log({ ...mockEntry, data: "eth0" });

    expect(console.log).toHaveBeenCalledWith("[INFO ] Shaping applied eth0");
  });
});
