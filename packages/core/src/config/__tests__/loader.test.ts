import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode, TierlinkError } from "../../errors/types.js";
import { ConfigError, deepMerge, loadConfig, parseEnvConfig } from "../loader.js";

// ============================================
// Config Loader
// ============================================

describe("parseEnvConfig", () => {
  it("maps TIERLINK_* variables onto config paths", () => {
    const config = parseEnvConfig({
      TIERLINK_INTERFACE: "ppp0",
      TIERLINK_UPLOAD_KBPS: "2000",
      TIERLINK_LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      link: { interface: "ppp0", rateKbps: 2000 },
      logging: { level: "debug" },
    });
  });

  it("leaves non-numeric values as strings", () => {
    expect(parseEnvConfig({ TIERLINK_RTT_MS: "fast" })).toEqual({ rttMs: "fast" });
  });

  it("ignores empty and unrelated variables", () => {
    expect(parseEnvConfig({ TIERLINK_INTERFACE: "", HOME: "/root" })).toEqual({});
  });
});

describe("deepMerge", () => {
  it("merges nested objects with later sources winning", () => {
    const result = deepMerge({ link: { interface: "eth0", rateKbps: 1000 } }, { link: { rateKbps: 2000 } });

    expect(result).toEqual({ link: { interface: "eth0", rateKbps: 2000 } });
  });

  it("replaces arrays instead of concatenating", () => {
    const result = deepMerge({ tiers: [{ id: 10 }, { id: 20 }] }, { tiers: [{ id: 30 }] });

    expect(result).toEqual({ tiers: [{ id: 30 }] });
  });

  it("does not overwrite with undefined", () => {
    expect(deepMerge({ rttMs: 50 }, { rttMs: undefined })).toEqual({ rttMs: 50 });
  });

  it("leaves its inputs untouched", () => {
    const base = { link: { rateKbps: 1000 } };

    deepMerge(base, { link: { rateKbps: 5 } });

    expect(base).toEqual({ link: { rateKbps: 1000 } });
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tierlink-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const filePath = path.join(tempDir, "tierlink.toml");
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe("built-in profile", () => {
    it("applies the stock tiers and schema defaults", () => {
      const result = loadConfig({ skipFile: true, skipEnv: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const config = result.value;
      expect(config.link).toEqual({ interface: "eth0", direction: "upload", rateKbps: 1000 });
      expect(config.tiers.map((tier) => tier.id)).toEqual([10, 20, 100, 200, 300]);
      expect(config.defaultTier).toEqual({
        id: 999,
        label: "Default",
        priority: "bulk",
        sharePercent: 13,
        match: [],
      });
      expect(config.backend.chain).toBe("TIERLINK_MARK");
      expect(config.logging.level).toBe("warn");
      expect(config.rttMs).toBe(50);
      expect(config.leafQueue).toBe("bfifo");
    });

    it("returns a deep-frozen value", () => {
      const result = loadConfig({ skipFile: true, skipEnv: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(Object.isFrozen(result.value)).toBe(true);
      expect(Object.isFrozen(result.value.tiers)).toBe(true);
      expect(Object.isFrozen(result.value.tiers[0])).toBe(true);
    });
  });

  describe("config file", () => {
    it("replaces the stock tiers when the file declares its own", () => {
      const filePath = writeConfig(`
[link]
rateKbps = 2000

[[tiers]]
kind = "percentage"
id = 100
label = "Desk"
priority = "shared"
sharePercent = 60
addresses = "10.0.0.2"
match = [{ protocol = "tcp", port = "8000:8080" }]
`);

      const result = loadConfig({ path: filePath, skipEnv: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.link).toEqual({ interface: "eth0", direction: "upload", rateKbps: 2000 });
      expect(result.value.tiers).toHaveLength(1);
      expect(result.value.tiers[0]?.match).toEqual([
        { protocol: "tcp", port: { from: 8000, to: 8080 }, side: "destination" },
      ]);
      expect(result.value.defaultTier.sharePercent).toBeUndefined();
    });

    it("fails when an explicit path does not exist", () => {
      const missing = path.join(tempDir, "missing.toml");

      const result = loadConfig({ path: missing, skipEnv: true });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
      expect(result.error.path).toBe(missing);
    });

    it("reports TOML syntax errors", () => {
      const filePath = writeConfig("[link\nrateKbps = 1");

      const result = loadConfig({ path: filePath, skipEnv: true });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    });
  });

  describe("merge priority order", () => {
    it("environment overrides the file and overrides beat both", () => {
      const filePath = writeConfig('[link]\ninterface = "eth1"\nrateKbps = 800\n');

      const result = loadConfig({
        path: filePath,
        env: { TIERLINK_INTERFACE: "ppp0", TIERLINK_UPLOAD_KBPS: "900" },
        overrides: { link: { rateKbps: 1200 } },
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.link.interface).toBe("ppp0");
      expect(result.value.link.rateKbps).toBe(1200);
    });
  });

  describe("validation", () => {
    it("rejects a reserved tier with both rate forms", () => {
      const result = loadConfig({
        skipFile: true,
        skipEnv: true,
        overrides: {
          tiers: [
            { kind: "reserved", id: 10, label: "Voice", priority: "realtime-strict", rateKbps: 100, ratePercent: 10 },
          ],
        },
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(result.error.message).toBe(
        "Invalid configuration: tiers.0: reserved tier 10 needs exactly one of rateKbps or ratePercent"
      );
    });

    it("rejects a non-numeric environment value", () => {
      const result = loadConfig({ skipFile: true, env: { TIERLINK_RTT_MS: "fast" } });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(result.error.message).toContain("rttMs:");
    });
  });
});

describe("ConfigError", () => {
  it("is a TierlinkError carrying the file path", () => {
    const error = new ConfigError("Config file not found: /tmp/x.toml", ErrorCode.CONFIG_NOT_FOUND, {
      path: "/tmp/x.toml",
    });

    expect(error).toBeInstanceOf(TierlinkError);
    expect(error.name).toBe("ConfigError");
    expect(error.context).toEqual({ path: "/tmp/x.toml" });
  });
});
