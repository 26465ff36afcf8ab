/**
 * Unit tests for config validation, defaults and loading.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import {
  DEFAULT_ESCALATION_RULES,
  DEFAULT_SOURCES,
  findConfigFile,
  getDefaultConfig,
  loadConfig,
  validateConfig,
} from "../config.js";
import { ConfigError } from "../errors.js";

describe("validateConfig - defaults", () => {
  it("fills every default for a minimal config", () => {
    const config = validateConfig({ dataDir: "/var/pulsewatch", workers: {} });

    expect(config.heartbeatPath).toBe("/var/pulsewatch/heartbeat.json");
    expect(config.alertsPath).toBe("/var/pulsewatch/alerts.txt");
    expect(config.ledgerPath).toBe("/var/pulsewatch/ledger.json");
    expect(config.logPath).toBe("/var/pulsewatch/logs/pulsewatch.jsonl");
    expect(config.thresholds).toEqual({ activeMs: 300_000, idleMs: 900_000 });
    expect(config.intervals).toEqual({ collectMs: 30_000, enforceMs: 300_000 });
    expect(config.sourceTimeoutMs).toBe(10_000);
    expect(config.persistFailureAlarm).toBe(3);
    expect(config.sources).toEqual(DEFAULT_SOURCES);
    expect(config.escalation.rules).toEqual(DEFAULT_ESCALATION_RULES);
    expect(config.sink).toEqual({ plugin: "log" });
  });

  it("defaults the data directory to ~/.pulsewatch", () => {
    expect(getDefaultConfig().dataDir).toBe(join(homedir(), ".pulsewatch"));
  });

  it("keeps explicit artifact paths", () => {
    const config = validateConfig({
      dataDir: "/var/pulsewatch",
      heartbeatPath: "/run/heartbeat.json",
      workers: {},
    });
    expect(config.heartbeatPath).toBe("/run/heartbeat.json");
    expect(config.alertsPath).toBe("/var/pulsewatch/alerts.txt");
  });

  it("expands ~ in worker locators", () => {
    const config = validateConfig({
      workers: { W1: { "interactive-log": "~/agents/w1.jsonl" } },
    });
    expect(config.workers["W1"]?.["interactive-log"]).toBe(join(homedir(), "agents/w1.jsonl"));
  });

  it("merges user sources over the defaults and keeps plugin options", () => {
    const config = validateConfig({
      sources: { chat: { plugin: "jsonl-log", tailBytes: 1024 } },
      workers: {},
    });
    expect(config.sources["chat"]).toEqual({ plugin: "jsonl-log", tailBytes: 1024 });
    expect(config.sources["commit-trail"]).toEqual({ plugin: "git-commit" });
  });

  it("merges partial action messages over the defaults", () => {
    const config = validateConfig({
      escalation: { messages: { reminder: "ping" } },
      workers: {},
    });
    expect(config.escalation.messages.reminder).toBe("ping");
    expect(config.escalation.messages.restart_worker).toBe(
      "Worker has been stopped for too long and is being restarted.",
    );
  });

  it("accepts custom escalation rules", () => {
    const rules = [{ state: "stopped", minCycles: 2, action: "open_blocker" }];
    expect(validateConfig({ escalation: { rules }, workers: {} }).escalation.rules).toEqual(rules);
  });
});

describe("validateConfig - rejections", () => {
  it("requires a workers mapping", () => {
    expect(() => validateConfig({})).toThrow(ConfigError);
    expect(() => validateConfig({})).toThrow(/workers/);
  });

  it("rejects worker ids with unsupported characters", () => {
    expect(() => validateConfig({ workers: { "bad id!": {} } })).toThrow(
      /worker ids must match/,
    );
  });

  it("rejects malformed durations", () => {
    expect(() =>
      validateConfig({ thresholds: { active: "5 minutes" }, workers: {} }),
    ).toThrow(/Expected a duration/);
  });

  it("rejects zero durations for the collect interval and source timeout", () => {
    expect(() =>
      validateConfig({ intervals: { collect: "0s" }, workers: {} }),
    ).toThrow(/Durations must be greater than 0/);
    expect(() => validateConfig({ sourceTimeout: "0ms", workers: {} })).toThrow(
      /Durations must be greater than 0/,
    );
  });

  it("rejects an idle threshold that is not above the active threshold", () => {
    expect(() =>
      validateConfig({ thresholds: { active: "10m", idle: "10m" }, workers: {} }),
    ).toThrow(/thresholds.idle must be greater than thresholds.active/);
  });

  it("rejects an enforce interval shorter than the collect interval", () => {
    expect(() =>
      validateConfig({ intervals: { collect: "1m", enforce: "30s" }, workers: {} }),
    ).toThrow(/intervals.enforce must be at least intervals.collect/);
  });

  it("rejects unknown escalation actions", () => {
    expect(() =>
      validateConfig({
        escalation: { rules: [{ state: "stopped", minCycles: 1, action: "fire" }] },
        workers: {},
      }),
    ).toThrow(ConfigError);
  });

  it("rejects a sink without a plugin name", () => {
    expect(() => validateConfig({ sink: { url: "http://localhost" }, workers: {} })).toThrow(
      /sink.plugin/,
    );
  });
});

describe("loadConfig", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `pw-test-config-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("loads YAML and records the resolved config path", () => {
    const configPath = join(testDir, "pulsewatch.yaml");
    writeFileSync(
      configPath,
      [
        `dataDir: ${testDir}`,
        "thresholds:",
        "  active: 2m",
        "  idle: 10m",
        "workers:",
        "  W1:",
        "    scheduled-report: /reports/w1.md",
      ].join("\n"),
    );

    const config = loadConfig(configPath);
    expect(config.configPath).toBe(realpathSync(configPath));
    expect(config.thresholds).toEqual({ activeMs: 120_000, idleMs: 600_000 });
    expect(config.workers).toEqual({ W1: { "scheduled-report": "/reports/w1.md" } });
  });

  it("throws ConfigError for a missing file", () => {
    expect(() => loadConfig(join(testDir, "missing.yaml"))).toThrow(/Config file not found/);
  });

  it("throws ConfigError for unparseable YAML", () => {
    const configPath = join(testDir, "pulsewatch.yaml");
    writeFileSync(configPath, "workers: [unclosed\n");
    expect(() => loadConfig(configPath)).toThrow(/Could not parse/);
  });

  it("finds pulsewatch.yaml in the start directory", () => {
    const configPath = join(testDir, "pulsewatch.yaml");
    writeFileSync(configPath, "workers: {}\n");
    expect(findConfigFile(testDir)).toBe(configPath);
  });

  it("finds pulsewatch.yml in the start directory", () => {
    const configPath = join(testDir, "pulsewatch.yml");
    writeFileSync(configPath, "workers: {}\n");
    expect(findConfigFile(testDir)).toBe(configPath);
  });
});
