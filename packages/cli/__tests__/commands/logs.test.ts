import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Command } from "commander";
import { parseLogsOptions, registerLogs } from "../../src/commands/logs.js";
import { reloadConfig } from "../../src/services/ConfigService.js";
import { loggedLines, writeConfig } from "../test-utils.js";

const ENTRIES = [
  { ts: "2025-06-15T12:00:00.000Z", level: "info", source: "aggregator", workerId: null, message: "heartbeat written for 2 worker(s)" },
  { ts: "2025-06-15T12:00:01.000Z", level: "warn", source: "enforcement", workerId: "W2", message: "reassign_task (level 2) after 1 stopped cycle(s)" },
  { ts: "2025-06-15T12:00:02.000Z", level: "debug", source: "collector", workerId: "W1", message: "interactive-log: no record" },
];

describe("parseLogsOptions", () => {
  it("parses the limit", () => {
    expect(parseLogsOptions({ limit: "50" })).toEqual({ limit: 50 });
  });

  it("passes level, source and worker filters through", () => {
    expect(
      parseLogsOptions({ limit: "5", level: "warn", source: "enforcement", worker: "W2" }),
    ).toEqual({ limit: 5, level: "warn", source: "enforcement", workerId: "W2" });
  });

  it("rejects unknown levels", () => {
    expect(() => parseLogsOptions({ limit: "5", level: "loud" })).toThrow(
      "Invalid level 'loud'. Use one of: debug, info, warn, error",
    );
  });

  it("rejects unknown sources", () => {
    expect(() => parseLogsOptions({ limit: "5", source: "web" })).toThrow("Invalid source 'web'");
  });

  it("reads --since as a duration before now", () => {
    const now = new Date("2025-06-15T12:00:00.000Z");
    expect(parseLogsOptions({ limit: "5", since: "10m" }, now).since?.toISOString()).toBe(
      "2025-06-15T11:50:00.000Z",
    );
  });

  it("reads --since as a date", () => {
    expect(
      parseLogsOptions({ limit: "5", since: "2025-06-15T11:00:00.000Z" }).since?.toISOString(),
    ).toBe("2025-06-15T11:00:00.000Z");
  });

  it("rejects an unreadable --since", () => {
    expect(() => parseLogsOptions({ limit: "5", since: "yesterday-ish" })).toThrow(
      "Invalid --since 'yesterday-ish'",
    );
  });

  it("maps --grep and --all", () => {
    expect(parseLogsOptions({ limit: "5", grep: "timed out", all: true })).toEqual({
      limit: 5,
      pattern: "timed out",
      includeRotated: true,
    });
  });

  it("rejects a non-positive limit", () => {
    expect(() => parseLogsOptions({ limit: "0" })).toThrow("Invalid limit '0'");
  });
});

describe("logs command", () => {
  let tmpDir: string;
  let configPath: string;
  let program: Command;
  let consoleSpy: MockInstance;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "pw-logs-test-"));
    configPath = writeConfig(tmpDir);
    mkdirSync(join(tmpDir, "data", "logs"), { recursive: true });
    writeFileSync(
      join(tmpDir, "data", "logs", "pulsewatch.jsonl"),
      ENTRIES.map((e) => JSON.stringify(e)).join("\n") + "\n",
    );
    reloadConfig();

    program = new Command();
    program.exitOverride();
    registerLogs(program);
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("prints entries filtered by worker", async () => {
    await program.parseAsync(["node", "test", "logs", "--config", configPath, "--worker", "W2"]);
    expect(loggedLines(consoleSpy)).toEqual([
      "2025-06-15T12:00:01.000Z warn  [enforcement] W2: reassign_task (level 2) after 1 stopped cycle(s)",
    ]);
  });

  it("filters by minimum level", async () => {
    await program.parseAsync(["node", "test", "logs", "--config", configPath, "--level", "info"]);
    expect(loggedLines(consoleSpy)).toEqual([
      "2025-06-15T12:00:00.000Z info  [aggregator] heartbeat written for 2 worker(s)",
      "2025-06-15T12:00:01.000Z warn  [enforcement] W2: reassign_task (level 2) after 1 stopped cycle(s)",
    ]);
  });

  it("keeps the last N entries", async () => {
    await program.parseAsync(["node", "test", "logs", "--config", configPath, "-n", "1"]);
    expect(loggedLines(consoleSpy)).toEqual([
      "2025-06-15T12:00:02.000Z debug [collector] W1: interactive-log: no record",
    ]);
  });

  it("exits with 1 on an invalid level", async () => {
    await expect(
      program.parseAsync(["node", "test", "logs", "--config", configPath, "--level", "loud"]),
    ).rejects.toThrow("process.exit(1)");
  });
});
