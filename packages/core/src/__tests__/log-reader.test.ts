import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import type { LogEntry } from "../log-writer.js";
import { readLogs, rotatedLogFiles } from "../log-reader.js";

let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `pw-test-log-reader-${randomUUID()}`);
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

/** Helper: create a LogEntry with sensible defaults. */
function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    ts: "2025-06-15T12:00:00.000Z",
    level: "info",
    source: "collector",
    workerId: null,
    message: "test message",
    ...overrides,
  };
}

/** Helper: write an array of LogEntry objects to a JSONL file. */
function writeJsonl(filePath: string, entries: LogEntry[]): void {
  const content = entries.map((e) => JSON.stringify(e)).join("\n") + "\n";
  writeFileSync(filePath, content, "utf-8");
}

describe("readLogs", () => {
  it("reads all entries from a JSONL file", () => {
    const filePath = join(testDir, "test.jsonl");
    writeJsonl(filePath, [
      makeEntry({ message: "first" }),
      makeEntry({ message: "second" }),
      makeEntry({ message: "third" }),
    ]);

    expect(readLogs(filePath).map((e) => e.message)).toEqual(["first", "second", "third"]);
  });

  it("returns empty array for non-existent file", () => {
    expect(readLogs(join(testDir, "nonexistent.jsonl"))).toEqual([]);
  });

  it("preserves the data field", () => {
    const filePath = join(testDir, "test.jsonl");
    writeJsonl(filePath, [makeEntry({ data: { source: "commit-trail", reason: "timeout" } })]);
    expect(readLogs(filePath)[0]?.data).toEqual({ source: "commit-trail", reason: "timeout" });
  });

  describe("level filter", () => {
    it("returns entries at or above the minimum level", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [
        makeEntry({ level: "debug", message: "d" }),
        makeEntry({ level: "info", message: "i" }),
        makeEntry({ level: "warn", message: "w" }),
        makeEntry({ level: "error", message: "e" }),
      ]);

      expect(readLogs(filePath, { level: "warn" }).map((e) => e.message)).toEqual(["w", "e"]);
    });
  });

  describe("workerId filter", () => {
    it("returns only entries about the worker", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [
        makeEntry({ workerId: "W1", message: "one" }),
        makeEntry({ workerId: "W2", message: "two" }),
        makeEntry({ workerId: null, message: "global" }),
      ]);

      expect(readLogs(filePath, { workerId: "W2" }).map((e) => e.message)).toEqual(["two"]);
    });
  });

  describe("source filter", () => {
    it("returns only entries from the source", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [
        makeEntry({ source: "collector", message: "c" }),
        makeEntry({ source: "enforcement", message: "e1" }),
        makeEntry({ source: "enforcement", message: "e2" }),
      ]);

      expect(readLogs(filePath, { source: "enforcement" }).map((e) => e.message)).toEqual([
        "e1",
        "e2",
      ]);
    });
  });

  describe("since + until", () => {
    it("returns entries within the inclusive range", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [
        makeEntry({ ts: "2025-06-15T11:59:59.000Z", message: "before" }),
        makeEntry({ ts: "2025-06-15T12:00:00.000Z", message: "start" }),
        makeEntry({ ts: "2025-06-15T12:05:00.000Z", message: "end" }),
        makeEntry({ ts: "2025-06-15T12:05:01.000Z", message: "after" }),
      ]);

      const result = readLogs(filePath, {
        since: new Date("2025-06-15T12:00:00.000Z"),
        until: new Date("2025-06-15T12:05:00.000Z"),
      });
      expect(result.map((e) => e.message)).toEqual(["start", "end"]);
    });
  });

  describe("pattern filter", () => {
    it("matches a case-sensitive substring of the message", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [
        makeEntry({ message: "source commit-trail timed out" }),
        makeEntry({ message: "Timed Out elsewhere" }),
      ]);

      expect(readLogs(filePath, { pattern: "timed out" }).map((e) => e.message)).toEqual([
        "source commit-trail timed out",
      ]);
    });
  });

  describe("limit option", () => {
    it("keeps the last N matching entries", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(
        filePath,
        [1, 2, 3, 4, 5].map((i) => makeEntry({ message: `line ${i}` })),
      );

      expect(readLogs(filePath, { limit: 2 }).map((e) => e.message)).toEqual([
        "line 4",
        "line 5",
      ]);
    });

    it("returns all entries when limit exceeds total", () => {
      const filePath = join(testDir, "test.jsonl");
      writeJsonl(filePath, [makeEntry(), makeEntry()]);
      expect(readLogs(filePath, { limit: 10 })).toHaveLength(2);
    });
  });

  describe("corrupted/invalid lines", () => {
    it("skips corrupted lines, blank lines and entries of the wrong shape", () => {
      const filePath = join(testDir, "test.jsonl");
      writeFileSync(
        filePath,
        [
          JSON.stringify(makeEntry({ message: "good 1" })),
          "{not json",
          "",
          JSON.stringify({ ts: "2025-06-15T12:00:00.000Z", level: "loud", message: "bad level" }),
          JSON.stringify(makeEntry({ message: "good 2" })),
        ].join("\n"),
      );

      expect(readLogs(filePath).map((e) => e.message)).toEqual(["good 1", "good 2"]);
    });
  });

  describe("rotated files", () => {
    it("reads backups oldest first when includeRotated is set", () => {
      const filePath = join(testDir, "app.jsonl");
      writeJsonl(join(testDir, "app.2.jsonl"), [makeEntry({ message: "oldest" })]);
      writeJsonl(join(testDir, "app.1.jsonl"), [makeEntry({ message: "older" })]);
      writeJsonl(filePath, [makeEntry({ message: "current" })]);

      expect(readLogs(filePath).map((e) => e.message)).toEqual(["current"]);
      expect(readLogs(filePath, { includeRotated: true }).map((e) => e.message)).toEqual([
        "oldest",
        "older",
        "current",
      ]);
    });

    it("applies limit across all files", () => {
      const filePath = join(testDir, "app.jsonl");
      writeJsonl(join(testDir, "app.1.jsonl"), [
        makeEntry({ message: "a" }),
        makeEntry({ message: "b" }),
      ]);
      writeJsonl(filePath, [makeEntry({ message: "c" })]);

      expect(
        readLogs(filePath, { includeRotated: true, limit: 2 }).map((e) => e.message),
      ).toEqual(["b", "c"]);
    });
  });
});

describe("rotatedLogFiles", () => {
  it("lists consecutive backups oldest first", () => {
    const filePath = join(testDir, "app.jsonl");
    writeFileSync(join(testDir, "app.1.jsonl"), "");
    writeFileSync(join(testDir, "app.2.jsonl"), "");
    // Gap: .4 is not reachable without .3
    writeFileSync(join(testDir, "app.4.jsonl"), "");

    expect(rotatedLogFiles(filePath)).toEqual([
      join(testDir, "app.2.jsonl"),
      join(testDir, "app.1.jsonl"),
    ]);
  });

  it("returns nothing when there are no backups", () => {
    expect(rotatedLogFiles(join(testDir, "app.jsonl"))).toEqual([]);
  });
});
