import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { z } from "zod";
import type { LogEntry, LogLevel, LogSource, WorkerId } from "./types.js";

export interface ReadLogsOptions {
  /** Minimum level to include. */
  level?: LogLevel;
  source?: LogSource;
  workerId?: WorkerId;
  /** Only entries at or after this time. */
  since?: Date;
  /** Only entries at or before this time. */
  until?: Date;
  /** Case-sensitive substring of the message. */
  pattern?: string;
  /** Keep only the last N matching entries. */
  limit?: number;
  /** Also read rotated backups (app.N.jsonl), oldest first. Default false. */
  includeRotated?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LogEntrySchema = z.object({
  ts: z.string(),
  level: z.enum(["debug", "info", "warn", "error"]),
  source: z.enum(["collector", "aggregator", "alerts", "enforcement", "monitor", "ledger", "cli"]),
  workerId: z.string().nullable(),
  message: z.string(),
  data: z.record(z.unknown()).optional(),
});

function parseLine(line: string): LogEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const result = LogEntrySchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function matches(entry: LogEntry, options: ReadLogsOptions): boolean {
  if (options.level && LEVEL_RANK[entry.level] < LEVEL_RANK[options.level]) return false;
  if (options.source && entry.source !== options.source) return false;
  if (options.workerId && entry.workerId !== options.workerId) return false;
  if (options.pattern && !entry.message.includes(options.pattern)) return false;
  if (options.since || options.until) {
    const ts = Date.parse(entry.ts);
    if (Number.isNaN(ts)) return false;
    if (options.since && ts < options.since.getTime()) return false;
    if (options.until && ts > options.until.getTime()) return false;
  }
  return true;
}

/** Rotated backups of `filePath` that exist, oldest first. */
export function rotatedLogFiles(filePath: string): string[] {
  const ext = extname(filePath);
  const base = ext ? filePath.slice(0, -ext.length) : filePath;
  const backups: string[] = [];
  for (let i = 1; existsSync(`${base}.${i}${ext}`); i++) {
    backups.push(`${base}.${i}${ext}`);
  }
  return backups.reverse();
}

/** Read and filter a JSONL log. Missing files and malformed lines yield nothing. */
export function readLogs(filePath: string, options: ReadLogsOptions = {}): LogEntry[] {
  const files = options.includeRotated ? [...rotatedLogFiles(filePath), filePath] : [filePath];

  const entries: LogEntry[] = [];
  for (const file of files) {
    if (!existsSync(file)) continue;
    for (const line of readFileSync(file, "utf-8").split("\n")) {
      const entry = parseLine(line);
      if (entry && matches(entry, options)) entries.push(entry);
    }
  }

  if (options.limit !== undefined && entries.length > options.limit) {
    return entries.slice(entries.length - options.limit);
  }
  return entries;
}
