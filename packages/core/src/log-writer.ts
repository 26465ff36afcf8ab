/**
 * Append-only JSONL log with size-based rotation.
 *
 * app.jsonl → app.1.jsonl → app.2.jsonl ... up to maxBackups; the oldest
 * backup is deleted. Writes are synchronous so a crash never loses a line
 * that append() already returned for. Write failures are counted, not thrown:
 * logging must never take down a monitoring cycle.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  renameSync,
  statSync,
  unlinkSync,
} from "node:fs";
import { dirname, extname } from "node:path";
import type { LogEntry, LogLevel, LogSource, Logger, WorkerId } from "./types.js";

export type { LogEntry } from "./types.js";

export interface LogWriterOptions {
  filePath: string;
  /** Rotate once the current file reaches this size. Default 10 MiB. */
  maxSizeBytes?: number;
  /** Rotated files to keep. Default 3. */
  maxBackups?: number;
}

const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024;
const DEFAULT_MAX_BACKUPS = 3;

export class LogWriter implements Logger {
  private readonly filePath: string;
  private readonly maxSizeBytes: number;
  private readonly maxBackups: number;
  private closed = false;
  private failures = 0;

  constructor(options: LogWriterOptions) {
    this.filePath = options.filePath;
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    mkdirSync(dirname(this.filePath), { recursive: true });
  }

  /** Number of entries that could not be written. */
  get failedWrites(): number {
    return this.failures;
  }

  append(entry: LogEntry): void {
    if (this.closed) return;
    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch {
      this.failures++;
    }
  }

  appendLine(
    message: string,
    level: LogLevel,
    source: LogSource,
    workerId: WorkerId | null = null,
    data?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      source,
      workerId,
      message,
    };
    if (data !== undefined) entry.data = data;
    this.append(entry);
  }

  close(): void {
    this.closed = true;
  }

  private backupPath(index: number): string {
    const ext = extname(this.filePath);
    const base = ext ? this.filePath.slice(0, -ext.length) : this.filePath;
    return `${base}.${index}${ext}`;
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxSizeBytes) return;

    const oldest = this.backupPath(this.maxBackups);
    if (existsSync(oldest)) unlinkSync(oldest);

    for (let i = this.maxBackups - 1; i >= 1; i--) {
      const from = this.backupPath(i);
      if (existsSync(from)) renameSync(from, this.backupPath(i + 1));
    }
    renameSync(this.filePath, this.backupPath(1));
  }
}
