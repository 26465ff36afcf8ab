import type { PluginModule, SignalSource } from "@pulsewatch/core";
import { open, stat } from "node:fs/promises";
import { isAbsolute } from "node:path";

// =============================================================================
// Plugin Manifest
// =============================================================================

export const manifest = {
  name: "jsonl-log",
  slot: "source" as const,
  description: "Signal source: newest timestamp in an interactive JSONL session log",
  version: "0.1.0",
};

const DEFAULT_TAIL_BYTES = 64 * 1024;
const DEFAULT_TIMESTAMP_FIELDS = ["ts", "timestamp", "time"];

// =============================================================================
// JSONL Helpers
// =============================================================================

/** Read at most the last `maxBytes` of a file. */
async function readTail(filePath: string, size: number, maxBytes: number): Promise<string> {
  const length = Math.min(size, maxBytes);
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, size - length);
    return buffer.toString("utf-8");
  } finally {
    await handle.close();
  }
}

function parseTimestamp(value: unknown): Date | null {
  if (typeof value === "string") {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : new Date(ms);
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    // Heuristic: values below 1e12 are epoch seconds
    return new Date(value < 1e12 ? value * 1000 : value);
  }
  return null;
}

/**
 * Newest timestamp found in the given JSONL text, scanning from the end.
 * Non-JSON lines and lines without a timestamp field are skipped.
 */
export function extractLastTimestamp(content: string, fields: readonly string[]): Date | null {
  const lines = content.split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const trimmed = lines[i]?.trim();
    if (!trimmed || !trimmed.startsWith("{")) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      // Partial first line of the tail window, or a non-JSON line
      continue;
    }
    if (typeof parsed !== "object" || parsed === null) continue;

    for (const field of fields) {
      if (!(field in parsed)) continue;
      const value: unknown = Reflect.get(parsed, field);
      const ts = parseTimestamp(value);
      if (ts) return ts;
    }
  }
  return null;
}

// =============================================================================
// Source Implementation
// =============================================================================

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function create(config?: Record<string, unknown>): SignalSource {
  const rawTail = config?.["tailBytes"];
  const tailBytes =
    typeof rawTail === "number" && Number.isFinite(rawTail) && rawTail > 0
      ? rawTail
      : DEFAULT_TAIL_BYTES;
  const rawFields = config?.["timestampFields"];
  const fields =
    Array.isArray(rawFields) && rawFields.every((f): f is string => typeof f === "string")
      ? rawFields
      : DEFAULT_TIMESTAMP_FIELDS;
  // Log files without parseable entries fall back to modification time
  const useMtimeFallback = config?.["mtimeFallback"] !== false;

  return {
    name: "jsonl-log",

    validateLocator(locator: string): string | null {
      return isAbsolute(locator) ? null : "log path must be absolute";
    },

    async query(locator, _workerId, ctx): Promise<Date | null> {
      let size: number;
      let mtime: Date;
      try {
        const s = await stat(locator);
        size = s.size;
        mtime = s.mtime;
      } catch (err) {
        if (isMissing(err)) return null;
        throw err;
      }
      ctx.signal.throwIfAborted();
      if (size === 0) return useMtimeFallback ? mtime : null;

      const tail = await readTail(locator, size, tailBytes);
      const ts = extractLastTimestamp(tail, fields);
      if (ts) return ts;
      return useMtimeFallback ? mtime : null;
    },
  };
}

export default { manifest, create } satisfies PluginModule<SignalSource>;
