import type { PluginModule, SignalSource } from "@pulsewatch/core";
import { readdir, stat } from "node:fs/promises";
import { extname, isAbsolute, join } from "node:path";

export const manifest = {
  name: "file-mtime",
  slot: "source" as const,
  description: "Signal source: modification time of a report file or newest file in a directory",
  version: "0.1.0",
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Newest modification time among the regular files directly inside `dir`.
 * Entries that vanish between listing and stat are ignored.
 */
async function newestInDirectory(
  dir: string,
  extensions: ReadonlySet<string> | null,
  signal: AbortSignal,
): Promise<Date | null> {
  const entries = await readdir(dir, { withFileTypes: true });
  let newest: Date | null = null;

  for (const entry of entries) {
    signal.throwIfAborted();
    if (!entry.isFile()) continue;
    if (extensions && !extensions.has(extname(entry.name).toLowerCase())) continue;

    let mtime: Date;
    try {
      mtime = (await stat(join(dir, entry.name))).mtime;
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }
    if (!newest || mtime.getTime() > newest.getTime()) newest = mtime;
  }

  return newest;
}

function parseExtensions(raw: unknown): ReadonlySet<string> | null {
  if (!Array.isArray(raw) || raw.length === 0) return null;
  const normalized = raw
    .filter((ext): ext is string => typeof ext === "string" && ext.length > 0)
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase());
  return normalized.length > 0 ? new Set(normalized) : null;
}

export function create(config?: Record<string, unknown>): SignalSource {
  const extensions = parseExtensions(config?.["extensions"]);

  return {
    name: "file-mtime",

    validateLocator(locator: string): string | null {
      return isAbsolute(locator) ? null : "report path must be absolute";
    },

    async query(locator, _workerId, ctx): Promise<Date | null> {
      try {
        const info = await stat(locator);
        ctx.signal.throwIfAborted();
        if (info.isDirectory()) {
          return await newestInDirectory(locator, extensions, ctx.signal);
        }
        return info.mtime;
      } catch (err) {
        // No report produced yet
        if (isMissing(err)) return null;
        throw err;
      }
    },
  };
}

export default { manifest, create } satisfies PluginModule<SignalSource>;
