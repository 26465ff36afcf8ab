import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PersistenceError, describeError } from "./errors.js";

/**
 * Atomically replace a file: write a temp file in the same directory, then
 * rename it over the target. Readers see either the old or the new content.
 * On failure the temp file is removed and the previous file stays in place.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const suffix = randomBytes(6).toString("hex");
  const tmpPath = `${filePath}.tmp.${suffix}`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    // The write error is the one reported, not a failed cleanup
    await rm(tmpPath, { force: true }).catch(() => undefined);
    throw new PersistenceError(
      filePath,
      `Failed to write ${filePath}: ${describeError(err)}`,
      { cause: err },
    );
  }
}
