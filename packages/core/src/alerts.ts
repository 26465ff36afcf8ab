/**
 * Alert writer: one line per worker currently in the worst state.
 *
 * The artifact is regenerated wholesale from a single document every cycle.
 * When nobody qualifies it is written empty, never left holding the previous
 * cycle's alerts.
 */

import { readFile } from "node:fs/promises";
import { atomicWriteFile } from "./atomic-write.js";
import { formatDuration } from "./durations.js";
import { createNullLogger } from "./logger.js";
import {
  LIVENESS_SEVERITY,
  LIVENESS_STATE,
  type ActivitySnapshot,
  type HeartbeatDocument,
  type LivenessState,
  type Logger,
} from "./types.js";

/** Render one alert line. */
export function formatAlertLine(snapshot: ActivitySnapshot): string {
  const label = snapshot.state.toUpperCase();
  if (!Number.isFinite(snapshot.freshnessAgeMs)) {
    return `${snapshot.workerId}: ${label} (no signal ever observed)`;
  }
  return `${snapshot.workerId}: ${label} (no activity for ${formatDuration(snapshot.freshnessAgeMs)})`;
}

/**
 * Workers to alert on: everyone in STOPPED. Sorted by staleness (never-seen
 * first), then by id so the artifact is stable across identical cycles.
 */
export function selectAlerts(
  doc: HeartbeatDocument,
  state: LivenessState = LIVENESS_STATE.STOPPED,
): ActivitySnapshot[] {
  return Object.values(doc.workers)
    .filter((snapshot) => LIVENESS_SEVERITY[snapshot.state] >= LIVENESS_SEVERITY[state])
    .sort((a, b) => {
      if (a.freshnessAgeMs !== b.freshnessAgeMs) {
        // Infinity - Infinity is NaN, so compare explicitly
        return a.freshnessAgeMs > b.freshnessAgeMs ? -1 : 1;
      }
      return a.workerId.localeCompare(b.workerId);
    });
}

/** Alert file contents for a document: "" when no worker qualifies. */
export function renderAlerts(doc: HeartbeatDocument): string {
  const lines = selectAlerts(doc).map(formatAlertLine);
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/** Replace the alert artifact with this document's alerts. Returns the line count. */
export async function writeAlerts(
  filePath: string,
  doc: HeartbeatDocument,
  logger: Logger = createNullLogger(),
): Promise<number> {
  const content = renderAlerts(doc);
  await atomicWriteFile(filePath, content);
  const count = content ? content.trimEnd().split("\n").length : 0;
  logger.appendLine(
    count > 0 ? `${count} worker(s) stopped` : "no stopped workers",
    count > 0 ? "warn" : "debug",
    "alerts",
    null,
    { count },
  );
  return count;
}

/** Read the alert artifact as lines. Missing file means no alerts. */
export async function readAlerts(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
  return content.split("\n").filter((line) => line.trim().length > 0);
}
