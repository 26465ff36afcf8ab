/**
 * Escalation ledger persistence.
 *
 * Only the enforcement engine writes the ledger, once per enforcement cycle,
 * with the same atomic replace used for the heartbeat. A corrupt ledger is
 * not fatal: it is logged and escalation starts over from empty.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { atomicWriteFile } from "./atomic-write.js";
import { describeError } from "./errors.js";
import { createNullLogger } from "./logger.js";
import type { EscalationLedger, EscalationLedgerEntry, Logger, WorkerId } from "./types.js";

export const LEDGER_SCHEMA_VERSION = 1;

const IsoDateSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)));

const SerializedEntrySchema = z.object({
  state: z.enum(["active", "idle", "stopped"]),
  consecutiveCycles: z.number().int().nonnegative(),
  level: z.number().int().nonnegative(),
  lastAction: z.enum(["reminder", "reassign_task", "open_blocker", "restart_worker"]).nullable(),
  lastActionAt: IsoDateSchema.nullable(),
  lastEvaluatedAt: IsoDateSchema,
});

const SerializedLedgerSchema = z.object({
  version: z.literal(LEDGER_SCHEMA_VERSION),
  workers: z.record(SerializedEntrySchema),
});

type SerializedLedger = z.infer<typeof SerializedLedgerSchema>;

export function serializeLedger(ledger: EscalationLedger): string {
  const workers: SerializedLedger["workers"] = {};
  for (const [workerId, entry] of Object.entries(ledger)) {
    workers[workerId] = {
      state: entry.state,
      consecutiveCycles: entry.consecutiveCycles,
      level: entry.level,
      lastAction: entry.lastAction,
      lastActionAt: entry.lastActionAt ? entry.lastActionAt.toISOString() : null,
      lastEvaluatedAt: entry.lastEvaluatedAt.toISOString(),
    };
  }
  return `${JSON.stringify({ version: LEDGER_SCHEMA_VERSION, workers }, null, 2)}\n`;
}

export function parseLedger(content: string): EscalationLedger {
  const parsed = SerializedLedgerSchema.parse(JSON.parse(content));
  const ledger: EscalationLedger = {};
  for (const [workerId, entry] of Object.entries(parsed.workers)) {
    ledger[workerId] = {
      state: entry.state,
      consecutiveCycles: entry.consecutiveCycles,
      level: entry.level,
      lastAction: entry.lastAction,
      lastActionAt: entry.lastActionAt ? new Date(entry.lastActionAt) : null,
      lastEvaluatedAt: new Date(entry.lastEvaluatedAt),
    };
  }
  return ledger;
}

/** Load the ledger. Missing or corrupt files yield an empty ledger. */
export async function readLedger(
  filePath: string,
  logger: Logger = createNullLogger(),
): Promise<EscalationLedger> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    logger.appendLine(`could not read ledger: ${describeError(err)}`, "error", "ledger");
    return {};
  }
  try {
    return parseLedger(content);
  } catch (err) {
    logger.appendLine(
      `ledger at ${filePath} is corrupt, starting from empty: ${describeError(err)}`,
      "error",
      "ledger",
    );
    return {};
  }
}

export async function writeLedger(filePath: string, ledger: EscalationLedger): Promise<void> {
  await atomicWriteFile(filePath, serializeLedger(ledger));
}

/** Copy a ledger so planning never mutates the caller's object. */
export function cloneLedger(ledger: EscalationLedger): EscalationLedger {
  const copy: EscalationLedger = {};
  for (const [workerId, entry] of Object.entries(ledger)) {
    copy[workerId] = cloneEntry(entry);
  }
  return copy;
}

export function cloneEntry(entry: EscalationLedgerEntry): EscalationLedgerEntry {
  return {
    ...entry,
    lastActionAt: entry.lastActionAt ? new Date(entry.lastActionAt) : null,
    lastEvaluatedAt: new Date(entry.lastEvaluatedAt),
  };
}

/**
 * Remove one worker's escalation history (manual reset). Returns false if the
 * worker had no entry.
 */
export async function resetLedgerEntry(filePath: string, workerId: WorkerId): Promise<boolean> {
  const ledger = await readLedger(filePath);
  if (!(workerId in ledger)) return false;
  delete ledger[workerId];
  await writeLedger(filePath, ledger);
  return true;
}
