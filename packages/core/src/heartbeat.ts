/**
 * Heartbeat aggregator: one consistent snapshot of every registered worker
 * per cycle, persisted with an atomic replace.
 *
 * All per-worker results are gathered before anything is written, so the
 * document on disk is always from exactly one cycle. If the swap fails the
 * previous document stays authoritative and the next cycle simply tries
 * again.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { atomicWriteFile } from "./atomic-write.js";
import { classify } from "./classifier.js";
import type { Collector } from "./collector.js";
import { PersistenceError, describeError } from "./errors.js";
import { createNullLogger } from "./logger.js";
import type { WorkerRegistry, WorkerEntry } from "./registry.js";
import {
  LIVENESS_STATE,
  type ActivitySnapshot,
  type CycleDiagnostic,
  type HeartbeatDocument,
  type LivenessState,
  type Logger,
  type SignalMap,
  type Thresholds,
} from "./types.js";

export const HEARTBEAT_SCHEMA_VERSION = 1;

// =============================================================================
// SERIALIZATION
// =============================================================================

const IsoDateSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "Expected an ISO timestamp",
});

const SerializedSnapshotSchema = z.object({
  signals: z.record(IsoDateSchema.nullable()),
  /** null encodes "never seen" (Infinity is not valid JSON). */
  freshnessAgeMs: z.number().nonnegative().nullable(),
  state: z.enum(["active", "idle", "stopped"]),
});

const SerializedHeartbeatSchema = z.object({
  version: z.literal(HEARTBEAT_SCHEMA_VERSION),
  generatedAt: IsoDateSchema,
  thresholds: z.object({
    activeMs: z.number().nonnegative(),
    idleMs: z.number().nonnegative(),
  }),
  workers: z.record(SerializedSnapshotSchema),
  diagnostics: z
    .array(
      z.object({
        workerId: z.string(),
        kind: z.enum(["registry", "collection"]),
        message: z.string(),
      }),
    )
    .default([]),
});

type SerializedHeartbeat = z.infer<typeof SerializedHeartbeatSchema>;

/** Convert a document to its JSON form. */
export function serializeHeartbeat(doc: HeartbeatDocument): string {
  const workers: SerializedHeartbeat["workers"] = {};
  for (const [workerId, snapshot] of Object.entries(doc.workers)) {
    const signals: Record<string, string | null> = {};
    for (const [source, ts] of Object.entries(snapshot.signals)) {
      signals[source] = ts ? ts.toISOString() : null;
    }
    workers[workerId] = {
      signals,
      freshnessAgeMs: Number.isFinite(snapshot.freshnessAgeMs) ? snapshot.freshnessAgeMs : null,
      state: snapshot.state,
    };
  }

  const serialized: SerializedHeartbeat = {
    version: HEARTBEAT_SCHEMA_VERSION,
    generatedAt: doc.generatedAt.toISOString(),
    thresholds: { ...doc.thresholds },
    workers,
    diagnostics: doc.diagnostics.map((d) => ({ ...d })),
  };
  return `${JSON.stringify(serialized, null, 2)}\n`;
}

/** Parse a document from its JSON form. Throws on malformed content. */
export function parseHeartbeat(content: string): HeartbeatDocument {
  const parsed = SerializedHeartbeatSchema.parse(JSON.parse(content));

  const workers: Record<string, ActivitySnapshot> = {};
  for (const [workerId, snapshot] of Object.entries(parsed.workers)) {
    const signals: SignalMap = {};
    for (const [source, ts] of Object.entries(snapshot.signals)) {
      signals[source] = ts === null ? null : new Date(ts);
    }
    workers[workerId] = {
      workerId,
      signals,
      freshnessAgeMs: snapshot.freshnessAgeMs ?? Infinity,
      state: snapshot.state,
    };
  }

  return {
    generatedAt: new Date(parsed.generatedAt),
    thresholds: parsed.thresholds,
    workers,
    diagnostics: parsed.diagnostics,
  };
}

/** Atomically replace the heartbeat document at `filePath`. */
export async function writeHeartbeat(filePath: string, doc: HeartbeatDocument): Promise<void> {
  await atomicWriteFile(filePath, serializeHeartbeat(doc));
}

/** Read the current heartbeat document. Returns null if none has been written yet. */
export async function readHeartbeat(filePath: string): Promise<HeartbeatDocument | null> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw new PersistenceError(filePath, `Could not read ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }
  try {
    return parseHeartbeat(content);
  } catch (err) {
    throw new PersistenceError(filePath, `Malformed heartbeat document ${filePath}`, {
      cause: err,
    });
  }
}

/** Per-state worker counts, for status displays. */
export function summarizeHeartbeat(doc: HeartbeatDocument): Record<LivenessState, number> {
  const counts: Record<LivenessState, number> = { active: 0, idle: 0, stopped: 0 };
  for (const snapshot of Object.values(doc.workers)) {
    counts[snapshot.state]++;
  }
  return counts;
}

// =============================================================================
// AGGREGATION
// =============================================================================

export interface BuildHeartbeatInput {
  registry: WorkerRegistry;
  collector: Collector;
  thresholds: Thresholds;
  now: Date;
  logger?: Logger;
}

function unknownSignals(entry: WorkerEntry): SignalMap {
  return Object.fromEntries(Object.keys(entry.locators).map((name) => [name, null]));
}

/**
 * Collect and classify every registered worker. Workers are independent and
 * collected in parallel; a failure for one worker degrades only that worker
 * to STOPPED with all-unknown signals.
 */
export async function buildHeartbeatDocument(
  input: BuildHeartbeatInput,
): Promise<HeartbeatDocument> {
  const { registry, collector, thresholds, now } = input;
  const logger = input.logger ?? createNullLogger();
  const entries = registry.entries();

  const outcomes = await Promise.all(
    entries.map(async (entry): Promise<[ActivitySnapshot, CycleDiagnostic | null]> => {
      if (entry.error) {
        logger.appendLine(entry.error.message, "warn", "aggregator", entry.id);
        const signals = unknownSignals(entry);
        return [
          { workerId: entry.id, signals, ...classify(signals, now, thresholds) },
          { workerId: entry.id, kind: "registry", message: entry.error.message },
        ];
      }
      try {
        const signals = await collector.collectWorker(entry);
        return [{ workerId: entry.id, signals, ...classify(signals, now, thresholds) }, null];
      } catch (err) {
        const message = `collection failed: ${describeError(err)}`;
        logger.appendLine(message, "error", "aggregator", entry.id);
        return [
          {
            workerId: entry.id,
            signals: unknownSignals(entry),
            freshnessAgeMs: Infinity,
            state: LIVENESS_STATE.STOPPED,
          },
          { workerId: entry.id, kind: "collection", message },
        ];
      }
    }),
  );

  const workers: Record<string, ActivitySnapshot> = {};
  const diagnostics: CycleDiagnostic[] = [];
  for (const [snapshot, diagnostic] of outcomes) {
    workers[snapshot.workerId] = snapshot;
    if (diagnostic) diagnostics.push(diagnostic);
  }

  return { generatedAt: now, thresholds: { ...thresholds }, workers, diagnostics };
}

export interface HeartbeatAggregatorDeps {
  registry: WorkerRegistry;
  collector: Collector;
  thresholds: Thresholds;
  heartbeatPath: string;
  /** Consecutive persistence failures before each failure is logged as an error. */
  persistFailureAlarm?: number;
  logger?: Logger;
}

export interface CycleResult {
  document: HeartbeatDocument;
  /** true once the document has atomically replaced the previous one. */
  persisted: boolean;
  error: PersistenceError | null;
}

export interface HeartbeatAggregator {
  runCycle(now: Date): Promise<CycleResult>;
  /** Persistence failures since the last successful write. */
  consecutivePersistFailures(): number;
}

/** Create the aggregator that builds and persists one document per cycle. */
export function createHeartbeatAggregator(deps: HeartbeatAggregatorDeps): HeartbeatAggregator {
  const logger = deps.logger ?? createNullLogger();
  const alarmAfter = deps.persistFailureAlarm ?? 3;
  let persistFailures = 0;

  return {
    async runCycle(now: Date): Promise<CycleResult> {
      const document = await buildHeartbeatDocument({
        registry: deps.registry,
        collector: deps.collector,
        thresholds: deps.thresholds,
        now,
        logger,
      });

      try {
        await writeHeartbeat(deps.heartbeatPath, document);
      } catch (err) {
        persistFailures++;
        const error =
          err instanceof PersistenceError
            ? err
            : new PersistenceError(deps.heartbeatPath, describeError(err), { cause: err });
        const alarming = persistFailures >= alarmAfter;
        logger.appendLine(
          alarming
            ? `heartbeat not persisted for ${persistFailures} consecutive cycles: ${error.message}`
            : `heartbeat not persisted, keeping previous document: ${error.message}`,
          alarming ? "error" : "warn",
          "aggregator",
          null,
          { consecutiveFailures: persistFailures },
        );
        return { document, persisted: false, error };
      }

      persistFailures = 0;
      logger.appendLine(
        `heartbeat written for ${Object.keys(document.workers).length} worker(s)`,
        "debug",
        "aggregator",
      );
      return { document, persisted: true, error: null };
    },

    consecutivePersistFailures: () => persistFailures,
  };
}
