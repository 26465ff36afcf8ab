/**
 * Enforcement engine: escalation state machine + action dispatch.
 *
 * Per worker, per enforcement cycle:
 * 1. ACTIVE resets the worker's ledger entry to level 0 (recovery clears history).
 * 2. IDLE / STOPPED advance the consecutive-cycle counter for that state.
 * 3. The next rule whose state matches, whose minCycles is reached and whose
 *    level is above the worker's current level is emitted. At most one action
 *    per worker per cycle; levels only go up, one step at a time.
 * 4. The level is recorded only after the sink accepted the action, so a
 *    failed delivery is retried on the next cycle.
 *
 * Planning is pure (planEnforcement); dispatch and persistence live in
 * createEnforcementEngine.
 */

import { describeError, EnforcementActionError } from "./errors.js";
import { cloneEntry, cloneLedger, readLedger, writeLedger } from "./ledger.js";
import { createNullLogger } from "./logger.js";
import {
  ACTION_LEVEL,
  LIVENESS_STATE,
  type ActionKind,
  type ActionSink,
  type ActivitySnapshot,
  type EscalationLedger,
  type EscalationLedgerEntry,
  type EscalationRule,
  type HeartbeatDocument,
  type Logger,
  type PlannedAction,
} from "./types.js";

export interface EnforcementPlan {
  actions: PlannedAction[];
  /**
   * Ledger with observations (state, counters, lastEvaluatedAt) advanced.
   * Levels are NOT yet raised for planned actions; see applyDelivery().
   */
  ledger: EscalationLedger;
}

/** Pick the next escalation step for a worker, or null if none applies. */
export function selectRule(
  rules: readonly EscalationRule[],
  snapshot: ActivitySnapshot,
  entry: EscalationLedgerEntry,
): EscalationRule | null {
  let next: EscalationRule | null = null;
  for (const rule of rules) {
    if (rule.state !== snapshot.state) continue;
    if (rule.minCycles > entry.consecutiveCycles) continue;
    const level = ACTION_LEVEL[rule.action];
    if (level <= entry.level) continue;
    if (!next || level < ACTION_LEVEL[next.action]) next = rule;
  }
  return next;
}

function observe(
  previous: EscalationLedgerEntry | undefined,
  snapshot: ActivitySnapshot,
  evaluatedAt: Date,
): EscalationLedgerEntry {
  const sameState = previous !== undefined && previous.state === snapshot.state;
  const consecutiveCycles = sameState ? previous.consecutiveCycles + 1 : 1;

  if (snapshot.state === LIVENESS_STATE.ACTIVE) {
    return {
      state: snapshot.state,
      consecutiveCycles,
      level: 0,
      lastAction: null,
      lastActionAt: null,
      lastEvaluatedAt: evaluatedAt,
    };
  }

  return {
    state: snapshot.state,
    consecutiveCycles,
    level: previous?.level ?? 0,
    lastAction: previous?.lastAction ?? null,
    lastActionAt: previous?.lastActionAt ?? null,
    lastEvaluatedAt: evaluatedAt,
  };
}

/**
 * Decide this cycle's actions. Pure: the input ledger is not mutated.
 *
 * A worker whose ledger entry already evaluated a document at least as new as
 * this one is left untouched, so re-running enforcement on the same snapshot
 * never escalates further. Entries for workers no longer in the document are
 * dropped.
 */
export function planEnforcement(
  doc: HeartbeatDocument,
  ledger: EscalationLedger,
  rules: readonly EscalationRule[],
  messages: Readonly<Record<ActionKind, string>>,
): EnforcementPlan {
  const next: EscalationLedger = {};
  const actions: PlannedAction[] = [];
  const evaluatedAt = doc.generatedAt;

  for (const [workerId, snapshot] of Object.entries(doc.workers)) {
    const previous = ledger[workerId];

    if (previous && previous.lastEvaluatedAt.getTime() >= evaluatedAt.getTime()) {
      next[workerId] = cloneEntry(previous);
      continue;
    }

    const entry = observe(previous, snapshot, evaluatedAt);
    next[workerId] = entry;

    const rule = selectRule(rules, snapshot, entry);
    if (!rule) continue;

    actions.push({
      workerId,
      kind: rule.action,
      payload: {
        level: ACTION_LEVEL[rule.action],
        state: snapshot.state,
        consecutiveCycles: entry.consecutiveCycles,
        freshnessAgeMs: Number.isFinite(snapshot.freshnessAgeMs) ? snapshot.freshnessAgeMs : null,
        message: messages[rule.action],
        generatedAt: evaluatedAt.toISOString(),
      },
    });
  }

  return { actions, ledger: next };
}

/** Record a delivered action in the ledger. Returns a new ledger. */
export function applyDelivery(
  ledger: EscalationLedger,
  action: PlannedAction,
  deliveredAt: Date,
): EscalationLedger {
  const updated = cloneLedger(ledger);
  const entry = updated[action.workerId];
  if (!entry) return updated;
  entry.level = Math.max(entry.level, action.payload.level);
  entry.lastAction = action.kind;
  entry.lastActionAt = deliveredAt;
  return updated;
}

// =============================================================================
// ENGINE
// =============================================================================

export interface EnforcementEngineDeps {
  rules: readonly EscalationRule[];
  messages: Readonly<Record<ActionKind, string>>;
  sink: ActionSink;
  ledgerPath: string;
  logger?: Logger;
  /** Clock for lastActionAt. Defaults to Date.now. */
  now?: () => Date;
}

export interface ActionOutcome {
  action: PlannedAction;
  delivered: boolean;
  error: EnforcementActionError | null;
}

export interface EnforcementResult {
  outcomes: ActionOutcome[];
  ledger: EscalationLedger;
  /** false when the ledger could not be written; it is retried next cycle. */
  ledgerPersisted: boolean;
}

export interface EnforcementEngine {
  enforce(doc: HeartbeatDocument): Promise<EnforcementResult>;
  /** Snapshot of the in-memory ledger. */
  getLedger(): Promise<EscalationLedger>;
}

/**
 * Create the engine. The ledger is loaded from disk once and kept in memory
 * as the authority afterwards; the file is a copy for restarts. Calls to
 * enforce() must not overlap (the monitor loop guarantees this).
 */
export function createEnforcementEngine(deps: EnforcementEngineDeps): EnforcementEngine {
  const logger = deps.logger ?? createNullLogger();
  const clock = deps.now ?? (() => new Date());
  let ledger: EscalationLedger | null = null;

  async function loadLedger(): Promise<EscalationLedger> {
    if (!ledger) ledger = await readLedger(deps.ledgerPath, logger);
    return ledger;
  }

  return {
    async enforce(doc: HeartbeatDocument): Promise<EnforcementResult> {
      const plan = planEnforcement(doc, await loadLedger(), deps.rules, deps.messages);
      let current = plan.ledger;
      const outcomes: ActionOutcome[] = [];

      // Sequential: one sink call at a time, in document order
      for (const action of plan.actions) {
        try {
          await deps.sink.emit(action.workerId, action.kind, action.payload);
        } catch (err) {
          const error = new EnforcementActionError(
            action.workerId,
            `${deps.sink.name} rejected ${action.kind}: ${describeError(err)}`,
            { cause: err },
          );
          logger.appendLine(error.message, "error", "enforcement", action.workerId, {
            action: action.kind,
            level: action.payload.level,
          });
          outcomes.push({ action, delivered: false, error });
          continue;
        }

        current = applyDelivery(current, action, clock());
        logger.appendLine(
          `${action.kind} (level ${action.payload.level}) after ${action.payload.consecutiveCycles} ${action.payload.state} cycle(s)`,
          "warn",
          "enforcement",
          action.workerId,
          { action: action.kind, level: action.payload.level },
        );
        outcomes.push({ action, delivered: true, error: null });
      }

      ledger = current;

      let ledgerPersisted = true;
      try {
        await writeLedger(deps.ledgerPath, current);
      } catch (err) {
        ledgerPersisted = false;
        logger.appendLine(
          `ledger not persisted, will retry next cycle: ${describeError(err)}`,
          "error",
          "ledger",
        );
      }

      return { outcomes, ledger: cloneLedger(current), ledgerPersisted };
    },

    async getLedger(): Promise<EscalationLedger> {
      return cloneLedger(await loadLedger());
    },
  };
}
