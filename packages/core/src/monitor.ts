/**
 * Monitor: the periodic driver loop.
 *
 * Two nested periods:
 * - every `collectMs`: collect + classify all workers, persist the heartbeat,
 *   regenerate the alert artifact
 * - every `enforceMs` (checked on collect ticks): run the enforcement engine on
 *   the document that tick just persisted
 *
 * Alerts and enforcement only ever see a document that was successfully
 * swapped in. Ticks never overlap; stop() waits for the in-flight cycle.
 */

import { writeAlerts } from "./alerts.js";
import type { EnforcementEngine, EnforcementResult } from "./enforcement.js";
import { describeError } from "./errors.js";
import type { CycleResult, HeartbeatAggregator } from "./heartbeat.js";
import { createNullLogger } from "./logger.js";
import type { Logger } from "./types.js";

export interface MonitorDeps {
  aggregator: HeartbeatAggregator;
  enforcement: EnforcementEngine;
  alertsPath: string;
  intervals: {
    collectMs: number;
    enforceMs: number;
  };
  logger?: Logger;
  /** Clock for cycle timestamps. Defaults to Date.now. */
  now?: () => Date;
  /** Called after every completed cycle. */
  onCycle?: (report: CycleReport) => void;
}

export interface CycleReport {
  cycle: CycleResult;
  /** Alert lines written, or null if alerts were not regenerated. */
  alertCount: number | null;
  /** null when enforcement was not due (or the heartbeat was not persisted). */
  enforcement: EnforcementResult | null;
}

export interface RunOnceOptions {
  /**
   * true runs enforcement regardless of the enforce interval, false skips it.
   * Left undefined, enforcement runs when due, as on a timer tick.
   */
  enforce?: boolean;
}

type EnforceMode = "due" | "force" | "skip";

export interface Monitor {
  /** Start the loop (runs one cycle immediately). No-op if already running. */
  start(): void;
  /** Stop scheduling new cycles and resolve once the in-flight one finishes. */
  stop(): Promise<void>;
  /** Run a single cycle now, after any in-flight one. */
  runOnce(options?: RunOnceOptions): Promise<CycleReport>;
  isRunning(): boolean;
}

export function createMonitor(deps: MonitorDeps): Monitor {
  const logger = deps.logger ?? createNullLogger();
  const clock = deps.now ?? (() => new Date());

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<unknown> | null = null;
  let lastEnforcedAt: number | null = null;

  function enforcementDue(now: Date): boolean {
    if (lastEnforcedAt === null) return true;
    return now.getTime() - lastEnforcedAt >= deps.intervals.enforceMs;
  }

  async function runCycle(mode: EnforceMode): Promise<CycleReport> {
    const now = clock();
    const cycle = await deps.aggregator.runCycle(now);

    if (!cycle.persisted) {
      const skipped: CycleReport = { cycle, alertCount: null, enforcement: null };
      deps.onCycle?.(skipped);
      return skipped;
    }

    let alertCount: number | null = null;
    try {
      alertCount = await writeAlerts(deps.alertsPath, cycle.document, logger);
    } catch (err) {
      logger.appendLine(`alert artifact not written: ${describeError(err)}`, "error", "alerts");
    }

    let enforcement: EnforcementResult | null = null;
    if (mode === "force" || (mode === "due" && enforcementDue(now))) {
      enforcement = await deps.enforcement.enforce(cycle.document);
      // A rejected run leaves enforcement due on the next tick
      lastEnforcedAt = now.getTime();
    }

    const report: CycleReport = { cycle, alertCount, enforcement };
    deps.onCycle?.(report);
    return report;
  }

  /** Mark a cycle as in flight until it settles. */
  function track(run: Promise<CycleReport>): void {
    const settled: Promise<unknown> = run.then(
      () => undefined,
      () => undefined,
    );
    const guard: Promise<unknown> = settled.finally(() => {
      if (inFlight === guard) inFlight = null;
    });
    inFlight = guard;
  }

  function tick(): void {
    // Re-entrancy guard: skip if the previous cycle is still running
    if (inFlight) {
      logger.appendLine("previous cycle still running, skipping tick", "debug", "monitor");
      return;
    }
    const run = runCycle("due");
    track(run);
    run.catch((err: unknown) => {
      logger.appendLine(`cycle failed: ${describeError(err)}`, "error", "monitor");
    });
  }

  return {
    start(): void {
      if (timer) return;
      logger.appendLine(
        `monitor started (collect every ${deps.intervals.collectMs}ms, enforce every ${deps.intervals.enforceMs}ms)`,
        "info",
        "monitor",
      );
      timer = setInterval(tick, deps.intervals.collectMs);
      tick();
    },

    async stop(): Promise<void> {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      if (inFlight) await inFlight;
      logger.appendLine("monitor stopped", "info", "monitor");
    },

    async runOnce(options: RunOnceOptions = {}): Promise<CycleReport> {
      while (inFlight) await inFlight;
      const mode: EnforceMode =
        options.enforce === undefined ? "due" : options.enforce ? "force" : "skip";
      const run = runCycle(mode);
      track(run);
      return run;
    },

    isRunning: () => timer !== null,
  };
}
