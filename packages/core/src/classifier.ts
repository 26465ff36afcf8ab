/**
 * Liveness classifier: pure mapping from collected signals to a state.
 *
 * Boundary rule: a tie goes to the worse bucket.
 *   age <  activeMs            → active
 *   activeMs <= age < idleMs   → idle
 *   age >= idleMs, or no signal → stopped
 * So a signal exactly 5m old under the default thresholds is IDLE.
 */

import {
  LIVENESS_STATE,
  type Classification,
  type LivenessState,
  type SignalMap,
  type Thresholds,
} from "./types.js";

/** Newest known timestamp in the map, or null if every source is unknown. */
export function latestSignal(signals: SignalMap): Date | null {
  let latest: Date | null = null;
  for (const value of Object.values(signals)) {
    if (value && (!latest || value.getTime() > latest.getTime())) {
      latest = value;
    }
  }
  return latest;
}

/** Map a freshness age to a state. */
export function stateForAge(freshnessAgeMs: number, thresholds: Thresholds): LivenessState {
  if (freshnessAgeMs < thresholds.activeMs) return LIVENESS_STATE.ACTIVE;
  if (freshnessAgeMs < thresholds.idleMs) return LIVENESS_STATE.IDLE;
  return LIVENESS_STATE.STOPPED;
}

/**
 * Classify one worker. Timestamps in the future (clock skew between hosts)
 * count as age 0.
 */
export function classify(signals: SignalMap, now: Date, thresholds: Thresholds): Classification {
  const latest = latestSignal(signals);
  if (!latest) {
    return { freshnessAgeMs: Infinity, state: LIVENESS_STATE.STOPPED };
  }
  const freshnessAgeMs = Math.max(0, now.getTime() - latest.getTime());
  return { freshnessAgeMs, state: stateForAge(freshnessAgeMs, thresholds) };
}
