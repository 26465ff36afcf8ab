/**
 * Core types for pulsewatch.
 *
 * The monitor is built from three kinds of pieces:
 *   - SignalSource plugins (slot "source") report when a worker was last seen
 *   - ActionSink plugins (slot "sink") deliver enforcement actions
 *   - core services (collector, classifier, aggregator, alerts, enforcement)
 *     glue them together once per cycle
 */

// =============================================================================
// WORKERS + SIGNALS
// =============================================================================

/** Opaque worker identity (e.g. "Agent-3"). Stable for a monitoring session. */
export type WorkerId = string;

/** Source name as configured (e.g. "interactive-log", "commit-trail"). */
export type SourceName = string;

/** Source-specific locator: a log path, a report path, a "repo#author" tag... */
export type Locator = string;

/** Per-source last-activity timestamps collected in one cycle. null = unknown. */
export type SignalMap = Record<SourceName, Date | null>;

export interface QueryContext {
  /** Aborted when the per-query timeout elapses. */
  signal: AbortSignal;
}

/**
 * A provider of activity evidence.
 *
 * query() resolves to the last observed activity, or null when the source has
 * no record of the worker. It may reject when the source is unreachable; the
 * collector degrades that to unknown.
 */
export interface SignalSource {
  readonly name: string;
  query(locator: Locator, workerId: WorkerId, ctx: QueryContext): Promise<Date | null>;
  /** Returns an error message if the locator can never be queried, else null. */
  validateLocator?(locator: Locator): string | null;
}

// =============================================================================
// LIVENESS
// =============================================================================

export const LIVENESS_STATE = {
  ACTIVE: "active",
  IDLE: "idle",
  STOPPED: "stopped",
} as const;

export type LivenessState = (typeof LIVENESS_STATE)[keyof typeof LIVENESS_STATE];

/** Severity order, lowest first. */
export const LIVENESS_SEVERITY: Readonly<Record<LivenessState, number>> = {
  active: 0,
  idle: 1,
  stopped: 2,
};

export interface Thresholds {
  /** Ages strictly below this are ACTIVE. */
  activeMs: number;
  /** Ages strictly below this (and at or above activeMs) are IDLE. */
  idleMs: number;
}

export interface Classification {
  /** now - newest known timestamp; Infinity when nothing was ever observed. */
  freshnessAgeMs: number;
  state: LivenessState;
}

export interface ActivitySnapshot extends Classification {
  workerId: WorkerId;
  signals: SignalMap;
}

export type DiagnosticKind = "registry" | "collection";

export interface CycleDiagnostic {
  workerId: WorkerId;
  kind: DiagnosticKind;
  message: string;
}

/** The full-cycle snapshot of every registered worker. Replaced, never patched. */
export interface HeartbeatDocument {
  generatedAt: Date;
  thresholds: Thresholds;
  workers: Record<WorkerId, ActivitySnapshot>;
  diagnostics: CycleDiagnostic[];
}

// =============================================================================
// ENFORCEMENT
// =============================================================================

export const ACTION_KIND = {
  REMINDER: "reminder",
  REASSIGN_TASK: "reassign_task",
  OPEN_BLOCKER: "open_blocker",
  RESTART_WORKER: "restart_worker",
} as const;

export type ActionKind = (typeof ACTION_KIND)[keyof typeof ACTION_KIND];

/** Escalation level applied by each action kind. Level 0 means "nothing applied". */
export const ACTION_LEVEL: Readonly<Record<ActionKind, number>> = {
  reminder: 1,
  reassign_task: 2,
  open_blocker: 3,
  restart_worker: 4,
};

export interface EscalationRule {
  state: Exclude<LivenessState, "active">;
  /** Consecutive enforcement cycles in `state` before the rule applies. */
  minCycles: number;
  action: ActionKind;
}

export interface ActionPayload {
  level: number;
  state: LivenessState;
  consecutiveCycles: number;
  /** null when no signal was ever observed. */
  freshnessAgeMs: number | null;
  message: string;
  generatedAt: string;
}

export interface PlannedAction {
  workerId: WorkerId;
  kind: ActionKind;
  payload: ActionPayload;
}

/** Outbound transport for enforcement actions. */
export interface ActionSink {
  readonly name: string;
  emit(workerId: WorkerId, kind: ActionKind, payload: ActionPayload): Promise<void>;
}

export interface EscalationLedgerEntry {
  /** State observed at the last evaluated cycle. */
  state: LivenessState;
  /** Consecutive evaluated cycles spent in `state`. */
  consecutiveCycles: number;
  /** Highest level successfully applied since the last recovery. */
  level: number;
  lastAction: ActionKind | null;
  lastActionAt: Date | null;
  /** generatedAt of the last document evaluated for this worker. */
  lastEvaluatedAt: Date;
}

export type EscalationLedger = Record<WorkerId, EscalationLedgerEntry>;

// =============================================================================
// LOGGING
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSource =
  | "collector"
  | "aggregator"
  | "alerts"
  | "enforcement"
  | "monitor"
  | "ledger"
  | "cli";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  source: LogSource;
  workerId: WorkerId | null;
  message: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  appendLine(
    message: string,
    level: LogLevel,
    source: LogSource,
    workerId?: WorkerId | null,
    data?: Record<string, unknown>,
  ): void;
}

// =============================================================================
// PLUGINS
// =============================================================================

export type PluginSlot = "source" | "sink";

export interface PluginManifest {
  name: string;
  slot: PluginSlot;
  description: string;
  version: string;
}

export interface PluginModule<T> {
  manifest: PluginManifest;
  create(config?: Record<string, unknown>): T;
}

export interface PluginRegistry {
  registerSource(module: PluginModule<SignalSource>): void;
  registerSink(module: PluginModule<ActionSink>): void;
  /** Instantiate a registered source plugin. Throws for unknown plugin names. */
  createSource(plugin: string, config?: Record<string, unknown>): SignalSource;
  /** Instantiate a registered sink plugin. Throws for unknown plugin names. */
  createSink(plugin: string, config?: Record<string, unknown>): ActionSink;
  list(slot: PluginSlot): PluginManifest[];
}

// =============================================================================
// CONFIG
// =============================================================================

export interface PluginConfig {
  plugin: string;
  [key: string]: unknown;
}

export interface PulsewatchConfig {
  /** Resolved path of the loaded config file, when loaded from disk. */
  configPath?: string;
  dataDir: string;
  heartbeatPath: string;
  alertsPath: string;
  ledgerPath: string;
  logPath: string;
  thresholds: Thresholds;
  intervals: {
    collectMs: number;
    enforceMs: number;
  };
  sourceTimeoutMs: number;
  persistFailureAlarm: number;
  sources: Record<SourceName, PluginConfig>;
  workers: Record<WorkerId, Record<SourceName, Locator>>;
  escalation: {
    rules: EscalationRule[];
    messages: Record<ActionKind, string>;
  };
  sink: PluginConfig;
}
