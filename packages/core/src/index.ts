/**
 * @pulsewatch/core
 *
 * Multi-signal liveness and stall detection for long-running workers.
 * Exports all types, config loader, and service implementations.
 */

// Types: everything plugins and consumers need
export * from "./types.js";

// Errors
export {
  ConfigError,
  SourceUnavailableError,
  PartialRegistryError,
  PersistenceError,
  EnforcementActionError,
  describeError,
} from "./errors.js";

// Config: YAML loader + validation
export {
  loadConfig,
  validateConfig,
  getDefaultConfig,
  findConfigFile,
  expandHome,
  DEFAULT_SOURCES,
  DEFAULT_ESCALATION_RULES,
  DEFAULT_ACTION_MESSAGES,
} from "./config.js";

// Durations
export { parseDuration, formatDuration } from "./durations.js";

// Logging
export { LogWriter } from "./log-writer.js";
export type { LogWriterOptions } from "./log-writer.js";
export { readLogs, rotatedLogFiles } from "./log-reader.js";
export type { ReadLogsOptions } from "./log-reader.js";
export { createNullLogger, createConsoleLogger, combineLoggers } from "./logger.js";

// Plugin + worker registries
export { createPluginRegistry } from "./plugin-registry.js";
export { createWorkerRegistry } from "./registry.js";
export type { WorkerEntry, WorkerRegistry } from "./registry.js";

// Collection + classification
export { createCollector } from "./collector.js";
export type { Collector, CollectorDeps } from "./collector.js";
export { classify, latestSignal, stateForAge } from "./classifier.js";

// Heartbeat document
export {
  HEARTBEAT_SCHEMA_VERSION,
  buildHeartbeatDocument,
  createHeartbeatAggregator,
  parseHeartbeat,
  readHeartbeat,
  serializeHeartbeat,
  summarizeHeartbeat,
  writeHeartbeat,
} from "./heartbeat.js";
export type {
  BuildHeartbeatInput,
  CycleResult,
  HeartbeatAggregator,
  HeartbeatAggregatorDeps,
} from "./heartbeat.js";

// Alerts
export { formatAlertLine, readAlerts, renderAlerts, selectAlerts, writeAlerts } from "./alerts.js";

// Enforcement + ledger
export {
  applyDelivery,
  createEnforcementEngine,
  planEnforcement,
  selectRule,
} from "./enforcement.js";
export type {
  ActionOutcome,
  EnforcementEngine,
  EnforcementEngineDeps,
  EnforcementPlan,
  EnforcementResult,
} from "./enforcement.js";
export {
  LEDGER_SCHEMA_VERSION,
  parseLedger,
  readLedger,
  resetLedgerEntry,
  serializeLedger,
  writeLedger,
} from "./ledger.js";
export { createLogActionSink, createLogSinkModule, logSinkManifest } from "./log-sink.js";

// Atomic persistence
export { atomicWriteFile } from "./atomic-write.js";

// Monitor loop + wiring
export { createMonitor } from "./monitor.js";
export type { CycleReport, Monitor, MonitorDeps, RunOnceOptions } from "./monitor.js";
export { createPulsewatch, createSources } from "./pulsewatch.js";
export type { Pulsewatch, PulsewatchDeps } from "./pulsewatch.js";
