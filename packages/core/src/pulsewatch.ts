/**
 * Wire a full monitor from config: sources → registry → collector →
 * aggregator → enforcement → monitor loop.
 */

import { createCollector, type Collector } from "./collector.js";
import { createEnforcementEngine, type EnforcementEngine } from "./enforcement.js";
import { createHeartbeatAggregator, type HeartbeatAggregator } from "./heartbeat.js";
import { createLogSinkModule } from "./log-sink.js";
import { createNullLogger } from "./logger.js";
import { createMonitor, type Monitor, type MonitorDeps } from "./monitor.js";
import { createWorkerRegistry, type WorkerRegistry } from "./registry.js";
import type {
  ActionSink,
  Logger,
  PluginRegistry,
  PulsewatchConfig,
  SignalSource,
  SourceName,
} from "./types.js";

export interface PulsewatchDeps {
  config: PulsewatchConfig;
  plugins: PluginRegistry;
  logger?: Logger;
  /** Clock shared by the loop and the enforcement engine. */
  now?: () => Date;
  onCycle?: MonitorDeps["onCycle"];
}

export interface Pulsewatch {
  sources: ReadonlyMap<SourceName, SignalSource>;
  registry: WorkerRegistry;
  collector: Collector;
  aggregator: HeartbeatAggregator;
  sink: ActionSink;
  enforcement: EnforcementEngine;
  monitor: Monitor;
}

/** Split a plugin config into its plugin name and the options passed to create(). */
function pluginOptions(config: { plugin: string }): Record<string, unknown> {
  const { plugin: _plugin, ...options } = config;
  return options;
}

/** Instantiate every configured source. Unknown plugin names are fatal. */
export function createSources(
  config: PulsewatchConfig,
  plugins: PluginRegistry,
): Map<SourceName, SignalSource> {
  const sources = new Map<SourceName, SignalSource>();
  for (const [name, sourceConfig] of Object.entries(config.sources)) {
    sources.set(name, plugins.createSource(sourceConfig.plugin, pluginOptions(sourceConfig)));
  }
  return sources;
}

export function createPulsewatch(deps: PulsewatchDeps): Pulsewatch {
  const { config, plugins } = deps;
  const logger = deps.logger ?? createNullLogger();

  if (!plugins.list("sink").some((m) => m.name === "log")) {
    plugins.registerSink(createLogSinkModule(logger));
  }

  const sources = createSources(config, plugins);
  const registry = createWorkerRegistry(config.workers, sources);
  const collector = createCollector({ sources, timeoutMs: config.sourceTimeoutMs, logger });
  const aggregator = createHeartbeatAggregator({
    registry,
    collector,
    thresholds: config.thresholds,
    heartbeatPath: config.heartbeatPath,
    persistFailureAlarm: config.persistFailureAlarm,
    logger,
  });
  const sink = plugins.createSink(config.sink.plugin, pluginOptions(config.sink));
  const enforcement = createEnforcementEngine({
    rules: config.escalation.rules,
    messages: config.escalation.messages,
    sink,
    ledgerPath: config.ledgerPath,
    logger,
    now: deps.now,
  });
  const monitor = createMonitor({
    aggregator,
    enforcement,
    alertsPath: config.alertsPath,
    intervals: config.intervals,
    logger,
    now: deps.now,
    onCycle: deps.onCycle,
  });

  return { sources, registry, collector, aggregator, sink, enforcement, monitor };
}
