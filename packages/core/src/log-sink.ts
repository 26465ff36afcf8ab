import type { ActionSink, Logger, PluginModule } from "./types.js";

export const logSinkManifest = {
  name: "log",
  slot: "sink" as const,
  description: "Action sink: records enforcement actions in the pulsewatch log",
  version: "0.1.0",
};

/** Sink that only logs. The default when no transport is configured. */
export function createLogActionSink(logger: Logger): ActionSink {
  return {
    name: "log",
    async emit(workerId, kind, payload): Promise<void> {
      logger.appendLine(`action ${kind}: ${payload.message}`, "warn", "enforcement", workerId, {
        action: kind,
        level: payload.level,
        consecutiveCycles: payload.consecutiveCycles,
        freshnessAgeMs: payload.freshnessAgeMs,
      });
    },
  };
}

/** Plugin module for the log sink, bound to a logger. */
export function createLogSinkModule(logger: Logger): PluginModule<ActionSink> {
  return {
    manifest: logSinkManifest,
    create: () => createLogActionSink(logger),
  };
}
