/**
 * Pulsewatch factory for the CLI.
 *
 * Opens the JSONL log for the configured data directory, optionally mirrors
 * it to the console, and wires the bundled plugins into core's monitor.
 */

import {
  combineLoggers,
  createConsoleLogger,
  createPulsewatch,
  LogWriter,
  type LogLevel,
  type Logger,
  type Pulsewatch,
  type PulsewatchConfig,
  type PulsewatchDeps,
} from "@pulsewatch/core";
import { createBundledPlugins } from "./plugins.js";

export interface CliLoggerOptions {
  /** Mirror log lines to the console at or above this level; null for file only. */
  consoleLevel: LogLevel | null;
}

export interface CliLogger {
  logger: Logger;
  writer: LogWriter;
}

export function openLogger(config: PulsewatchConfig, options: CliLoggerOptions): CliLogger {
  const writer = new LogWriter({ filePath: config.logPath });
  const logger =
    options.consoleLevel === null
      ? writer
      : combineLoggers(writer, createConsoleLogger(options.consoleLevel));
  return { logger, writer };
}

export function getPulsewatch(
  config: PulsewatchConfig,
  logger: Logger,
  onCycle?: PulsewatchDeps["onCycle"],
): Pulsewatch {
  return createPulsewatch({ config, plugins: createBundledPlugins(), logger, onCycle });
}
