import chalk from "chalk";
import type { Command } from "commander";
import {
  parseDuration,
  readLogs,
  type LogLevel,
  type LogSource,
  type ReadLogsOptions,
} from "@pulsewatch/core";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";
import { formatLogEntry } from "../lib/format.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_SOURCES: readonly LogSource[] = [
  "collector",
  "aggregator",
  "alerts",
  "enforcement",
  "monitor",
  "ledger",
  "cli",
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogSource(value: string): value is LogSource {
  return LOG_SOURCES.some((source) => source === value);
}

interface LogsOptions {
  config?: string;
  level?: string;
  source?: string;
  worker?: string;
  since?: string;
  grep?: string;
  all?: boolean;
  limit: string;
  json?: boolean;
}

/** "10m" means ten minutes before `now`; anything else must be a date. */
function parseSince(value: string, now: Date): Date {
  const ago = parseDuration(value);
  if (ago !== null) return new Date(now.getTime() - ago);
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid --since '${value}'. Use a duration like 10m or an ISO date.`);
  }
  return new Date(ms);
}

/** Validate CLI flags into reader options. Throws on bad values. */
export function parseLogsOptions(opts: LogsOptions, now: Date = new Date()): ReadLogsOptions {
  const options: ReadLogsOptions = {};
  if (opts.level !== undefined) {
    if (!isLogLevel(opts.level)) {
      throw new Error(`Invalid level '${opts.level}'. Use one of: ${LOG_LEVELS.join(", ")}`);
    }
    options.level = opts.level;
  }
  if (opts.source !== undefined) {
    if (!isLogSource(opts.source)) {
      throw new Error(`Invalid source '${opts.source}'. Use one of: ${LOG_SOURCES.join(", ")}`);
    }
    options.source = opts.source;
  }
  if (opts.worker !== undefined) options.workerId = opts.worker;
  if (opts.since !== undefined) options.since = parseSince(opts.since, now);
  if (opts.grep !== undefined) options.pattern = opts.grep;
  if (opts.all) options.includeRotated = true;

  const limit = Number.parseInt(opts.limit, 10);
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new Error(`Invalid limit '${opts.limit}'. Must be a positive integer.`);
  }
  options.limit = limit;
  return options;
}

export function registerLogs(program: Command): void {
  program
    .command("logs")
    .description("Show recent monitor log entries")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .option("-l, --level <level>", "Minimum level (debug, info, warn, error)")
    .option("-s, --source <source>", "Only entries from this component")
    .option("-w, --worker <id>", "Only entries about this worker")
    .option("--since <when>", "Only entries newer than a duration ago (10m) or an ISO date")
    .option("-g, --grep <text>", "Only entries whose message contains this text")
    .option("-a, --all", "Include rotated log files")
    .option("-n, --limit <n>", "Number of entries to show", "50")
    .option("--json", "Print raw JSONL entries")
    .action(async (opts: LogsOptions) => {
      const config = loadConfigOrExit(opts.config, { allowDefault: true });

      let options: ReadLogsOptions;
      try {
        options = parseLogsOptions(opts);
      } catch (err) {
        exitWithError(err);
      }

      const entries = readLogs(config.logPath, options);
      if (entries.length === 0) {
        console.log(chalk.dim("No log entries."));
        return;
      }
      for (const entry of entries) {
        console.log(opts.json ? JSON.stringify(entry) : formatLogEntry(entry));
      }
    });
}
