/**
 * Configuration loader: reads pulsewatch.yaml and validates with Zod.
 *
 * Minimal config that just works:
 *   workers:
 *     Agent-1:
 *       interactive-log: ~/agents/agent-1/session.jsonl
 *       commit-trail: ~/repos/app#Agent-1
 *
 * Everything else has defaults.
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseDuration } from "./durations.js";
import { ConfigError } from "./errors.js";
import { ACTION_KIND, type ActionKind, type PulsewatchConfig } from "./types.js";

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

const DurationSchema = z
  .string()
  .refine((value) => parseDuration(value) !== null, {
    message: 'Expected a duration such as "30s", "5m" or "1h"',
  })
  .refine((value) => (parseDuration(value) ?? 1) > 0, {
    message: "Durations must be greater than 0",
  });

const PluginConfigSchema = z
  .object({
    plugin: z.string().min(1),
  })
  .passthrough();

const EscalationRuleSchema = z.object({
  state: z.enum(["idle", "stopped"]),
  minCycles: z.number().int().positive(),
  action: z.enum(["reminder", "reassign_task", "open_blocker", "restart_worker"]),
});

const ThresholdsSchema = z
  .object({
    active: DurationSchema.default("5m"),
    idle: DurationSchema.default("15m"),
  })
  .refine((t) => (parseDuration(t.idle) ?? 0) > (parseDuration(t.active) ?? 0), {
    message: "thresholds.idle must be greater than thresholds.active",
  });

const IntervalsSchema = z
  .object({
    collect: DurationSchema.default("30s"),
    enforce: DurationSchema.default("5m"),
  })
  .refine((i) => (parseDuration(i.enforce) ?? 0) >= (parseDuration(i.collect) ?? 0), {
    message: "intervals.enforce must be at least intervals.collect",
  });

const WorkerIdSchema = z
  .string()
  .regex(/^[a-zA-Z0-9_.-]+$/, "worker ids must match [a-zA-Z0-9_.-]+");

const PulsewatchConfigSchema = z.object({
  dataDir: z.string().default("~/.pulsewatch"),
  heartbeatPath: z.string().optional(),
  alertsPath: z.string().optional(),
  ledgerPath: z.string().optional(),
  logPath: z.string().optional(),
  thresholds: ThresholdsSchema.default({}),
  intervals: IntervalsSchema.default({}),
  sourceTimeout: DurationSchema.default("10s"),
  persistFailureAlarm: z.number().int().positive().default(3),
  sources: z.record(PluginConfigSchema).optional(),
  workers: z.record(WorkerIdSchema, z.record(z.string())),
  escalation: z
    .object({
      rules: z.array(EscalationRuleSchema).optional(),
      messages: z
        .object({
          reminder: z.string(),
          reassign_task: z.string(),
          open_blocker: z.string(),
          restart_worker: z.string(),
        })
        .partial()
        .default({}),
    })
    .default({}),
  sink: PluginConfigSchema.default({ plugin: "log" }),
});

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_SOURCES: PulsewatchConfig["sources"] = {
  "interactive-log": { plugin: "jsonl-log" },
  "scheduled-report": { plugin: "file-mtime" },
  "commit-trail": { plugin: "git-commit" },
};

export const DEFAULT_ESCALATION_RULES: PulsewatchConfig["escalation"]["rules"] = [
  { state: "idle", minCycles: 2, action: ACTION_KIND.REMINDER },
  { state: "stopped", minCycles: 1, action: ACTION_KIND.REASSIGN_TASK },
  { state: "stopped", minCycles: 3, action: ACTION_KIND.OPEN_BLOCKER },
  { state: "stopped", minCycles: 5, action: ACTION_KIND.RESTART_WORKER },
];

export const DEFAULT_ACTION_MESSAGES: Record<ActionKind, string> = {
  reminder: "No activity seen for a while. Post a progress update or pick up your next task.",
  reassign_task: "No activity detected. Your top task is being reassigned.",
  open_blocker: "Still no activity. A blocker record has been opened for you.",
  restart_worker: "Worker has been stopped for too long and is being restarted.",
};

// =============================================================================
// CONFIG LOADING
// =============================================================================

/** Expand ~ to home directory */
export function expandHome(filepath: string): string {
  if (filepath.startsWith("~/")) {
    return join(homedir(), filepath.slice(2));
  }
  return filepath;
}

/** Durations were validated by the schema; this narrows them to numbers. */
function durationMs(value: string): number {
  const ms = parseDuration(value);
  if (ms === null) throw new ConfigError(`Invalid duration: ${value}`);
  return ms;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/** Search for config file in standard locations */
export function findConfigFile(startDir?: string): string | null {
  const searchPaths = [
    startDir ? resolve(startDir, "pulsewatch.yaml") : null,
    startDir ? resolve(startDir, "pulsewatch.yml") : null,
    resolve(process.cwd(), "pulsewatch.yaml"),
    resolve(process.cwd(), "pulsewatch.yml"),
    resolve(homedir(), ".pulsewatch.yaml"),
    resolve(homedir(), ".pulsewatch.yml"),
    resolve(homedir(), ".config", "pulsewatch", "config.yaml"),
  ].filter((p): p is string => p !== null);

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/** Load and validate config from a YAML file */
export function loadConfig(configPath?: string): PulsewatchConfig {
  const path = configPath ?? findConfigFile();

  if (!path) {
    throw new ConfigError("No pulsewatch.yaml found. Pass --config <path> or create one.");
  }
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not parse ${path}`, { cause: err });
  }

  const config = validateConfig(parsed);
  config.configPath = realpathSync(path);
  return config;
}

/** Validate a raw config object and apply defaults */
export function validateConfig(raw: unknown): PulsewatchConfig {
  const result = PulsewatchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid pulsewatch config:\n${formatIssues(result.error)}`);
  }
  const validated = result.data;
  const dataDir = expandHome(validated.dataDir);

  const workers: PulsewatchConfig["workers"] = {};
  for (const [workerId, locators] of Object.entries(validated.workers)) {
    workers[workerId] = Object.fromEntries(
      Object.entries(locators).map(([source, locator]) => [source, expandHome(locator)]),
    );
  }

  return {
    dataDir,
    heartbeatPath: expandHome(validated.heartbeatPath ?? join(dataDir, "heartbeat.json")),
    alertsPath: expandHome(validated.alertsPath ?? join(dataDir, "alerts.txt")),
    ledgerPath: expandHome(validated.ledgerPath ?? join(dataDir, "ledger.json")),
    logPath: expandHome(validated.logPath ?? join(dataDir, "logs", "pulsewatch.jsonl")),
    thresholds: {
      activeMs: durationMs(validated.thresholds.active),
      idleMs: durationMs(validated.thresholds.idle),
    },
    intervals: {
      collectMs: durationMs(validated.intervals.collect),
      enforceMs: durationMs(validated.intervals.enforce),
    },
    sourceTimeoutMs: durationMs(validated.sourceTimeout),
    persistFailureAlarm: validated.persistFailureAlarm,
    // User-specified sources win over defaults
    sources: { ...DEFAULT_SOURCES, ...validated.sources },
    workers,
    escalation: {
      rules: validated.escalation.rules ?? DEFAULT_ESCALATION_RULES,
      messages: { ...DEFAULT_ACTION_MESSAGES, ...validated.escalation.messages },
    },
    sink: validated.sink,
  };
}

/** Get the default config for an empty worker set */
export function getDefaultConfig(): PulsewatchConfig {
  return validateConfig({ workers: {} });
}
