import chalk from "chalk";
import {
  formatDuration,
  type ActivitySnapshot,
  type HeartbeatDocument,
  type LivenessState,
  type LogEntry,
  type LogLevel,
} from "@pulsewatch/core";

export function header(title: string): string {
  const line = "─".repeat(76);
  return [
    chalk.dim(`┌${line}┐`),
    chalk.dim("│") + chalk.bold(` ${title}`.padEnd(76)) + chalk.dim("│"),
    chalk.dim(`└${line}┘`),
  ].join("\n");
}

/** Signal age relative to `now`, e.g. "4m ago"; "-" for an unknown signal. */
export function formatAge(at: Date | null, now: Date): string {
  if (!at) return "-";
  const diff = Math.max(0, now.getTime() - at.getTime());
  return `${formatDuration(diff)} ago`;
}

/** Freshness age; "never" when no source ever reported. */
export function formatFreshness(ageMs: number): string {
  return formatDuration(ageMs);
}

export function stateColor(state: LivenessState): string {
  switch (state) {
    case "active":
      return chalk.green(state);
    case "idle":
      return chalk.yellow(state);
    case "stopped":
      return chalk.red(state);
  }
}

export function levelColor(level: LogLevel): string {
  switch (level) {
    case "debug":
      return chalk.dim(level);
    case "info":
      return chalk.cyan(level);
    case "warn":
      return chalk.yellow(level);
    case "error":
      return chalk.red(level);
  }
}

// eslint-disable-next-line no-control-regex
const ANSI_RE = /\u001b\[[0-9;]*m/g;

/** Pad/truncate a string to exactly `width` visible characters */
export function padCol(str: string, width: number): string {
  // Strip ANSI codes to measure visible length
  const visible = str.replace(ANSI_RE, "");
  if (visible.length > width) {
    const plain = visible.slice(0, width - 1) + "…";
    return plain.padEnd(width);
  }
  const padding = width - visible.length;
  return str + " ".repeat(Math.max(0, padding));
}

const COL_WORKER = 16;
const COL_STATE = 9;
const COL_AGE = 10;
const COL_SIGNAL = 14;

/** Column headings for a heartbeat table. */
export function workerTableHeader(sources: readonly string[]): string {
  const cols = [
    padCol("Worker", COL_WORKER),
    padCol("State", COL_STATE),
    padCol("Fresh", COL_AGE),
    ...sources.map((s) => padCol(s, COL_SIGNAL)),
  ];
  return chalk.dim(`  ${cols.join(" ")}`);
}

export function workerTableRow(
  snapshot: ActivitySnapshot,
  sources: readonly string[],
  now: Date,
): string {
  const cols = [
    padCol(chalk.bold(snapshot.workerId), COL_WORKER),
    padCol(stateColor(snapshot.state), COL_STATE),
    padCol(formatFreshness(snapshot.freshnessAgeMs), COL_AGE),
    ...sources.map((source) => padCol(formatAge(snapshot.signals[source] ?? null, now), COL_SIGNAL)),
  ];
  return `  ${cols.join(" ")}`;
}

/** Every source name that appears in any worker's signals, in first-seen order. */
export function signalColumns(doc: HeartbeatDocument): string[] {
  const seen = new Set<string>();
  for (const snapshot of Object.values(doc.workers)) {
    for (const source of Object.keys(snapshot.signals)) seen.add(source);
  }
  return [...seen];
}

/** Render a full heartbeat document as a table with a summary footer. */
export function renderHeartbeat(doc: HeartbeatDocument, counts: Record<LivenessState, number>): string {
  const sources = signalColumns(doc);
  const lines: string[] = [
    header(`Heartbeat ${doc.generatedAt.toISOString()}`),
    "",
  ];

  const snapshots = Object.values(doc.workers);
  if (snapshots.length === 0) {
    lines.push(chalk.dim("  (no workers configured)"));
  } else {
    lines.push(workerTableHeader(sources));
    for (const snapshot of snapshots) {
      lines.push(workerTableRow(snapshot, sources, doc.generatedAt));
    }
  }

  if (doc.diagnostics.length > 0) {
    lines.push("");
    for (const diag of doc.diagnostics) {
      lines.push(chalk.yellow(`  ! ${diag.workerId} (${diag.kind}): ${diag.message}`));
    }
  }

  lines.push("");
  lines.push(
    `  ${chalk.green(`${counts.active} active`)}  ${chalk.yellow(`${counts.idle} idle`)}  ${chalk.red(`${counts.stopped} stopped`)}`,
  );
  return lines.join("\n");
}

/** One log entry as a single console line. */
export function formatLogEntry(entry: LogEntry): string {
  const who = entry.workerId ? ` ${chalk.bold(entry.workerId)}:` : "";
  return `${chalk.dim(entry.ts)} ${padCol(levelColor(entry.level), 5)} [${entry.source}]${who} ${entry.message}`;
}
