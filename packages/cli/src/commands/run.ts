/**
 * `pulsewatch run`: the long-running monitor.
 *
 * Collects every `intervals.collect`, enforces every `intervals.enforce`,
 * and stops cleanly on SIGINT/SIGTERM after the in-flight cycle finishes.
 */

import chalk from "chalk";
import type { Command } from "commander";
import {
  formatDuration,
  summarizeHeartbeat,
  type CycleReport,
  type Pulsewatch,
} from "@pulsewatch/core";
import { getPulsewatch, openLogger } from "../lib/create-pulsewatch.js";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";

/** One console line per cycle. */
export function formatCycleLine(report: CycleReport): string {
  const doc = report.cycle.document;
  const time = chalk.dim(doc.generatedAt.toISOString());
  if (!report.cycle.persisted) {
    return `${time} ${chalk.red("heartbeat not persisted")}`;
  }
  const counts = summarizeHeartbeat(doc);
  const parts = [
    chalk.green(`${counts.active} active`),
    chalk.yellow(`${counts.idle} idle`),
    chalk.red(`${counts.stopped} stopped`),
  ];
  if (report.enforcement) {
    const delivered = report.enforcement.outcomes.filter((o) => o.delivered).length;
    const failed = report.enforcement.outcomes.length - delivered;
    parts.push(chalk.magenta(`${delivered} action(s)`));
    if (failed > 0) parts.push(chalk.red(`${failed} failed`));
  }
  return `${time} ${parts.join("  ")}`;
}

export function registerRun(program: Command): void {
  program
    .command("run")
    .description("Run the monitor loop until interrupted")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .option("-q, --quiet", "Only write the log file; print nothing per cycle")
    .option("-v, --verbose", "Mirror debug log lines to the console")
    .action(async (opts: { config?: string; quiet?: boolean; verbose?: boolean }) => {
      const config = loadConfigOrExit(opts.config);
      const { logger, writer } = openLogger(config, {
        consoleLevel: opts.quiet ? null : opts.verbose ? "debug" : "warn",
      });

      let pulsewatch: Pulsewatch;
      try {
        pulsewatch = getPulsewatch(config, logger, (report) => {
          if (!opts.quiet) console.log(formatCycleLine(report));
        });
      } catch (err) {
        writer.close();
        exitWithError(err);
      }

      const { monitor, registry } = pulsewatch;
      console.log(
        chalk.bold(
          `Watching ${registry.list().length} worker(s): collect every ${formatDuration(config.intervals.collectMs)}, enforce every ${formatDuration(config.intervals.enforceMs)}`,
        ),
      );
      console.log(chalk.dim(`Heartbeat: ${config.heartbeatPath}`));
      console.log(chalk.dim(`Alerts:    ${config.alertsPath}`));
      console.log(chalk.dim(`Log:       ${config.logPath}`));

      let stopping = false;
      const shutdown = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        logger.appendLine(`${signal} received, stopping monitor`, "info", "cli");
        console.log(chalk.dim(`\n${signal} received, finishing current cycle...`));
        monitor
          .stop()
          .then(() => {
            writer.close();
            process.exit(0);
          })
          .catch((err: unknown) => {
            writer.close();
            exitWithError(err);
          });
      };

      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
      monitor.start();
    });
}
