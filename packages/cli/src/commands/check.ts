import chalk from "chalk";
import ora from "ora";
import type { Command } from "commander";
import { serializeHeartbeat, summarizeHeartbeat, type CycleReport } from "@pulsewatch/core";
import { getPulsewatch, openLogger } from "../lib/create-pulsewatch.js";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";
import { renderHeartbeat } from "../lib/format.js";

function renderEnforcement(report: CycleReport): string[] {
  if (!report.enforcement) return [];
  const lines = ["", chalk.bold("  Enforcement")];
  if (report.enforcement.outcomes.length === 0) {
    lines.push(chalk.dim("  no actions due"));
  }
  for (const outcome of report.enforcement.outcomes) {
    const { workerId, kind, payload } = outcome.action;
    const status = outcome.delivered ? chalk.green("sent") : chalk.red("failed");
    lines.push(`  ${status} ${chalk.bold(workerId)} ${kind} (level ${payload.level})`);
    if (outcome.error) lines.push(chalk.dim(`       ${outcome.error.message}`));
  }
  if (!report.enforcement.ledgerPersisted) {
    lines.push(chalk.red("  escalation ledger could not be written"));
  }
  return lines;
}

export function registerCheck(program: Command): void {
  program
    .command("check")
    .description("Run a single collection cycle and print the result")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .option("--enforce", "Also run the enforcement engine on this cycle")
    .option("--json", "Print the heartbeat document as JSON")
    .action(async (opts: { config?: string; enforce?: boolean; json?: boolean }) => {
      const config = loadConfigOrExit(opts.config);
      const { logger, writer } = openLogger(config, { consoleLevel: null });

      const spinner = opts.json ? null : ora("Collecting signals...").start();
      let report: CycleReport;
      try {
        const { monitor } = getPulsewatch(config, logger);
        report = await monitor.runOnce({ enforce: opts.enforce === true });
      } catch (err) {
        spinner?.fail("Check failed");
        exitWithError(err);
      } finally {
        writer.close();
      }
      spinner?.stop();

      const doc = report.cycle.document;
      if (opts.json) {
        process.stdout.write(serializeHeartbeat(doc));
      } else {
        console.log(renderHeartbeat(doc, summarizeHeartbeat(doc)));
        if (report.alertCount !== null) {
          console.log(chalk.dim(`\n  ${report.alertCount} alert(s) written to ${config.alertsPath}`));
        }
        for (const line of renderEnforcement(report)) console.log(line);
      }

      if (!report.cycle.persisted) {
        console.error(
          chalk.red(`Heartbeat not persisted: ${report.cycle.error?.message ?? "unknown error"}`),
        );
        process.exit(1);
      }
    });
}
