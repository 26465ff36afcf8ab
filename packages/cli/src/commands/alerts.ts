import chalk from "chalk";
import type { Command } from "commander";
import { readAlerts } from "@pulsewatch/core";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";

export function registerAlerts(program: Command): void {
  program
    .command("alerts")
    .description("Print the current alert artifact")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .action(async (opts: { config?: string }) => {
      const config = loadConfigOrExit(opts.config, { allowDefault: true });

      let lines: string[];
      try {
        lines = await readAlerts(config.alertsPath);
      } catch (err) {
        exitWithError(err);
      }

      if (lines.length === 0) {
        console.log(chalk.green("No stopped workers."));
        return;
      }
      for (const line of lines) console.log(chalk.red(line));
    });
}
