import chalk from "chalk";
import type { Command } from "commander";
import {
  formatDuration,
  readHeartbeat,
  serializeHeartbeat,
  summarizeHeartbeat,
  type HeartbeatDocument,
} from "@pulsewatch/core";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";
import { renderHeartbeat } from "../lib/format.js";

export function registerStatus(program: Command): void {
  program
    .command("status")
    .description("Show the last persisted heartbeat")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .option("--json", "Print the heartbeat document as JSON")
    .action(async (opts: { config?: string; json?: boolean }) => {
      const config = loadConfigOrExit(opts.config, { allowDefault: true });

      let doc: HeartbeatDocument | null;
      try {
        doc = await readHeartbeat(config.heartbeatPath);
      } catch (err) {
        exitWithError(err);
      }

      if (!doc) {
        console.error(
          chalk.yellow(
            `No heartbeat at ${config.heartbeatPath}. Run \`pulsewatch check\` or \`pulsewatch run\` first.`,
          ),
        );
        process.exit(1);
      }

      if (opts.json) {
        process.stdout.write(serializeHeartbeat(doc));
        return;
      }

      console.log(renderHeartbeat(doc, summarizeHeartbeat(doc)));
      const age = Math.max(0, Date.now() - doc.generatedAt.getTime());
      console.log(chalk.dim(`\n  generated ${formatDuration(age)} ago`));
    });
}
