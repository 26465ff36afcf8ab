/**
 * `pulsewatch ledger`: inspect or reset escalation history.
 *
 * A running monitor keeps its ledger in memory, so a reset made while it
 * runs is overwritten at its next enforcement cycle; reset takes effect for
 * monitors started afterwards (and for `check --enforce`).
 */

import chalk from "chalk";
import type { Command } from "commander";
import {
  readLedger,
  resetLedgerEntry,
  serializeLedger,
  type EscalationLedger,
} from "@pulsewatch/core";
import { exitWithError, loadConfigOrExit } from "../lib/exit.js";
import { header, padCol, stateColor } from "../lib/format.js";

export function renderLedger(ledger: EscalationLedger): string {
  const entries = Object.entries(ledger);
  const lines = [header("Escalation ledger"), ""];
  if (entries.length === 0) {
    lines.push(chalk.dim("  (empty)"));
    return lines.join("\n");
  }

  lines.push(
    chalk.dim(
      `  ${[
        padCol("Worker", 16),
        padCol("State", 9),
        padCol("Cycles", 7),
        padCol("Level", 6),
        padCol("Last action", 16),
        "Last action at",
      ].join(" ")}`,
    ),
  );
  for (const [workerId, entry] of entries) {
    lines.push(
      `  ${[
        padCol(chalk.bold(workerId), 16),
        padCol(stateColor(entry.state), 9),
        padCol(String(entry.consecutiveCycles), 7),
        padCol(String(entry.level), 6),
        padCol(entry.lastAction ?? "-", 16),
        entry.lastActionAt ? entry.lastActionAt.toISOString() : "-",
      ].join(" ")}`,
    );
  }
  return lines.join("\n");
}

export function registerLedger(program: Command): void {
  program
    .command("ledger")
    .description("Show escalation state per worker")
    .option("-c, --config <path>", "Path to pulsewatch.yaml")
    .option("--reset <worker>", "Clear one worker's escalation history")
    .option("--json", "Print the ledger as JSON")
    .action(async (opts: { config?: string; reset?: string; json?: boolean }) => {
      const config = loadConfigOrExit(opts.config, { allowDefault: true });

      if (opts.reset) {
        let removed: boolean;
        try {
          removed = await resetLedgerEntry(config.ledgerPath, opts.reset);
        } catch (err) {
          exitWithError(err);
        }
        if (!removed) {
          console.error(chalk.yellow(`No ledger entry for worker '${opts.reset}'`));
          process.exit(1);
        }
        console.log(chalk.green(`Reset escalation for ${opts.reset}`));
        return;
      }

      const ledger = await readLedger(config.ledgerPath);
      if (opts.json) {
        process.stdout.write(serializeLedger(ledger));
        return;
      }
      console.log(renderLedger(ledger));
    });
}
