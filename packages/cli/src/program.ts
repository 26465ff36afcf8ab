import { Command } from "commander";
import { registerAlerts } from "./commands/alerts.js";
import { registerCheck } from "./commands/check.js";
import { registerLedger } from "./commands/ledger.js";
import { registerLogs } from "./commands/logs.js";
import { registerRun } from "./commands/run.js";
import { registerStatus } from "./commands/status.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("pulsewatch")
    .description("Multi-signal liveness and stall detection for long-running workers")
    .version("0.1.0");

  registerRun(program);
  registerCheck(program);
  registerStatus(program);
  registerAlerts(program);
  registerLedger(program);
  registerLogs(program);

  return program;
}
