import chalk from "chalk";
import { describeError, getDefaultConfig, type PulsewatchConfig } from "@pulsewatch/core";
import { getConfig, getConfigPath } from "../services/ConfigService.js";

/** Print an error and exit with status 1. */
export function exitWithError(err: unknown): never {
  console.error(chalk.red(`Error: ${describeError(err)}`));
  process.exit(1);
}

/**
 * Load config or exit. With `allowDefault`, commands that only read
 * artifacts use the default data directory when no config file exists.
 */
export function loadConfigOrExit(
  explicitPath: string | undefined,
  options: { allowDefault?: boolean } = {},
): PulsewatchConfig {
  if (options.allowDefault && !explicitPath && getConfigPath() === null) {
    return getDefaultConfig();
  }
  try {
    return getConfig(explicitPath);
  } catch (err) {
    return exitWithError(err);
  }
}
