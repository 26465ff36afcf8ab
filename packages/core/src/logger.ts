import type { LogLevel, LogSource, Logger, WorkerId } from "./types.js";

/** Logger that drops everything. Default for components built without one. */
export function createNullLogger(): Logger {
  return {
    appendLine(): void {},
  };
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Prints `[source] worker: message` to the console at or above `minLevel`. */
export function createConsoleLogger(minLevel: LogLevel = "info"): Logger {
  return {
    appendLine(
      message: string,
      level: LogLevel,
      source: LogSource,
      workerId?: WorkerId | null,
    ): void {
      if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
      const line = workerId ? `[${source}] ${workerId}: ${message}` : `[${source}] ${message}`;
      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
    },
  };
}

/** Fan one log call out to several loggers. */
export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    appendLine(message, level, source, workerId, data): void {
      for (const logger of loggers) {
        logger.appendLine(message, level, source, workerId, data);
      }
    },
  };
}
