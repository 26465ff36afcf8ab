/**
 * Signal collector: asks every source that knows a worker when it last saw
 * that worker.
 *
 * Never throws. Each query runs under its own timeout; "no record", errors
 * and timeouts all degrade to unknown (null) and differ only in how they are
 * logged.
 */

import { SourceUnavailableError, describeError } from "./errors.js";
import { createNullLogger } from "./logger.js";
import type { WorkerEntry } from "./registry.js";
import type { Logger, SignalMap, SignalSource, SourceName, WorkerId } from "./types.js";

export interface CollectorDeps {
  sources: ReadonlyMap<SourceName, SignalSource>;
  /** Per-query timeout. */
  timeoutMs: number;
  logger?: Logger;
}

export interface Collector {
  /** Query one source for one worker. Resolves null on any failure. */
  collect(sourceName: SourceName, locator: string, workerId: WorkerId): Promise<Date | null>;
  /** Query every source the worker is registered with, in parallel. */
  collectWorker(entry: WorkerEntry): Promise<SignalMap>;
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Run a source query, rejecting with a timeout SourceUnavailableError if it
 * has not settled in time. The source's AbortSignal fires at the same moment
 * so well-behaved sources can release their resources.
 */
async function queryWithTimeout(
  source: SignalSource,
  sourceName: SourceName,
  locator: string,
  workerId: WorkerId,
  timeoutMs: number,
): Promise<Date | null> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(
        new SourceUnavailableError(
          sourceName,
          workerId,
          "timeout",
          `${sourceName} did not answer within ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      source.query(locator, workerId, { signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Create a Collector over a fixed set of named sources. */
export function createCollector(deps: CollectorDeps): Collector {
  const { sources, timeoutMs } = deps;
  const logger = deps.logger ?? createNullLogger();

  async function collect(
    sourceName: SourceName,
    locator: string,
    workerId: WorkerId,
  ): Promise<Date | null> {
    const source = sources.get(sourceName);
    if (!source) {
      logger.appendLine(`no source named "${sourceName}"`, "warn", "collector", workerId);
      return null;
    }

    let result: Date | null;
    try {
      result = await queryWithTimeout(source, sourceName, locator, workerId, timeoutMs);
    } catch (err) {
      const unavailable =
        err instanceof SourceUnavailableError
          ? err
          : new SourceUnavailableError(sourceName, workerId, "error", describeError(err), {
              cause: err,
            });
      logger.appendLine(
        `source ${sourceName} unavailable (${unavailable.reason}): ${unavailable.message}`,
        "warn",
        "collector",
        workerId,
        { source: sourceName, reason: unavailable.reason },
      );
      return null;
    }

    if (result === null) {
      logger.appendLine(`source ${sourceName} has no record`, "debug", "collector", workerId, {
        source: sourceName,
      });
      return null;
    }
    if (!isValidDate(result)) {
      logger.appendLine(
        `source ${sourceName} returned an invalid timestamp`,
        "warn",
        "collector",
        workerId,
        { source: sourceName, reason: "error" },
      );
      return null;
    }
    return result;
  }

  return {
    collect,

    async collectWorker(entry: WorkerEntry): Promise<SignalMap> {
      const sourceNames = Object.keys(entry.locators);
      const signals: SignalMap = {};

      if (entry.error) {
        for (const name of sourceNames) signals[name] = null;
        return signals;
      }

      const results = await Promise.all(
        sourceNames.map((name) => collect(name, entry.locators[name], entry.id)),
      );
      sourceNames.forEach((name, i) => {
        signals[name] = results[i] ?? null;
      });
      return signals;
    },
  };
}
