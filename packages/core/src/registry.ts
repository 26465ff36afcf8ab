/**
 * Worker registry: which locator each source needs for each worker.
 *
 * Loaded once per process from config. Entries whose locators cannot be
 * queried are kept (every registered worker still gets a snapshot) but carry
 * a PartialRegistryError so the collector treats them as fully unknown.
 */

import { PartialRegistryError } from "./errors.js";
import type { Locator, SignalSource, SourceName, WorkerId } from "./types.js";

export interface WorkerEntry {
  id: WorkerId;
  locators: Readonly<Record<SourceName, Locator>>;
  /** Set when the entry is malformed; the worker is collected as all-unknown. */
  error: PartialRegistryError | null;
}

export interface WorkerRegistry {
  /** Worker ids in registration order. */
  list(): WorkerId[];
  get(workerId: WorkerId): WorkerEntry | undefined;
  entries(): WorkerEntry[];
}

function validateEntry(
  workerId: WorkerId,
  locators: Record<SourceName, Locator>,
  sources: ReadonlyMap<SourceName, SignalSource>,
): PartialRegistryError | null {
  for (const [sourceName, locator] of Object.entries(locators)) {
    const source = sources.get(sourceName);
    if (!source) {
      return new PartialRegistryError(workerId, `unknown source "${sourceName}"`);
    }
    if (!locator.trim()) {
      return new PartialRegistryError(workerId, `empty locator for source "${sourceName}"`);
    }
    const problem = source.validateLocator?.(locator) ?? null;
    if (problem) {
      return new PartialRegistryError(
        workerId,
        `invalid locator for source "${sourceName}": ${problem}`,
      );
    }
  }
  return null;
}

/** Build the registry, validating every locator against its source. */
export function createWorkerRegistry(
  workers: Record<WorkerId, Record<SourceName, Locator>>,
  sources: ReadonlyMap<SourceName, SignalSource>,
): WorkerRegistry {
  const byId = new Map<WorkerId, WorkerEntry>();
  for (const [id, locators] of Object.entries(workers)) {
    byId.set(id, {
      id,
      locators: Object.freeze({ ...locators }),
      error: validateEntry(id, locators, sources),
    });
  }

  return {
    list: () => [...byId.keys()],
    get: (workerId) => byId.get(workerId),
    entries: () => [...byId.values()],
  };
}
