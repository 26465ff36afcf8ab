/**
 * Error taxonomy. Only ConfigError is fatal; everything else is caught at a
 * worker or source seam and degraded.
 */

import type { SourceName, WorkerId } from "./types.js";

/** Config or registry could not be loaded at all. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A signal source could not be reached, failed, or timed out. */
export class SourceUnavailableError extends Error {
  constructor(
    public readonly source: SourceName,
    public readonly workerId: WorkerId,
    public readonly reason: "error" | "timeout",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SourceUnavailableError";
  }
}

/** One worker's registry entry is malformed; other workers are unaffected. */
export class PartialRegistryError extends Error {
  constructor(
    public readonly workerId: WorkerId,
    message: string,
  ) {
    super(message);
    this.name = "PartialRegistryError";
  }
}

/** The atomic write/swap of a persisted artifact failed. */
export class PersistenceError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/** The action sink rejected or failed to deliver an action. */
export class EnforcementActionError extends Error {
  constructor(
    public readonly workerId: WorkerId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EnforcementActionError";
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
