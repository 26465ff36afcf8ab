import type { PluginModule, SignalSource } from "@pulsewatch/core";
import { execFile } from "node:child_process";
import { isAbsolute } from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export const manifest = {
  name: "git-commit",
  slot: "source" as const,
  description: "Signal source: committer time of the newest commit by a worker",
  version: "0.1.0",
};

export interface CommitLocator {
  repoPath: string;
  /** Author pattern passed to `git log --author`; null means any author. */
  author: string | null;
}

/** Parse `<repoPath>` or `<repoPath>#<author>`. */
export function parseCommitLocator(locator: string): CommitLocator {
  const hash = locator.lastIndexOf("#");
  if (hash === -1) return { repoPath: locator, author: null };
  const author = locator.slice(hash + 1).trim();
  return { repoPath: locator.slice(0, hash), author: author.length > 0 ? author : null };
}

export function create(config?: Record<string, unknown>): SignalSource {
  const allRefs = config?.["allRefs"] === true;
  const rawBranch = config?.["branch"];
  const branch = typeof rawBranch === "string" && rawBranch.length > 0 ? rawBranch : null;

  return {
    name: "git-commit",

    validateLocator(locator: string): string | null {
      const { repoPath } = parseCommitLocator(locator);
      return isAbsolute(repoPath) ? null : "repository path must be absolute";
    },

    async query(locator, _workerId, ctx): Promise<Date | null> {
      const { repoPath, author } = parseCommitLocator(locator);
      const args = ["-C", repoPath, "log", "-1", "--format=%ct"];
      if (author) args.push(`--author=${author}`);
      if (allRefs) args.push("--all");
      else if (branch) args.push(branch);

      const { stdout } = await execFileAsync("git", args, {
        signal: ctx.signal,
        timeout: 30_000,
      });

      const trimmed = stdout.trim();
      // No commits (by this author) yet
      if (!trimmed) return null;

      const seconds = Number.parseInt(trimmed, 10);
      if (!Number.isFinite(seconds)) {
        throw new Error(`unexpected git log output: ${trimmed.slice(0, 80)}`);
      }
      return new Date(seconds * 1000);
    },
  };
}

export default { manifest, create } satisfies PluginModule<SignalSource>;
