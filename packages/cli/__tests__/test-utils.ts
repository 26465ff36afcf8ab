import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type { MockInstance } from "vitest";

// eslint-disable-next-line no-control-regex
const ANSI_RE = /\u001b\[[0-9;]*m/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_RE, "");
}

/** Every console.log call, joined and stripped of colors. */
export function loggedLines(spy: MockInstance): string[] {
  return spy.mock.calls.map((args) => stripAnsi(args.map(String).join(" ")));
}

/**
 * Write a pulsewatch.yaml whose data directory lives under `dir`.
 * `workersYaml` is the indented body of the `workers:` mapping.
 */
export function writeConfig(dir: string, workersYaml = "  {}", extraYaml = ""): string {
  const configPath = join(dir, "pulsewatch.yaml");
  const body = workersYaml.trim() === "{}" ? "workers: {}" : `workers:\n${workersYaml}`;
  writeFileSync(configPath, `dataDir: ${join(dir, "data")}\n${body}\n${extraYaml}`);
  return configPath;
}
