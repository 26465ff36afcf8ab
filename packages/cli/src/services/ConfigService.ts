/**
 * Process-wide config cache for the CLI commands.
 *
 * The config file is located once (explicit path, then PULSEWATCH_CONFIG,
 * then the standard search locations) and parsed at most once per location.
 */

import { loadConfig, findConfigFile, type PulsewatchConfig } from "@pulsewatch/core";

interface ConfigCache {
  /** Resolved file, or null when no config file exists. */
  path: string | null;
  /** Set once the file at `path` has been loaded. */
  config?: PulsewatchConfig;
}

let cache: ConfigCache | null = null;

function locateConfig(explicitPath?: string): string | null {
  return explicitPath || process.env["PULSEWATCH_CONFIG"] || findConfigFile();
}

/**
 * The loaded config. An explicit path always loads that file and replaces
 * the cache; otherwise the cached config is returned when there is one.
 */
export function getConfig(explicitPath?: string): PulsewatchConfig {
  if (!explicitPath && cache?.config) return cache.config;

  const path = explicitPath ? explicitPath : (cache?.path ?? locateConfig());
  const config = loadConfig(path ?? undefined);
  cache = { path: config.configPath ?? path, config };
  return config;
}

/** Where the config lives, without loading it. null when there is no config file. */
export function getConfigPath(): string | null {
  if (!cache) cache = { path: locateConfig() };
  return cache.path;
}

/** Forget the cached config and path. */
export function reloadConfig(): void {
  cache = null;
}
