import { createPluginRegistry, type PluginRegistry } from "@pulsewatch/core";
import jsonlLogSource from "@pulsewatch/plugin-source-jsonl-log";
import fileMtimeSource from "@pulsewatch/plugin-source-file-mtime";
import gitCommitSource from "@pulsewatch/plugin-source-git-commit";
import webhookSink from "@pulsewatch/plugin-sink-webhook";

/**
 * Registry holding every plugin bundled with the CLI.
 * Direct import: no dynamic loading needed since the CLI depends on all of them.
 * The "log" sink is added by createPulsewatch() once a logger exists.
 */
export function createBundledPlugins(): PluginRegistry {
  const plugins = createPluginRegistry();
  plugins.registerSource(jsonlLogSource);
  plugins.registerSource(fileMtimeSource);
  plugins.registerSource(gitCommitSource);
  plugins.registerSink(webhookSink);
  return plugins;
}
