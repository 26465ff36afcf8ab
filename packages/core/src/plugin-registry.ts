/**
 * Plugin registry: named factories for signal sources and action sinks.
 *
 * Core never imports concrete plugins (plugins depend on core, not the other
 * way round). Callers register the modules they ship with, then instantiate
 * them by the plugin name referenced in config.
 */

import type {
  ActionSink,
  PluginManifest,
  PluginModule,
  PluginRegistry,
  PluginSlot,
  SignalSource,
} from "./types.js";

function assertSlot(module: { manifest: PluginManifest }, slot: PluginSlot): void {
  if (module.manifest.slot !== slot) {
    throw new Error(
      `Plugin "${module.manifest.name}" has slot "${module.manifest.slot}", expected "${slot}"`,
    );
  }
}

function unknownPlugin(slot: PluginSlot, plugin: string, known: Iterable<string>): Error {
  const available = [...known].sort().join(", ") || "(none)";
  return new Error(`Unknown ${slot} plugin: ${plugin}. Available: ${available}`);
}

/** Create an empty PluginRegistry. */
export function createPluginRegistry(): PluginRegistry {
  const sources = new Map<string, PluginModule<SignalSource>>();
  const sinks = new Map<string, PluginModule<ActionSink>>();

  return {
    registerSource(module: PluginModule<SignalSource>): void {
      assertSlot(module, "source");
      sources.set(module.manifest.name, module);
    },

    registerSink(module: PluginModule<ActionSink>): void {
      assertSlot(module, "sink");
      sinks.set(module.manifest.name, module);
    },

    createSource(plugin: string, config?: Record<string, unknown>): SignalSource {
      const module = sources.get(plugin);
      if (!module) throw unknownPlugin("source", plugin, sources.keys());
      return module.create(config);
    },

    createSink(plugin: string, config?: Record<string, unknown>): ActionSink {
      const module = sinks.get(plugin);
      if (!module) throw unknownPlugin("sink", plugin, sinks.keys());
      return module.create(config);
    },

    list(slot: PluginSlot): PluginManifest[] {
      const modules = slot === "source" ? [...sources.values()] : [...sinks.values()];
      return modules.map((m) => m.manifest);
    },
  };
}
