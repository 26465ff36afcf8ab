import { describe, it, expect, vi } from "vitest";
import { createPluginRegistry } from "../plugin-registry.js";
import type { ActionSink, PluginModule, SignalSource } from "../types.js";

function makeSource(name: string): PluginModule<SignalSource> {
  return {
    manifest: { name, slot: "source", description: `source ${name}`, version: "0.0.1" },
    create: vi.fn((config?: Record<string, unknown>) => ({
      name,
      query: async () => {
        const at = config?.["at"];
        return at instanceof Date ? at : null;
      },
    })),
  };
}

function makeSink(name: string): PluginModule<ActionSink> {
  return {
    manifest: { name, slot: "sink", description: `sink ${name}`, version: "0.0.1" },
    create: () => ({ name, emit: async () => {} }),
  };
}

describe("createPluginRegistry", () => {
  it("creates a registered source with its options", async () => {
    const registry = createPluginRegistry();
    const module = makeSource("fake");
    registry.registerSource(module);

    const at = new Date("2025-06-15T12:00:00.000Z");
    const source = registry.createSource("fake", { at });

    expect(module.create).toHaveBeenCalledWith({ at });
    expect(source.name).toBe("fake");
    await expect(
      source.query("/x", "W1", { signal: new AbortController().signal }),
    ).resolves.toEqual(at);
  });

  it("creates a registered sink", () => {
    const registry = createPluginRegistry();
    registry.registerSink(makeSink("bus"));
    expect(registry.createSink("bus").name).toBe("bus");
  });

  it("throws for unknown plugins and lists what is available", () => {
    const registry = createPluginRegistry();
    registry.registerSource(makeSource("b"));
    registry.registerSource(makeSource("a"));

    expect(() => registry.createSource("missing")).toThrow(
      "Unknown source plugin: missing. Available: a, b",
    );
    expect(() => registry.createSink("missing")).toThrow(
      "Unknown sink plugin: missing. Available: (none)",
    );
  });

  it("rejects a module registered under the wrong slot", () => {
    const registry = createPluginRegistry();
    const wrong: PluginModule<SignalSource> = {
      manifest: { name: "confused", slot: "sink", description: "", version: "0.0.1" },
      create: () => ({ name: "confused", query: async () => null }),
    };
    expect(() => registry.registerSource(wrong)).toThrow(
      'Plugin "confused" has slot "sink", expected "source"',
    );
  });

  it("lists manifests per slot", () => {
    const registry = createPluginRegistry();
    registry.registerSource(makeSource("jsonl-log"));
    registry.registerSink(makeSink("webhook"));

    expect(registry.list("source").map((m) => m.name)).toEqual(["jsonl-log"]);
    expect(registry.list("sink").map((m) => m.name)).toEqual(["webhook"]);
  });

  it("replaces a module registered twice under the same name", () => {
    const registry = createPluginRegistry();
    registry.registerSink(makeSink("bus"));
    registry.registerSink(makeSink("bus"));
    expect(registry.list("sink")).toHaveLength(1);
  });
});
