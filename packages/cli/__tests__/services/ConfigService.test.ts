import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync, rmSync, realpathSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";

import { getConfig, getConfigPath, reloadConfig } from "../../src/services/ConfigService.js";

describe("ConfigService", () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(testDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  beforeEach(() => {
    testDir = join(tmpdir(), `pw-config-service-test-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
    originalEnv = { ...process.env };
    reloadConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    reloadConfig();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("getConfig", () => {
    it("loads thresholds from an explicit path", () => {
      const configPath = writeConfig("pulsewatch.yaml", "thresholds:\n  active: 2m\nworkers: {}\n");
      expect(getConfig(configPath).thresholds.activeMs).toBe(120_000);
    });

    it("returns the cached config when no path is given", () => {
      const configPath = writeConfig("pulsewatch.yaml", "workers: {}\n");
      const loaded = getConfig(configPath);
      expect(getConfig()).toBe(loaded);
    });

    it("replaces the cache when given another explicit path", () => {
      const first = writeConfig("first.yaml", "persistFailureAlarm: 2\nworkers: {}\n");
      const second = writeConfig("second.yaml", "persistFailureAlarm: 5\nworkers: {}\n");

      getConfig(first);
      expect(getConfig(second).persistFailureAlarm).toBe(5);
      expect(getConfig().persistFailureAlarm).toBe(5);
      expect(getConfigPath()).toBe(realpathSync(second));
    });

    it("reads PULSEWATCH_CONFIG when no path is given", () => {
      process.env["PULSEWATCH_CONFIG"] = writeConfig("env.yaml", "sourceTimeout: 3s\nworkers: {}\n");
      expect(getConfig().sourceTimeoutMs).toBe(3_000);
    });

    it("throws for an explicit path that does not exist", () => {
      expect(() => getConfig(join(testDir, "missing.yaml"))).toThrow("Config file not found");
    });
  });

  describe("getConfigPath", () => {
    it("reports the real path of the loaded file", () => {
      const configPath = writeConfig("pulsewatch.yaml", "workers: {}\n");
      getConfig(configPath);
      expect(getConfigPath()).toBe(realpathSync(configPath));
    });

    it("locates the file through PULSEWATCH_CONFIG without loading it", () => {
      // Not valid config: locating must not parse it
      const configPath = writeConfig("env.yaml", "workers: [\n");
      process.env["PULSEWATCH_CONFIG"] = configPath;

      expect(getConfigPath()).toBe(configPath);
    });
  });

  describe("reloadConfig", () => {
    it("makes the next call read the file again", () => {
      const configPath = writeConfig("pulsewatch.yaml", "persistFailureAlarm: 2\nworkers: {}\n");
      expect(getConfig(configPath).persistFailureAlarm).toBe(2);

      writeFileSync(configPath, "persistFailureAlarm: 7\nworkers: {}\n");
      expect(getConfig().persistFailureAlarm).toBe(2);

      reloadConfig();
      expect(getConfig(configPath).persistFailureAlarm).toBe(7);
    });
  });
});
