import { describe, it, expect, afterEach, beforeEach } from "vitest";
import path from "path";
import fs from "fs";
import os from "os";
import {
  applyEnvOverrides,
  ConfigValidationError,
  deepFreeze,
  loadConfig,
  mergeConfig,
  validateConfig
} from "../src/config/loader";
import { DEFAULT_CONFIG } from "../src/config/defaults";
import { ConfigurationManager, createConfigManager } from "../src/config/manager";
import { EnvValidationError } from "../src/env/validator";

const defaultConfigPath = path.resolve(__dirname, "../../../config/joulegate.default.json");
const exampleConfigPath = path.resolve(__dirname, "../../../config/joulegate.example.json");
const schemaPath = path.resolve(__dirname, "../../../config/schema/joulegate.schema.json");

describe("config loader", () => {
  it("accepts the built-in defaults", () => {
    const result = validateConfig(DEFAULT_CONFIG, schemaPath);
    expect(result.valid).toBe(true);
    expect(result.errors).toBeUndefined();
  });

  it("returns errors for invalid config", () => {
    const result = validateConfig({ invalid: "config" }, schemaPath);
    expect(result.valid).toBe(false);
    expect(result.errors?.length).toBeGreaterThan(0);
  });

  it("ships a default config file with no tasks", () => {
    const cfg = loadConfig({ filePath: defaultConfigPath, env: {} });
    expect(cfg.ledger.path).toBe("var/receipts.db");
    expect(cfg.merge.candidatesDir).toBe("var/adapters/candidates");
    expect(cfg.tasks).toEqual([]);
  });

  it("layers the example config file over the defaults", () => {
    const cfg = loadConfig({ filePath: exampleConfigPath, env: {} });
    expect(cfg.ledger.path).toBe("var/receipts.db");
    expect(cfg.ledger.retry).toEqual(DEFAULT_CONFIG.ledger.retry);
    expect(cfg.tasks.map(task => [task.name, task.minBudgetJoules, task.estimatedCostJoules])).toEqual([
      ["lora_delta", 120, 80],
      ["index_refresh", 20, 20]
    ]);
    expect(cfg.energy.cpuTdpW).toBe(65);
  });

  it("applies env overrides after the file", () => {
    const cfg = loadConfig({
      env: {
        JOULE_SMOOTHING: "0.5",
        JOULE_CPU_TDP_W: "95",
        JOULE_IDLE_LEARN_W: "3",
        JOULE_AGENT_URL: "http://10.0.0.2:9000",
        JOULEGATE_LOG_LEVEL: "DEBUG"
      }
    });
    expect(cfg.energy.smoothingAlpha).toBe(0.5);
    expect(cfg.energy.cpuTdpW).toBe(95);
    expect(cfg.energy.idleLearnW).toBe(3);
    expect(cfg.scheduler.agentUrl).toBe("http://10.0.0.2:9000");
    expect(cfg.logging.level).toBe("debug");
  });

  it("maps an empty idle-learn threshold to null", () => {
    const cfg = loadConfig({ env: { JOULE_IDLE_LEARN_W: "none" } });
    expect(cfg.energy.idleLearnW).toBeNull();
  });

  it("rejects malformed numeric overrides", () => {
    expect(() => loadConfig({ env: { JOULE_HZ: "fast" } })).toThrowError(EnvValidationError);
  });

  it("rejects a smoothing factor outside (0, 1]", () => {
    expect(() => loadConfig({ env: { JOULE_SMOOTHING: "0" } })).toThrowError(ConfigValidationError);
    expect(() => loadConfig({ env: { JOULE_SMOOTHING: "1.5" } })).toThrowError(ConfigValidationError);
  });

  it("freezes the loaded config", () => {
    const cfg = loadConfig({ env: {} });
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.energy.gpu)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(false);
  });
});

describe("mergeConfig", () => {
  it("merges objects and replaces arrays", () => {
    const merged = mergeConfig({ a: { b: 1, c: 2 }, list: [1, 2] }, { a: { c: 3 }, list: [9] });
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9] });
  });

  it("lets null override a value", () => {
    expect(mergeConfig({ a: 5 }, { a: null })).toEqual({ a: null });
  });

  it("applyEnvOverrides nests values by path", () => {
    expect(applyEnvOverrides({ merge: { deltaThreshold: 0.002, keepVersions: 3 } }, { JOULE_DELTA_THRESHOLD: "0.01" })).toEqual({
      merge: { deltaThreshold: 0.01, keepVersions: 3 }
    });
  });

  it("deepFreeze freezes nested arrays", () => {
    const value = deepFreeze({ list: [{ x: 1 }] });
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});

describe("ConfigurationManager", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("loads once and refuses a second load", () => {
    const manager = new ConfigurationManager();
    manager.load({ filePath: defaultConfigPath, env: {} });
    expect(manager.isLoaded()).toBe(true);
    expect(manager.getSource()).toBe(defaultConfigPath);
    expect(() => manager.load({ env: {} })).toThrow("Config already loaded");
  });

  it("throws when read before load", () => {
    const manager = new ConfigurationManager();
    expect(() => manager.getConfig()).toThrow("Config not loaded");
  });

  it("reads sections and dotted paths", () => {
    const manager = createConfigManager({ env: {} });
    expect(manager.get("agent")).toEqual({ host: "127.0.0.1", port: 8787 });
    expect(manager.getValue("merge.deltaThreshold")).toBe(0.002);
    expect(() => manager.getValue("merge.missing")).toThrow("Invalid path");
  });

  it("reports schema errors with the file name", async () => {
    const badPath = path.join(tempDir, "bad.json");
    await fs.promises.writeFile(badPath, JSON.stringify({ agent: { port: "eighty" } }), "utf-8");
    const manager = new ConfigurationManager();
    expect(() => manager.load({ filePath: badPath, env: {} })).toThrow(`Config validation failed for ${badPath}`);
    expect(manager.isLoaded()).toBe(false);
  });
});
