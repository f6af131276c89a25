import { loadConfig, type LoadConfigOptions } from "./loader";
import type { JouleGateConfig } from "./types";

/**
 * Holds the process configuration. Loaded once; the loaded value is frozen
 * and never reloaded.
 */
export class ConfigurationManager {
  private config: JouleGateConfig | null = null;
  private source: string | null = null;

  load(options: LoadConfigOptions = {}): JouleGateConfig {
    if (this.config) {
      throw new Error(`Config already loaded${this.source ? ` from ${this.source}` : ""}`);
    }
    this.config = loadConfig(options);
    this.source = options.filePath ?? null;
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  getConfig(): JouleGateConfig {
    if (!this.config) {
      throw new Error("Config not loaded");
    }
    return this.config;
  }

  get<K extends keyof JouleGateConfig>(section: K): JouleGateConfig[K] {
    return this.getConfig()[section];
  }

  /**
   * Value at a dot-separated path, e.g. "merge.deltaThreshold".
   */
  getValue(keyPath: string): unknown {
    let current: unknown = this.getConfig();
    for (const part of keyPath.split(".")) {
      if (typeof current !== "object" || current === null || !(part in current)) {
        throw new Error(`Invalid path: property '${part}' does not exist`);
      }
      current = Reflect.get(current, part);
    }
    return current;
  }

  getSource(): string | null {
    return this.source;
  }
}

export function createConfigManager(options: LoadConfigOptions = {}): ConfigurationManager {
  const manager = new ConfigurationManager();
  manager.load(options);
  return manager;
}
