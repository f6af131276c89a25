import { LogLevel } from "../observability";
import type { JouleGateConfig } from "./types";

export const DEFAULT_CONFIG: JouleGateConfig = {
  energy: {
    cpuTdpW: 65,
    smoothingAlpha: 0.2,
    sampleHz: 1,
    idleSeedCpuW: 15,
    idleSeedGpuW: 20,
    idleLearnW: null,
    readTimeoutMs: 800,
    gpu: {
      enabled: true,
      command: "nvidia-smi",
      deviceIndex: 0
    }
  },
  agent: {
    host: "127.0.0.1",
    port: 8787
  },
  scheduler: {
    agentUrl: "http://127.0.0.1:8787",
    transportTimeoutMs: 500,
    idleBackoff: { kind: "fixed", delayMs: 300 },
    admissionBackoff: { kind: "fixed", delayMs: 200 },
    errorBackoffMs: 500
  },
  merge: {
    deltaThreshold: 0.002,
    secondaryThreshold: 0.01,
    baseDir: "adapters/base",
    candidatesDir: "adapters/candidates",
    keepVersions: 3
  },
  ledger: {
    path: "receipts.db",
    retry: { kind: "exponential", initialDelayMs: 100, maxDelayMs: 5000, factor: 2 },
    maxAttempts: 0
  },
  tasks: [],
  logging: {
    level: LogLevel.INFO,
    console: { enabled: true },
    file: {
      enabled: false,
      outputDir: "logs",
      maxFileSizeMb: 10,
      maxFiles: 5
    }
  }
};
