import type { BackoffConfig } from "../backoff";
import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export interface GpuReaderConfig {
  enabled: boolean;
  command: string;
  deviceIndex: number;
}

export interface EnergyConfig {
  /** Used to convert CPU utilization into estimated watts. */
  cpuTdpW: number;
  /** EMA smoothing factor, in (0, 1]. */
  smoothingAlpha: number;
  sampleHz: number;
  idleSeedCpuW: number;
  idleSeedGpuW: number;
  /** Learn idle baselines only while net power stays under this value; `null` learns every tick. */
  idleLearnW: number | null;
  readTimeoutMs: number;
  gpu: GpuReaderConfig;
}

export interface AgentConfig {
  host: string;
  port: number;
}

export interface SchedulerConfig {
  agentUrl: string;
  transportTimeoutMs: number;
  idleBackoff: BackoffConfig;
  admissionBackoff: BackoffConfig;
  errorBackoffMs: number;
}

export interface MergeConfig {
  deltaThreshold: number;
  secondaryThreshold: number;
  baseDir: string;
  candidatesDir: string;
  keepVersions: number;
}

export interface LedgerConfig {
  path: string;
  retry: BackoffConfig;
  /** 0 retries a failed receipt write until it succeeds. */
  maxAttempts: number;
}

interface TaskConfigBase {
  name: string;
  minBudgetJoules: number;
  estimatedCostJoules: number;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandTaskConfig extends TaskConfigBase {
  kind: "command";
}

export interface MergeTaskConfig extends TaskConfigBase {
  kind: "merge";
}

export type TaskConfig = CommandTaskConfig | MergeTaskConfig;

export interface LoggingSinkConfig {
  enabled: boolean;
  level?: LogLevel;
}

export interface ConsoleLoggingSinkConfig extends LoggingSinkConfig {
  format?: "json" | "pretty";
}

export interface FileLoggingSinkConfig extends LoggingSinkConfig {
  outputDir: string;
  maxFileSizeMb: number;
  maxFiles: number;
}

export interface LoggingConfig {
  level: LogLevel;
  console: ConsoleLoggingSinkConfig;
  file: FileLoggingSinkConfig;
}

export interface JouleGateConfig {
  energy: EnergyConfig;
  agent: AgentConfig;
  scheduler: SchedulerConfig;
  merge: MergeConfig;
  ledger: LedgerConfig;
  tasks: TaskConfig[];
  logging: LoggingConfig;
}
