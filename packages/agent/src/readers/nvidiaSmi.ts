import { execFile } from "node:child_process";
import { LogLevel, type ComponentLogger } from "@joulegate/shared";
import type { PowerReader } from "./types";

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

export interface NvidiaSmiPowerReaderOptions {
  command?: string;
  deviceIndex?: number;
  timeoutMs: number;
  run?: CommandRunner;
  logger?: ComponentLogger;
}

export const QUERY_ARGS = ["--query-gpu=power.draw", "--format=csv,noheader,nounits"];

export const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: timeoutMs, windowsHide: true }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * GPU board power from `nvidia-smi`. A missing binary disables the reader
 * for the rest of the process.
 */
export class NvidiaSmiPowerReader implements PowerReader {
  readonly device = "gpu";
  private disabled = false;
  private readonly run: CommandRunner;

  constructor(private readonly options: NvidiaSmiPowerReaderOptions) {
    this.run = options.run ?? runCommand;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  async read(): Promise<number | null> {
    if (this.disabled) {
      return null;
    }
    let output: string;
    try {
      output = await this.run(this.options.command ?? "nvidia-smi", QUERY_ARGS, this.options.timeoutMs);
    } catch (error) {
      if (isMissingBinary(error)) {
        this.disabled = true;
        this.options.logger?.log(LogLevel.WARN, "gpu_reader_disabled", {
          command: this.options.command ?? "nvidia-smi",
          reason: "binary not found"
        });
      }
      return null;
    }
    return parsePowerDraw(output, this.options.deviceIndex ?? 0);
  }
}

export function parsePowerDraw(output: string, deviceIndex: number): number | null {
  const lines = output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
  const line = lines[deviceIndex];
  if (line === undefined) {
    return null;
  }
  const watts = Number.parseFloat(line);
  return Number.isFinite(watts) && watts >= 0 ? watts : null;
}
