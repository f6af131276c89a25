import { performance } from "node:perf_hooks";
import {
  LogLevel,
  describeError,
  noopLogger,
  type ComponentLogger,
  type EnergySample,
  type PowerReadings
} from "@joulegate/shared";
import type { BudgetService } from "./budgetService";
import type { PowerReader } from "./readers";

const MIN_SAMPLE_HZ = 0.1;

export interface PowerSamplerOptions {
  readers: PowerReader[];
  service: BudgetService;
  sampleHz: number;
  /** Monotonic milliseconds. */
  monotonicNow?: () => number;
  logger?: ComponentLogger;
}

export class PowerSampler {
  private readonly periodMs: number;
  private readonly monotonicNow: () => number;
  private readonly logger: ComponentLogger;
  private lastTickAt: number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<unknown> | null = null;
  private running = false;
  /** Bumped on every start and stop; a tick only reschedules its own run. */
  private generation = 0;
  private ticks = 0;

  constructor(private readonly options: PowerSamplerOptions) {
    this.periodMs = 1000 / Math.max(MIN_SAMPLE_HZ, options.sampleHz);
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
    this.logger = options.logger ?? noopLogger;
    this.lastTickAt = this.monotonicNow();
  }

  getPeriodMs(): number {
    return this.periodMs;
  }

  getTickCount(): number {
    return this.ticks;
  }

  /**
   * Reads every device, then credits `net × elapsed` where elapsed is the
   * measured time since the previous tick, not the nominal period.
   */
  async tick(): Promise<EnergySample> {
    const readings = await this.readAll();
    const now = this.monotonicNow();
    const elapsedSec = Math.max(0, now - this.lastTickAt) / 1000;
    this.lastTickAt = now;
    this.ticks += 1;
    const sample = this.options.service.recordTick(readings, elapsedSec);
    this.logger.log(LogLevel.DEBUG, "tick", {
      elapsedSec,
      cpuW: readings.cpuW,
      gpuW: readings.gpuW,
      netPowerW: sample.netPowerW,
      bucketJoules: sample.bucketJoules
    });
    return sample;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation += 1;
    this.lastTickAt = this.monotonicNow();
    this.schedule(this.periodMs, this.generation);
    this.logger.log(LogLevel.INFO, "sampler_started", { periodMs: this.periodMs });
  }

  async stop(): Promise<void> {
    this.running = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.log(LogLevel.INFO, "sampler_stopped", { ticks: this.ticks });
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      const startedAt = this.monotonicNow();
      const current: Promise<unknown> = this.tick()
        .catch(error => {
          this.logger.log(LogLevel.ERROR, "tick_failed", { error: describeError(error) });
        })
        .finally(() => {
          if (this.inFlight === current) {
            this.inFlight = null;
          }
          if (this.running && generation === this.generation) {
            const spent = this.monotonicNow() - startedAt;
            this.schedule(Math.max(0, this.periodMs - spent), generation);
          }
        });
      this.inFlight = current;
    }, delayMs);
  }

  private async readAll(): Promise<PowerReadings> {
    const readings: PowerReadings = { cpuW: null, gpuW: null };
    const values = await Promise.all(this.options.readers.map(reader => this.readSafely(reader)));
    this.options.readers.forEach((reader, index) => {
      const value = values[index];
      if (reader.device === "cpu") {
        readings.cpuW = value;
      } else {
        readings.gpuW = value;
      }
    });
    return readings;
  }

  private async readSafely(reader: PowerReader): Promise<number | null> {
    try {
      return await reader.read();
    } catch (error) {
      this.logger.log(LogLevel.WARN, "reader_failed", { device: reader.device, error: describeError(error) }, {
        dedupParts: ["reader_failed", reader.device]
      });
      return null;
    }
  }
}
