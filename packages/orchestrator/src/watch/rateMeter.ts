import type { EnergySample } from "@joulegate/shared";

const MIN_RATE = 1e-12;

export type RatePoint = Pick<EnergySample, "timestamp" | "bucketJoules" | "cpuPowerW" | "gpuPowerW">;

export interface TargetEta {
  targetJoules: number;
  /** Seconds until the bucket reaches the target; negative once passed, null while the bucket is not growing. */
  etaSec: number | null;
}

export interface RateReading {
  timestamp: number;
  bucketJoules: number;
  deltaJoules: number;
  /** Moving average over the window, J/s. */
  rateJps: number;
  cpuPowerW: number;
  gpuPowerW: number;
  etas: TargetEta[];
  /** Progress toward the first target, in [0, 1]. */
  progress: number;
}

/**
 * Accumulation rate of the bucket over the last `windowSize` samples.
 * Debits show up as negative deltas and pull the average down.
 */
export class RateMeter {
  private readonly window: Array<{ delta: number; dt: number }> = [];
  private previous: RatePoint | null = null;

  constructor(
    private readonly windowSize: number,
    private readonly targets: readonly number[]
  ) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }
    if (targets.length === 0) {
      throw new RangeError("at least one target is required");
    }
  }

  record(point: RatePoint): RateReading {
    const previous = this.previous;
    const delta = previous ? point.bucketJoules - previous.bucketJoules : 0;
    const dt = previous ? Math.max(0, point.timestamp - previous.timestamp) : 0;
    this.previous = point;

    this.window.push({ delta, dt });
    if (this.window.length > this.windowSize) {
      this.window.shift();
    }
    const totalDelta = this.window.reduce((sum, entry) => sum + entry.delta, 0);
    const totalDt = this.window.reduce((sum, entry) => sum + entry.dt, 0);
    const rateJps = totalDt > 0 ? totalDelta / totalDt : 0;

    const etas = this.targets.map(targetJoules => ({
      targetJoules,
      etaSec: rateJps <= MIN_RATE ? null : (targetJoules - point.bucketJoules) / rateJps
    }));
    const first = this.targets[0] ?? 0;
    const progress = first > 0 ? Math.min(1, Math.max(0, point.bucketJoules / first)) : 1;

    return {
      timestamp: point.timestamp,
      bucketJoules: point.bucketJoules,
      deltaJoules: delta,
      rateJps,
      cpuPowerW: point.cpuPowerW,
      gpuPowerW: point.gpuPowerW,
      etas,
      progress
    };
  }
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null || Number.isNaN(seconds)) {
    return "n/a";
  }
  if (seconds < 0) {
    return "reached";
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = (seconds % 60).toFixed(1);
  if (hours) {
    return `${hours}h ${minutes}m ${rest}s`;
  }
  if (minutes) {
    return `${minutes}m ${rest}s`;
  }
  return `${rest}s`;
}

export function renderBar(progress: number, width = 40): string {
  const clamped = Math.min(1, Math.max(0, progress));
  const filled = Math.round(clamped * width);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}]`;
}

export function formatRateLine(reading: RateReading, barWidth = 40): string {
  const etas = reading.etas.map(eta => `ETA${eta.targetJoules}: ${formatDuration(eta.etaSec)}`).join(" | ");
  return (
    `Bucket: ${reading.bucketJoules.toFixed(4)} J | avg: ${reading.rateJps.toFixed(6)} J/s | ` +
    `${renderBar(reading.progress, barWidth)} | ${etas} ` +
    `(cpu:${reading.cpuPowerW.toFixed(3)}W gpu:${reading.gpuPowerW.toFixed(3)}W)`
  );
}

export const CSV_HEADER = "ts_iso,elapsed_s,bucket_j,delta_j,avg_j_s,cpu_w,gpu_w";

export function toCsvRow(reading: RateReading, elapsedSec: number): string {
  return [
    new Date(reading.timestamp * 1000).toISOString(),
    elapsedSec.toFixed(1),
    reading.bucketJoules.toFixed(8),
    reading.deltaJoules.toFixed(8),
    reading.rateJps.toFixed(8),
    reading.cpuPowerW.toFixed(3),
    reading.gpuPowerW.toFixed(3)
  ].join(",");
}
