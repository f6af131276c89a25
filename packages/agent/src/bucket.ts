import {
  computeNetPower,
  nowEpochSeconds,
  sampleIntegrityHash,
  type EnergySample,
  type PowerReadings,
  type TakeResult
} from "@joulegate/shared";

export interface JouleBucketOptions {
  smoothingAlpha: number;
  idleSeedCpuW: number;
  idleSeedGpuW: number;
  /** Learn baselines only while pre-update net power is below this; `null` always learns. */
  idleLearnW?: number | null;
  initialJoules?: number;
  /** Epoch seconds. */
  now?: () => number;
}

function usable(reading: number | null): reading is number {
  return reading !== null && Number.isFinite(reading) && reading >= 0;
}

/**
 * The energy credit and the idle baselines it is computed from.
 *
 * Every method runs to completion without yielding, so each call is a
 * single critical section: credits, debits and snapshots never interleave.
 */
export class JouleBucket {
  private joules: number;
  private idleCpuW: number;
  private idleGpuW: number;
  private cpuPowerW = 0;
  private gpuPowerW = 0;
  private netPowerW = 0;
  private readonly alpha: number;
  private readonly idleLearnW: number | null;
  private readonly now: () => number;

  constructor(options: JouleBucketOptions) {
    if (!(options.smoothingAlpha > 0 && options.smoothingAlpha <= 1)) {
      throw new RangeError(`smoothingAlpha must be in (0, 1], got ${options.smoothingAlpha}`);
    }
    this.alpha = options.smoothingAlpha;
    this.idleCpuW = options.idleSeedCpuW;
    this.idleGpuW = options.idleSeedGpuW;
    this.idleLearnW = options.idleLearnW ?? null;
    this.joules = Math.max(0, options.initialJoules ?? 0);
    this.now = options.now ?? nowEpochSeconds;
  }

  /**
   * Folds one tick of readings into the baselines and credits
   * `net × elapsedSec` Joules. Unavailable devices count as 0 W and keep
   * their baseline.
   */
  credit(readings: PowerReadings, elapsedSec: number): EnergySample {
    const cpuReading = usable(readings.cpuW) ? readings.cpuW : null;
    const gpuReading = usable(readings.gpuW) ? readings.gpuW : null;
    const cpuW = cpuReading ?? 0;
    const gpuW = gpuReading ?? 0;

    const learn =
      this.idleLearnW === null || computeNetPower(cpuW, this.idleCpuW, gpuW, this.idleGpuW) < this.idleLearnW;
    if (learn && cpuReading !== null) {
      this.idleCpuW = this.alpha * cpuReading + (1 - this.alpha) * this.idleCpuW;
    }
    if (learn && gpuReading !== null) {
      this.idleGpuW = this.alpha * gpuReading + (1 - this.alpha) * this.idleGpuW;
    }

    this.cpuPowerW = cpuW;
    this.gpuPowerW = gpuW;
    this.netPowerW = computeNetPower(cpuW, this.idleCpuW, gpuW, this.idleGpuW);
    if (Number.isFinite(elapsedSec) && elapsedSec > 0) {
      this.joules += this.netPowerW * elapsedSec;
    }
    return this.snapshot();
  }

  /** Check-and-subtract. Invalid amounts fail with the bucket unchanged. */
  take(amount: number): TakeResult {
    if (!Number.isFinite(amount) || amount < 0 || this.joules < amount) {
      return { ok: false, remainingJoules: this.joules };
    }
    this.joules -= amount;
    return { ok: true, remainingJoules: this.joules };
  }

  snapshot(): EnergySample {
    const timestamp = this.now();
    return {
      timestamp,
      cpuPowerW: this.cpuPowerW,
      gpuPowerW: this.gpuPowerW,
      idleCpuW: this.idleCpuW,
      idleGpuW: this.idleGpuW,
      netPowerW: this.netPowerW,
      bucketJoules: this.joules,
      integrityHash: sampleIntegrityHash(timestamp, this.joules)
    };
  }
}
