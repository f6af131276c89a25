import { appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import {
  LogLevel,
  abortableSleep,
  describeError,
  noopLogger,
  type ComponentLogger,
  type EnergySample,
  type Sleep
} from "@joulegate/shared";
import { CSV_HEADER, RateMeter, formatRateLine, toCsvRow, type RateReading } from "./rateMeter";

export interface SampleSource {
  readSample(): Promise<EnergySample>;
}

export interface WatchOptions {
  source: SampleSource;
  intervalMs: number;
  windowSize: number;
  /** 0 runs until the signal aborts. */
  durationSec: number;
  targets: number[];
  csvPath?: string;
  write: (line: string) => void;
  signal: AbortSignal;
  logger?: ComponentLogger;
  sleep?: Sleep;
  monotonicNow?: () => number;
}

async function ensureCsvHeader(csvPath: string): Promise<void> {
  await mkdir(path.dirname(csvPath), { recursive: true });
  const size = await stat(csvPath).then(
    info => info.size,
    (error: unknown) => {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return 0;
      }
      throw error;
    }
  );
  if (size === 0) {
    await appendFile(csvPath, `${CSV_HEADER}\n`, "utf-8");
  }
}

/**
 * Polls the agent at a fixed interval and reports the bucket's
 * accumulation rate. Failed polls are logged and skipped.
 */
export async function runWatch(options: WatchOptions): Promise<RateReading[]> {
  const logger = options.logger ?? noopLogger;
  const sleep = options.sleep ?? abortableSleep;
  const monotonicNow = options.monotonicNow ?? (() => performance.now());
  const meter = new RateMeter(options.windowSize, options.targets);
  const readings: RateReading[] = [];

  if (options.csvPath) {
    await ensureCsvHeader(options.csvPath);
  }

  const startedAt = monotonicNow();
  while (!options.signal.aborted) {
    const loopStart = monotonicNow();
    try {
      const sample = await options.source.readSample();
      const reading = meter.record(sample);
      readings.push(reading);
      options.write(formatRateLine(reading));
      if (options.csvPath) {
        const elapsedSec = (monotonicNow() - startedAt) / 1000;
        await appendFile(options.csvPath, `${toCsvRow(reading, elapsedSec)}\n`, "utf-8");
      }
    } catch (error) {
      logger.log(LogLevel.WARN, "watch_sample_failed", { error: describeError(error) });
    }

    if (options.durationSec > 0 && (monotonicNow() - startedAt) / 1000 >= options.durationSec) {
      break;
    }
    const spent = monotonicNow() - loopStart;
    await sleep(Math.max(0, options.intervalMs - spent), options.signal);
  }
  return readings;
}
