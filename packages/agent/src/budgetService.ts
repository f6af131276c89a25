import { LogLevel, noopLogger, type ComponentLogger, type EnergySample, type PowerReadings, type TakeResult } from "@joulegate/shared";
import { JouleBucket, type JouleBucketOptions } from "./bucket";

export interface BudgetServiceOptions extends JouleBucketOptions {
  logger?: ComponentLogger;
}

/**
 * Sole owner of the Joule bucket. `sample` and `take` are the boundary
 * operations; `recordTick` is the sampler's credit path.
 */
export class BudgetService {
  private readonly bucket: JouleBucket;
  private readonly logger: ComponentLogger;

  constructor(options: BudgetServiceOptions) {
    this.bucket = new JouleBucket(options);
    this.logger = options.logger ?? noopLogger;
  }

  sample(): EnergySample {
    return this.bucket.snapshot();
  }

  take(amount: number): TakeResult {
    const result = this.bucket.take(amount);
    this.logger.log(result.ok ? LogLevel.INFO : LogLevel.DEBUG, result.ok ? "take_granted" : "take_denied", {
      requestedJoules: amount,
      remainingJoules: result.remainingJoules
    });
    return result;
  }

  recordTick(readings: PowerReadings, elapsedSec: number): EnergySample {
    return this.bucket.credit(readings, elapsedSec);
  }
}
