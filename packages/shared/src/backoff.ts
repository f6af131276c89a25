import { setTimeout as delay } from "node:timers/promises";

export type BackoffConfig =
  | { kind: "fixed"; delayMs: number }
  | { kind: "exponential"; initialDelayMs: number; maxDelayMs: number; factor?: number };

/**
 * Delay policy for retry loops. `attempt` is 1-based: the delay before the
 * first retry is `delayFor(1)`.
 */
export interface BackoffPolicy {
  readonly kind: BackoffConfig["kind"];
  delayFor(attempt: number): number;
}

export class FixedBackoff implements BackoffPolicy {
  readonly kind = "fixed";

  constructor(private readonly delayMs: number) {}

  delayFor(): number {
    return Math.max(0, this.delayMs);
  }
}

export class CappedExponentialBackoff implements BackoffPolicy {
  readonly kind = "exponential";
  private readonly factor: number;

  constructor(
    private readonly initialDelayMs: number,
    private readonly maxDelayMs: number,
    factor = 2
  ) {
    this.factor = Math.max(1, factor);
  }

  delayFor(attempt: number): number {
    const exponent = Math.max(0, Math.floor(attempt) - 1);
    const raw = this.initialDelayMs * Math.pow(this.factor, exponent);
    return Math.max(0, Math.min(this.maxDelayMs, raw));
  }
}

export function createBackoff(config: BackoffConfig): BackoffPolicy {
  switch (config.kind) {
    case "fixed":
      return new FixedBackoff(config.delayMs);
    case "exponential":
      return new CappedExponentialBackoff(config.initialDelayMs, config.maxDelayMs, config.factor);
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early, without throwing, once `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) {
      throw error;
    }
  }
};
