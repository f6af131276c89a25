import { fetch } from "undici";
import {
  LogLevel,
  describeError,
  fromSampleResponse,
  noopLogger,
  nowEpochSeconds,
  sampleIntegrityHash,
  type ComponentLogger,
  type EnergySample,
  type TakeRequest,
  type TakeResult
} from "@joulegate/shared";
import type { BudgetPort } from "./types";
import { isSampleResponse, isTakeResponse } from "./wireSchemas";

const DEFAULT_TIMEOUT_MS = 500;

export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
  }
}

export interface HttpBudgetClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  logger?: ComponentLogger;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export function zeroSample(timestamp: number): EnergySample {
  return {
    timestamp,
    cpuPowerW: 0,
    gpuPowerW: 0,
    idleCpuW: 0,
    idleGpuW: 0,
    netPowerW: 0,
    bucketJoules: 0,
    integrityHash: sampleIntegrityHash(timestamp, 0)
  };
}

/**
 * Budget port over the agent's HTTP boundary. Every failure, including a
 * sample whose hash does not match or whose timestamp goes backwards,
 * reads as "no energy now". Calls are never retried here.
 */
export class HttpBudgetClient implements BudgetPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: ComponentLogger;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private lastAcceptedTs = Number.NEGATIVE_INFINITY;

  constructor(options: HttpBudgetClientOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? nowEpochSeconds;
  }

  async sample(): Promise<EnergySample> {
    try {
      return await this.readSample();
    } catch (error) {
      this.reportFailure("sample", error);
      return zeroSample(this.now());
    }
  }

  /** Like `sample`, but rejects with a TransportError instead of failing closed. */
  async readSample(): Promise<EnergySample> {
    const body = await this.request("/v1/sample", { method: "GET" });
    if (!isSampleResponse(body)) {
      throw new TransportError("malformed sample response");
    }
    if (body.hash !== sampleIntegrityHash(body.ts, body.bucket_j)) {
      throw new TransportError("sample integrity hash mismatch");
    }
    if (body.ts < this.lastAcceptedTs) {
      throw new TransportError(`stale sample (ts ${body.ts} < ${this.lastAcceptedTs})`);
    }
    this.lastAcceptedTs = body.ts;
    return fromSampleResponse(body);
  }

  async take(joules: number): Promise<TakeResult> {
    try {
      const payload: TakeRequest = { joules };
      const body = await this.request("/v1/take", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload)
      });
      if (!isTakeResponse(body)) {
        throw new TransportError("malformed take response");
      }
      return { ok: body.ok, remainingJoules: body.remaining_j };
    } catch (error) {
      this.reportFailure("take", error);
      return { ok: false, remainingJoules: 0 };
    }
  }

  private async request(
    route: string,
    init: { method: string; headers?: Record<string, string>; body?: string }
  ): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${route}`, { ...init, signal: controller.signal });
      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError(`${init.method} ${route} responded ${response.status}`, { status: response.status });
      }
      return await response.json();
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : describeError(error);
      throw new TransportError(`${init.method} ${route} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private reportFailure(operation: "sample" | "take", error: unknown): void {
    this.logger.log(
      LogLevel.WARN,
      "transport_failure",
      {
        operation,
        baseUrl: this.baseUrl,
        error: describeError(error),
        status: error instanceof TransportError ? error.status : undefined
      },
      { dedupParts: ["transport_failure", operation] }
    );
  }
}
