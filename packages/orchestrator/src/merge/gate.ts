import {
  LogLevel,
  decisionHash,
  noopLogger,
  nowEpochSeconds,
  type ComponentLogger,
  type MergeDecision
} from "@joulegate/shared";
import type { BaseStore } from "./baseStore";

export interface MergeCandidate {
  id: string;
  path: string;
  delta: number;
  secondaryGain?: number | null;
}

export interface MergeGateOptions {
  deltaThreshold: number;
  secondaryThreshold: number;
  store: BaseStore;
  logger?: ComponentLogger;
  now?: () => number;
}

function meets(value: number | null | undefined, threshold: number): boolean {
  return typeof value === "number" && Number.isFinite(value) && value >= threshold;
}

/**
 * Promotes a candidate when `delta ≥ deltaThreshold` or
 * `secondaryGain ≥ secondaryThreshold`. The candidate is discarded either
 * way; on reject the base is not touched.
 */
export class MergeGate {
  private readonly logger: ComponentLogger;
  private readonly now: () => number;

  constructor(private readonly options: MergeGateOptions) {
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? nowEpochSeconds;
  }

  decide(delta: number, secondaryGain?: number | null): boolean {
    return meets(delta, this.options.deltaThreshold) || meets(secondaryGain, this.options.secondaryThreshold);
  }

  async evaluate(candidate: MergeCandidate): Promise<MergeDecision> {
    const accepted = this.decide(candidate.delta, candidate.secondaryGain);
    const timestamp = this.now();
    let versionPath: string | null = null;
    try {
      if (accepted) {
        versionPath = await this.options.store.promote(candidate.path, candidate.id);
      }
    } finally {
      await this.options.store.discard(candidate.path);
    }

    const decision: MergeDecision = {
      accepted,
      delta: candidate.delta,
      secondaryGain: candidate.secondaryGain ?? null,
      decisionHash: decisionHash(timestamp, candidate.id, candidate.delta),
      candidateId: candidate.id,
      timestamp
    };
    this.logger.log(LogLevel.INFO, accepted ? "merge_accepted" : "merge_rejected", {
      ...decision,
      deltaThreshold: this.options.deltaThreshold,
      secondaryThreshold: this.options.secondaryThreshold,
      versionPath
    });
    return decision;
  }
}
