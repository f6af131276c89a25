import type { EnergySample, TakeResult } from "@joulegate/shared";

/**
 * The scheduler's view of the budget service. Implementations fail closed:
 * they resolve to a zero-bucket sample or a failed take, never reject.
 */
export interface BudgetPort {
  sample(): Promise<EnergySample>;
  take(joules: number): Promise<TakeResult>;
}
