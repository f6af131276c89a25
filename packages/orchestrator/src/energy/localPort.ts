import type { EnergySample, TakeResult } from "@joulegate/shared";
import type { BudgetService } from "@joulegate/agent";
import type { BudgetPort } from "./types";

/** Budget port over an in-process agent (`joulegate run --embedded`). */
export class LocalBudgetPort implements BudgetPort {
  constructor(private readonly service: BudgetService) {}

  async sample(): Promise<EnergySample> {
    return this.service.sample();
  }

  async take(joules: number): Promise<TakeResult> {
    return this.service.take(joules);
  }
}
