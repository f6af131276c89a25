import type { Task } from "../tasks/types";

export interface PolicyEntry {
  minBudgetJoules: number;
  task: Task;
}

/**
 * Threshold table checked from the highest threshold down; the first
 * threshold the bucket satisfies selects its task.
 */
export class PolicyTable {
  private readonly sorted: readonly PolicyEntry[];

  constructor(entries: readonly PolicyEntry[]) {
    for (const entry of entries) {
      if (!Number.isFinite(entry.minBudgetJoules) || entry.minBudgetJoules < 0) {
        throw new RangeError(`Invalid threshold ${entry.minBudgetJoules} for task ${entry.task.name}`);
      }
    }
    // stable sort keeps declaration order among equal thresholds
    this.sorted = [...entries].sort((a, b) => b.minBudgetJoules - a.minBudgetJoules);
  }

  select(bucketJoules: number): Task | null {
    if (Number.isNaN(bucketJoules)) {
      return null;
    }
    const entry = this.sorted.find(candidate => bucketJoules >= candidate.minBudgetJoules);
    return entry ? entry.task : null;
  }

  entries(): readonly PolicyEntry[] {
    return this.sorted;
  }
}
