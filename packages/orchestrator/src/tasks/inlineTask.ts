import type { TaskResult } from "@joulegate/shared";
import type { Task } from "./types";

export type TaskFn = () => TaskResult | Promise<TaskResult>;

export class InlineTask implements Task {
  readonly kind = "inline";

  constructor(
    readonly name: string,
    readonly estimatedCostJoules: number,
    private readonly fn: TaskFn
  ) {}

  async run(): Promise<TaskResult> {
    return this.fn();
  }
}

export function defineTask(name: string, estimatedCostJoules: number, fn: TaskFn): Task {
  return new InlineTask(name, estimatedCostJoules, fn);
}
