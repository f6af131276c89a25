import type { TaskDescriptor, TaskResult } from "@joulegate/shared";

export type TaskKind = "inline" | "command" | "merge";

/**
 * Opaque unit of admitted work. `run` is awaited to completion once the
 * task's cost has been debited; it is never cancelled.
 */
export interface Task extends TaskDescriptor {
  readonly kind: TaskKind;
  run(): Promise<TaskResult>;
}

export class TaskExecutionError extends Error {
  readonly taskName: string;
  readonly exitCode: number | null;
  readonly stderrTail?: string;

  constructor(
    taskName: string,
    message: string,
    options: { exitCode?: number | null; stderrTail?: string; cause?: unknown } = {}
  ) {
    super(`Task ${taskName} failed: ${message}`, { cause: options.cause });
    this.name = "TaskExecutionError";
    this.taskName = taskName;
    this.exitCode = options.exitCode ?? null;
    this.stderrTail = options.stderrTail;
  }
}
