import { performance } from "node:perf_hooks";
import {
  LogLevel,
  abortableSleep,
  contentHash,
  describeError,
  noopLogger,
  nowEpochSeconds,
  type BackoffPolicy,
  type ComponentLogger,
  type ReceiptInput,
  type Sleep,
  type TaskResult
} from "@joulegate/shared";
import { PersistenceError, type DurableReceiptWriter } from "@joulegate/ledger";
import type { BudgetPort } from "../energy/types";
import { TaskExecutionError, type Task } from "../tasks/types";
import type { PolicyTable } from "./policy";

export type SchedulerState = "idle-wait" | "executing";

export type ReceiptSink = Pick<DurableReceiptWriter, "append">;

export type IterationOutcome =
  | { kind: "idle"; bucketJoules: number }
  | { kind: "denied"; taskName: string; requestedJoules: number; remainingJoules: number }
  | { kind: "executed"; taskName: string; receiptId: number; receipt: ReceiptInput };

export interface SchedulerStats {
  iterations: number;
  idlePolls: number;
  deniedTakes: number;
  executed: number;
  failed: number;
  joulesCharged: number;
}

export interface SchedulerOptions {
  port: BudgetPort;
  policy: PolicyTable;
  writer: ReceiptSink;
  idleBackoff: BackoffPolicy;
  admissionBackoff: BackoffPolicy;
  errorBackoffMs: number;
  logger?: ComponentLogger;
  /** Epoch seconds for receipt timestamps. */
  now?: () => number;
  /** Milliseconds, for task durations. */
  monotonicNow?: () => number;
  sleep?: Sleep;
}

function isSerializable(metadata: TaskResult["metadata"]): boolean {
  try {
    JSON.stringify(metadata);
    return true;
  } catch {
    return false;
  }
}

function isValidResult(result: TaskResult): boolean {
  return (
    typeof result.ok === "boolean" &&
    Number.isFinite(result.delta) &&
    result.delta >= 0 &&
    Number.isFinite(result.loss) &&
    typeof result.contentHash === "string" &&
    typeof result.metadata === "object" &&
    result.metadata !== null
  );
}

/**
 * Polling control loop: sample, select, take, execute, record. A task runs
 * only after a successful take of its declared cost, and each execution
 * yields exactly one receipt before the next poll.
 */
export class Scheduler {
  private readonly logger: ComponentLogger;
  private readonly now: () => number;
  private readonly monotonicNow: () => number;
  private readonly sleep: Sleep;
  private state: SchedulerState = "idle-wait";
  private readonly stats: SchedulerStats = {
    iterations: 0,
    idlePolls: 0,
    deniedTakes: 0,
    executed: 0,
    failed: 0,
    joulesCharged: 0
  };

  constructor(private readonly options: SchedulerOptions) {
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? nowEpochSeconds;
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
    this.sleep = options.sleep ?? abortableSleep;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getStats(): SchedulerStats {
    return { ...this.stats };
  }

  async runOnce(signal?: AbortSignal): Promise<IterationOutcome> {
    this.stats.iterations += 1;
    const sample = await this.options.port.sample();
    const task = this.options.policy.select(sample.bucketJoules);
    if (!task) {
      this.stats.idlePolls += 1;
      this.logger.log(LogLevel.DEBUG, "idle", { bucketJoules: sample.bucketJoules });
      return { kind: "idle", bucketJoules: sample.bucketJoules };
    }

    const cost = task.estimatedCostJoules;
    const take = await this.options.port.take(cost);
    if (!take.ok) {
      this.stats.deniedTakes += 1;
      this.logger.log(
        LogLevel.INFO,
        "admission_denied",
        { task: task.name, requestedJoules: cost, remainingJoules: take.remainingJoules },
        { dedupParts: ["admission_denied", task.name] }
      );
      return { kind: "denied", taskName: task.name, requestedJoules: cost, remainingJoules: take.remainingJoules };
    }

    this.state = "executing";
    try {
      const timestamp = this.now();
      const startedAt = this.monotonicNow();
      this.logger.log(LogLevel.INFO, "task_started", { task: task.name, chargedJoules: cost, remainingJoules: take.remainingJoules });
      const result = await this.execute(task);
      const durationSec = Math.max(0, (this.monotonicNow() - startedAt) / 1000);

      this.stats.executed += 1;
      this.stats.joulesCharged += cost;
      if (!result.ok) {
        this.stats.failed += 1;
      }

      const receipt: ReceiptInput = {
        timestamp,
        taskName: task.name,
        joulesCharged: cost,
        durationSec,
        delta: result.delta,
        loss: result.loss,
        contentHash: result.contentHash,
        metadata: { ...result.metadata, ok: result.ok }
      };
      const receiptId = await this.options.writer.append(receipt, signal);
      this.logger.log(LogLevel.INFO, "task_recorded", {
        task: task.name,
        receiptId,
        ok: result.ok,
        delta: result.delta,
        durationSec
      });
      return { kind: "executed", taskName: task.name, receiptId, receipt };
    } finally {
      this.state = "idle-wait";
    }
  }

  /**
   * Loops until `signal` aborts. Only a PersistenceError ends the loop
   * early; it is rethrown.
   */
  async run(signal: AbortSignal): Promise<void> {
    let idleAttempts = 0;
    let admissionAttempts = 0;
    this.logger.log(LogLevel.INFO, "scheduler_started", {
      policy: this.options.policy.entries().map(entry => ({ task: entry.task.name, minBudgetJoules: entry.minBudgetJoules }))
    });

    while (!signal.aborted) {
      let outcome: IterationOutcome;
      try {
        outcome = await this.runOnce(signal);
      } catch (error) {
        if (error instanceof PersistenceError) {
          this.logger.log(LogLevel.CRITICAL, "scheduler_halted", {
            error: describeError(error),
            receipt: { ...error.receipt }
          });
          throw error;
        }
        this.logger.log(LogLevel.ERROR, "iteration_failed", { error: describeError(error) });
        await this.sleep(this.options.errorBackoffMs, signal);
        continue;
      }

      switch (outcome.kind) {
        case "idle":
          idleAttempts += 1;
          await this.sleep(this.options.idleBackoff.delayFor(idleAttempts), signal);
          break;
        case "denied":
          admissionAttempts += 1;
          await this.sleep(this.options.admissionBackoff.delayFor(admissionAttempts), signal);
          break;
        case "executed":
          idleAttempts = 0;
          admissionAttempts = 0;
          break;
      }
    }
    this.logger.log(LogLevel.INFO, "scheduler_stopped", { ...this.stats });
  }

  private async execute(task: Task): Promise<TaskResult> {
    try {
      const result = await task.run();
      if (!isValidResult(result)) {
        throw new TaskExecutionError(task.name, "returned an invalid result");
      }
      if (!isSerializable(result.metadata)) {
        throw new TaskExecutionError(task.name, "returned metadata that is not JSON-serializable");
      }
      return result;
    } catch (error) {
      const message = describeError(error);
      this.logger.log(LogLevel.ERROR, "task_failed", {
        task: task.name,
        error: message,
        stderrTail: error instanceof TaskExecutionError ? error.stderrTail : undefined
      });
      return {
        ok: false,
        delta: 0,
        loss: 0,
        contentHash: contentHash(`${task.name}:${message}`),
        metadata: { ok: false, error: message }
      };
    }
  }
}
