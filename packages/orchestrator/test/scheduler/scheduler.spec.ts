import { describe, expect, it, vi } from "vitest";
import { DurableReceiptWriter, PersistenceError, SqliteReceiptLedger } from "@joulegate/ledger";
import {
  CappedExponentialBackoff,
  FixedBackoff,
  LogLevel,
  contentHash,
  type ReceiptInput,
  type TaskResult
} from "@joulegate/shared";
import type { BudgetPort } from "../../src/energy/types";
import { PolicyTable } from "../../src/scheduler/policy";
import { Scheduler, type ReceiptSink, type SchedulerOptions } from "../../src/scheduler/scheduler";
import { defineTask } from "../../src/tasks/inlineTask";
import { createRecordingLogger, FakeBudgetPort, okResult, sampleWithBucket } from "../utils/factories";

class RecordingSink implements ReceiptSink {
  readonly receipts: ReceiptInput[] = [];

  constructor(private readonly calls?: string[]) {}

  async append(receipt: ReceiptInput): Promise<number> {
    this.calls?.push("append");
    this.receipts.push(receipt);
    return this.receipts.length;
  }
}

function createScheduler(overrides: Partial<SchedulerOptions> & Pick<SchedulerOptions, "port" | "policy">) {
  return new Scheduler({
    writer: new RecordingSink(),
    idleBackoff: new FixedBackoff(300),
    admissionBackoff: new FixedBackoff(200),
    errorBackoffMs: 500,
    now: () => 1_700_000_000,
    monotonicNow: () => 0,
    sleep: async () => undefined,
    ...overrides
  });
}

describe("Scheduler.runOnce", () => {
  it("stays idle when no threshold is met", async () => {
    const run = vi.fn(() => okResult());
    const port = new FakeBudgetPort(10);
    const scheduler = createScheduler({ port, policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, run) }]) });

    await expect(scheduler.runOnce()).resolves.toEqual({ kind: "idle", bucketJoules: 10 });
    expect(port.takes).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it("never runs a task whose take was denied", async () => {
    const run = vi.fn(() => okResult());
    const port: BudgetPort = {
      sample: async () => sampleWithBucket(100),
      take: async () => ({ ok: false, remainingJoules: 3 })
    };
    const scheduler = createScheduler({ port, policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, run) }]) });

    await expect(scheduler.runOnce()).resolves.toEqual({
      kind: "denied",
      taskName: "b",
      requestedJoules: 20,
      remainingJoules: 3
    });
    expect(run).not.toHaveBeenCalled();
    expect(scheduler.getStats()).toMatchObject({ iterations: 1, deniedTakes: 1, executed: 0 });
  });

  it("debits the selected task's cost, runs it and records one receipt", async () => {
    const port = new FakeBudgetPort(25);
    const writer = new RecordingSink();
    const taskA = defineTask("a", 100, () => okResult());
    const taskB = defineTask("b", 20, () => okResult({ delta: 0.004, loss: 0.25, contentHash: "abc", metadata: { epoch: 2 } }));
    const clock = [1000, 3500];
    const scheduler = createScheduler({
      port,
      writer,
      policy: new PolicyTable([
        { minBudgetJoules: 120, task: taskA },
        { minBudgetJoules: 20, task: taskB }
      ]),
      monotonicNow: () => clock.shift() ?? 0
    });

    const outcome = await scheduler.runOnce();

    expect(outcome).toMatchObject({ kind: "executed", taskName: "b", receiptId: 1 });
    expect(port.takes).toEqual([20]);
    expect(port.bucketJoules).toBe(5);
    expect(writer.receipts).toEqual([
      {
        timestamp: 1_700_000_000,
        taskName: "b",
        joulesCharged: 20,
        durationSec: 2.5,
        delta: 0.004,
        loss: 0.25,
        contentHash: "abc",
        metadata: { epoch: 2, ok: true }
      }
    ]);
    expect(scheduler.getStats()).toEqual({
      iterations: 1,
      idlePolls: 0,
      deniedTakes: 0,
      executed: 1,
      failed: 0,
      joulesCharged: 20
    });
  });

  it("records a task's own failure with its ok flag", async () => {
    const port = new FakeBudgetPort(50);
    const writer = new RecordingSink();
    const scheduler = createScheduler({
      port,
      writer,
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult({ ok: false, delta: 0 })) }])
    });

    await scheduler.runOnce();
    expect(writer.receipts[0]?.metadata).toEqual({ ok: false });
    expect(scheduler.getStats().failed).toBe(1);
  });

  it("turns a thrown task error into a failed receipt", async () => {
    const port = new FakeBudgetPort(50);
    const writer = new RecordingSink();
    const logger = createRecordingLogger();
    const scheduler = createScheduler({
      port,
      writer,
      logger,
      policy: new PolicyTable([
        {
          minBudgetJoules: 20,
          task: defineTask("b", 20, () => {
            throw new Error("boom");
          })
        }
      ])
    });

    await expect(scheduler.runOnce()).resolves.toMatchObject({ kind: "executed" });
    expect(writer.receipts).toHaveLength(1);
    expect(writer.receipts[0]).toMatchObject({
      joulesCharged: 20,
      delta: 0,
      loss: 0,
      contentHash: contentHash("b:boom"),
      metadata: { ok: false, error: "boom" }
    });
    expect(logger.events.find(event => event.event === "task_failed")).toMatchObject({
      level: LogLevel.ERROR,
      payload: { task: "b", error: "boom" }
    });
  });

  it("treats a malformed result as a failure", async () => {
    const writer = new RecordingSink();
    const bad: TaskResult = { ok: true, delta: Number.NaN, loss: 0, contentHash: "x", metadata: {} };
    const scheduler = createScheduler({
      port: new FakeBudgetPort(50),
      writer,
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => bad) }])
    });

    await scheduler.runOnce();
    expect(writer.receipts[0]).toMatchObject({
      delta: 0,
      metadata: { ok: false, error: "Task b failed: returned an invalid result" }
    });
  });

  it("records unserializable metadata as a failed receipt instead of retrying the write", async () => {
    const ledger = new SqliteReceiptLedger(":memory:");
    const sleep = vi.fn(async () => undefined);
    const scheduler = createScheduler({
      port: new FakeBudgetPort(40),
      writer: new DurableReceiptWriter({ ledger, backoff: new FixedBackoff(1), sleep }),
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult({ metadata: { n: 1n } })) }])
    });

    const outcome = await scheduler.runOnce();
    expect(outcome.kind).toBe("executed");
    expect(sleep).not.toHaveBeenCalled();
    expect(ledger.list().map(receipt => [receipt.delta, receipt.metadata])).toEqual([
      [0, { ok: false, error: "Task b failed: returned metadata that is not JSON-serializable" }]
    ]);
    expect(scheduler.getStats().failed).toBe(1);
    ledger.close();
  });

  it("reports the executing state while a task runs", async () => {
    const states: string[] = [];
    let scheduler: Scheduler | undefined;
    scheduler = createScheduler({
      port: new FakeBudgetPort(50),
      policy: new PolicyTable([
        {
          minBudgetJoules: 20,
          task: defineTask("b", 20, () => {
            states.push(scheduler?.getState() ?? "missing");
            return okResult();
          })
        }
      ])
    });

    expect(scheduler.getState()).toBe("idle-wait");
    await scheduler.runOnce();
    expect(states).toEqual(["executing"]);
    expect(scheduler.getState()).toBe("idle-wait");
  });

  it("writes receipts to the SQLite ledger", async () => {
    const ledger = new SqliteReceiptLedger(":memory:");
    const scheduler = createScheduler({
      port: new FakeBudgetPort(40),
      writer: new DurableReceiptWriter({ ledger, backoff: new FixedBackoff(1) }),
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult({ metadata: { note: "x" } })) }])
    });

    await scheduler.runOnce();
    await scheduler.runOnce();
    await scheduler.runOnce();
    expect(ledger.count()).toBe(2);
    expect(ledger.list({ order: "asc" }).map(receipt => receipt.metadata)).toEqual([
      { note: "x", ok: true },
      { note: "x", ok: true }
    ]);
    ledger.close();
  });
});

describe("Scheduler.run", () => {
  it("backs off while idle and resets after an execution", async () => {
    const port = new FakeBudgetPort(0);
    const controller = new AbortController();
    const delays: number[] = [];
    const script = [0, 0, 25, 0];
    port.sample = async () => {
      port.bucketJoules = script.shift() ?? 0;
      return sampleWithBucket(port.bucketJoules);
    };
    const scheduler = createScheduler({
      port,
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult()) }]),
      idleBackoff: new CappedExponentialBackoff(100, 1000, 2),
      sleep: async ms => {
        delays.push(ms);
        if (delays.length === 3) {
          controller.abort();
        }
      }
    });

    await scheduler.run(controller.signal);
    expect(delays).toEqual([100, 200, 100]);
    expect(scheduler.getStats()).toMatchObject({ iterations: 4, idlePolls: 3, executed: 1 });
  });

  it("grows the admission backoff across denied takes", async () => {
    const controller = new AbortController();
    const delays: number[] = [];
    const port: BudgetPort = {
      sample: async () => sampleWithBucket(30),
      take: async () => ({ ok: false, remainingJoules: 30 })
    };
    const scheduler = createScheduler({
      port,
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult()) }]),
      admissionBackoff: new CappedExponentialBackoff(50, 150, 2),
      sleep: async ms => {
        delays.push(ms);
        if (delays.length === 4) {
          controller.abort();
        }
      }
    });

    await scheduler.run(controller.signal);
    expect(delays).toEqual([50, 100, 150, 150]);
  });

  it("writes the receipt before the next poll", async () => {
    const calls: string[] = [];
    const controller = new AbortController();
    const port = new FakeBudgetPort(45);
    const sample = port.sample.bind(port);
    port.sample = async () => {
      if (calls.filter(call => call === "sample").length === 2) {
        controller.abort();
      }
      calls.push("sample");
      return sample();
    };
    const scheduler = createScheduler({
      port,
      writer: new RecordingSink(calls),
      policy: new PolicyTable([
        {
          minBudgetJoules: 20,
          task: defineTask("b", 20, () => {
            calls.push("run");
            return okResult();
          })
        }
      ])
    });

    await scheduler.run(controller.signal);
    expect(calls).toEqual(["sample", "run", "append", "sample", "run", "append", "sample"]);
  });

  it("keeps looping after an unexpected port error", async () => {
    const controller = new AbortController();
    const delays: number[] = [];
    const logger = createRecordingLogger();
    let polls = 0;
    const port: BudgetPort = {
      sample: async () => {
        polls += 1;
        if (polls === 1) {
          throw new Error("socket closed");
        }
        return sampleWithBucket(0);
      },
      take: async () => ({ ok: false, remainingJoules: 0 })
    };
    const scheduler = createScheduler({
      port,
      logger,
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult()) }]),
      sleep: async ms => {
        delays.push(ms);
        if (delays.length === 2) {
          controller.abort();
        }
      }
    });

    await scheduler.run(controller.signal);
    expect(delays).toEqual([500, 300]);
    expect(logger.events.find(event => event.event === "iteration_failed")?.payload).toEqual({ error: "socket closed" });
  });

  it("stops fatally on a PersistenceError", async () => {
    const receipt: ReceiptInput = {
      timestamp: 1,
      taskName: "b",
      joulesCharged: 20,
      durationSec: 0,
      delta: 0,
      loss: 0,
      contentHash: "h",
      metadata: {}
    };
    const failure = new PersistenceError("disk gone", receipt, 3);
    const scheduler = createScheduler({
      port: new FakeBudgetPort(100),
      writer: { append: async () => Promise.reject(failure) },
      policy: new PolicyTable([{ minBudgetJoules: 20, task: defineTask("b", 20, () => okResult()) }])
    });

    await expect(scheduler.run(new AbortController().signal)).rejects.toBe(failure);
    expect(scheduler.getState()).toBe("idle-wait");
  });
});
