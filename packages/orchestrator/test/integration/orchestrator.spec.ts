import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteReceiptLedger } from "@joulegate/ledger";
import { DEFAULT_CONFIG, type JouleGateConfig } from "@joulegate/shared";
import { createOrchestrator } from "../../src/main";
import { defineTask } from "../../src/tasks/inlineTask";
import { FakeBudgetPort, makeTempDir, okResult } from "../utils/factories";

describe("createOrchestrator", () => {
  let root: string;
  let config: JouleGateConfig;

  beforeEach(async () => {
    root = await makeTempDir("orchestrator");
    config = structuredClone(DEFAULT_CONFIG);
    config.ledger.path = "state/receipts.db";
    config.merge.baseDir = "adapters/base";
    config.merge.candidatesDir = "adapters/candidates";
    config.energy.gpu.enabled = false;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("wires the scheduler to a durable ledger under the working directory", async () => {
    const port = new FakeBudgetPort(50);
    const handle = await createOrchestrator({
      config,
      cwd: root,
      port,
      policy: [{ minBudgetJoules: 20, task: defineTask("refresh", 20, () => okResult({ contentHash: "r1" })) }]
    });

    await expect(handle.scheduler.runOnce()).resolves.toMatchObject({ kind: "executed", receiptId: 1 });
    await handle.close();

    expect(existsSync(path.join(root, "adapters", "candidates"))).toBe(true);
    const reopened = new SqliteReceiptLedger(path.join(root, "state", "receipts.db"));
    expect(reopened.list().map(receipt => [receipt.taskName, receipt.joulesCharged, receipt.contentHash])).toEqual([
      ["refresh", 20, "r1"]
    ]);
    reopened.close();
  });

  it("builds the policy from the tasks config", async () => {
    config.tasks = [
      { kind: "command", name: "small", minBudgetJoules: 20, estimatedCostJoules: 20, command: "true", args: [] },
      { kind: "merge", name: "big", minBudgetJoules: 120, estimatedCostJoules: 80, command: "true", args: [] }
    ];
    const handle = await createOrchestrator({ config, cwd: root, port: new FakeBudgetPort(0) });

    await expect(handle.scheduler.runOnce()).resolves.toEqual({ kind: "idle", bucketJoules: 0 });
    await handle.close();
  });

  it("runs against an embedded agent", async () => {
    const handle = await createOrchestrator({
      config,
      cwd: root,
      embedded: true,
      policy: [{ minBudgetJoules: 1_000_000, task: defineTask("never", 1, () => okResult()) }]
    });
    try {
      const outcome = await handle.scheduler.runOnce();
      expect(outcome.kind).toBe("idle");
    } finally {
      await handle.close();
    }
  });
});
