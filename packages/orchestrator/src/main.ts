import { mkdir } from "node:fs/promises";
import path from "node:path";
import { startAgent, type AgentHandle } from "@joulegate/agent";
import { DurableReceiptWriter, SqliteReceiptLedger, type ReceiptLedger } from "@joulegate/ledger";
import {
  LogLevel,
  createBackoff,
  noopLogger,
  type ComponentLogger,
  type JouleGateConfig
} from "@joulegate/shared";
import { HttpBudgetClient, LocalBudgetPort, type BudgetPort } from "./energy";
import { FsBaseStore, MergeGate } from "./merge";
import { PolicyTable, Scheduler, type PolicyEntry } from "./scheduler";
import { createTasks } from "./tasks";

export interface OrchestratorOptions {
  config: JouleGateConfig;
  logger?: ComponentLogger;
  /** Runs the agent in process instead of calling it over HTTP. */
  embedded?: boolean;
  /** Replaces the configured task table. */
  policy?: PolicyEntry[];
  port?: BudgetPort;
  ledger?: ReceiptLedger;
  /** Relative config paths resolve against this directory. */
  cwd?: string;
}

export interface OrchestratorHandle {
  scheduler: Scheduler;
  ledger: ReceiptLedger;
  gate: MergeGate;
  run(signal: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export async function createOrchestrator(options: OrchestratorOptions): Promise<OrchestratorHandle> {
  const { config } = options;
  const logger = options.logger ?? noopLogger;
  const resolve = (target: string) => path.resolve(options.cwd ?? process.cwd(), target);

  const baseDir = resolve(config.merge.baseDir);
  const candidatesDir = resolve(config.merge.candidatesDir);
  await mkdir(candidatesDir, { recursive: true });
  const store = new FsBaseStore({ basePath: baseDir, keepVersions: config.merge.keepVersions });
  await store.prepare();

  let agent: AgentHandle | null = null;
  let port = options.port;
  if (!port) {
    if (options.embedded) {
      agent = await startAgent(config, { listen: false, logger: logger.child("agent") });
      port = new LocalBudgetPort(agent.service);
    } else {
      port = new HttpBudgetClient({
        baseUrl: config.scheduler.agentUrl,
        timeoutMs: config.scheduler.transportTimeoutMs,
        logger: logger.child("energy")
      });
    }
  }

  const ledger = options.ledger ?? new SqliteReceiptLedger(resolve(config.ledger.path));
  const writer = new DurableReceiptWriter({
    ledger,
    backoff: createBackoff(config.ledger.retry),
    maxAttempts: config.ledger.maxAttempts,
    logger: logger.child("ledger")
  });

  const gate = new MergeGate({
    deltaThreshold: config.merge.deltaThreshold,
    secondaryThreshold: config.merge.secondaryThreshold,
    store,
    logger: logger.child("merge")
  });

  const policy = new PolicyTable(options.policy ?? createTasks(config.tasks, { gate, mergeDirs: { baseDir, candidatesDir } }));
  if (policy.entries().length === 0) {
    logger.log(LogLevel.WARN, "empty_policy", { message: "no tasks configured; the scheduler will stay idle" });
  }

  const scheduler = new Scheduler({
    port,
    policy,
    writer,
    idleBackoff: createBackoff(config.scheduler.idleBackoff),
    admissionBackoff: createBackoff(config.scheduler.admissionBackoff),
    errorBackoffMs: config.scheduler.errorBackoffMs,
    logger: logger.child("scheduler")
  });

  return {
    scheduler,
    ledger,
    gate,
    run: signal => scheduler.run(signal),
    async close() {
      if (agent) {
        await agent.stop();
      }
      ledger.close();
    }
  };
}

/** Runs the scheduler until `signal` aborts, then releases the ledger and any embedded agent. */
export async function runOrchestrator(options: OrchestratorOptions & { signal: AbortSignal }): Promise<void> {
  const handle = await createOrchestrator(options);
  try {
    await handle.run(options.signal);
  } finally {
    await handle.close();
  }
}
