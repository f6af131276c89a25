#!/usr/bin/env node
import { existsSync } from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { nanoid } from "nanoid";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { startAgent } from "@joulegate/agent";
import { PersistenceError, SqliteReceiptLedger } from "@joulegate/ledger";
import { createLogger, type StructuredLogger } from "@joulegate/logger";
import {
  LogLevel,
  assertEnvVars,
  createConfigManager,
  describeError,
  type EnvService,
  type JouleGateConfig,
  type Receipt
} from "@joulegate/shared";
import { HttpBudgetClient } from "../energy";
import { runOrchestrator } from "../main";
import { runWatch } from "../watch";

const DEFAULT_CONFIG_FILE = "config/joulegate.default.json";

interface GlobalArgs {
  config?: string;
  envFile?: string;
}

interface Runtime {
  config: JouleGateConfig;
  logger: StructuredLogger;
}

function loadConfig(args: GlobalArgs, service: EnvService): JouleGateConfig {
  const loaded = loadDotenv(args.envFile ? { path: args.envFile } : {});
  if (args.envFile && loaded.error) {
    throw loaded.error;
  }
  assertEnvVars(service);
  const defaultFile = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  const filePath = args.config ?? process.env.JOULEGATE_CONFIG ?? (existsSync(defaultFile) ? defaultFile : undefined);
  return createConfigManager({ filePath, env: process.env }).getConfig();
}

async function bootstrap(args: GlobalArgs, service: EnvService): Promise<Runtime> {
  const config = loadConfig(args, service);
  const logger = await createLogger({ sessionId: nanoid(12), baseComponent: service, config: config.logging });
  return { config, logger };
}

function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return controller.signal;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise(resolve => signal.addEventListener("abort", () => resolve(), { once: true }));
}

function formatReceipt(receipt: Receipt): string {
  const ts = new Date(receipt.timestamp * 1000).toISOString();
  const ok = receipt.metadata.ok === false ? "no" : "yes";
  return (
    `ID=${receipt.id} ts=${ts} task=${receipt.taskName} joule=${receipt.joulesCharged} ` +
    `sec=${receipt.durationSec.toFixed(2)} delta=${receipt.delta.toFixed(4)} loss=${receipt.loss} ok=${ok}`
  );
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("joulegate")
    .option("config", {
      type: "string",
      describe: "JSON config file layered over the defaults"
    })
    .option("envFile", {
      type: "string",
      describe: "dotenv file to load before reading the environment"
    })
    .command(
      "agent",
      "Start the power agent and its HTTP boundary",
      builder => builder,
      async args => {
        const { config, logger } = await bootstrap(args, "agent");
        const signal = shutdownSignal();
        try {
          const agent = await startAgent(config, { logger });
          await waitForAbort(signal);
          await agent.stop();
        } finally {
          await logger.stop();
        }
      }
    )
    .command(
      "run",
      "Start the orchestrator loop",
      builder =>
        builder.option("embedded", {
          type: "boolean",
          default: false,
          describe: "Run the power agent in this process"
        }),
      async args => {
        const { config, logger } = await bootstrap(args, "orchestrator");
        const signal = shutdownSignal();
        try {
          await runOrchestrator({ config, logger, embedded: args.embedded, signal });
        } catch (error) {
          if (error instanceof PersistenceError) {
            logger.log(LogLevel.CRITICAL, "orchestrator_halted", { error: describeError(error), receipt: { ...error.receipt } });
            process.exitCode = 2;
            return;
          }
          throw error;
        } finally {
          await logger.stop();
        }
      }
    )
    .command(
      "receipts",
      "Print the most recent receipts",
      builder =>
        builder.option("limit", {
          type: "number",
          default: 10,
          describe: "Number of receipts to show"
        }),
      args => {
        const config = loadConfig(args, "orchestrator");
        const ledger = new SqliteReceiptLedger(path.resolve(process.cwd(), config.ledger.path));
        try {
          const receipts = ledger.list({ limit: args.limit, order: "desc" });
          if (receipts.length === 0) {
            console.log("No receipts recorded.");
          }
          receipts.forEach(receipt => console.log(formatReceipt(receipt)));
        } finally {
          ledger.close();
        }
      }
    )
    .command(
      "watch",
      "Poll the agent and show the bucket's accumulation rate",
      builder =>
        builder
          .option("url", {
            type: "string",
            describe: "Agent base URL (defaults to scheduler.agentUrl)"
          })
          .option("interval", {
            type: "number",
            default: 1,
            describe: "Seconds between samples"
          })
          .option("window", {
            type: "number",
            default: 20,
            describe: "Samples in the moving average"
          })
          .option("duration", {
            type: "number",
            default: 120,
            describe: "Seconds to run (0 runs until interrupted)"
          })
          .option("targets", {
            type: "number",
            array: true,
            default: [40, 120],
            describe: "Energy targets in J; the first drives the progress bar"
          })
          .option("csv", {
            type: "string",
            describe: "CSV file to append samples to"
          }),
      async args => {
        const { config, logger } = await bootstrap(args, "orchestrator");
        const signal = shutdownSignal();
        const interactive = process.stdout.isTTY === true;
        try {
          const readings = await runWatch({
            source: new HttpBudgetClient({
              baseUrl: args.url ?? config.scheduler.agentUrl,
              timeoutMs: config.scheduler.transportTimeoutMs
            }),
            intervalMs: Math.max(0, args.interval) * 1000,
            windowSize: Math.max(1, Math.floor(args.window)),
            durationSec: Math.max(0, args.duration),
            targets: args.targets,
            csvPath: args.csv ? path.resolve(process.cwd(), args.csv) : undefined,
            write: line => {
              if (interactive) {
                process.stdout.write(`\r\x1b[2K${line}`);
              } else {
                console.log(line);
              }
            },
            signal,
            logger: logger.child("watch")
          });
          if (interactive) {
            process.stdout.write("\n");
          }
          console.log(`Done. ${readings.length} samples.`);
        } finally {
          await logger.stop();
        }
      }
    )
    .demandCommand()
    .help()
    .strict()
    .parseAsync();
}

main().catch(error => {
  console.error(describeError(error));
  process.exitCode = 1;
});
