import path from "node:path";
import type { LoggingConfig } from "@joulegate/shared";
import { StructuredLogger } from "./structuredLogger";
import { createConsoleSink } from "./sinks/consoleSink";
import { createFileSink } from "./sinks/fileSink";
import type { LogSink } from "./sinks/types";

export interface CreateLoggerOptions {
  sessionId: string;
  baseComponent: string;
  config: LoggingConfig;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function buildSinks(options: CreateLoggerOptions): LogSink[] {
  const { config } = options;
  const sinks: LogSink[] = [];
  if (config.console.enabled) {
    sinks.push(
      createConsoleSink({
        level: config.console.level ?? config.level,
        format: config.console.format,
        consoleImpl: options.consoleImpl
      })
    );
  }
  if (config.file.enabled) {
    sinks.push(
      createFileSink({
        sessionId: options.sessionId,
        level: config.file.level ?? config.level,
        outputDir: path.resolve(config.file.outputDir),
        maxFileSizeMb: config.file.maxFileSizeMb,
        maxFiles: config.file.maxFiles,
        logger: console
      })
    );
  }
  return sinks;
}

/**
 * Builds a logger from the `logging` config section and starts its sinks.
 */
export async function createLogger(options: CreateLoggerOptions): Promise<StructuredLogger> {
  const logger = new StructuredLogger({
    sessionId: options.sessionId,
    baseComponent: options.baseComponent,
    level: options.config.level,
    sinks: buildSinks(options)
  });
  await logger.start();
  return logger;
}
