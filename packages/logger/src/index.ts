export { StructuredLogger, type StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatPretty, type ConsoleFormat } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export { buildSinks, createLogger, type CreateLoggerOptions } from "./factory";
export type { LogSink } from "./sinks/types";
