import { LogLevel, shouldLog, type StructuredLogEvent } from "@joulegate/shared";
import type { LogSink } from "./types";

export type ConsoleFormat = "json" | "pretty";

interface ConsoleSinkOptions {
  level: LogLevel;
  format?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function formatPretty(event: StructuredLogEvent): string {
  const time = new Date(event.timestamp).toISOString();
  const payload = event.payload && Object.keys(event.payload).length ? ` ${JSON.stringify(event.payload)}` : "";
  return `${time} ${event.level.toUpperCase().padEnd(8)} [${event.component}] ${event.event}${payload}`;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const render = options.format === "pretty" ? formatPretty : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const line = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(line);
          break;
        default:
          consoleImpl.info(line);
      }
    }
  };
}
