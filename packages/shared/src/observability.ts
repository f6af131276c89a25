import { createHash } from "node:crypto";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

const LEVELS: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.CRITICAL];

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some(level => level === value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  sessionId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
  dedupKey?: string;
  tags?: string[];
}

export interface LogOptions {
  component?: string;
  dedupParts?: Array<string | number | undefined | null>;
  tags?: string[];
}

/**
 * The slice of the structured logger that components depend on.
 */
export interface ComponentLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>, options?: LogOptions): void;
  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger;
}

export const noopLogger: ComponentLogger = {
  log: () => undefined,
  child: () => noopLogger
};

export function makeDedupKey(parts: Array<string | number | undefined | null>): string {
  const normalized = parts
    .filter(part => part !== undefined && part !== null)
    .map(part => String(part))
    .join("|");
  const hash = createHash("sha1");
  hash.update(normalized);
  return hash.digest("hex");
}

interface StructuredEventOptions<TPayload> {
  sessionId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  dedupParts?: Array<string | number | undefined | null>;
  timestamp?: number;
  tags?: string[];
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    sessionId: options.sessionId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload,
    tags: options.tags,
    dedupKey: options.dedupParts ? makeDedupKey(options.dedupParts) : undefined
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
