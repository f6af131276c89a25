import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type ComponentLogger,
  type LogOptions,
  type StructuredLogEvent
} from "@joulegate/shared";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  sessionId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  defaultContext?: Record<string, unknown>;
  onDrop?: (event: StructuredLogEvent) => void;
  /** Reports sink failures; the logger cannot log about itself. */
  fallback?: Pick<Console, "warn">;
}

export class StructuredLogger implements ComponentLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private readonly queueSize: number;
  private readonly defaultContext: Record<string, unknown>;
  private readonly fallback: Pick<Console, "warn">;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.defaultContext = options.defaultContext ?? {};
    this.fallback = options.fallback ?? console;
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  async start() {
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.start) {
          await sink.start();
        }
      })
    );
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.stop) {
          await sink.stop();
        }
      })
    );
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await (this.draining ?? this.drainQueue());
    }
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>, logOptions?: LogOptions) {
    if (this.stopped) {
      return;
    }
    if (!shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      sessionId: this.options.sessionId,
      component: logOptions?.component ?? this.options.baseComponent,
      level,
      event,
      payload: { ...this.defaultContext, ...payload },
      dedupParts: logOptions?.dedupParts,
      tags: logOptions?.tags
    });
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(structured);
      return;
    }
    this.queue.push(structured);
    if (!this.draining) {
      this.draining = this.drainQueue();
    }
  }

  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger {
    const mergedContext = {
      ...this.defaultContext,
      ...(defaultContext ?? {})
    };
    return {
      log: (level, event, payload, options) => {
        this.log(level, event, { ...mergedContext, ...payload }, { ...options, component });
      },
      child: (nextComponent, childContext) => {
        return this.child(nextComponent, {
          ...mergedContext,
          ...(childContext ?? {})
        });
      }
    };
  }

  private async drainQueue() {
    try {
      let next = this.queue.shift();
      while (next) {
        const current = next;
        await Promise.allSettled(
          this.options.sinks.map(async sink => {
            try {
              await sink.publish(current);
            } catch (error) {
              this.fallback.warn(`[structured-logger] sink ${sink.name} failed`, error);
            }
          })
        );
        next = this.queue.shift();
      }
    } finally {
      this.draining = null;
    }
  }
}
