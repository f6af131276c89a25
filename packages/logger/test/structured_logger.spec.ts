import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { LogLevel, type StructuredLogEvent } from "@joulegate/shared";
import { StructuredLogger } from "../src/structuredLogger";
import type { LogSink } from "../src/sinks/types";
import { createConsoleSink, formatPretty } from "../src/sinks/consoleSink";
import { createFileSink } from "../src/sinks/fileSink";
import { buildSinks } from "../src/factory";

function memorySink(received: StructuredLogEvent[]): LogSink {
  return {
    name: "memory",
    level: LogLevel.DEBUG,
    publish: async event => {
      received.push(event);
    }
  };
}

describe("StructuredLogger", () => {
  it("filters logs below minimum level and merges child context", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "session-1",
      baseComponent: "root",
      level: LogLevel.INFO,
      sinks: [memorySink(received)]
    });

    logger.log(LogLevel.DEBUG, "ignore");
    logger.log(LogLevel.ERROR, "root-event", { root: true });
    const child = logger.child("scheduler", { loop: 1 });
    child.child("ledger", { db: "memory" }).log(LogLevel.INFO, "child-event", { foo: "bar" });

    await logger.flushOutstanding();

    expect(received).toHaveLength(2);
    expect(received[0].event).toBe("root-event");
    expect(received[0].component).toBe("root");
    expect(received[1].component).toBe("ledger");
    expect(received[1].payload).toEqual({ loop: 1, db: "memory", foo: "bar" });
    expect(received[1].sessionId).toBe("session-1");
  });

  it("drops events once the queue is full", async () => {
    const received: StructuredLogEvent[] = [];
    const dropped: string[] = [];
    const logger = new StructuredLogger({
      sessionId: "s",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)],
      queueSize: 100,
      onDrop: event => dropped.push(event.event)
    });

    for (let i = 0; i < 105; i += 1) {
      logger.log(LogLevel.INFO, `e${i}`);
    }
    await logger.flushOutstanding();

    // the first event leaves the queue synchronously when draining starts
    expect(received).toHaveLength(101);
    expect(dropped).toEqual(["e101", "e102", "e103", "e104"]);
  });

  it("reports a failing sink and keeps delivering to the others", async () => {
    const received: StructuredLogEvent[] = [];
    const warn = vi.fn();
    const logger = new StructuredLogger({
      sessionId: "s",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [
        {
          name: "broken",
          level: LogLevel.DEBUG,
          publish: async () => {
            throw new Error("disk full");
          }
        },
        memorySink(received)
      ],
      fallback: { warn }
    });

    logger.log(LogLevel.WARN, "still-delivered");
    await logger.stop();

    expect(received.map(event => event.event)).toEqual(["still-delivered"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("[structured-logger] sink broken failed");
  });

  it("ignores events after stop", async () => {
    const received: StructuredLogEvent[] = [];
    const logger = new StructuredLogger({
      sessionId: "s",
      baseComponent: "root",
      level: LogLevel.DEBUG,
      sinks: [memorySink(received)]
    });
    await logger.stop();
    logger.log(LogLevel.CRITICAL, "late");
    await logger.flushOutstanding();
    expect(received).toHaveLength(0);
  });
});

describe("console sink", () => {
  const event: StructuredLogEvent = {
    sessionId: "s",
    component: "agent",
    event: "tick",
    level: LogLevel.CRITICAL,
    timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
    payload: { bucketJoules: 12 }
  };

  it("routes critical events to console.error as JSON", async () => {
    const consoleImpl = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sink = createConsoleSink({ level: LogLevel.INFO, consoleImpl });
    await sink.publish(event);
    expect(consoleImpl.error).toHaveBeenCalledWith(JSON.stringify(event));
    expect(consoleImpl.info).not.toHaveBeenCalled();
  });

  it("renders a single pretty line", () => {
    expect(formatPretty(event)).toBe('2024-01-02T03:04:05.000Z CRITICAL [agent] tick {"bucketJoules":12}');
    expect(formatPretty({ ...event, level: LogLevel.INFO, payload: {} })).toBe(
      "2024-01-02T03:04:05.000Z INFO     [agent] tick"
    );
  });
});

describe("file sink", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "logger-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("rotates files when exceeding max size and prunes old ones", async () => {
    const sink = createFileSink({
      sessionId: "sessionA",
      level: LogLevel.DEBUG,
      outputDir: tempDir,
      maxFileSizeMb: 0.001,
      maxFiles: 3
    });
    await sink.start?.();

    for (let i = 0; i < 5; i += 1) {
      await sink.publish({
        sessionId: "sessionA",
        component: "test",
        event: `event-${i}`,
        level: LogLevel.INFO,
        timestamp: Date.now(),
        payload: { index: i, blob: "x".repeat(4096) }
      });
    }
    await sink.flush?.();
    await sink.stop?.();

    const files = (await fs.readdir(tempDir)).filter(file => file.endsWith(".jsonl"));
    expect(files).toHaveLength(3);
  });

  it("builds only the enabled sinks", () => {
    const sinks = buildSinks({
      sessionId: "s",
      baseComponent: "root",
      config: {
        level: LogLevel.INFO,
        console: { enabled: false },
        file: { enabled: true, outputDir: tempDir, maxFileSizeMb: 1, maxFiles: 2 }
      }
    });
    expect(sinks.map(sink => sink.name)).toEqual(["file"]);
  });
});
