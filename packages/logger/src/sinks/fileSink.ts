import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { LogLevel, shouldLog, type StructuredLogEvent } from "@joulegate/shared";
import type { LogSink } from "./types";

interface FileSinkOptions {
  sessionId: string;
  level: LogLevel;
  outputDir: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
  logger?: Pick<Console, "warn" | "error">;
}

export function createFileSink(options: FileSinkOptions): LogSink {
  const sink = new RotatingFileSink(options);
  return {
    name: "file",
    level: options.level,
    start: () => sink.start(),
    stop: () => sink.stop(),
    flush: () => sink.flush(),
    publish: event => sink.publish(event)
  };
}

function endStream(stream: WriteStream): Promise<void> {
  return new Promise(resolve => stream.end(() => resolve()));
}

/**
 * JSONL file per session segment. A segment closes once it would exceed
 * `maxFileSizeMb`; only the newest `maxFiles` segments are kept.
 */
class RotatingFileSink {
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private stream: WriteStream | null = null;
  private bytesWritten = 0;
  private segment = 0;
  private readonly queue: StructuredLogEvent[] = [];
  private draining = false;

  constructor(private readonly options: FileSinkOptions) {
    this.maxBytes = Math.max(0.001, options.maxFileSizeMb ?? 25) * 1024 * 1024;
    this.maxFiles = Math.max(1, options.maxFiles ?? 10);
  }

  async start() {
    if (this.stream) {
      return;
    }
    await mkdir(this.options.outputDir, { recursive: true });
    await this.rotate();
  }

  async stop() {
    if (this.stream) {
      const stream = this.stream;
      this.stream = null;
      await endStream(stream);
    }
  }

  async flush() {
    const stream = this.stream;
    if (!stream || !stream.writableNeedDrain) {
      return;
    }
    await new Promise<void>(resolve => stream.once("drain", () => resolve()));
  }

  async publish(event: StructuredLogEvent) {
    if (!shouldLog(event.level, this.options.level)) {
      return;
    }
    this.queue.push(event);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        await this.write(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async write(event: StructuredLogEvent) {
    const line = JSON.stringify(event) + "\n";
    const size = Buffer.byteLength(line);
    if (!this.stream || (this.bytesWritten > 0 && this.bytesWritten + size > this.maxBytes)) {
      await this.start();
      if (this.bytesWritten > 0) {
        await this.rotate();
      }
    }
    const stream = this.stream;
    if (!stream) {
      throw new Error("file sink is not open");
    }
    await new Promise<void>((resolve, reject) => {
      stream.write(line, error => {
        if (error) {
          this.options.logger?.error("File sink write failed", error);
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.bytesWritten += size;
  }

  private async rotate() {
    if (this.stream) {
      await endStream(this.stream);
      this.stream = null;
    }
    this.segment += 1;
    const fileName = `${this.options.sessionId}-${Date.now()}-${String(this.segment).padStart(4, "0")}.jsonl`;
    const stream = createWriteStream(path.join(this.options.outputDir, fileName), { flags: "a" });
    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => resolve());
      stream.once("error", reject);
    });
    this.stream = stream;
    this.bytesWritten = 0;
    await this.pruneOldFiles();
  }

  private async pruneOldFiles() {
    try {
      const entries = await readdir(this.options.outputDir);
      const files = await Promise.all(
        entries
          .filter(entry => entry.endsWith(".jsonl"))
          .map(async entry => {
            const fullPath = path.join(this.options.outputDir, entry);
            const info = await stat(fullPath);
            return { fullPath, mtime: info.mtimeMs };
          })
      );
      if (files.length <= this.maxFiles) {
        return;
      }
      const sorted = files.sort((a, b) => b.mtime - a.mtime || b.fullPath.localeCompare(a.fullPath));
      await Promise.all(
        sorted.slice(this.maxFiles).map(file =>
          unlink(file.fullPath).catch(error => {
            this.options.logger?.warn("Failed to remove old log file", error);
          })
        )
      );
    } catch (error) {
      this.options.logger?.warn("Failed to prune log files", error);
    }
  }
}
