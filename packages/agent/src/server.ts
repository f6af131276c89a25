import http from "node:http";
import { performance } from "node:perf_hooks";
import {
  LogLevel,
  describeError,
  noopLogger,
  toSampleResponse,
  type ComponentLogger,
  type TakeResponse
} from "@joulegate/shared";
import type { BudgetService } from "./budgetService";

const MAX_BODY_BYTES = 64 * 1024;

interface AgentServerConfig {
  host: string;
  port: number;
}

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BadRequestError("request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

export function parseTakeRequest(raw: string): number {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    throw new BadRequestError("body is not valid JSON");
  }
  if (typeof body !== "object" || body === null || !("joules" in body)) {
    throw new BadRequestError("body must be an object with a joules field");
  }
  const { joules } = body;
  if (typeof joules !== "number" || !Number.isFinite(joules) || joules < 0) {
    throw new BadRequestError("joules must be a non-negative finite number");
  }
  return joules;
}

/**
 * HTTP boundary of the budget service: `GET /v1/sample`,
 * `POST /v1/take` and `GET /health`.
 */
export class AgentServer {
  private server?: http.Server;
  private readonly startedAt = performance.now();

  constructor(
    private readonly config: AgentServerConfig,
    private readonly service: BudgetService,
    private readonly logger: ComponentLogger = noopLogger
  ) {}

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch(error => {
        this.logger.log(LogLevel.ERROR, "request_failed", { url: req.url, error: describeError(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { error: "internal error" });
        }
      });
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    this.logger.log(LogLevel.INFO, "agent_listening", { host: this.config.host, port: this.port() });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  /** Bound port; differs from the configured one when that was 0. */
  port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.port;
  }

  url(): string {
    return `http://${this.config.host}:${this.port()}`;
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const pathname = new URL(req.url ?? "/", "http://agent.local").pathname;

    if (pathname === "/v1/sample" && req.method === "GET") {
      sendJson(res, 200, toSampleResponse(this.service.sample()));
      return;
    }

    if (pathname === "/v1/take" && req.method === "POST") {
      let joules: number;
      try {
        joules = parseTakeRequest(await readBody(req));
      } catch (error) {
        if (!(error instanceof BadRequestError)) {
          throw error;
        }
        const body: TakeResponse = {
          ok: false,
          remaining_j: this.service.sample().bucketJoules,
          error: error.message
        };
        this.logger.log(LogLevel.WARN, "take_rejected", { reason: error.message });
        sendJson(res, 400, body);
        return;
      }
      const result = this.service.take(joules);
      const body: TakeResponse = { ok: result.ok, remaining_j: result.remainingJoules };
      sendJson(res, 200, body);
      return;
    }

    if (pathname === "/health" && req.method === "GET") {
      sendJson(res, 200, { ok: true, uptime_s: (performance.now() - this.startedAt) / 1000 });
      return;
    }

    sendJson(res, 404, { error: `no route for ${req.method ?? "?"} ${pathname}` });
  }
}
