import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Receipt, ReceiptInput, TaskMetadata } from "@joulegate/shared";
import { ReceiptEncodingError } from "./errors";
import type { ListReceiptsOptions, ReceiptLedger } from "./types";

interface ReceiptRow {
  id: number;
  ts: number;
  task: string;
  joule: number;
  sec: number;
  delta: number;
  loss: number;
  delta_hash: string;
  meta: string;
}

type InsertParams = [number, string, number, number, number, number, string, string];

const DEFAULT_LIST_LIMIT = 100;

function parseMeta(raw: string): TaskMetadata {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return { value: parsed };
  } catch {
    return { raw };
  }
}

function toReceipt(row: ReceiptRow): Receipt {
  return {
    id: row.id,
    timestamp: row.ts,
    taskName: row.task,
    joulesCharged: row.joule,
    durationSec: row.sec,
    delta: row.delta,
    loss: row.loss,
    contentHash: row.delta_hash,
    metadata: parseMeta(row.meta)
  };
}

/**
 * Receipt ledger on better-sqlite3. WAL with `synchronous = FULL`, so a
 * receipt is on disk when `add` returns.
 */
export class SqliteReceiptLedger implements ReceiptLedger {
  private readonly db: Database.Database;
  private readonly insert: Database.Statement<InsertParams, unknown>;
  private readonly selectById: Database.Statement<[number], ReceiptRow>;
  private readonly selectCount: Database.Statement<[], { n: number }>;

  constructor(readonly dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS receipts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts REAL NOT NULL,
        task TEXT NOT NULL,
        joule REAL NOT NULL,
        sec REAL NOT NULL,
        delta REAL NOT NULL,
        loss REAL NOT NULL,
        delta_hash TEXT NOT NULL,
        meta TEXT NOT NULL
      )
    `);
    this.insert = this.db.prepare<InsertParams, unknown>(
      "INSERT INTO receipts (ts, task, joule, sec, delta, loss, delta_hash, meta) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
    );
    this.selectById = this.db.prepare<[number], ReceiptRow>("SELECT * FROM receipts WHERE id = ?");
    this.selectCount = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM receipts");
  }

  add(input: ReceiptInput): number {
    let meta: string;
    try {
      meta = JSON.stringify(input.metadata);
    } catch (error) {
      throw new ReceiptEncodingError(`Metadata for ${input.taskName} is not JSON-serializable`, { cause: error });
    }
    const info = this.insert.run(
      input.timestamp,
      input.taskName,
      input.joulesCharged,
      input.durationSec,
      input.delta,
      input.loss,
      input.contentHash,
      meta
    );
    return Number(info.lastInsertRowid);
  }

  get(id: number): Receipt | null {
    const row = this.selectById.get(id);
    return row ? toReceipt(row) : null;
  }

  list(options: ListReceiptsOptions = {}): Receipt[] {
    const limit = Math.max(0, Math.floor(options.limit ?? DEFAULT_LIST_LIMIT));
    const offset = Math.max(0, Math.floor(options.offset ?? 0));
    const order = options.order === "asc" ? "ASC" : "DESC";
    const rows = this.db
      .prepare<[number, number], ReceiptRow>(`SELECT * FROM receipts ORDER BY id ${order} LIMIT ? OFFSET ?`)
      .all(limit, offset);
    return rows.map(toReceipt);
  }

  count(): number {
    return this.selectCount.get()?.n ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
