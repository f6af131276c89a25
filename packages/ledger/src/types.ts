import type { Receipt, ReceiptInput } from "@joulegate/shared";

export interface ListReceiptsOptions {
  limit?: number;
  offset?: number;
  /** Defaults to newest first. */
  order?: "asc" | "desc";
}

/**
 * Append-only receipt store. `add` returns once the receipt is durable.
 */
export interface ReceiptLedger {
  add(input: ReceiptInput): number;
  get(id: number): Receipt | null;
  list(options?: ListReceiptsOptions): Receipt[];
  count(): number;
  close(): void;
}
