import {
  LogLevel,
  abortableSleep,
  describeError,
  noopLogger,
  type BackoffPolicy,
  type ComponentLogger,
  type ReceiptInput,
  type Sleep
} from "@joulegate/shared";
import { PersistenceError, ReceiptEncodingError } from "./errors";
import type { ReceiptLedger } from "./types";

export interface DurableReceiptWriterOptions {
  ledger: ReceiptLedger;
  backoff: BackoffPolicy;
  /**
   * 0 keeps retrying until the write succeeds or the signal aborts. A
   * ReceiptEncodingError is never retried.
   */
  maxAttempts?: number;
  logger?: ComponentLogger;
  sleep?: Sleep;
}

/**
 * Writes receipts through a ledger, retrying failed writes. A receipt is
 * never dropped silently: it is either stored or surfaced in a
 * PersistenceError.
 */
export class DurableReceiptWriter {
  private readonly maxAttempts: number;
  private readonly logger: ComponentLogger;
  private readonly sleep: Sleep;

  constructor(private readonly options: DurableReceiptWriterOptions) {
    this.maxAttempts = Math.max(0, Math.floor(options.maxAttempts ?? 0));
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  async append(receipt: ReceiptInput, signal?: AbortSignal): Promise<number> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        const id = this.options.ledger.add(receipt);
        if (attempt > 1) {
          this.logger.log(LogLevel.WARN, "receipt_write_recovered", { id, attempts: attempt });
        }
        return id;
      } catch (error) {
        const exhausted = (this.maxAttempts > 0 && attempt >= this.maxAttempts) || error instanceof ReceiptEncodingError;
        this.logger.log(
          LogLevel.CRITICAL,
          "receipt_write_failed",
          { attempt, error: describeError(error), receipt: { ...receipt } },
          { dedupParts: ["receipt_write_failed", receipt.taskName, receipt.timestamp] }
        );
        if (exhausted) {
          throw new PersistenceError(
            `Receipt for ${receipt.taskName} not persisted after ${attempt} attempts`,
            receipt,
            attempt,
            { cause: error }
          );
        }
        if (signal?.aborted) {
          throw new PersistenceError(`Receipt for ${receipt.taskName} not persisted: shutdown requested`, receipt, attempt, {
            cause: error
          });
        }
        await this.sleep(this.options.backoff.delayFor(attempt), signal);
      }
    }
  }
}
