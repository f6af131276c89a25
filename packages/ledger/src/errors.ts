import type { ReceiptInput } from "@joulegate/shared";

/**
 * A receipt could not be made durable. Energy for the attempt has already
 * been debited, so the receipt travels with the error for manual recovery.
 */
export class PersistenceError extends Error {
  readonly receipt: ReceiptInput;
  readonly attempts: number;

  constructor(message: string, receipt: ReceiptInput, attempts: number, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.receipt = receipt;
    this.attempts = attempts;
  }
}

/** The receipt itself cannot be stored; retrying will not help. */
export class ReceiptEncodingError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ReceiptEncodingError";
  }
}
