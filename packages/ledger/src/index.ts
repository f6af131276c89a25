export type { ListReceiptsOptions, ReceiptLedger } from "./types";
export { SqliteReceiptLedger } from "./sqliteLedger";
export { DurableReceiptWriter, type DurableReceiptWriterOptions } from "./durableWriter";
export { PersistenceError, ReceiptEncodingError } from "./errors";
