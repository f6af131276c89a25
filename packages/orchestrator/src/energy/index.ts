export type { BudgetPort } from "./types";
export { HttpBudgetClient, TransportError, zeroSample, type HttpBudgetClientOptions } from "./httpClient";
export { LocalBudgetPort } from "./localPort";
