export { PolicyTable, type PolicyEntry } from "./policy";
export {
  Scheduler,
  type IterationOutcome,
  type ReceiptSink,
  type SchedulerOptions,
  type SchedulerState,
  type SchedulerStats
} from "./scheduler";
