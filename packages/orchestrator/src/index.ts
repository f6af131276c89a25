export * from "./energy";
export * from "./tasks";
export * from "./merge";
export * from "./scheduler";
export * from "./watch";
export { createOrchestrator, runOrchestrator, type OrchestratorHandle, type OrchestratorOptions } from "./main";
