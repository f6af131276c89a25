export { JouleBucket, type JouleBucketOptions } from "./bucket";
export { BudgetService, type BudgetServiceOptions } from "./budgetService";
export { PowerSampler, type PowerSamplerOptions } from "./sampler";
export { AgentServer, parseTakeRequest } from "./server";
export { createReaders, startAgent, type AgentHandle, type StartAgentOptions } from "./main";
export * from "./readers";
