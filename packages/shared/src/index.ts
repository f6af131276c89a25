export * from "./types";
export * from "./hash";
export * from "./backoff";
export * from "./observability";
export * from "./env/validator";
export * from "./env/schema";
export * from "./config";
