export { FsBaseStore, isInsideDirectory, type BaseStore, type FsBaseStoreOptions } from "./baseStore";
export { MergeGate, type MergeCandidate, type MergeGateOptions } from "./gate";
