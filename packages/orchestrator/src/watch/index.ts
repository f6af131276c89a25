export * from "./rateMeter";
export { runWatch, type SampleSource, type WatchOptions } from "./watch";
