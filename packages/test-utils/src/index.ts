export const PACKAGE_NAME = "@loadtrace/test-utils" as const;

export { MockConfigReader } from "./config.js";
export { MemoryLogSink, type SinkEntry } from "./sink.js";
export { makeFrames, stackWithCallers } from "./stack.js";
