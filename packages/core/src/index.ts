export const PACKAGE_NAME = "@loadtrace/core" as const;

export { type Clock, defaultClock } from "./clock-types.js";
export { configPathToEnvVar, createEnvConfig, createMapConfig } from "./config-store.js";
export { FileLogSink } from "./file-sink.js";
export type {
  ConfigReader,
  ConfigValue,
  LogSink,
  ModelLoadEvent,
  StackFrame,
  StackProvider,
} from "./host-types.js";
export { decodeHtmlEntities } from "./html.js";
export {
  getRequestContext,
  type RequestContext,
  runWithRequestContext,
  tryGetRequestContext,
} from "./runtime-context.js";
export { captureStack, parseStackLine, parseStackTrace } from "./stack.js";
