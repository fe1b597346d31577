/**
 * Host collaborator contracts.
 *
 * The load tracer never talks to a framework directly: configuration,
 * log output, stack introspection and load notifications all arrive
 * through these interfaces.
 */

/** Raw value returned by a config store lookup */
export type ConfigValue = string | number | boolean | null | undefined;

/** Key-value configuration lookup by slash-separated path */
export interface ConfigReader {
  getValue(path: string): ConfigValue;
}

/** Append-only text sink addressed by file name */
export interface LogSink {
  append(message: string, file: string): void;
}

/** One frame of a call stack; either part may be unknown */
export interface StackFrame {
  readonly file?: string | undefined;
  readonly line?: number | undefined;
}

/** Returns the current call stack, innermost frame first */
export type StackProvider = () => readonly StackFrame[];

/**
 * Notification emitted by a data layer each time an entity is loaded
 * by identifier.
 */
export interface ModelLoadEvent {
  /** Entity type name (supplied by the dispatcher, e.g. "Product") */
  readonly typeName: string;
  /** Load key; numbers are treated as their string form */
  readonly identifier: string | number;
}
