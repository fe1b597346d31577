import type { LogSink } from "@loadtrace/core";

export interface SinkEntry {
  readonly file: string;
  readonly message: string;
}

/**
 * LogSink keeping every append in memory.
 * Call `failWith()` to make subsequent appends throw.
 */
export class MemoryLogSink implements LogSink {
  readonly entries: SinkEntry[] = [];
  private failure: Error | undefined;

  append(message: string, file: string): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
    this.entries.push({ file, message });
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  /** Message of the last append, or undefined when nothing was written */
  get lastMessage(): string | undefined {
    return this.entries.at(-1)?.message;
  }
}
