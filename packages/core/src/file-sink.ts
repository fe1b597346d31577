import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import { type Clock, defaultClock } from "./clock-types.js";
import type { LogSink } from "./host-types.js";

/**
 * Log sink appending timestamped entries to files under a log directory.
 *
 * Each append writes `"<ISO timestamp> <message>\n"` synchronously. The
 * directory is created on first write. Write errors are thrown to the caller.
 */
export class FileLogSink implements LogSink {
  private readonly logDir: string;
  private readonly clock: Clock;

  constructor(logDir: string, clock: Clock = defaultClock) {
    this.logDir = logDir;
    this.clock = clock;
  }

  /** Absolute path a given log file name resolves to */
  resolve(file: string): string {
    return path.resolve(this.logDir, file);
  }

  append(message: string, file: string): void {
    const target = this.resolve(file);
    mkdirSync(path.dirname(target), { recursive: true });
    const timestamp = new Date(this.clock.now()).toISOString();
    appendFileSync(target, `${timestamp} ${message}\n`, "utf-8");
  }
}
