import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileLogSink } from "../../file-sink.js";

const FIXED_NOW = Date.UTC(2024, 0, 2, 3, 4, 5);

describe("FileLogSink", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "loadtrace-sink-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("appends timestamped entries", () => {
    const sink = new FileLogSink(tempDir, { now: () => FIXED_NOW });

    sink.append("first", "loads.log");
    sink.append("second", "loads.log");

    expect(readFileSync(path.join(tempDir, "loads.log"), "utf-8")).toBe(
      "2024-01-02T03:04:05.000Z first\n2024-01-02T03:04:05.000Z second\n",
    );
  });

  it("creates missing sub-directories", () => {
    const sink = new FileLogSink(tempDir, { now: () => FIXED_NOW });

    sink.append("nested", "debug/loads.log");

    expect(readFileSync(path.join(tempDir, "debug", "loads.log"), "utf-8")).toBe(
      "2024-01-02T03:04:05.000Z nested\n",
    );
  });

  it("resolves file names against the log directory", () => {
    const sink = new FileLogSink(tempDir);
    expect(sink.resolve("loads.log")).toBe(path.join(tempDir, "loads.log"));
  });
});
