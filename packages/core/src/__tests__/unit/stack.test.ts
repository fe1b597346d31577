import { describe, expect, it } from "vitest";
import { captureStack, parseStackLine, parseStackTrace } from "../../stack.js";

describe("parseStackLine", () => {
  it("parses named frames", () => {
    expect(parseStackLine("    at loadProduct (/srv/app/src/catalog.ts:42:13)")).toEqual({
      file: "/srv/app/src/catalog.ts",
      line: 42,
    });
  });

  it("parses anonymous frames", () => {
    expect(parseStackLine("    at /srv/app/src/index.ts:7:1")).toEqual({
      file: "/srv/app/src/index.ts",
      line: 7,
    });
  });

  it("parses constructor and async frames", () => {
    expect(parseStackLine("    at new Repository (/srv/app/src/repo.ts:3:9)")).toEqual({
      file: "/srv/app/src/repo.ts",
      line: 3,
    });
    expect(parseStackLine("    at async /srv/app/src/handler.ts:18:5")).toEqual({
      file: "/srv/app/src/handler.ts",
      line: 18,
    });
  });

  it("converts file URLs to paths", () => {
    expect(parseStackLine("    at run (file:///srv/app/dist/main.js:10:2)")).toEqual({
      file: "/srv/app/dist/main.js",
      line: 10,
    });
  });

  it("keeps locations without a line number as file only", () => {
    expect(parseStackLine("    at node:internal/process/task_queues")).toEqual({
      file: "node:internal/process/task_queues",
    });
  });

  it("returns an empty frame for sourceless locations", () => {
    expect(parseStackLine("    at Array.map (<anonymous>)")).toEqual({});
    expect(parseStackLine("    at Math.max (native)")).toEqual({});
    expect(parseStackLine("    at async Promise.all (index 0)")).toEqual({});
  });

  it("ignores non-frame lines", () => {
    expect(parseStackLine("Error: boom")).toBeUndefined();
    expect(parseStackLine("")).toBeUndefined();
  });
});

describe("parseStackTrace", () => {
  it("returns frames innermost first, skipping the header", () => {
    const stack = [
      "Error",
      "    at inner (/srv/a.ts:1:1)",
      "    at outer (/srv/b.ts:2:2)",
    ].join("\n");

    expect(parseStackTrace(stack)).toEqual([
      { file: "/srv/a.ts", line: 1 },
      { file: "/srv/b.ts", line: 2 },
    ]);
  });
});

describe("captureStack", () => {
  it("starts at the caller of captureStack", () => {
    function callerUnderTest() {
      return captureStack();
    }

    const frames = callerUnderTest();
    expect(frames.length).toBeGreaterThan(1);
    expect(frames[0]?.file).toMatch(/stack\.test\.ts$/);
  });

  it("restores Error.stackTraceLimit", () => {
    const before = Error.stackTraceLimit;
    captureStack();
    expect(Error.stackTraceLimit).toBe(before);
  });
});
