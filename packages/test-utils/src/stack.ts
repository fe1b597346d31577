import type { StackFrame } from "@loadtrace/core";

/**
 * Build a synthetic stack of `count` frames: `<dir>/frame<i>.ts` at line
 * `(i + 1) * 10`, innermost first.
 */
export function makeFrames(count: number, dir = "/app/src"): StackFrame[] {
  return Array.from({ length: count }, (_, i) => ({
    file: `${dir}/frame${i}.ts`,
    line: (i + 1) * 10,
  }));
}

/**
 * Five plumbing frames followed by the given caller frames, so the caller
 * frames land exactly in the call-site window.
 */
export function stackWithCallers(...callers: StackFrame[]): StackFrame[] {
  return [...makeFrames(5, "/app/plumbing"), ...callers];
}
