import type { StackFrame } from "@loadtrace/core";
import { DISPATCH_FRAME_SKIP, MAX_CONTEXT_FRAMES, UNKNOWN_LOCATION } from "./constants.js";

/** Render one frame as `file:line`, `file`, or `unknown:line` */
export function formatFrame(frame: StackFrame): string {
  const file = frame.file !== undefined && frame.file !== "" ? frame.file : UNKNOWN_LOCATION;
  return frame.line !== undefined ? `${file}:${frame.line}` : file;
}

/**
 * Build the call site for a load: skip the dispatch plumbing frames and
 * join up to MAX_CONTEXT_FRAMES of the remaining ones.
 *
 * A stack that ends inside the plumbing yields `"unknown"`.
 */
export function buildCallSite(callStack: readonly StackFrame[]): string {
  const window = callStack.slice(DISPATCH_FRAME_SKIP, DISPATCH_FRAME_SKIP + MAX_CONTEXT_FRAMES);
  if (window.length === 0) {
    return UNKNOWN_LOCATION;
  }
  return window.map(formatFrame).join(", ");
}
