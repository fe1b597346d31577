/**
 * Call-stack introspection over V8 `Error.stack` text.
 */

import { fileURLToPath } from "node:url";
import type { StackFrame } from "./host-types.js";

/** Frames captured per stack; V8's default of 10 is too shallow */
const STACK_CAPTURE_LIMIT = 32;

/** Locations V8 prints for frames without a source file */
const SOURCELESS_LOCATIONS = new Set(["native", "<anonymous>", "unknown location"]);

const LOCATION_PATTERN = /^(.*?):(\d+)(?::\d+)?$/;

/** Strip a `file://` scheme so frames show plain paths */
function normalizeFile(file: string): string {
  if (!file.startsWith("file://")) return file;
  try {
    return fileURLToPath(file);
  } catch {
    return file;
  }
}

/**
 * Parse one `    at ...` line into a frame.
 * Returns undefined for lines that are not frames (e.g. the error header).
 */
export function parseStackLine(rawLine: string): StackFrame | undefined {
  const line = rawLine.trim();
  if (!line.startsWith("at ")) return undefined;

  const body = line.slice(3);
  const location =
    body.endsWith(")") && body.includes(" (")
      ? body.slice(body.lastIndexOf(" (") + 2, -1)
      : body.replace(/^async /, "");

  if (SOURCELESS_LOCATIONS.has(location) || location.startsWith("index ")) {
    return {};
  }

  const match = LOCATION_PATTERN.exec(location);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    return { file: normalizeFile(location) };
  }
  return { file: normalizeFile(match[1]), line: Number.parseInt(match[2], 10) };
}

/** Parse a full V8 stack string, innermost frame first */
export function parseStackTrace(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];
  for (const rawLine of stack.split("\n")) {
    const frame = parseStackLine(rawLine);
    if (frame !== undefined) {
      frames.push(frame);
    }
  }
  return frames;
}

/**
 * Capture the caller's stack. Frame 0 is the function that called
 * `captureStack`.
 */
export function captureStack(): StackFrame[] {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = STACK_CAPTURE_LIMIT;
  try {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, captureStack);
    return parseStackTrace(holder.stack ?? "");
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
}
