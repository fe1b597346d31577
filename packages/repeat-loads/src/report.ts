/**
 * Repeated load report — pure filtering and formatting.
 */

import { Buffer } from "node:buffer";
import { decodeHtmlEntities } from "@loadtrace/core";
import { REPORT_HEADER_FILL, REPORT_HEADER_WIDTH } from "./constants.js";
import type { LoadLogSnapshot } from "./types.js";

export interface ReportInput {
  /** Request URL, possibly HTML-entity encoded */
  readonly url: string;
  /** Loads across the unfiltered log */
  readonly totalLoaded: number;
  /** Output of filterRepeated() */
  readonly repeated: LoadLogSnapshot;
  /** Prefix stripped from locations */
  readonly rootDir: string;
}

/**
 * Drop every entry loaded at most once, then every type left empty.
 * Builds a new map; the input is not modified.
 */
export function filterRepeated(log: LoadLogSnapshot): LoadLogSnapshot {
  const repeated = new Map<string, ReadonlyMap<string, readonly string[]>>();
  for (const [typeName, byId] of log) {
    const kept = new Map<string, readonly string[]>();
    for (const [identifier, callSites] of byId) {
      if (callSites.length > 1) {
        kept.set(identifier, callSites);
      }
    }
    if (kept.size > 0) {
      repeated.set(typeName, kept);
    }
  }
  return repeated;
}

/** Remove `prefix` from the start of `location` when present */
export function stripRootDir(location: string, prefix: string): string {
  return prefix !== "" && location.startsWith(prefix) ? location.slice(prefix.length) : location;
}

/**
 * Center `text` in a line of `width` UTF-8 bytes; the extra fill character
 * of an odd split goes to the right.
 */
export function centerPad(text: string, width: number, fill: string): string {
  const extra = width - Buffer.byteLength(text, "utf8");
  if (extra <= 0 || fill === "") return text;
  const left = Math.floor(extra / 2);
  return fill.repeat(left) + text + fill.repeat(extra - left);
}

export function formatHeader(url: string): string {
  return centerPad(` ${decodeHtmlEntities(url)} `, REPORT_HEADER_WIDTH, REPORT_HEADER_FILL);
}

export function formatSummary(repeated: LoadLogSnapshot, rootDir: string): string {
  let summary = "Repeated model loads:\n";
  for (const [typeName, byId] of repeated) {
    summary += `${typeName}:\n`;
    for (const [identifier, callSites] of byId) {
      const locations = callSites.map((callSite) => stripRootDir(callSite, rootDir));
      summary += `- ID: ${identifier}, Count: ${locations.length}, Locations:\n`;
      summary += `  - ${locations.join("\n  - ")}\n`;
    }
  }
  return summary;
}

/**
 * Full report: a blank lead section, URL header, total and summary,
 * separated by blank lines. The text opens with four newlines.
 */
export function buildReport(input: ReportInput): string {
  return [
    "\n\n",
    formatHeader(input.url),
    `Total number of loaded models: ${input.totalLoaded}`,
    formatSummary(input.repeated, input.rootDir),
  ].join("\n\n");
}
