/**
 * OTel span attributes for an emitted report.
 *
 * When no tracer provider is registered these calls are no-ops.
 */

import { trace } from "@opentelemetry/api";
import type { LoadLogSnapshot } from "./types.js";

/** Annotate the active span with the request's load totals */
export function recordReportTelemetry(totalLoaded: number, repeated: LoadLogSnapshot): void {
  const span = trace.getActiveSpan();
  if (span === undefined) return;

  let repeatedEntities = 0;
  for (const byId of repeated.values()) {
    repeatedEntities += byId.size;
  }
  span.setAttribute("model_loads.total", totalLoaded);
  span.setAttribute("model_loads.repeated_entities", repeatedEntities);
}
