/**
 * node:http integration — one load trace scope per request/response pair.
 */

import { RequestLoadScope } from "./scope.js";
import { resolveLoadTraceOptions } from "./settings.js";
import type { LoadTraceOptions } from "./types.js";

/** The parts of an IncomingMessage the tracker reads */
export interface TrackedRequest {
  readonly url?: string | undefined;
  readonly headers: { readonly host?: string | undefined };
}

/** The parts of a ServerResponse the tracker uses */
export interface TrackedResponse {
  once(event: "close", listener: () => void): unknown;
}

/** Absolute URL of an incoming request */
export function requestUrl(req: TrackedRequest): string {
  return `http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`;
}

/**
 * Wrap a request listener so every request gets its own collector.
 * The report is written when the response closes.
 *
 * @throws {LoadTraceConfigurationError} if `options` are invalid
 */
export function withRepeatedLoadTracking<
  Req extends TrackedRequest,
  Res extends TrackedResponse,
  R,
>(listener: (req: Req, res: Res) => R, options: LoadTraceOptions): (req: Req, res: Res) => R {
  const resolved = resolveLoadTraceOptions(options);

  return (req, res) => {
    const scope = new RequestLoadScope({ url: requestUrl(req) }, resolved);
    res.once("close", () => scope.complete());
    return scope.enter(() => listener(req, res));
  };
}
