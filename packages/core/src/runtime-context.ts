/**
 * Runtime context — per-request context propagation via AsyncLocalStorage
 *
 * Any package can call getRequestContext() / tryGetRequestContext() to
 * reach the current request without parameter drilling.
 */

import { AsyncLocalStorage } from "node:async_hooks";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Immutable per-request context available throughout the async call chain.
 */
export interface RequestContext {
  /** Unique request identifier (always present) */
  readonly requestId: string;
  /** Current request URL; may still be HTML-entity encoded */
  readonly url: string;
  /** Arbitrary metadata (frozen at runtime) */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// AsyncLocalStorage singleton + accessors
// ---------------------------------------------------------------------------

const contextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request's context.
 *
 * @throws {Error} if called outside an active request (no runWithRequestContext wrapper)
 */
export function getRequestContext(): RequestContext {
  const ctx = contextStorage.getStore();
  if (ctx === undefined) {
    throw new Error(
      "RequestContext not initialized — getRequestContext() was called outside an active request. " +
        "Ensure request handling is wrapped with runWithRequestContext().",
    );
  }
  return ctx;
}

/**
 * Try to get the current request's context.
 *
 * @returns The context if inside an active request, or `undefined` otherwise.
 */
export function tryGetRequestContext(): RequestContext | undefined {
  return contextStorage.getStore();
}

/**
 * Run a function within a request context scope.
 *
 * The context (and its metadata) is frozen before being stored.
 */
export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  const frozen = Object.freeze({
    ...ctx,
    ...(ctx.metadata !== undefined ? { metadata: Object.freeze({ ...ctx.metadata }) } : {}),
  });
  return contextStorage.run(frozen, fn);
}
