/**
 * Request scope — binds one collector to one request and completes it once.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { type RequestContext, runWithRequestContext } from "@loadtrace/core";
import { LoadTraceReportError, LoadTraceScopeError, toError } from "@loadtrace/errors";
import { RepeatedLoadCollector } from "./collector.js";
import { resolveLoadTraceOptions } from "./settings.js";
import type { LoadTraceOptions, LoadTraceRequest, ResolvedLoadTraceOptions } from "./types.js";

const collectorStorage = new AsyncLocalStorage<RepeatedLoadCollector>();

/**
 * Explicit request-scoped context: owns the collector and its completion
 * hook. `complete()` flushes exactly once and never throws.
 */
export class RequestLoadScope {
  readonly requestId: string;
  readonly url: string;
  readonly collector: RepeatedLoadCollector;

  private readonly options: ResolvedLoadTraceOptions;
  private readonly context: RequestContext;
  private completed = false;

  constructor(request: LoadTraceRequest, options: ResolvedLoadTraceOptions) {
    this.requestId = request.requestId ?? randomUUID();
    this.url = request.url;
    this.options = options;
    this.context = { requestId: this.requestId, url: this.url };
    this.collector = new RepeatedLoadCollector(options);
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  /** Run `fn` with this scope's collector (and request context) active */
  enter<T>(fn: () => T): T {
    return runWithRequestContext(this.context, () => collectorStorage.run(this.collector, fn));
  }

  /**
   * Completion hook: flush the collector inside this request's context, so
   * it runs the same from a `finally` or a later lifecycle event. Report
   * failures go to onError.
   */
  complete(): void {
    if (this.completed) return;
    this.completed = true;

    try {
      runWithRequestContext(this.context, () => this.collector.flush());
    } catch (error) {
      this.options.onError(new LoadTraceReportError(this.requestId, toError(error)));
    }
  }
}

/**
 * Run a request handler with repeated load tracking.
 *
 * The scope is completed once `fn` settles, whether it resolves or throws.
 * Rejects with LoadTraceConfigurationError before `fn` runs if `options`
 * are invalid.
 */
export async function runWithLoadTrace<T>(
  request: LoadTraceRequest,
  fn: () => T | Promise<T>,
  options: LoadTraceOptions,
): Promise<T> {
  const scope = new RequestLoadScope(request, resolveLoadTraceOptions(options));
  try {
    return await scope.enter(fn);
  } finally {
    scope.complete();
  }
}

/**
 * Get the collector of the current request.
 *
 * @throws {LoadTraceScopeError} if called outside a request scope
 */
export function getActiveCollector(): RepeatedLoadCollector {
  const collector = collectorStorage.getStore();
  if (collector === undefined) {
    throw new LoadTraceScopeError();
  }
  return collector;
}

/** Get the collector of the current request, or undefined outside one */
export function tryGetActiveCollector(): RepeatedLoadCollector | undefined {
  return collectorStorage.getStore();
}
