import { captureStack, type ModelLoadEvent } from "@loadtrace/core";
import { tryGetActiveCollector } from "./scope.js";
import type { ModelLoadObserverOptions } from "./types.js";

/**
 * Create the handler a data layer calls after each entity load.
 *
 * Loads outside a request scope, or while logging is off, are ignored
 * without capturing a stack.
 */
export function createModelLoadObserver(
  options?: ModelLoadObserverOptions,
): (event: ModelLoadEvent) => void {
  const stack = options?.stack ?? captureStack;

  return function onModelLoad(event: ModelLoadEvent): void {
    const collector = tryGetActiveCollector();
    if (collector === undefined || !collector.isRecording()) return;
    collector.record(event.typeName, String(event.identifier), stack());
  };
}

/** Type name of an entity instance, for dispatchers without an explicit one */
export function entityTypeName(entity: object): string {
  const ctor: unknown = entity.constructor;
  if (typeof ctor === "function" && ctor.name !== "") {
    return ctor.name;
  }
  return "Object";
}
