import type { LoadLogSnapshot } from "./types.js";

/**
 * Per-request load log. `totalLoaded` always equals the number of call
 * sites stored across all entries.
 */
export class LoadLog {
  private readonly byType = new Map<string, Map<string, string[]>>();
  private total = 0;

  append(typeName: string, identifier: string, callSite: string): void {
    let byId = this.byType.get(typeName);
    if (byId === undefined) {
      byId = new Map();
      this.byType.set(typeName, byId);
    }

    let callSites = byId.get(identifier);
    if (callSites === undefined) {
      callSites = [];
      byId.set(identifier, callSites);
    }

    callSites.push(callSite);
    this.total += 1;
  }

  get totalLoaded(): number {
    return this.total;
  }

  /** Deep copy in insertion order */
  snapshot(): LoadLogSnapshot {
    const copy = new Map<string, ReadonlyMap<string, readonly string[]>>();
    for (const [typeName, byId] of this.byType) {
      const ids = new Map<string, readonly string[]>();
      for (const [identifier, callSites] of byId) {
        ids.set(identifier, [...callSites]);
      }
      copy.set(typeName, ids);
    }
    return copy;
  }
}
