import { stackWithCallers } from "@loadtrace/test-utils";
import { describe, expect, it, vi } from "vitest";
import { CONFIG_PATHS } from "../constants.js";
import { createModelLoadObserver, entityTypeName } from "../observer.js";
import { RequestLoadScope } from "../scope.js";
import { makeHarness, TEST_URL } from "./helpers.js";

describe("createModelLoadObserver", () => {
  it("ignores loads outside a request scope without capturing a stack", () => {
    const stack = vi.fn(() => stackWithCallers({ file: "/app/a.ts", line: 1 }));
    const observe = createModelLoadObserver({ stack });

    expect(() => observe({ typeName: "Product", identifier: 1 })).not.toThrow();
    expect(stack).not.toHaveBeenCalled();
  });

  it("skips stack capture while logging is off", () => {
    const { resolved, config } = makeHarness();
    config.set(CONFIG_PATHS.LOG_ACTIVE, "0");
    const scope = new RequestLoadScope({ url: TEST_URL }, resolved);
    const stack = vi.fn(() => stackWithCallers({ file: "/app/a.ts", line: 1 }));
    const observe = createModelLoadObserver({ stack });

    scope.enter(() => observe({ typeName: "Product", identifier: 1 }));

    expect(stack).not.toHaveBeenCalled();
    expect(scope.collector.totalLoaded).toBe(0);
  });

  it("skips stack capture once the scope is complete", () => {
    const { resolved } = makeHarness();
    const scope = new RequestLoadScope({ url: TEST_URL }, resolved);
    const stack = vi.fn(() => stackWithCallers({ file: "/app/a.ts", line: 1 }));
    const observe = createModelLoadObserver({ stack });

    scope.complete();
    scope.enter(() => observe({ typeName: "Product", identifier: 1 }));

    expect(stack).not.toHaveBeenCalled();
  });

  it("records into the active collector with a stringified identifier", () => {
    const { resolved } = makeHarness();
    const scope = new RequestLoadScope({ url: TEST_URL }, resolved);
    const observe = createModelLoadObserver({
      stack: () => stackWithCallers({ file: "/app/src/list.ts", line: 21 }),
    });

    scope.enter(() => observe({ typeName: "Category", identifier: 12 }));

    expect(scope.collector.snapshot().get("Category")?.get("12")).toEqual(["/app/src/list.ts:21"]);
  });

  it("captures the real call stack by default", () => {
    const { resolved } = makeHarness();
    const scope = new RequestLoadScope({ url: TEST_URL }, resolved);
    const observe = createModelLoadObserver();

    scope.enter(() => observe({ typeName: "Product", identifier: "sku-1" }));

    const callSites = scope.collector.snapshot().get("Product")?.get("sku-1");
    expect(callSites).toHaveLength(1);
    expect(typeof callSites?.[0]).toBe("string");
    expect(callSites?.[0]).not.toBe("");
  });
});

describe("entityTypeName", () => {
  it("uses the constructor name", () => {
    class Product {}
    expect(entityTypeName(new Product())).toBe("Product");
  });

  it("falls back to Object for plain and prototype-less objects", () => {
    expect(entityTypeName({})).toBe("Object");
    expect(entityTypeName(Object.create(null))).toBe("Object");
  });
});
