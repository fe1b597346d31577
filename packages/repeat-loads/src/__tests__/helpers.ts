import { MemoryLogSink, MockConfigReader } from "@loadtrace/test-utils";
import { CONFIG_PATHS } from "../constants.js";
import { resolveLoadTraceOptions } from "../settings.js";
import type { LoadTraceOptions, ResolvedLoadTraceOptions } from "../types.js";

export const TEST_URL = "https://shop.test/catalog/product/view/id/7";

export interface Harness {
  readonly config: MockConfigReader;
  readonly sink: MemoryLogSink;
  readonly options: LoadTraceOptions;
  readonly resolved: ResolvedLoadTraceOptions;
}

/** Logging on, diagnostics on, root "/app/" */
export function makeHarness(overrides: Partial<LoadTraceOptions> = {}): Harness {
  const config = new MockConfigReader({
    [CONFIG_PATHS.LOG_ACTIVE]: "1",
    [CONFIG_PATHS.LOG_FILE]: "loads.log",
  });
  const sink = new MemoryLogSink();
  const options: LoadTraceOptions = {
    config,
    sink,
    rootDir: "/app",
    diagnosticsEnabled: () => true,
    ...overrides,
  };
  return { config, sink, options, resolved: resolveLoadTraceOptions(options) };
}
