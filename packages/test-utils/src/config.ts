import type { ConfigReader, ConfigValue } from "@loadtrace/core";
import { vi } from "vitest";

/**
 * Mutable ConfigReader for testing.
 *
 * `getValue` is a vitest mock, so lookups can be asserted against.
 *
 * @example
 * ```typescript
 * const config = new MockConfigReader({ "dev/aoe_modelcache/log_active": "1" });
 * config.set("dev/aoe_modelcache/log_active", "0");
 * expect(config.getValue).toHaveBeenCalledWith("dev/aoe_modelcache/log_active");
 * ```
 */
export class MockConfigReader implements ConfigReader {
  private readonly values: Map<string, ConfigValue>;

  readonly getValue: (path: string) => ConfigValue = vi.fn<(path: string) => ConfigValue>(
    (path: string) => this.values.get(path),
  );

  constructor(values: Readonly<Record<string, ConfigValue>> = {}) {
    this.values = new Map(Object.entries(values));
  }

  set(path: string, value: ConfigValue): void {
    this.values.set(path, value);
  }
}
