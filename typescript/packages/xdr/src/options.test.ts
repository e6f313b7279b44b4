import { describe, it, expect } from "vitest";
import type { PaddingPolicy } from "./binary/padding.ts";
import { createLogger, silentLogger } from "./logging.ts";
import { DEFAULT_CODEC_OPTIONS, resolveOptions } from "./options.ts";

describe("resolveOptions", () => {
  it("fills in defaults", () => {
    const resolved = resolveOptions();

    expect(resolved.padding).toBe(DEFAULT_CODEC_OPTIONS.padding);
    expect(resolved.strictPadding).toBe(true);
    expect(resolved.exact).toBe(false);
    expect(resolved.maxLength).toBeUndefined();
    expect(resolved.registry.size).toBe(0);
    expect(resolved.logger.namespace).toBe("xdr:codec");
  });

  it("keeps what the caller set", () => {
    const registry = new Map();
    const resolved = resolveOptions({
      padding: "legacy",
      strictPadding: false,
      maxLength: 0,
      registry,
      exact: true,
      logger: silentLogger,
    });

    expect(resolved).toEqual({
      padding: "legacy",
      strictPadding: false,
      maxLength: 0,
      registry,
      exact: true,
      logger: silentLogger,
    });
  });

  it("rejects an unknown padding policy", () => {
    // Options arriving from configuration files are not checked by the compiler
    const config: { padding: PaddingPolicy } = JSON.parse('{"padding":"none"}');
    expect(() => resolveOptions(config)).toThrow(new TypeError("unknown padding policy: none"));
  });

  it("rejects a bad maxLength", () => {
    expect(() => resolveOptions({ maxLength: -1 })).toThrow("maxLength must be a non-negative integer, got -1");
    expect(() => resolveOptions({ maxLength: 1.5 })).toThrow(TypeError);
  });

  it("shares one default logger", () => {
    expect(resolveOptions().logger).toBe(resolveOptions().logger);
    expect(createLogger("xdr:codec")).not.toBe(resolveOptions().logger);
  });
});
