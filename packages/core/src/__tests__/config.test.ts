import { ZodError } from "zod";
import { defaultQueryConfig, resolveConfig } from "../config.js";

describe("resolveConfig", () => {
  test("fills in defaults", () => {
    expect(resolveConfig()).toEqual({
      refetchDuration: 4_000,
      cacheDuration: 300_000,
      shouldRethrow: false,
      storeQuery: true,
    });
    expect(defaultQueryConfig).toEqual(resolveConfig({}));
  });

  test("keeps overrides", () => {
    const config = resolveConfig({ refetchDuration: 0, shouldRethrow: true });
    expect(config.refetchDuration).toBe(0);
    expect(config.shouldRethrow).toBe(true);
    expect(config.cacheDuration).toBe(300_000);
  });

  test("rejects negative and fractional durations", () => {
    expect(() => resolveConfig({ cacheDuration: -1 })).toThrow(ZodError);
    expect(() => resolveConfig({ refetchDuration: 1.5 })).toThrow(ZodError);
  });

  test("rejects unknown fields", () => {
    expect(() => resolveConfig(JSON.parse('{"refetchDurationMs":10}'))).toThrow(
      ZodError
    );
  });
});
