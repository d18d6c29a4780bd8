import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_ENGINE_CONFIG, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dbPath: "storage/learning.db",
      vendorHistoryPath: "data/vendor_history.json",
      advisoryTimeoutMs: 15000,
      engine: DEFAULT_ENGINE_CONFIG,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      INVOICE_DB_PATH: "/tmp/test.db",
      VENDOR_CONFIDENCE_THRESHOLD: "0.9",
      MATH_EPSILON: "0.05",
      ADVISORY_TIMEOUT_MS: "2500",
    });

    expect(config.dbPath).toBe("/tmp/test.db");
    expect(config.advisoryTimeoutMs).toBe(2500);
    expect(config.engine.vendorConfidenceThreshold).toBe(0.9);
    expect(config.engine.mathEpsilon).toBe(0.05);
    expect(config.engine.priceHighRatio).toBe(1.5);
  });

  it("rejects values out of range", () => {
    expect(() => loadConfig({ VENDOR_CONFIDENCE_THRESHOLD: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ ADVISORY_TIMEOUT_MS: "soon" })).toThrow(/ADVISORY_TIMEOUT_MS/);
  });
});
