import { describe, it, expect } from "vitest";
import { EngineConfigSchema, parseConfig } from "../config.js";

describe("EngineConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.rules).toEqual({ dir: "./rules", activeFile: "rules_active.json" });
    expect(config.store.path).toBe(":memory:");
    expect(config.detection.concurrency).toBe(4);
    expect(config.detection.businessHours).toEqual({ start: 8, end: 18 });
    expect(config.logLevel).toBe("info");
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      rules: { dir: "/srv/rules" },
      detection: { concurrency: 16, historyWindowMs: 86_400_000, businessHours: { start: 6, end: 22 } },
    });
    expect(config.rules.dir).toBe("/srv/rules");
    expect(config.detection.concurrency).toBe(16);
    expect(config.detection.historyWindowMs).toBe(86_400_000);
    expect(config.detection.businessHours).toEqual({ start: 6, end: 22 });
  });

  it("rejects a non-positive concurrency", () => {
    expect(EngineConfigSchema.safeParse({ detection: { concurrency: 0 } }).success).toBe(false);
  });

  it("rejects business hours that end before they start", () => {
    const result = EngineConfigSchema.safeParse({ detection: { businessHours: { start: 18, end: 8 } } });
    expect(result.success).toBe(false);
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ logLevel: "trace" })).toThrow();
  });
});
