import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should count cache hits and misses per table", () => {
    metrics.recordCacheHit("shop/products");
    metrics.recordCacheHit("shop/products");
    metrics.recordCacheMiss("shop/products");

    expect(metrics.getMetrics("shop/products")).toMatchObject({ cacheHits: 2, cacheMisses: 1 });
    expect(metrics.getHitRate("shop/products")).toBeCloseTo(2 / 3);
  });

  it("should report a zero hit rate for unknown tables", () => {
    expect(metrics.getHitRate("shop/orders")).toBe(0);
    expect(metrics.getMetrics("shop/orders")).toBeUndefined();
  });

  it("should keep only the latest 100 timing samples", () => {
    for (let i = 1; i <= 120; i++) {
      metrics.recordQueryTime("shop/products", i);
    }

    const samples = metrics.getMetrics("shop/products")?.queryTimeMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(21);
    expect(samples[99]).toBe(120);
  });

  it("should compute the 95th percentile", () => {
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should track write and rebuild timings separately", () => {
    metrics.recordWriteTime("shop/products", 3);
    metrics.recordRebuildTime("shop/products", 7);

    expect(metrics.getMetrics("shop/products")).toMatchObject({ writeTimeMs: [3], rebuildTimeMs: [7], queryTimeMs: [] });
  });

  it("should reset one table or all of them", () => {
    metrics.recordCacheHit("shop/products");
    metrics.recordCacheHit("shop/orders");

    metrics.reset("shop/products");
    expect(metrics.getMetrics("shop/products")).toBeUndefined();
    expect(metrics.getAllMetrics().size).toBe(1);

    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
