import { beforeEach, describe, expect, it } from "vitest";
import {
  getMetricsSnapshot,
  recordCacheLookup,
  recordErrorRate,
  recordLanguageModelLatency,
  recordRegistryLatency,
  resetMetrics
} from "../../src/observability/metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("summarizes latencies with two decimals", () => {
    recordRegistryLatency(10);
    recordRegistryLatency(20.5);
    recordRegistryLatency(-5);

    expect(getMetricsSnapshot().registry_latency).toEqual({ count: 3, avgMs: 10.17, minMs: 0, maxMs: 20.5 });
  });

  it("keeps per-purpose language model latency", () => {
    recordLanguageModelLatency("interpret", 40);

    expect(getMetricsSnapshot().language_model_latency).toEqual({
      classify: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      synthesize: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      interpret: { count: 1, avgMs: 40, minMs: 40, maxMs: 40 }
    });
  });

  it("counts cache hits, misses and errors", () => {
    recordCacheLookup("registry_query", false);
    recordCacheLookup("registry_query", true);
    recordCacheLookup("registry_fulltext", true);
    recordErrorRate("validation_422");
    recordErrorRate("validation_422");

    const snapshot = getMetricsSnapshot();
    expect(snapshot.cache).toEqual({
      registry_query: { hits: 1, misses: 1 },
      registry_fulltext: { hits: 1, misses: 0 }
    });
    expect(snapshot.error_rates).toEqual({ validation_422: 2 });
  });
});
