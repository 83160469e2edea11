import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

export type LanguageModelPurpose = "classify" | "synthesize" | "interpret";
export type CacheName = "registry_query" | "registry_fulltext";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface CacheSummary {
  hits: number;
  misses: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  analysisLatency: LatencySummary;
  registryLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  languageModelLatency: Record<LanguageModelPurpose, LatencySummary>;
  cache: Record<CacheName, CacheSummary>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  analysisLatency: createLatencySummary(),
  registryLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  languageModelLatency: {
    classify: createLatencySummary(),
    synthesize: createLatencySummary(),
    interpret: createLatencySummary()
  },
  cache: {
    registry_query: { hits: 0, misses: 0 },
    registry_fulltext: { hits: 0, misses: 0 }
  },
  errorRates: {}
});

let state: MetricsState = createState();

const REQUEST_START_TIME = Symbol("request_start_time");

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordAnalysisLatency = (durationMs: number): void => {
  recordLatency(state.analysisLatency, durationMs);
};

export const recordRegistryLatency = (durationMs: number): void => {
  recordLatency(state.registryLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordLanguageModelLatency = (purpose: LanguageModelPurpose, durationMs: number): void => {
  recordLatency(state.languageModelLatency[purpose], durationMs);
};

export const recordCacheLookup = (cache: CacheName, hit: boolean): void => {
  if (hit) {
    state.cache[cache].hits += 1;
  } else {
    state.cache[cache].misses += 1;
  }
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  analysis_latency: serializeLatency(state.analysisLatency),
  registry_latency: serializeLatency(state.registryLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  language_model_latency: {
    classify: serializeLatency(state.languageModelLatency.classify),
    synthesize: serializeLatency(state.languageModelLatency.synthesize),
    interpret: serializeLatency(state.languageModelLatency.interpret)
  },
  cache: {
    registry_query: { ...state.cache.registry_query },
    registry_fulltext: { ...state.cache.registry_fulltext }
  },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

const readRequestStartTime = (request: FastifyRequest): number => {
  const value: unknown = Reflect.get(request, REQUEST_START_TIME);
  return typeof value === "number" ? value : Date.now();
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    Reflect.set(request, REQUEST_START_TIME, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    recordRequestLatency(Date.now() - readRequestStartTime(request));
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
