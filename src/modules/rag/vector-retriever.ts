import { getOpenAIClient } from "../../clients/openai.js";
import { getQdrantClient } from "../../clients/qdrant.js";
import { CallAbortedError, withTimeout } from "../../clients/request-policy.js";
import { config } from "../../config/index.js";
import { logInfo } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { VectorRetrievalError } from "../analysis/errors.js";
import type { RetrieveOptions, RetrievedDocument, VectorRetriever } from "./types.js";

export interface QdrantVectorRetrieverDependencies {
  now?: () => number;
  embeddingModel?: string;
  timeoutMs?: number;
  getOpenAIClient?: typeof getOpenAIClient;
  getQdrantClient?: typeof getQdrantClient;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
}

type QdrantPoint = {
  id?: string | number;
  score?: number;
  payload?: Record<string, unknown> | null;
};

const pickFirstString = (source: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
};

export const normalizePoint = (point: QdrantPoint): RetrievedDocument | null => {
  const payload = point.payload ?? {};
  const docId =
    pickFirstString(payload, ["doc_id", "document_id", "id"]) ??
    (typeof point.id === "string" || typeof point.id === "number" ? String(point.id) : undefined);
  const excerpt = pickFirstString(payload, ["text", "content", "chunk", "page_content"]);
  if (!docId || !excerpt) {
    return null;
  }

  return {
    docId,
    excerpt,
    score: typeof point.score === "number" ? point.score : 0,
    title: pickFirstString(payload, ["title", "document_title"]),
    source: pickFirstString(payload, ["source", "url", "file_name", "path"]),
    language: pickFirstString(payload, ["language", "lang"])?.toLowerCase()
  };
};

/** Default corpus adapter: OpenAI embeddings searched against a Qdrant collection. */
export class QdrantVectorRetriever implements VectorRetriever {
  private readonly now: () => number;
  private readonly embeddingModel: string;
  private readonly timeoutMs: number;
  private readonly getOpenAIClient: typeof getOpenAIClient;
  private readonly getQdrantClient: typeof getQdrantClient;
  private readonly recordRetrievalLatency: typeof recordRetrievalLatency;
  private readonly logInfo: typeof logInfo;

  constructor(dependencies: QdrantVectorRetrieverDependencies = {}) {
    this.now = dependencies.now ?? Date.now;
    this.embeddingModel = dependencies.embeddingModel ?? config.OPENAI_EMBEDDING_MODEL;
    this.timeoutMs = dependencies.timeoutMs ?? config.LLM_TIMEOUT_MS;
    this.getOpenAIClient = dependencies.getOpenAIClient ?? getOpenAIClient;
    this.getQdrantClient = dependencies.getQdrantClient ?? getQdrantClient;
    this.recordRetrievalLatency = dependencies.recordRetrievalLatency ?? recordRetrievalLatency;
    this.logInfo = dependencies.logInfo ?? logInfo;
  }

  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<RetrievedDocument[]> {
    const text = query.trim();
    if (!text) {
      return [];
    }

    const startedAt = this.now();
    const limit = Math.max(1, k);
    let points: QdrantPoint[];
    try {
      const embedding = await this.embed(text, options.signal);
      const { client, collection } = await this.getQdrantClient();
      points = await withTimeout(
        () =>
          client.search(collection, {
            vector: embedding,
            limit,
            with_payload: true,
            with_vector: false
          }),
        { label: "qdrant.search", timeoutMs: this.timeoutMs, signal: options.signal }
      );
    } catch (error) {
      if (error instanceof CallAbortedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown retrieval error";
      throw new VectorRetrievalError(`Vector retrieval failed: ${message}`, { cause: error });
    }

    const documents = points
      .map(normalizePoint)
      .filter((document): document is RetrievedDocument => document !== null)
      .sort((left, right) => right.score - left.score)
      .slice(0, limit);

    const latencyMs = this.now() - startedAt;
    this.recordRetrievalLatency(latencyMs);
    this.logInfo("rag.retrieve.complete", options.correlation ?? {}, {
      latency_ms: latencyMs,
      raw_point_count: points.length,
      result_count: documents.length,
      dropped_point_count: Math.max(0, points.length - documents.length)
    });

    return documents;
  }

  private async embed(text: string, signal: AbortSignal | undefined): Promise<number[]> {
    const { client } = await this.getOpenAIClient();
    const response = await withTimeout(
      (callSignal) => client.embeddings.create({ model: this.embeddingModel, input: text }, { signal: callSignal }),
      { label: "openai.embeddings", timeoutMs: this.timeoutMs, signal }
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error("Embedding response missing vector payload.");
    }
    return embedding;
  }
}
