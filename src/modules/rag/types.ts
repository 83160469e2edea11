import type { CorrelationContext } from "../../observability/logger.js";

export type RetrievedDocument = {
  docId: string;
  excerpt: string;
  score: number;
  title?: string;
  source?: string;
  language?: string;
};

export interface RetrieveOptions {
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

/** Similarity search over the general document corpus, ranked by score. */
export interface VectorRetriever {
  retrieve(query: string, k: number, options?: RetrieveOptions): Promise<RetrievedDocument[]>;
}
