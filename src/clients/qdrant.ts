import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { withRetries } from "./request-policy.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: QdrantClient;
  collection: string;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

async function initialize(): Promise<QdrantSingleton> {
  const client = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await client.getCollections();
    },
    { retries: REQUEST_RETRIES, retryDelayMs: REQUEST_RETRY_DELAY_MS }
  );

  console.info("[clients/qdrant] initialized singleton");

  return {
    client,
    collection: config.QDRANT_COLLECTION,
    async healthCheck() {
      try {
        const { exists } = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} not found` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
