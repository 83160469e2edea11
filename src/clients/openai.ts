import OpenAI from "openai";
import { config } from "../config/index.js";
import { withRetries, withTimeout } from "./request-policy.js";

type HealthStatus = "ok" | "error";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;
const HEALTH_CHECK_RETRIES = 2;
const HEALTH_CHECK_RETRY_DELAY_MS = 300;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  // Retries and timeouts are applied per call shape by the language-model adapter.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: config.LLM_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(
          async () =>
            withTimeout(
              async (signal) => {
                await client.models.retrieve(config.OPENAI_MODEL, { signal });
              },
              { label: "openai.health", timeoutMs: HEALTH_CHECK_TIMEOUT_MS }
            ),
          { retries: HEALTH_CHECK_RETRIES, retryDelayMs: HEALTH_CHECK_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
