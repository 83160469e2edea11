import { APIError } from "openai";
import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { withRetries, withTimeout } from "../../clients/request-policy.js";
import { config } from "../../config/index.js";
import { logDebug, type CorrelationContext } from "../../observability/logger.js";
import { recordLanguageModelLatency, type LanguageModelPurpose } from "../../observability/metrics.js";

export type { LanguageModelPurpose };

export type ResponseFormat = "json" | "text";

export interface CompletionRequest {
  purpose: LanguageModelPurpose;
  system: string;
  prompt: string;
  responseFormat: ResponseFormat;
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

/**
 * Every non-deterministic call of the service goes through this capability:
 * `classify` (routing), `synthesize` (registry query) and `interpret`
 * (citation extraction and final answer).
 */
export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}

export class LanguageModelOutputError extends Error {
  readonly purpose: LanguageModelPurpose;

  constructor(purpose: LanguageModelPurpose, message: string) {
    super(message);
    this.name = "LanguageModelOutputError";
    this.purpose = purpose;
  }
}

export interface OpenAILanguageModelOptions {
  getOpenAIClient?: typeof getOpenAIClient;
  models?: Partial<Record<LanguageModelPurpose, string>>;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  now?: () => number;
  recordLatency?: typeof recordLanguageModelLatency;
}

const DEFAULT_RETRY_DELAY_MS = 500;

// Client errors other than rate limiting will not succeed on a second attempt.
const isRetryableModelError = (error: unknown): boolean => {
  if (error instanceof APIError && typeof error.status === "number") {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  return true;
};

export class OpenAILanguageModel implements LanguageModel {
  private readonly getClient: typeof getOpenAIClient;
  private readonly models: Record<LanguageModelPurpose, string>;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly now: () => number;
  private readonly recordLatency: typeof recordLanguageModelLatency;

  constructor(options: OpenAILanguageModelOptions = {}) {
    this.getClient = options.getOpenAIClient ?? getOpenAIClient;
    this.models = {
      classify: options.models?.classify ?? config.OPENAI_ROUTER_MODEL,
      synthesize: options.models?.synthesize ?? config.OPENAI_MODEL,
      interpret: options.models?.interpret ?? config.OPENAI_MODEL
    };
    this.timeoutMs = options.timeoutMs ?? config.LLM_TIMEOUT_MS;
    this.retries = options.retries ?? config.LLM_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.now = options.now ?? Date.now;
    this.recordLatency = options.recordLatency ?? recordLanguageModelLatency;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { client } = await this.getClient();
    const model = this.models[request.purpose];
    const startedAt = this.now();

    const content = await withRetries(
      async () =>
        withTimeout(
          async (signal) => {
            const response = await client.chat.completions.create(
              {
                model,
                temperature: 0,
                response_format: { type: request.responseFormat === "json" ? "json_object" : "text" },
                messages: [
                  { role: "system", content: request.system },
                  { role: "user", content: request.prompt }
                ]
              },
              { signal }
            );
            return response.choices[0]?.message?.content ?? "";
          },
          { label: `llm.${request.purpose}`, timeoutMs: this.timeoutMs, signal: request.signal }
        ),
      {
        retries: this.retries,
        retryDelayMs: this.retryDelayMs,
        signal: request.signal,
        shouldRetry: isRetryableModelError
      }
    );

    const latencyMs = this.now() - startedAt;
    this.recordLatency(request.purpose, latencyMs);
    logDebug("llm.complete", request.correlation ?? {}, {
      purpose: request.purpose,
      model,
      latency_ms: latencyMs,
      response_chars: content.length
    });

    return content;
  }
}

const stripCodeFence = (value: string): string => {
  const fenced = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/.exec(value.trim());
  return fenced?.[1] ?? value.trim();
};

/** Requests JSON output and validates it against `schema`. */
export async function completeStructured<T>(
  languageModel: LanguageModel,
  request: Omit<CompletionRequest, "responseFormat">,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const content = await languageModel.complete({ ...request, responseFormat: "json" });
  const body = stripCodeFence(content);
  if (!body) {
    throw new LanguageModelOutputError(request.purpose, "Language model returned empty content.");
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(body);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new LanguageModelOutputError(request.purpose, `Language model returned invalid JSON: ${message}`);
  }

  const parsed = schema.safeParse(parsedJson);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new LanguageModelOutputError(
      request.purpose,
      `Language model JSON schema validation failed: ${issues.join("; ")}`
    );
  }

  return parsed.data;
}
