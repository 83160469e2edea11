import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: typeof fs.readFileSync;
}

/**
 * Loads `.env.<APP_MODE>` (or `.env.local`, then `.env.prod`) from the working
 * directory. Variables already present in the process environment win.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): void {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
}

loadModeEnvFile();

const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const routeSchema = z.enum(["STRUCTURED", "VECTOR", "BOTH"]);
export const registryLanguageSchema = z.enum(["de", "fr", "it", "rm"]);

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    ENABLE_ANALYSIS_AUDIT: booleanFlagSchema.default(false),
    REQUEST_TRACE_MODE: z.enum(["off", "debug", "trace"]).default("off"),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_MODEL: z.string().min(1).default("gpt-4.1"),
    OPENAI_ROUTER_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    LLM_RETRIES: z.coerce.number().int().min(1).max(5).default(2),
    POSTGRES_URL: optionalTrimmedString,
    QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
    VECTOR_TOP_K: z.coerce.number().int().positive().default(4),
    REGISTRY_SPARQL_ENDPOINT: z.string().url().default("https://fedlex.data.admin.ch/sparqlendpoint"),
    REGISTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    REGISTRY_FULLTEXT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    REGISTRY_RETRIES: z.coerce.number().int().min(1).max(6).default(3),
    REGISTRY_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(300),
    REGISTRY_MAX_RESULTS: z.coerce.number().int().positive().max(50).default(15),
    REGISTRY_DEFAULT_LANGUAGE: registryLanguageSchema.default("de"),
    RECORD_CACHE_TTL_MS: z.coerce.number().int().positive().default(6 * 60 * 60 * 1000),
    RECORD_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
    ROUTER_DEFAULT_ROUTE: routeSchema.default("BOTH"),
    ROUTER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6)
  })
  .superRefine((value, ctx) => {
    if (value.ENABLE_ANALYSIS_AUDIT && !value.POSTGRES_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["POSTGRES_URL"],
        message: "POSTGRES_URL is required when ENABLE_ANALYSIS_AUDIT is on"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
