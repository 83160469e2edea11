import fs from "node:fs";
import { describe, expect, it, vi } from "vitest";
import { loadModeEnvFile, parseDotEnvLine, parseEnv } from "../../src/config/env.js";

const baseEnv = {
  OPENAI_API_KEY: "test-key",
  QDRANT_URL: "http://localhost:6333",
  QDRANT_COLLECTION: "laws"
};

describe("parseEnv", () => {
  it("applies defaults for optional settings", () => {
    const env = parseEnv(baseEnv);

    expect(env.PORT).toBe(3000);
    expect(env.ENABLE_ANALYSIS_AUDIT).toBe(false);
    expect(env.REQUEST_TRACE_MODE).toBe("off");
    expect(env.ROUTER_DEFAULT_ROUTE).toBe("BOTH");
    expect(env.REGISTRY_DEFAULT_LANGUAGE).toBe("de");
    expect(env.RECORD_CACHE_TTL_MS).toBe(21600000);
    expect(env.POSTGRES_URL).toBeUndefined();
  });

  it("reads boolean flags and numbers from strings", () => {
    const env = parseEnv({
      ...baseEnv,
      ENABLE_INFRA_BOOTSTRAP: "yes",
      ENABLE_ANALYSIS_AUDIT: "1",
      POSTGRES_URL: " postgres://localhost/audit ",
      REGISTRY_RETRIES: "4"
    });

    expect(env.ENABLE_INFRA_BOOTSTRAP).toBe(true);
    expect(env.ENABLE_ANALYSIS_AUDIT).toBe(true);
    expect(env.POSTGRES_URL).toBe("postgres://localhost/audit");
    expect(env.REGISTRY_RETRIES).toBe(4);
  });

  it("requires a connection string when the audit trail is on", () => {
    expect(() => parseEnv({ ...baseEnv, ENABLE_ANALYSIS_AUDIT: "true" })).toThrow(
      "- POSTGRES_URL: POSTGRES_URL is required when ENABLE_ANALYSIS_AUDIT is on"
    );
  });

  it("lists every missing required variable", () => {
    expect(() => parseEnv({})).toThrow(/OPENAI_API_KEY[\s\S]*QDRANT_URL[\s\S]*QDRANT_COLLECTION/);
  });

  it("rejects an unknown default route", () => {
    expect(() => parseEnv({ ...baseEnv, ROUTER_DEFAULT_ROUTE: "GRAPH" })).toThrow("ROUTER_DEFAULT_ROUTE");
  });
});

describe("dotenv loading", () => {
  it("parses quoted values and skips comments", () => {
    expect(parseDotEnvLine("# comment")).toBeNull();
    expect(parseDotEnvLine("NO_SEPARATOR")).toBeNull();
    expect(parseDotEnvLine('QDRANT_COLLECTION="laws"')).toEqual(["QDRANT_COLLECTION", "laws"]);
    expect(parseDotEnvLine("PORT = 8080")).toEqual(["PORT", "8080"]);
  });

  it("loads the mode file without overriding variables already set", () => {
    const processEnv: NodeJS.ProcessEnv = { APP_MODE: "prod", PORT: "9000" };
    const existsSync = vi.fn((candidate: string) => candidate === "/srv/.env.prod");
    const readFileSync = vi.fn(() => "PORT=8080\nQDRANT_COLLECTION=laws\n");

    loadModeEnvFile({
      cwd: "/srv",
      processEnv,
      existsSync: existsSync as unknown as typeof fs.existsSync,
      readFileSync: readFileSync as unknown as typeof fs.readFileSync
    });

    expect(processEnv).toEqual({ APP_MODE: "prod", PORT: "9000", QDRANT_COLLECTION: "laws" });
  });
});
