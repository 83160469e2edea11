import Fastify from "fastify";
import { beforeEach, describe, expect, it, vi } from "vitest";

const infraMocks = vi.hoisted(() => ({
  config: { ENABLE_ANALYSIS_AUDIT: false },
  getPostgresClient: vi.fn(),
  getOpenAIClient: vi.fn(),
  getQdrantClient: vi.fn()
}));

vi.mock("../../src/config/index.js", () => ({
  config: infraMocks.config
}));

vi.mock("../../src/clients/postgres.js", () => ({
  getPostgresClient: infraMocks.getPostgresClient
}));

vi.mock("../../src/clients/openai.js", () => ({
  getOpenAIClient: infraMocks.getOpenAIClient
}));

vi.mock("../../src/clients/qdrant.js", () => ({
  getQdrantClient: infraMocks.getQdrantClient
}));

import { registerInfrastructureHealthRoute } from "../../src/api/routes/infrastructure-health.js";

const healthy = (result: { status: string; details?: string }) => ({
  healthCheck: vi.fn().mockResolvedValue(result)
});

describe("registerInfrastructureHealthRoute", () => {
  beforeEach(() => {
    infraMocks.config.ENABLE_ANALYSIS_AUDIT = false;
    infraMocks.getPostgresClient.mockReset();
    infraMocks.getOpenAIClient.mockReset();
    infraMocks.getQdrantClient.mockReset();
  });

  it("reports the model and vector store without postgres when the audit trail is off", async () => {
    infraMocks.getOpenAIClient.mockResolvedValue(healthy({ status: "error", details: "degraded" }));
    infraMocks.getQdrantClient.mockResolvedValue(healthy({ status: "ok" }));

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "ok",
        clients: {
          openai: { status: "error", details: "degraded" },
          qdrant: { status: "ok" }
        }
      });
      expect(infraMocks.getPostgresClient).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it("includes postgres when the audit trail is on", async () => {
    infraMocks.config.ENABLE_ANALYSIS_AUDIT = true;
    infraMocks.getPostgresClient.mockResolvedValue(healthy({ status: "ok" }));
    infraMocks.getOpenAIClient.mockResolvedValue(healthy({ status: "ok" }));
    infraMocks.getQdrantClient.mockResolvedValue(healthy({ status: "ok" }));

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.json()).toEqual({
        status: "ok",
        clients: {
          openai: { status: "ok" },
          qdrant: { status: "ok" },
          postgres: { status: "ok" }
        }
      });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when dependency resolution throws", async () => {
    infraMocks.config.ENABLE_ANALYSIS_AUDIT = true;
    infraMocks.getPostgresClient.mockRejectedValue(new Error("postgres down"));
    infraMocks.getOpenAIClient.mockResolvedValue(healthy({ status: "ok" }));
    infraMocks.getQdrantClient.mockResolvedValue(healthy({ status: "ok" }));

    const app = Fastify();
    try {
      await registerInfrastructureHealthRoute(app);

      const response = await app.inject({ method: "GET", url: "/infra/health" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ status: "error", detail: "postgres down" });
    } finally {
      await app.close();
    }
  });
});
