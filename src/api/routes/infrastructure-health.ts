import type { FastifyInstance } from "fastify";
import { config } from "../../config/index.js";

type ClientHealth = { status: "ok" | "error"; details?: string };

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, qdrantModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/qdrant.js")
      ]);

      const [openai, qdrant] = await Promise.all([openaiModule.getOpenAIClient(), qdrantModule.getQdrantClient()]);
      const clients: Record<string, ClientHealth> = {};
      const [openaiHealth, qdrantHealth] = await Promise.all([openai.healthCheck(), qdrant.healthCheck()]);
      clients.openai = openaiHealth;
      clients.qdrant = qdrantHealth;

      // Postgres only backs the audit trail.
      if (config.ENABLE_ANALYSIS_AUDIT) {
        const postgresModule = await import("../../clients/postgres.js");
        const postgres = await postgresModule.getPostgresClient();
        clients.postgres = await postgres.healthCheck();
      }

      return { status: "ok", clients };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return { status: "error", detail };
    }
  });
}
