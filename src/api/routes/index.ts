import type { FastifyInstance } from "fastify";
import { registerAnalysisRoutes, type AnalysisRoutesDependencies } from "./analysis.js";

export interface ApiRoutesDependencies {
  analysis?: AnalysisRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerAnalysisRoutes(app, dependencies?.analysis);
}
