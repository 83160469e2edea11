import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { buildCaseQueryText } from "../../modules/analysis/case-description.js";
import { AnalysisCancelledError, AnalysisError, toSafeUserErrorMessage } from "../../modules/analysis/errors.js";
import type { AnalysisService } from "../../modules/analysis/types.js";
import { logError, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const optionalText = z.string().trim().min(1).optional();

const caseMaterialsSchema = z.object({
  summary: z.string().optional(),
  transcription: z.string().optional(),
  forms_text: z.string().optional(),
  follow_up: z
    .array(
      z.object({
        role: z.enum(["lawyer", "applicant"]),
        content: z.string()
      })
    )
    .optional()
});

const analysisBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  language: optionalText,
  jurisdiction: optionalText,
  case_id: optionalText,
  case_materials: caseMaterialsSchema.optional()
});

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export interface AnalysisRoutesDependencies {
  createOrchestrator?: () => AnalysisService;
}

export async function registerAnalysisRoutes(
  app: FastifyInstance,
  dependencies?: AnalysisRoutesDependencies
): Promise<void> {
  let orchestrator: AnalysisService | null = null;

  // One orchestrator per app so the registry cache is shared across requests.
  const resolveOrchestrator = async (): Promise<AnalysisService> => {
    if (!orchestrator) {
      if (dependencies?.createOrchestrator) {
        orchestrator = dependencies.createOrchestrator();
      } else {
        const factory = await import("../../modules/analysis/factory.js");
        orchestrator = factory.createAnalysisOrchestrator();
      }
    }
    return orchestrator;
  };

  app.post("/api/analysis", async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const parsed = analysisBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    const body = parsed.data;
    const materials = body.case_materials;
    const controller = new AbortController();
    const abortOnDisconnect = (): void => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    };
    reply.raw.on("close", abortOnDisconnect);

    try {
      const service = await resolveOrchestrator();
      return await service.analyze(
        {
          text: buildCaseQueryText(
            body.query,
            materials && {
              summary: materials.summary,
              transcription: materials.transcription,
              formsText: materials.forms_text,
              followUp: materials.follow_up
            }
          ),
          language: body.language,
          jurisdiction: body.jurisdiction,
          caseId: body.case_id
        },
        { signal: controller.signal, requestId }
      );
    } catch (error) {
      if (error instanceof AnalysisCancelledError) {
        reply.code(499);
        return { detail: toSafeUserErrorMessage(error), kind: error.kind };
      }
      if (error instanceof AnalysisError) {
        recordErrorRate(`analysis_${error.kind}`);
        reply.code(502);
        return { detail: toSafeUserErrorMessage(error), kind: error.kind };
      }

      recordErrorRate("analysis_500");
      logError("analysis.route.unexpected_error", { requestId, caseId: body.case_id ?? null }, serializeError(error));
      reply.code(500);
      return { detail: "The analysis failed unexpectedly.", kind: "internal" };
    } finally {
      reply.raw.off("close", abortOnDisconnect);
    }
  });
}
