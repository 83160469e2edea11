import { z } from "zod";
import { CallAbortedError } from "../../clients/request-policy.js";
import { config, routeSchema } from "../../config/index.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { ROUTER_SYSTEM_PROMPT, buildRouterPrompt } from "../../prompts/index.js";
import type { AnalysisQuery, CallOptions } from "../analysis/types.js";
import { completeStructured, type LanguageModel } from "../llm/language-model.js";

export type Route = z.infer<typeof routeSchema>;

/** Which signal settled the route. */
export type RouteBasis = "model" | "cues" | "default_policy" | "classification_unavailable";

export type RoutingCues = {
  jurisdiction: boolean;
  comparative: boolean;
};

export type RouteDecision = {
  route: Route;
  rationale: string;
  basis: RouteBasis;
  confidence: number | null;
  cues: RoutingCues;
};

const classificationSchema = z.object({
  route: routeSchema,
  confidence: z.coerce.number().min(0).max(1),
  rationale: z.string().default("")
});

const SWISS_REFERENCE =
  /\b(switzerland|swiss|schweiz\w*|suisse|svizzera|svizra|eidgen\w*|conf[ée]d[ée]ration|fedlex|bern|zurich|z[üu]rich|lausanne|basel)\b|\bSR\s?\d/i;
const SWISS_HINT = /^(ch|che)$/i;
const COMPARATIVE_PHRASING =
  /\b(compar\w*|versus|vs\.?|international\w*|europ\w*|eu|echr|geneva convention|other countr(?:y|ies)|abroad|differ\w* between)\b/i;

export const detectRoutingCues = (query: AnalysisQuery): RoutingCues => {
  const hint = query.jurisdiction?.trim() ?? "";
  return {
    jurisdiction: SWISS_HINT.test(hint) || SWISS_REFERENCE.test(hint) || SWISS_REFERENCE.test(query.text),
    comparative: COMPARATIVE_PHRASING.test(query.text)
  };
};

export interface QueryRouterDependencies {
  languageModel: LanguageModel;
  minConfidence?: number;
  defaultRoute?: Route;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordErrorRate?: typeof recordErrorRate;
}

export class QueryRouter {
  private readonly languageModel: LanguageModel;
  private readonly minConfidence: number;
  private readonly defaultRoute: Route;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;
  private readonly recordErrorRate: typeof recordErrorRate;

  constructor(dependencies: QueryRouterDependencies) {
    this.languageModel = dependencies.languageModel;
    this.minConfidence = dependencies.minConfidence ?? config.ROUTER_MIN_CONFIDENCE;
    this.defaultRoute = dependencies.defaultRoute ?? config.ROUTER_DEFAULT_ROUTE;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
    this.recordErrorRate = dependencies.recordErrorRate ?? recordErrorRate;
  }

  async decideRoute(query: AnalysisQuery, options: CallOptions = {}): Promise<RouteDecision> {
    const correlation = options.correlation ?? {};
    const cues = detectRoutingCues(query);

    let classification: z.infer<typeof classificationSchema>;
    try {
      classification = await completeStructured(
        this.languageModel,
        {
          purpose: "classify",
          system: ROUTER_SYSTEM_PROMPT,
          prompt: buildRouterPrompt({ question: query.text, jurisdiction: query.jurisdiction, cues }),
          signal: options.signal,
          correlation
        },
        classificationSchema
      );
    } catch (error) {
      if (error instanceof CallAbortedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown classification error";
      this.recordErrorRate("routing_classification_unavailable");
      this.logWarn("routing.classification_unavailable", correlation, { error: message, fallback_route: "BOTH" });
      return {
        route: "BOTH",
        rationale: `Classification unavailable (${message}); consulting both sources.`,
        basis: "classification_unavailable",
        confidence: null,
        cues
      };
    }

    const decision = this.resolve(classification, cues);
    this.logInfo("routing.decision", correlation, {
      route: decision.route,
      basis: decision.basis,
      confidence: decision.confidence,
      model_route: classification.route,
      jurisdiction_cue: cues.jurisdiction,
      comparative_cue: cues.comparative
    });
    return decision;
  }

  private resolve(classification: z.infer<typeof classificationSchema>, cues: RoutingCues): RouteDecision {
    const { confidence } = classification;
    const modelRationale = classification.rationale.trim();

    if (confidence >= this.minConfidence) {
      if (classification.route === "VECTOR" && cues.jurisdiction) {
        return {
          route: "BOTH",
          rationale: `${modelRationale || "General sources suggested"}; widened to include the Swiss registry because the question refers to Swiss law.`,
          basis: "model",
          confidence,
          cues
        };
      }
      return {
        route: classification.route,
        rationale: modelRationale || `Classified as ${classification.route}.`,
        basis: "model",
        confidence,
        cues
      };
    }

    if (cues.comparative) {
      return {
        route: "BOTH",
        rationale: "Low-confidence classification; comparative or international phrasing calls for both sources.",
        basis: "cues",
        confidence,
        cues
      };
    }
    if (cues.jurisdiction) {
      return {
        route: "STRUCTURED",
        rationale: "Low-confidence classification; the question targets Swiss federal law.",
        basis: "cues",
        confidence,
        cues
      };
    }
    return {
      route: this.defaultRoute,
      rationale: `Low-confidence classification without routing cues; default route ${this.defaultRoute}.`,
      basis: "default_policy",
      confidence,
      cues
    };
  }
}
