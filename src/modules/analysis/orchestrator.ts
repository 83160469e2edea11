import { randomUUID } from "node:crypto";
import { CallAbortedError } from "../../clients/request-policy.js";
import { config } from "../../config/index.js";
import {
  logError,
  logInfo,
  logTrace,
  logWarn,
  serializeError,
  type CorrelationContext
} from "../../observability/logger.js";
import { recordAnalysisLatency, recordErrorRate } from "../../observability/metrics.js";
import { ANSWER_SYSTEM_GUARDRAILS, buildAnswerPrompt } from "../../prompts/index.js";
import type { AnalysisAuditEventType, AnalysisAuditSink } from "../audit/audit-repository.js";
import { buildBibliography, type BibliographyEntry } from "../bibliography/bibliography-builder.js";
import type { CitationInterpreter } from "../citations/citation-interpreter.js";
import type { Citation } from "../citations/types.js";
import type { LanguageModel } from "../llm/language-model.js";
import type { RetrievedDocument, VectorRetriever } from "../rag/types.js";
import { resolveRegistryLanguage } from "../registry/languages.js";
import type { RegistryClient } from "../registry/registry-client.js";
import type { RegistryLanguage, RegistryLookupResult } from "../registry/types.js";
import type { QueryRouter, Route, RouteDecision } from "../routing/router.js";
import type { QuerySynthesizer } from "../synthesis/query-synthesizer.js";
import type { FormalQuery } from "../synthesis/types.js";
import {
  AnalysisCancelledError,
  AnalysisUnavailableError,
  AnswerGenerationError,
  type PathFailure
} from "./errors.js";
import { runStage, throwIfCancelled, type StageOutcome } from "./pipeline.js";
import type {
  AnalysisQuery,
  AnalysisResult,
  AnalysisService,
  AnalyzeOptions,
  CallOptions,
  RecordSummary
} from "./types.js";

type StructuredEvidence = {
  formalQuery: FormalQuery;
  lookup: RegistryLookupResult;
  citations: Citation[];
  warnings: string[];
};

export interface AnalysisOrchestratorDependencies {
  router: Pick<QueryRouter, "decideRoute">;
  synthesizer: Pick<QuerySynthesizer, "synthesize">;
  registryClient: Pick<RegistryClient, "lookup">;
  interpreter: Pick<CitationInterpreter, "extractCitations">;
  vectorRetriever: VectorRetriever;
  languageModel: LanguageModel;
  auditRepository?: AnalysisAuditSink | null;
  defaultLanguage?: RegistryLanguage;
  vectorTopK?: number;
  now?: () => Date;
  createId?: () => string;
  recordAnalysisLatency?: typeof recordAnalysisLatency;
  recordErrorRate?: typeof recordErrorRate;
}

const requestsStructured = (route: Route): boolean => route === "STRUCTURED" || route === "BOTH";
const requestsVector = (route: Route): boolean => route === "VECTOR" || route === "BOTH";

const resolveRouteUsed = (
  decision: RouteDecision,
  structured: StageOutcome<StructuredEvidence> | null,
  vector: StageOutcome<RetrievedDocument[]> | null
): Route => {
  if (decision.route !== "BOTH") {
    return decision.route;
  }
  if (structured?.status === "degraded") {
    return "VECTOR";
  }
  if (vector?.status === "degraded") {
    return "STRUCTURED";
  }
  return "BOTH";
};

const toRecordSummaries = (lookup: RegistryLookupResult | null): RecordSummary[] =>
  (lookup?.records ?? []).map((evidence) => ({
    id: evidence.record.id,
    title: evidence.record.title,
    registryNumber: evidence.record.registryNumber,
    applicabilityStatus: evidence.applicability.status,
    applicabilityDetails: evidence.applicability.details,
    fullTextLanguage: evidence.fullText?.language ?? null
  }));

/**
 * Drives one analysis: route, run the requested knowledge paths concurrently,
 * tolerate a degraded path when another one succeeded, merge the
 * bibliography and produce the final answer.
 */
export class AnalysisOrchestrator implements AnalysisService {
  private readonly dependencies: AnalysisOrchestratorDependencies;
  private readonly defaultLanguage: RegistryLanguage;
  private readonly vectorTopK: number;
  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly recordAnalysisLatency: typeof recordAnalysisLatency;
  private readonly recordErrorRate: typeof recordErrorRate;

  constructor(dependencies: AnalysisOrchestratorDependencies) {
    this.dependencies = dependencies;
    this.defaultLanguage = dependencies.defaultLanguage ?? config.REGISTRY_DEFAULT_LANGUAGE;
    this.vectorTopK = dependencies.vectorTopK ?? config.VECTOR_TOP_K;
    this.now = dependencies.now ?? (() => new Date());
    this.createId = dependencies.createId ?? randomUUID;
    this.recordAnalysisLatency = dependencies.recordAnalysisLatency ?? recordAnalysisLatency;
    this.recordErrorRate = dependencies.recordErrorRate ?? recordErrorRate;
  }

  async analyze(query: AnalysisQuery, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const analysisId = this.createId();
    // Aborted on any failure so a sibling path stops with the analysis.
    const controller = new AbortController();
    const signal = controller.signal;
    const abortFromCaller = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      abortFromCaller();
    } else {
      options.signal?.addEventListener("abort", abortFromCaller, { once: true });
    }
    const correlation: CorrelationContext = {
      requestId: options.requestId ?? null,
      analysisId,
      caseId: query.caseId ?? null
    };
    const callOptions: CallOptions = { signal, correlation };
    const startedAt = this.now().getTime();
    let stage = "analysis.start";

    const traceStage = (nextStage: string, fields: Record<string, unknown> = {}): void => {
      stage = nextStage;
      logTrace("analysis.orchestrator.stage", correlation, { stage: nextStage, ...fields });
    };

    traceStage(stage);
    await this.appendAudit(correlation, "analysis.start", {
      query_chars: query.text.length,
      language_hint: query.language ?? null,
      jurisdiction_hint: query.jurisdiction ?? null
    });

    try {
      throwIfCancelled(signal);
      traceStage("routing.decide");
      const decision = await this.dependencies.router.decideRoute(query, callOptions);
      const language = resolveRegistryLanguage(query.language, this.defaultLanguage);

      traceStage("paths.run", { route: decision.route, basis: decision.basis, language });
      const [structured, vector] = await Promise.all([
        requestsStructured(decision.route)
          ? runStage("structured", () => this.runStructuredPath(query, language, callOptions), signal)
          : Promise.resolve(null),
        requestsVector(decision.route)
          ? runStage(
              "vector",
              () => this.dependencies.vectorRetriever.retrieve(query.text, this.vectorTopK, callOptions),
              signal
            )
          : Promise.resolve(null)
      ]);
      throwIfCancelled(signal);

      const degraded = [structured, vector].filter(
        (outcome): outcome is Extract<StageOutcome<unknown>, { status: "degraded" }> => outcome?.status === "degraded"
      );
      const requestedCount = [structured, vector].filter((outcome) => outcome !== null).length;
      const failures: PathFailure[] = degraded.map((outcome) => outcome.failure);
      if (degraded.length === requestedCount) {
        const [onlyFailure] = degraded;
        throw degraded.length === 1 && onlyFailure ? onlyFailure.error : new AnalysisUnavailableError(failures);
      }

      for (const failure of failures) {
        this.recordErrorRate(`analysis_path_degraded_${failure.path}`);
        logWarn("analysis.path_degraded", correlation, {
          path: failure.path,
          kind: failure.kind,
          error: failure.message
        });
      }

      const evidence = structured?.status === "ok" ? structured.value : null;
      const documents = vector?.status === "ok" ? vector.value : [];
      const citations = evidence?.citations ?? [];

      traceStage("bibliography.build", {
        record_count: evidence?.lookup.records.length ?? 0,
        document_count: documents.length,
        citation_count: citations.length
      });
      const bibliography = buildBibliography({
        records: evidence?.lookup.records ?? [],
        citations,
        documents,
        defaultLanguage: language
      });

      traceStage("answer.generate", { bibliography_count: bibliography.length });
      const answer = await this.generateAnswer(query, bibliography, citations, evidence ? language : null, callOptions);

      const routeUsed = resolveRouteUsed(decision, structured, vector);
      const result: AnalysisResult = {
        analysisId,
        answer,
        routeRequested: decision.route,
        routeUsed,
        routeBasis: decision.basis,
        rationale: decision.rationale,
        formalQuery: evidence?.formalQuery.text ?? null,
        citations,
        bibliography,
        recordIds: evidence?.lookup.records.map((entry) => entry.record.id) ?? [],
        records: toRecordSummaries(evidence?.lookup ?? null),
        degradations: failures.map((failure) => ({ path: failure.path, kind: failure.kind, message: failure.message })),
        warnings: [
          ...failures.map((failure) => `The ${failure.path} path was unavailable: ${failure.message}`),
          ...(evidence?.warnings ?? [])
        ],
        generatedAt: this.now().toISOString()
      };

      const latencyMs = this.now().getTime() - startedAt;
      this.recordAnalysisLatency(latencyMs);
      traceStage("analysis.complete");
      await this.appendAudit(correlation, "analysis.complete", {
        route_requested: result.routeRequested,
        route_used: result.routeUsed,
        route_basis: result.routeBasis,
        degradations: result.degradations,
        record_ids: result.recordIds,
        excluded_record_ids: evidence?.lookup.excludedRecordIds ?? [],
        citation_count: citations.length,
        bibliography_count: bibliography.length,
        latency_ms: latencyMs
      });
      logInfo("analysis.complete", correlation, {
        route_requested: result.routeRequested,
        route_used: result.routeUsed,
        citation_count: citations.length,
        bibliography_count: bibliography.length,
        degraded_paths: failures.map((failure) => failure.path),
        latency_ms: latencyMs
      });

      return result;
    } catch (error) {
      const cancelled = options.signal?.aborted === true || error instanceof CallAbortedError;
      controller.abort();
      const terminal = cancelled ? new AnalysisCancelledError() : error;
      this.recordErrorRate("analysis_error");
      logError("analysis.orchestrator.error", correlation, {
        failed_stage: stage,
        ...serializeError(terminal)
      });
      await this.appendAudit(correlation, "analysis.error", {
        failed_stage: stage,
        error_name: terminal instanceof Error ? terminal.name : "UnknownError",
        error: terminal instanceof Error ? terminal.message : String(terminal),
        latency_ms: this.now().getTime() - startedAt
      });
      throw terminal;
    } finally {
      options.signal?.removeEventListener("abort", abortFromCaller);
    }
  }

  private async runStructuredPath(
    query: AnalysisQuery,
    language: RegistryLanguage,
    options: CallOptions
  ): Promise<StructuredEvidence> {
    const formalQuery = await this.dependencies.synthesizer.synthesize(query, language, options);
    const lookup = await this.dependencies.registryClient.lookup(formalQuery, {
      language,
      signal: options.signal,
      correlation: options.correlation
    });
    const extraction = await this.dependencies.interpreter.extractCitations(
      { evidence: lookup.records, query, keywords: formalQuery.keywords },
      options
    );

    const warnings = lookup.records
      .filter((entry) => entry.fullText === null)
      .map((entry) => `Full text of ${entry.record.registryNumber ?? entry.record.id} could not be fetched; listed by metadata only.`);
    if (extraction.warning) {
      warnings.push(extraction.warning);
    }

    return { formalQuery, lookup, citations: extraction.citations, warnings };
  }

  private async generateAnswer(
    query: AnalysisQuery,
    bibliography: BibliographyEntry[],
    citations: Citation[],
    responseLanguage: RegistryLanguage | null,
    options: CallOptions
  ): Promise<string> {
    let content: string;
    try {
      content = await this.dependencies.languageModel.complete({
        purpose: "interpret",
        system: ANSWER_SYSTEM_GUARDRAILS,
        prompt: buildAnswerPrompt({ question: query.text, bibliography, citations, responseLanguage }),
        responseFormat: "text",
        signal: options.signal,
        correlation: options.correlation
      });
    } catch (error) {
      if (error instanceof CallAbortedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown language model error";
      throw new AnswerGenerationError(`Final synthesis failed: ${message}`, { cause: error });
    }

    const answer = content.trim();
    if (!answer) {
      throw new AnswerGenerationError("Final synthesis returned an empty answer.");
    }
    return answer;
  }

  private async appendAudit(
    correlation: CorrelationContext,
    eventType: AnalysisAuditEventType,
    payload: Record<string, unknown>
  ): Promise<void> {
    const auditRepository = this.dependencies.auditRepository;
    if (!auditRepository || !correlation.analysisId) {
      return;
    }

    try {
      await auditRepository.appendEvent({
        analysisId: correlation.analysisId,
        requestId: correlation.requestId ?? null,
        caseId: correlation.caseId ?? null,
        eventType,
        payload
      });
    } catch (error) {
      this.recordErrorRate("analysis_audit_error");
      logWarn("analysis.audit_failed", correlation, { event_type: eventType, ...serializeError(error) });
    }
  }
}
