import { config } from "../../config/index.js";
import { AnalysisAuditRepository } from "../audit/audit-repository.js";
import { CitationInterpreter } from "../citations/citation-interpreter.js";
import { OpenAILanguageModel, type LanguageModel } from "../llm/language-model.js";
import { QdrantVectorRetriever } from "../rag/vector-retriever.js";
import type { VectorRetriever } from "../rag/types.js";
import { RegistryClient } from "../registry/registry-client.js";
import type { RegistryTransport } from "../registry/types.js";
import { QueryRouter } from "../routing/router.js";
import { QuerySynthesizer } from "../synthesis/query-synthesizer.js";
import { AnalysisOrchestrator } from "./orchestrator.js";

export interface AnalysisOrchestratorOverrides {
  languageModel?: LanguageModel;
  registryTransport?: RegistryTransport;
  vectorRetriever?: VectorRetriever;
}

/**
 * Wires the production collaborators. The registry client, and with it the
 * record cache, lives as long as the returned orchestrator.
 */
export function createAnalysisOrchestrator(overrides: AnalysisOrchestratorOverrides = {}): AnalysisOrchestrator {
  const languageModel = overrides.languageModel ?? new OpenAILanguageModel();

  return new AnalysisOrchestrator({
    router: new QueryRouter({ languageModel }),
    synthesizer: new QuerySynthesizer({ languageModel }),
    registryClient: new RegistryClient({ transport: overrides.registryTransport }),
    interpreter: new CitationInterpreter({ languageModel }),
    vectorRetriever: overrides.vectorRetriever ?? new QdrantVectorRetriever(),
    languageModel,
    auditRepository: config.ENABLE_ANALYSIS_AUDIT ? new AnalysisAuditRepository() : null
  });
}
