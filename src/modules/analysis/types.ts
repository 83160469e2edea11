import type { CorrelationContext } from "../../observability/logger.js";
import type { BibliographyEntry } from "../bibliography/bibliography-builder.js";
import type { Citation } from "../citations/types.js";
import type { ApplicabilityStatus, RegistryLanguage } from "../registry/types.js";
import type { Route, RouteBasis } from "../routing/router.js";
import type { AnalysisErrorKind, AnalysisPath } from "./errors.js";

export type AnalysisQuery = {
  text: string;
  /** Language hint: a registry language code or a language name. */
  language?: string;
  jurisdiction?: string;
  /** Correlation only; never used for retrieval. */
  caseId?: string;
};

export interface AnalyzeOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface CallOptions {
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

export type Degradation = {
  path: AnalysisPath;
  kind: AnalysisErrorKind;
  message: string;
};

export type RecordSummary = {
  id: string;
  title: string;
  registryNumber: string | null;
  applicabilityStatus: ApplicabilityStatus;
  applicabilityDetails: string;
  fullTextLanguage: RegistryLanguage | null;
};

export type AnalysisResult = {
  analysisId: string;
  answer: string;
  routeRequested: Route;
  routeUsed: Route;
  routeBasis: RouteBasis;
  rationale: string;
  formalQuery: string | null;
  citations: Citation[];
  bibliography: BibliographyEntry[];
  recordIds: string[];
  records: RecordSummary[];
  degradations: Degradation[];
  warnings: string[];
  generatedAt: string;
};

export interface AnalysisService {
  analyze(query: AnalysisQuery, options?: AnalyzeOptions): Promise<AnalysisResult>;
}
