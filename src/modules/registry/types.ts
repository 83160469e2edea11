import type { FormalQuery } from "../synthesis/types.js";

export type RegistryLanguage = "de" | "fr" | "it" | "rm";

export type ApplicabilityStatus =
  | "currently_applicable"
  | "not_yet_applicable"
  | "expired"
  | "no_dates_available"
  | "invalid_dates";

export type Applicability = {
  isApplicable: boolean;
  status: ApplicabilityStatus;
  details: string;
};

export type LegislativeRecord = {
  /** Work (abstract act) identifier. */
  id: string;
  consolidationId: string;
  title: string;
  registryNumber: string | null;
  documentDate: string | null;
  applicabilityStart: string | null;
  applicabilityEnd: string | null;
  languages: RegistryLanguage[];
  sourceUris: Record<RegistryLanguage, string>;
};

export type FullTextNodeKind = "article" | "paragraph" | "document";

export type FullTextNode = {
  id: string;
  kind: FullTextNodeKind;
  label: string | null;
  heading: string | null;
  parentId: string | null;
  text: string;
};

export type FullText = {
  recordId: string;
  language: RegistryLanguage;
  sourceUrl: string;
  nodes: FullTextNode[];
};

export type RecordEvidence = {
  record: LegislativeRecord;
  applicability: Applicability;
  /** Null when no language variant could be fetched (metadata-only record). */
  fullText: FullText | null;
  fetchErrors: string[];
};

export type RegistryLookupResult = {
  formalQuery: FormalQuery;
  rowCount: number;
  records: RecordEvidence[];
  excludedRecordIds: string[];
  cacheHit: boolean;
};

export type SparqlTerm = {
  type: string;
  value: string;
  "xml:lang"?: string;
  datatype?: string;
};

export type SparqlBinding = Record<string, SparqlTerm | undefined>;

export type FetchedMarkup = {
  url: string;
  markup: string;
};

export interface RegistryCallOptions {
  signal?: AbortSignal;
}

/**
 * Wire boundary of the legislative registry: a SPARQL SELECT endpoint and a
 * full-text download addressed by consolidation and language.
 */
export interface RegistryTransport {
  select(query: string, options?: RegistryCallOptions): Promise<SparqlBinding[]>;
  fetchFullText(
    consolidationId: string,
    language: RegistryLanguage,
    options?: RegistryCallOptions
  ): Promise<FetchedMarkup>;
}
