import type { RegistryLanguage } from "../registry/types.js";

/** A verbatim span of a legislative record, verified against its full text. */
export type Citation = {
  recordId: string;
  nodeId: string;
  nodeLabel: string | null;
  quote: string;
  language: RegistryLanguage;
  registryNumber: string | null;
  sourceUrl: string;
};

export type VerificationFailureReason = "unknown_record" | "unknown_node" | "empty_quote" | "quote_not_found";

export type CitationExtractionResult = {
  citations: Citation[];
  rejectedCount: number;
  /** Set when the extraction call itself failed. */
  warning: string | null;
};
