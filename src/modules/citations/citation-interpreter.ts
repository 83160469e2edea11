import { z } from "zod";
import { CallAbortedError } from "../../clients/request-policy.js";
import { logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import {
  CITATION_EXTRACTION_SYSTEM_PROMPT,
  buildCitationExtractionPrompt,
  type CitationPromptNode
} from "../../prompts/index.js";
import type { AnalysisQuery, CallOptions } from "../analysis/types.js";
import { completeStructured, type LanguageModel } from "../llm/language-model.js";
import { canonicalizeText, findNode } from "../registry/full-text-parser.js";
import type { FullTextNode, RecordEvidence } from "../registry/types.js";
import type { Citation, CitationExtractionResult, VerificationFailureReason } from "./types.js";

const extractionResponseSchema = z.object({
  citations: z
    .array(
      z.object({
        record_id: z.string(),
        node_id: z.string(),
        quote: z.string()
      })
    )
    .default([])
});

type ProposedCitation = z.infer<typeof extractionResponseSchema>["citations"][number];

const DEFAULT_MAX_NODES_PER_RECORD = 30;
const DEFAULT_MAX_NODE_CHARS = 1500;

export interface ExtractCitationsInput {
  evidence: RecordEvidence[];
  query: AnalysisQuery;
  keywords: string[];
}

export interface CitationInterpreterDependencies {
  languageModel: LanguageModel;
  maxNodesPerRecord?: number;
  maxNodeChars?: number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const truncateText = (value: string, maxChars: number): string =>
  value.length <= maxChars ? value : `${value.slice(0, Math.max(1, maxChars - 1)).trimEnd()}…`;

const keywordHits = (node: FullTextNode, keywords: string[]): number => {
  const text = node.text.toLowerCase();
  return keywords.filter((keyword) => text.includes(keyword)).length;
};

/**
 * Picks the nodes shown to the model: articles (or the whole-document node)
 * ranked by keyword hits, original order breaking ties.
 */
export const selectCandidateNodes = (
  evidence: RecordEvidence,
  keywords: string[],
  maxNodes: number
): FullTextNode[] => {
  if (!evidence.fullText) {
    return [];
  }
  return evidence.fullText.nodes
    .map((node, index) => ({ node, index, hits: keywordHits(node, keywords) }))
    .filter(({ node }) => node.kind !== "paragraph")
    .sort((left, right) => right.hits - left.hits || left.index - right.index)
    .slice(0, maxNodes)
    .map(({ node }) => node);
};

type VerificationOutcome = { ok: true; citation: Citation } | { ok: false; reason: VerificationFailureReason };

/** Exact containment of the quote in the referenced node, after whitespace canonicalisation. */
export const verifyCitation = (proposed: ProposedCitation, evidence: RecordEvidence[]): VerificationOutcome => {
  const record = evidence.find((entry) => entry.record.id === proposed.record_id);
  if (!record?.fullText) {
    return { ok: false, reason: "unknown_record" };
  }

  const node = findNode(record.fullText, proposed.node_id);
  if (!node) {
    return { ok: false, reason: "unknown_node" };
  }

  const quote = canonicalizeText(proposed.quote);
  if (!quote) {
    return { ok: false, reason: "empty_quote" };
  }
  if (!canonicalizeText(node.text).includes(quote)) {
    return { ok: false, reason: "quote_not_found" };
  }

  return {
    ok: true,
    citation: {
      recordId: record.record.id,
      nodeId: node.id,
      nodeLabel: node.label,
      quote,
      language: record.fullText.language,
      registryNumber: record.record.registryNumber,
      sourceUrl: record.record.sourceUris[record.fullText.language]
    }
  };
};

export class CitationInterpreter {
  private readonly languageModel: LanguageModel;
  private readonly maxNodesPerRecord: number;
  private readonly maxNodeChars: number;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(dependencies: CitationInterpreterDependencies) {
    this.languageModel = dependencies.languageModel;
    this.maxNodesPerRecord = dependencies.maxNodesPerRecord ?? DEFAULT_MAX_NODES_PER_RECORD;
    this.maxNodeChars = dependencies.maxNodeChars ?? DEFAULT_MAX_NODE_CHARS;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  async extractCitations(input: ExtractCitationsInput, options: CallOptions = {}): Promise<CitationExtractionResult> {
    const correlation: CorrelationContext = options.correlation ?? {};
    const promptNodes: CitationPromptNode[] = input.evidence.flatMap((entry) =>
      selectCandidateNodes(entry, input.keywords, this.maxNodesPerRecord).map((node) => ({
        recordId: entry.record.id,
        recordTitle: entry.record.title,
        registryNumber: entry.record.registryNumber,
        nodeId: node.id,
        label: node.label,
        text: truncateText(node.text, this.maxNodeChars)
      }))
    );

    if (promptNodes.length === 0) {
      return { citations: [], rejectedCount: 0, warning: null };
    }

    let proposed: ProposedCitation[];
    try {
      const response = await completeStructured(
        this.languageModel,
        {
          purpose: "interpret",
          system: CITATION_EXTRACTION_SYSTEM_PROMPT,
          prompt: buildCitationExtractionPrompt({ question: input.query.text, nodes: promptNodes }),
          signal: options.signal,
          correlation
        },
        extractionResponseSchema
      );
      proposed = response.citations;
    } catch (error) {
      if (error instanceof CallAbortedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown extraction error";
      this.logWarn("citations.extraction_failed", correlation, { error: message });
      return { citations: [], rejectedCount: 0, warning: `Citation extraction failed: ${message}` };
    }

    const citations: Citation[] = [];
    const seen = new Set<string>();
    let rejectedCount = 0;
    for (const candidate of proposed) {
      const outcome = verifyCitation(candidate, input.evidence);
      if (!outcome.ok) {
        rejectedCount += 1;
        this.logWarn("citations.verification_failed", correlation, {
          record_id: candidate.record_id,
          node_id: candidate.node_id,
          reason: outcome.reason
        });
        continue;
      }

      const key = `${outcome.citation.recordId}|${outcome.citation.nodeId}|${outcome.citation.quote}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      citations.push(outcome.citation);
    }

    this.logInfo("citations.extraction.complete", correlation, {
      node_count: promptNodes.length,
      proposed_count: proposed.length,
      verified_count: citations.length,
      rejected_count: rejectedCount
    });

    return { citations, rejectedCount, warning: null };
  }
}
