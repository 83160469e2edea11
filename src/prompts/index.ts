import type { Citation } from "../modules/citations/types.js";
import type { BibliographyEntry } from "../modules/bibliography/bibliography-builder.js";
import type { RegistryLanguage } from "../modules/registry/types.js";
import type { RoutingCues } from "../modules/routing/router.js";

export const ANSWER_SYSTEM_GUARDRAILS = [
  "You are a legal research assistant supporting pro bono lawyers.",
  "Do not provide legal advice, only legal information and analysis grounded in supplied sources.",
  "Cite supporting sources using the reference labels exactly as provided, for example [L1] or [G2].",
  "Quote legislation only with the verified quotations supplied to you.",
  "If the sources do not answer the question, say so clearly.",
  "Never fabricate statutes, article numbers, dates or citations."
].join(" ");

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export const ROUTER_SYSTEM_PROMPT = [
  "You route legal research questions to knowledge sources.",
  "STRUCTURED is the Swiss federal legislative registry (laws and ordinances currently in force, with article text).",
  "VECTOR is a general document corpus (international conventions, European law, guidance, other countries).",
  "BOTH consults the two sources together.",
  "Choose STRUCTURED for questions answered by Swiss federal legislation alone,",
  "VECTOR for questions with no Swiss connection,",
  "and BOTH for comparative questions or when Swiss law and general material are both relevant.",
  'Return only JSON: {"route": "STRUCTURED" | "VECTOR" | "BOTH", "confidence": number between 0 and 1, "rationale": short sentence}.'
].join(" ");

export const buildRouterPrompt = (input: {
  question: string;
  jurisdiction?: string;
  cues: RoutingCues;
}): string =>
  [
    `Question: ${input.question}`,
    `Jurisdiction hint: ${input.jurisdiction?.trim() || "(none)"}`,
    `Swiss jurisdiction reference detected: ${input.cues.jurisdiction ? "yes" : "no"}`,
    `Comparative or international phrasing detected: ${input.cues.comparative ? "yes" : "no"}`
  ].join("\n");

// ---------------------------------------------------------------------------
// Registry query synthesis
// ---------------------------------------------------------------------------

const SYNTHESIS_SCHEMA_NOTES = [
  "Registry schema (JOLux ontology, prefixes jolux:, skos:, dct: are declared for you):",
  "- ?work a jolux:ConsolidationAbstract is an act of the systematic collection (SR).",
  "- ?work jolux:isRealizedBy ?expression; ?expression jolux:language <language IRI>; ?expression jolux:title ?title.",
  "- ?work jolux:dateDocument ?date.",
  "- ?consolidation jolux:isMemberOf ?work; ?consolidation jolux:dateApplicability ?dateApplicability.",
  "- OPTIONAL { ?consolidation jolux:dateEndApplicability ?dateEndApplicability }.",
  "- OPTIONAL { ?work jolux:classifiedByTaxonomyEntry ?taxonomy . ?taxonomy skos:notation ?sr_number }."
].join("\n");

const SYNTHESIS_EXAMPLE = [
  'Example for "Which laws regulate asylum?" in German:',
  "SELECT DISTINCT ?work ?consolidation ?title ?sr_number ?date ?dateApplicability ?dateEndApplicability WHERE {",
  "  ?work a jolux:ConsolidationAbstract ;",
  "        jolux:dateDocument ?date ;",
  "        jolux:isRealizedBy ?expression .",
  "  ?consolidation jolux:isMemberOf ?work ;",
  "                 jolux:dateApplicability ?dateApplicability .",
  "  ?expression jolux:language <http://publications.europa.eu/resource/authority/language/DEU> ;",
  "              jolux:title ?title .",
  "  OPTIONAL { ?work jolux:classifiedByTaxonomyEntry ?taxonomy . ?taxonomy skos:notation ?sr_number . }",
  "  OPTIONAL { ?consolidation jolux:dateEndApplicability ?dateEndApplicability }",
  '  FILTER(CONTAINS(LCASE(?title), "asyl") || CONTAINS(LCASE(?title), "flüchtling"))',
  "}",
  "ORDER BY DESC(?date)",
  "LIMIT 10"
].join("\n");

export const SPARQL_SYNTHESIS_SYSTEM_PROMPT = [
  "You write SPARQL 1.1 SELECT queries for the Swiss federal legislative registry.",
  "Return only the query text, without prefixes, Markdown or explanations.",
  "Always project ?work ?consolidation ?title ?dateApplicability and, when available, ?sr_number ?date ?dateEndApplicability.",
  "Filter titles with several lower-case keyword stems in the target language combined with ||,",
  'written as CONTAINS(LCASE(?title), "stem"). Prefer broad stems so that all relevant acts are found.'
].join(" ");

export const buildSparqlSynthesisPrompt = (input: {
  question: string;
  languageName: string;
  languageIri: string;
  maxResults: number;
  feedback?: { previousQuery: string; problems: string[] };
}): string => {
  const sections = [
    SYNTHESIS_SCHEMA_NOTES,
    "",
    SYNTHESIS_EXAMPLE,
    "",
    `Target language: ${input.languageName} (<${input.languageIri}>). Keywords must be in ${input.languageName}.`,
    `Use LIMIT ${input.maxResults} or less.`,
    "",
    `Question: ${input.question}`
  ];

  if (input.feedback) {
    sections.push(
      "",
      "Your previous query was rejected:",
      input.feedback.previousQuery,
      "",
      "Problems to fix:",
      ...input.feedback.problems.map((problem) => `- ${problem}`)
    );
  }

  return sections.join("\n");
};

// ---------------------------------------------------------------------------
// Citation extraction
// ---------------------------------------------------------------------------

export type CitationPromptNode = {
  recordId: string;
  recordTitle: string;
  registryNumber: string | null;
  nodeId: string;
  label: string | null;
  text: string;
};

export const CITATION_EXTRACTION_SYSTEM_PROMPT = [
  "You extract verbatim quotations from legislation that help answer a legal question.",
  "Quote text exactly as it appears in the supplied node, without paraphrasing, ellipses or added words.",
  "Each quotation must reference the record_id and node_id of the node it was copied from.",
  "Prefer short, decisive passages. Skip nodes that are not relevant.",
  'Return only JSON: {"citations": [{"record_id": string, "node_id": string, "quote": string}]}.'
].join(" ");

export const buildCitationExtractionPrompt = (input: {
  question: string;
  nodes: CitationPromptNode[];
}): string => {
  const nodeBlocks = input.nodes.map((node) =>
    [
      `record_id: ${node.recordId}`,
      `record: ${node.recordTitle}${node.registryNumber ? ` (${node.registryNumber})` : ""}`,
      `node_id: ${node.nodeId}${node.label ? ` [${node.label}]` : ""}`,
      "text:",
      node.text
    ].join("\n")
  );

  return [`Question: ${input.question}`, "", "Legislation nodes:", "", nodeBlocks.join("\n\n---\n\n")].join("\n");
};

// ---------------------------------------------------------------------------
// Final answer
// ---------------------------------------------------------------------------

export const buildAnswerPrompt = (input: {
  question: string;
  bibliography: BibliographyEntry[];
  citations: Citation[];
  responseLanguage: RegistryLanguage | null;
}): string => {
  const legislative = input.bibliography.filter((entry) => entry.kind === "legislative");
  const general = input.bibliography.filter((entry) => entry.kind === "general");

  const legislativeLines = legislative.map((entry) => {
    const quotes = input.citations
      .filter((citation) => citation.recordId === entry.recordId)
      .map((citation) => `  - ${citation.nodeLabel ?? citation.nodeId}: "${citation.quote}"`);
    return [
      `${entry.label} ${entry.title}${entry.registryNumber ? ` (${entry.registryNumber})` : ""}`,
      ...(quotes.length > 0 ? quotes : ["  (no verified quotation)"])
    ].join("\n");
  });

  const generalLines = general.map(
    (entry) => `${entry.label} ${entry.title} (score ${entry.score?.toFixed(3) ?? "n/a"})\n  ${entry.excerpt ?? ""}`
  );

  return [
    `Question: ${input.question}`,
    "",
    "Swiss federal legislation in force:",
    legislativeLines.length > 0 ? legislativeLines.join("\n") : "(none)",
    "",
    "General documents:",
    generalLines.length > 0 ? generalLines.join("\n") : "(none)",
    "",
    input.responseLanguage
      ? `Answer in the language of the question. Legislation was read in "${input.responseLanguage}".`
      : "Answer in the language of the question."
  ].join("\n");
};
