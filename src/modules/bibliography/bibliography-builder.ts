import type { Citation } from "../citations/types.js";
import type { RetrievedDocument } from "../rag/types.js";
import { REGISTRY_LANGUAGES } from "../registry/languages.js";
import type { RecordEvidence, RegistryLanguage } from "../registry/types.js";

export type BibliographyKind = "legislative" | "general";

export type BibliographyLink = {
  language: string;
  url: string;
};

export type BibliographyEntry = {
  kind: BibliographyKind;
  /** `[L1]`, `[L2]`… for legislation, `[G1]`… for general documents. */
  label: string;
  recordId: string;
  language: string;
  title: string;
  excerpt: string | null;
  registryNumber: string | null;
  sourceId: string | null;
  links: BibliographyLink[];
  citationCount: number;
  score: number | null;
};

export interface BuildBibliographyInput {
  records: RecordEvidence[];
  citations: Citation[];
  documents: RetrievedDocument[];
  /** Language of legislative entries whose full text could not be fetched. */
  defaultLanguage: RegistryLanguage;
}

export const EXCERPT_MAX_CHARS = 200;
const UNDETERMINED_LANGUAGE = "und";

export const truncateExcerpt = (value: string, maxChars = EXCERPT_MAX_CHARS): string => {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 1).trimEnd()}…`;
};

const recordDate = (evidence: RecordEvidence): string =>
  evidence.record.applicabilityStart ?? evidence.record.documentDate ?? "";

const isUrl = (value: string): boolean => /^https?:\/\//i.test(value);

type UnlabelledEntry = Omit<BibliographyEntry, "label">;

const buildLegislativeEntries = (input: BuildBibliographyInput): UnlabelledEntry[] => {
  const citationCounts = new Map<string, number>();
  for (const citation of input.citations) {
    citationCounts.set(citation.recordId, (citationCounts.get(citation.recordId) ?? 0) + 1);
  }

  const ranked = [...input.records].sort(
    (left, right) =>
      (citationCounts.get(right.record.id) ?? 0) - (citationCounts.get(left.record.id) ?? 0) ||
      recordDate(right).localeCompare(recordDate(left)) ||
      left.record.title.localeCompare(right.record.title)
  );

  return ranked.map((evidence): UnlabelledEntry => {
    const { record } = evidence;
    const firstQuote = input.citations.find((citation) => citation.recordId === record.id)?.quote;
    return {
      kind: "legislative",
      recordId: record.id,
      language: evidence.fullText?.language ?? input.defaultLanguage,
      title: record.title,
      excerpt: firstQuote ? truncateExcerpt(firstQuote) : null,
      registryNumber: record.registryNumber,
      sourceId: record.consolidationId,
      links: REGISTRY_LANGUAGES.map((language) => ({ language, url: record.sourceUris[language] })),
      citationCount: citationCounts.get(record.id) ?? 0,
      score: null
    };
  });
};

const buildGeneralEntries = (documents: RetrievedDocument[]): UnlabelledEntry[] =>
  [...documents]
    .sort((left, right) => right.score - left.score)
    .map((document): UnlabelledEntry => ({
      kind: "general",
      recordId: document.docId,
      language: document.language ?? UNDETERMINED_LANGUAGE,
      title: document.title ?? document.source ?? document.docId,
      excerpt: truncateExcerpt(document.excerpt),
      registryNumber: null,
      sourceId: document.source ?? null,
      links:
        document.source && isUrl(document.source)
          ? [{ language: document.language ?? UNDETERMINED_LANGUAGE, url: document.source }]
          : [],
      citationCount: 0,
      score: document.score
    }));

/**
 * Merges legislative and general references into one labelled list with no
 * repeated `(recordId, language)` pair. Legislation comes first, ordered by
 * verified citations then recency; general documents follow by score.
 */
export function buildBibliography(input: BuildBibliographyInput): BibliographyEntry[] {
  const seen = new Set<string>();
  const unique = (entries: UnlabelledEntry[]): UnlabelledEntry[] =>
    entries.filter((entry) => {
      const key = `${entry.recordId}|${entry.language}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });

  const legislative = unique(buildLegislativeEntries(input)).map((entry, index) => ({
    ...entry,
    label: `[L${index + 1}]`
  }));
  const general = unique(buildGeneralEntries(input.documents)).map((entry, index) => ({
    ...entry,
    label: `[G${index + 1}]`
  }));

  return [...legislative, ...general];
}
