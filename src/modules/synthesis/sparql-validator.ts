import { LANGUAGE_IRIS } from "../registry/languages.js";
import type { RegistryLanguage } from "../registry/types.js";
import type { QueryCheck } from "./types.js";

export const REGISTRY_PREFIXES = [
  "PREFIX rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>",
  "PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>",
  "PREFIX xsd: <http://www.w3.org/2001/XMLSchema#>",
  "PREFIX dct: <http://purl.org/dc/terms/>",
  "PREFIX skos: <http://www.w3.org/2004/02/skos/core#>",
  "PREFIX jolux: <http://data.legilux.public.lu/resource/ontology/jolux#>",
  "PREFIX schema: <http://schema.org/>"
].join("\n");

export const REQUIRED_PROJECTION = ["work", "consolidation", "title", "dateApplicability"] as const;

const UPDATE_KEYWORDS = /\b(INSERT|DELETE|LOAD|CLEAR|DROP|CREATE|COPY|MOVE|ADD|WITH)\b/i;
const KEYWORD_FILTER =
  /CONTAINS\s*\(\s*LCASE\s*\(\s*(?:STR\s*\(\s*\?\w+\s*\)|\?\w+)\s*\)\s*,\s*"((?:[^"\\]|\\.)*)"\s*\)/gi;
const LIMIT_CLAUSE = /\bLIMIT\s+(\d+)/gi;

export function withPrefixes(body: string): string {
  return `${REGISTRY_PREFIXES}\n\n${body}`;
}

/**
 * Removes Markdown fences, chatter before the query and any prefix or base
 * declarations; the service owns the prefix block.
 */
export function cleanGeneratedQuery(raw: string): string {
  const fenced = /```(?:sparql)?\s*([\s\S]*?)```/i.exec(raw);
  const source = fenced?.[1] ?? raw;
  const lines = source
    .split(/\r?\n/)
    .filter((line) => !/^\s*(PREFIX|BASE)\s/i.test(line));
  const text = lines.join("\n").trim();
  const selectIndex = text.search(/\bSELECT\b/i);
  return selectIndex > 0 ? text.slice(selectIndex).trim() : text;
}

type ScanResult = {
  braceDepth: number;
  parenDepth: number;
  closedBeforeOpen: boolean;
  unterminatedLiteral: boolean;
  /** Query text with the content of every string literal removed. */
  outsideLiterals: string;
};

const scanQueryText = (body: string): ScanResult => {
  let braceDepth = 0;
  let parenDepth = 0;
  let closedBeforeOpen = false;
  let quote: string | null = null;
  let outsideLiterals = "";

  for (let index = 0; index < body.length; index += 1) {
    const char = body.charAt(index);
    if (quote !== null) {
      if (char === "\\") {
        index += 1;
      } else if (char === quote) {
        quote = null;
        outsideLiterals += `${char}${char}`;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      continue;
    }

    if (char === "{") braceDepth += 1;
    if (char === "}") braceDepth -= 1;
    if (char === "(") parenDepth += 1;
    if (char === ")") parenDepth -= 1;
    if (braceDepth < 0 || parenDepth < 0) {
      closedBeforeOpen = true;
    }
    outsideLiterals += char;
  }

  return {
    braceDepth,
    parenDepth,
    closedBeforeOpen,
    unterminatedLiteral: quote !== null,
    outsideLiterals
  };
};

export const extractKeywordLiterals = (body: string): string[] =>
  [...body.matchAll(KEYWORD_FILTER)].map((match) => (match[1] ?? "").trim()).filter(Boolean);

/**
 * Well-formedness gate for a generated registry query body (without
 * prefixes). Returns every problem found so the model can be told all of
 * them at once.
 */
export function checkFormalQuery(
  body: string,
  options: { language: RegistryLanguage; maxResults: number }
): QueryCheck {
  const problems: string[] = [];
  const scan = scanQueryText(body);

  if (!/^\s*SELECT\b/i.test(body)) {
    problems.push("query must be a read-only SELECT query");
  }
  if (UPDATE_KEYWORDS.test(scan.outsideLiterals)) {
    problems.push("query must not contain update operations");
  }
  if (!/\bWHERE\s*\{/i.test(scan.outsideLiterals)) {
    problems.push("query must have a WHERE { ... } clause");
  }
  if (scan.braceDepth !== 0 || scan.closedBeforeOpen) {
    problems.push("curly braces are not balanced");
  }
  if (scan.parenDepth !== 0) {
    problems.push("parentheses are not balanced");
  }
  if (scan.unterminatedLiteral) {
    problems.push("a string literal is not closed");
  }

  const projection = /^\s*SELECT\s+([\s\S]*?)\bWHERE\b/i.exec(scan.outsideLiterals)?.[1] ?? "";
  for (const variable of REQUIRED_PROJECTION) {
    if (!new RegExp(`\\?${variable}\\b`).test(projection)) {
      problems.push(`SELECT must project ?${variable}`);
    }
  }

  const languageIri = LANGUAGE_IRIS[options.language];
  if (!body.includes(`<${languageIri}>`)) {
    problems.push(`query must filter expressions with jolux:language <${languageIri}>`);
  }

  if (!/jolux:dateApplicability\b/.test(scan.outsideLiterals)) {
    problems.push("query must bind jolux:dateApplicability on the consolidation");
  }

  const literals = extractKeywordLiterals(body);
  if (literals.length === 0) {
    problems.push('query must filter with at least one CONTAINS(LCASE(?title), "keyword")');
  }
  for (const literal of literals) {
    if (literal !== literal.toLowerCase()) {
      problems.push(`keyword "${literal}" must be lower-case to match LCASE`);
    }
  }

  const limits = [...scan.outsideLiterals.matchAll(LIMIT_CLAUSE)].map((match) => Number(match[1]));
  const limit = limits.at(-1);
  if (limit === undefined) {
    problems.push(`query must end with LIMIT (at most ${options.maxResults})`);
  } else if (limit < 1 || limit > options.maxResults) {
    problems.push(`LIMIT must be between 1 and ${options.maxResults}`);
  }

  if (problems.length > 0 || limit === undefined) {
    return { ok: false, problems };
  }

  const applicabilityPredicates = ["jolux:dateApplicability"];
  if (/jolux:dateEndApplicability\b/.test(scan.outsideLiterals)) {
    applicabilityPredicates.push("jolux:dateEndApplicability");
  }

  return {
    ok: true,
    keywords: [...new Set(literals.map((literal) => literal.toLowerCase()))],
    applicabilityPredicates,
    limit
  };
}
