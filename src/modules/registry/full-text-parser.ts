import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import type { FullText, FullTextNode, RegistryLanguage } from "./types.js";

/** Collapses all whitespace runs so quotes and node text compare on one canonical form. */
export function canonicalizeText(value: string): string {
  return value.replace(/ /g, " ").replace(/\s+/g, " ").trim();
}

export interface ParseFullTextInput {
  recordId: string;
  language: RegistryLanguage;
  sourceUrl: string;
  markup: string;
}

/**
 * Parses Akoma Ntoso markup into article and paragraph nodes keyed by their
 * `eId`. Footnotes are dropped. Markup without articles becomes one
 * `document` node holding the whole body text.
 */
export function parseFullText(input: ParseFullTextInput): FullText {
  const $ = cheerio.load(input.markup, { xml: true });
  $("authorialNote, script, style").remove();

  const nodes: FullTextNode[] = [];
  const seenIds = new Set<string>();
  const uniqueId = (candidate: string): string => {
    let id = candidate;
    let counter = 2;
    while (seenIds.has(id)) {
      id = `${candidate}~${counter}`;
      counter += 1;
    }
    seenIds.add(id);
    return id;
  };

  $("article").each((articleIndex, articleElement) => {
    const article = $(articleElement);
    const articleId = uniqueId(article.attr("eId") ?? article.attr("id") ?? `art_${articleIndex + 1}`);
    const label = canonicalizeText(article.children("num").first().text()) || null;
    const heading = canonicalizeText(article.children("heading").first().text()) || null;
    const text = canonicalizeText(article.text());
    if (!text) {
      return;
    }

    nodes.push({ id: articleId, kind: "article", label, heading, parentId: null, text });

    article.find("paragraph").each((paragraphIndex, paragraphElement) => {
      const paragraph = $(paragraphElement);
      const paragraphText = canonicalizeText(paragraph.text());
      if (!paragraphText) {
        return;
      }
      nodes.push({
        id: uniqueId(paragraph.attr("eId") ?? `${articleId}/para_${paragraphIndex + 1}`),
        kind: "paragraph",
        label: canonicalizeText(paragraph.children("num").first().text()) || null,
        heading: null,
        parentId: articleId,
        text: paragraphText
      });
    });
  });

  if (nodes.length === 0) {
    const textRoot: cheerio.Cheerio<AnyNode> = $("body").length > 0 ? $("body") : $.root();
    const bodyText = canonicalizeText(textRoot.text());
    if (bodyText) {
      nodes.push({ id: "document", kind: "document", label: null, heading: null, parentId: null, text: bodyText });
    }
  }

  return {
    recordId: input.recordId,
    language: input.language,
    sourceUrl: input.sourceUrl,
    nodes
  };
}

export function findNode(fullText: FullText, nodeId: string): FullTextNode | undefined {
  return fullText.nodes.find((node) => node.id === nodeId);
}
