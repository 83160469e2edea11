import type { RegistryLanguage } from "../registry/types.js";

export type FormalQuery = {
  /** Prefix block followed by the body; this is what the registry receives. */
  text: string;
  body: string;
  language: RegistryLanguage;
  /** Language IRI the query filters expressions on. */
  languageFilter: string;
  /** Lower-case terms of the `CONTAINS(LCASE(?x), "...")` filters. */
  keywords: string[];
  applicabilityPredicates: string[];
  limit: number;
  attempts: number;
};

export type QueryCheck =
  | {
      ok: true;
      keywords: string[];
      applicabilityPredicates: string[];
      limit: number;
    }
  | { ok: false; problems: string[] };
