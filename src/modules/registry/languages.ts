import type { RegistryLanguage } from "./types.js";

export const REGISTRY_LANGUAGES: readonly RegistryLanguage[] = ["de", "fr", "it", "rm"];

export const REGISTRY_LANGUAGE_NAMES: Record<RegistryLanguage, string> = {
  de: "German",
  fr: "French",
  it: "Italian",
  rm: "Romansh"
};

export const LANGUAGE_IRIS: Record<RegistryLanguage, string> = {
  de: "http://publications.europa.eu/resource/authority/language/DEU",
  fr: "http://publications.europa.eu/resource/authority/language/FRA",
  it: "http://publications.europa.eu/resource/authority/language/ITA",
  rm: "http://publications.europa.eu/resource/authority/language/RMH"
};

const REGISTRY_DATA_HOST = "https://fedlex.data.admin.ch";
const REGISTRY_READING_HOST = "https://www.fedlex.admin.ch";

export const isRegistryLanguage = (value: string): value is RegistryLanguage =>
  REGISTRY_LANGUAGES.some((language) => language === value);

export const languageFromIri = (iri: string): RegistryLanguage | null => {
  for (const language of REGISTRY_LANGUAGES) {
    if (LANGUAGE_IRIS[language] === iri) {
      return language;
    }
  }
  return null;
};

/**
 * Maps a free-form language hint ("de", "DE-ch", "French") onto a registry
 * language, or the fallback when the hint names none of them.
 */
export const resolveRegistryLanguage = (
  hint: string | null | undefined,
  fallback: RegistryLanguage
): RegistryLanguage => {
  const normalized = hint?.trim().toLowerCase() ?? "";
  if (!normalized) {
    return fallback;
  }
  const code = normalized.slice(0, 2);
  if (isRegistryLanguage(code)) {
    return code;
  }
  for (const language of REGISTRY_LANGUAGES) {
    if (REGISTRY_LANGUAGE_NAMES[language].toLowerCase() === normalized) {
      return language;
    }
  }
  return fallback;
};

/** Preferred language first, then the remaining variants in registry order. */
export const languageFallbackOrder = (preferred: RegistryLanguage): RegistryLanguage[] => [
  preferred,
  ...REGISTRY_LANGUAGES.filter((language) => language !== preferred)
];

export const buildDocumentUrls = (workUri: string): Record<RegistryLanguage, string> => {
  const base = workUri.startsWith(REGISTRY_DATA_HOST)
    ? `${REGISTRY_READING_HOST}${workUri.slice(REGISTRY_DATA_HOST.length)}`
    : workUri;
  const trimmed = base.replace(/\/+$/, "");
  return {
    de: `${trimmed}/de`,
    fr: `${trimmed}/fr`,
    it: `${trimmed}/it`,
    rm: `${trimmed}/rm`
  };
};
