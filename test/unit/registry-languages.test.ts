import { describe, expect, it } from "vitest";
import {
  LANGUAGE_IRIS,
  buildDocumentUrls,
  languageFallbackOrder,
  languageFromIri,
  resolveRegistryLanguage
} from "../../src/modules/registry/languages.js";

describe("registry languages", () => {
  it("resolves codes, regional tags and language names", () => {
    expect(resolveRegistryLanguage("FR", "de")).toBe("fr");
    expect(resolveRegistryLanguage("it-CH", "de")).toBe("it");
    expect(resolveRegistryLanguage("Romansh", "de")).toBe("rm");
    expect(resolveRegistryLanguage("english", "de")).toBe("de");
    expect(resolveRegistryLanguage(undefined, "fr")).toBe("fr");
  });

  it("maps authority-table IRIs back to codes", () => {
    expect(languageFromIri(LANGUAGE_IRIS.rm)).toBe("rm");
    expect(languageFromIri("http://publications.europa.eu/resource/authority/language/ENG")).toBeNull();
  });

  it("puts the preferred language first in the fallback order", () => {
    expect(languageFallbackOrder("de")).toEqual(["de", "fr", "it", "rm"]);
    expect(languageFallbackOrder("it")).toEqual(["it", "de", "fr", "rm"]);
  });

  it("turns data URIs into public reading links", () => {
    expect(buildDocumentUrls("https://fedlex.data.admin.ch/eli/cc/1999/358/")).toEqual({
      de: "https://www.fedlex.admin.ch/eli/cc/1999/358/de",
      fr: "https://www.fedlex.admin.ch/eli/cc/1999/358/fr",
      it: "https://www.fedlex.admin.ch/eli/cc/1999/358/it",
      rm: "https://www.fedlex.admin.ch/eli/cc/1999/358/rm"
    });
  });
});
