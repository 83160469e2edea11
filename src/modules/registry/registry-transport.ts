import { z } from "zod";
import { LANGUAGE_IRIS } from "./languages.js";
import type {
  FetchedMarkup,
  RegistryCallOptions,
  RegistryLanguage,
  RegistryTransport,
  SparqlBinding
} from "./types.js";

const XML_FILE_TYPE = "http://publications.europa.eu/resource/authority/file-type/XML";

const sparqlTermSchema = z.object({
  type: z.string(),
  value: z.string(),
  "xml:lang": z.string().optional(),
  datatype: z.string().optional()
});

const sparqlResultsSchema = z.object({
  results: z.object({
    bindings: z.array(z.record(sparqlTermSchema))
  })
});

export class RegistryHttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "RegistryHttpError";
    this.status = status;
  }
}

/** No XML manifestation exists for the requested language variant. */
export class FullTextUnavailableError extends Error {
  readonly language: RegistryLanguage;

  constructor(consolidationId: string, language: RegistryLanguage) {
    super(`No XML manifestation for ${consolidationId} in language ${language}`);
    this.name = "FullTextUnavailableError";
    this.language = language;
  }
}

export const buildManifestationQuery = (consolidationId: string, language: RegistryLanguage): string =>
  [
    "PREFIX jolux: <http://data.legilux.public.lu/resource/ontology/jolux#>",
    "SELECT ?xml_link WHERE {",
    `  <${consolidationId}> jolux:isRealizedBy ?expression .`,
    `  ?expression jolux:language <${LANGUAGE_IRIS[language]}> ;`,
    "              jolux:isEmbodiedBy ?manifestation .",
    `  ?manifestation jolux:format <${XML_FILE_TYPE}> ;`,
    "                 jolux:isExemplifiedBy ?xml_link .",
    "}",
    "LIMIT 1"
  ].join("\n");

const truncateBody = (body: string): string => (body.length > 300 ? `${body.slice(0, 300)}…` : body);

export interface HttpRegistryTransportOptions {
  endpoint: string;
  fetch?: typeof fetch;
}

/** SPARQL 1.1 protocol over HTTP plus direct download of the XML manifestation. */
export class HttpRegistryTransport implements RegistryTransport {
  private readonly endpoint: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpRegistryTransportOptions) {
    this.endpoint = options.endpoint;
    this.fetchFn = options.fetch ?? fetch;
  }

  async select(query: string, options: RegistryCallOptions = {}): Promise<SparqlBinding[]> {
    const response = await this.fetchFn(this.endpoint, {
      method: "POST",
      headers: {
        Accept: "application/sparql-results+json",
        "Content-Type": "application/x-www-form-urlencoded"
      },
      body: new URLSearchParams({ query }).toString(),
      signal: options.signal
    });

    if (!response.ok) {
      const details = await response.text();
      throw new RegistryHttpError(
        `Registry query failed (${response.status}): ${truncateBody(details)}`,
        response.status
      );
    }

    const parsed = sparqlResultsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RegistryHttpError("Registry returned an unexpected SPARQL results document.", response.status);
    }

    return parsed.data.results.bindings;
  }

  async fetchFullText(
    consolidationId: string,
    language: RegistryLanguage,
    options: RegistryCallOptions = {}
  ): Promise<FetchedMarkup> {
    const bindings = await this.select(buildManifestationQuery(consolidationId, language), options);
    const url = bindings[0]?.xml_link?.value;
    if (!url) {
      throw new FullTextUnavailableError(consolidationId, language);
    }

    const response = await this.fetchFn(url, {
      headers: { Accept: "application/xml, text/xml;q=0.9, */*;q=0.5" },
      signal: options.signal
    });
    if (!response.ok) {
      throw new RegistryHttpError(`Full text download failed (${response.status}) for ${url}`, response.status);
    }

    return { url, markup: await response.text() };
  }
}
