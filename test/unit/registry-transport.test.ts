import { describe, expect, it, vi } from "vitest";
import {
  buildManifestationQuery,
  FullTextUnavailableError,
  HttpRegistryTransport,
  RegistryHttpError
} from "../../src/modules/registry/registry-transport.js";

const ENDPOINT = "https://registry.test/sparqlendpoint";
const CONSOLIDATION = "https://fedlex.data.admin.ch/eli/cc/1999/358/20240101";
const XML_URL = "https://fedlex.data.admin.ch/filestore/asylg-de.xml";

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/sparql-results+json" } });

const linkBindings = {
  results: { bindings: [{ xml_link: { type: "uri", value: XML_URL } }] }
};

describe("HttpRegistryTransport", () => {
  it("posts the query form-encoded and returns the bindings", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ results: { bindings: [{ title: { type: "literal", value: "Asylgesetz", "xml:lang": "de" } }] } })
    );
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    const bindings = await transport.select("SELECT ?title WHERE { ?s ?p ?title } LIMIT 1");

    expect(bindings).toEqual([{ title: { type: "literal", value: "Asylgesetz", "xml:lang": "de" } }]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Accept: "application/sparql-results+json",
      "Content-Type": "application/x-www-form-urlencoded"
    });
    expect(new URLSearchParams(String(init?.body)).get("query")).toBe(
      "SELECT ?title WHERE { ?s ?p ?title } LIMIT 1"
    );
  });

  it("reports the status and body of a failed query", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("busy", { status: 503 }));
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    const failure = transport.select("SELECT * WHERE { ?s ?p ?o } LIMIT 1");

    await expect(failure).rejects.toBeInstanceOf(RegistryHttpError);
    await expect(failure).rejects.toThrow("Registry query failed (503): busy");
  });

  it("rejects a results document of the wrong shape", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ boolean: true }));
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    await expect(transport.select("ASK { ?s ?p ?o }")).rejects.toThrow(
      "Registry returned an unexpected SPARQL results document."
    );
  });

  it("resolves the XML manifestation and downloads it", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(linkBindings))
      .mockResolvedValueOnce(new Response("<akomaNtoso/>", { status: 200 }));
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    await expect(transport.fetchFullText(CONSOLIDATION, "de")).resolves.toEqual({
      url: XML_URL,
      markup: "<akomaNtoso/>"
    });
    expect(fetchMock.mock.calls[1]?.[0]).toBe(XML_URL);
  });

  it("raises FullTextUnavailableError when no manifestation exists", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ results: { bindings: [] } }));
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    const failure = transport.fetchFullText(CONSOLIDATION, "rm");

    await expect(failure).rejects.toBeInstanceOf(FullTextUnavailableError);
    await expect(failure).rejects.toThrow(`No XML manifestation for ${CONSOLIDATION} in language rm`);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("fails when the download itself fails", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(linkBindings))
      .mockResolvedValueOnce(new Response("gone", { status: 404 }));
    const transport = new HttpRegistryTransport({ endpoint: ENDPOINT, fetch: fetchMock });

    await expect(transport.fetchFullText(CONSOLIDATION, "de")).rejects.toThrow(
      `Full text download failed (404) for ${XML_URL}`
    );
  });
});

describe("buildManifestationQuery", () => {
  it("addresses the consolidation and language authority", () => {
    const query = buildManifestationQuery(CONSOLIDATION, "fr");

    expect(query).toContain(`<${CONSOLIDATION}> jolux:isRealizedBy ?expression .`);
    expect(query).toContain("jolux:language <http://publications.europa.eu/resource/authority/language/FRA>");
    expect(query.endsWith("LIMIT 1")).toBe(true);
  });
});
