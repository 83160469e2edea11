import { describe, expect, it } from "vitest";
import {
  REGISTRY_PREFIXES,
  checkFormalQuery,
  cleanGeneratedQuery,
  extractKeywordLiterals,
  withPrefixes
} from "../../src/modules/synthesis/sparql-validator.js";
import { readFixture } from "../helpers/fake-registry-transport.js";

const VALID_BODY = readFixture("asylum-query.sparql").trim();
const OPTIONS = { language: "de", maxResults: 15 } as const;

describe("cleanGeneratedQuery", () => {
  it("unwraps fences and drops model-supplied prefixes and chatter", () => {
    const raw = [
      "Here is the query:",
      "```sparql",
      "PREFIX jolux: <http://example.org/other#>",
      "SELECT ?work WHERE { ?work ?p ?o }",
      "```"
    ].join("\n");

    expect(cleanGeneratedQuery(raw)).toBe("SELECT ?work WHERE { ?work ?p ?o }");
  });

  it("cuts text before SELECT when there is no fence", () => {
    expect(cleanGeneratedQuery("Query: SELECT ?x WHERE { }")).toBe("SELECT ?x WHERE { }");
  });
});

describe("checkFormalQuery", () => {
  it("accepts a well-formed registry query", () => {
    expect(checkFormalQuery(VALID_BODY, OPTIONS)).toEqual({
      ok: true,
      keywords: ["asyl", "flüchtling"],
      applicabilityPredicates: ["jolux:dateApplicability", "jolux:dateEndApplicability"],
      limit: 10
    });
  });

  it("rejects update operations", () => {
    const check = checkFormalQuery(`DELETE WHERE { ?s ?p ?o }`, OPTIONS);

    expect(check.ok).toBe(false);
    expect(check.ok ? [] : check.problems).toEqual(
      expect.arrayContaining(["query must be a read-only SELECT query", "query must not contain update operations"])
    );
  });

  it("ignores keywords that only appear inside string literals", () => {
    const body = VALID_BODY.replace('"asyl"', '"delete"');

    expect(checkFormalQuery(body, OPTIONS)).toMatchObject({ ok: true, keywords: ["delete", "flüchtling"] });
  });

  it("reports unbalanced braces and parentheses", () => {
    const body = VALID_BODY.replace("ORDER BY DESC(?dateApplicability)", "}").replace(
      "LCASE(STR(?title))",
      "LCASE(STR(?title)"
    );
    const check = checkFormalQuery(body, OPTIONS);

    expect(check.ok ? [] : check.problems).toEqual(
      expect.arrayContaining(["curly braces are not balanced", "parentheses are not balanced"])
    );
  });

  it("requires the language filter of the target language", () => {
    const check = checkFormalQuery(VALID_BODY, { language: "fr", maxResults: 15 });

    expect(check.ok ? [] : check.problems).toEqual([
      "query must filter expressions with jolux:language <http://publications.europa.eu/resource/authority/language/FRA>"
    ]);
  });

  it("requires lower-case keyword filters", () => {
    const check = checkFormalQuery(VALID_BODY.replace('"asyl"', '"Asyl"'), OPTIONS);

    expect(check.ok ? [] : check.problems).toEqual(['keyword "Asyl" must be lower-case to match LCASE']);
  });

  it("requires a keyword filter and the projected variables", () => {
    const body = [
      "SELECT ?work ?title WHERE {",
      "  ?consolidation jolux:dateApplicability ?dateApplicability .",
      "  ?expression jolux:language <http://publications.europa.eu/resource/authority/language/DEU> .",
      "}",
      "LIMIT 5"
    ].join("\n");

    expect(checkFormalQuery(body, OPTIONS)).toEqual({
      ok: false,
      problems: [
        "SELECT must project ?consolidation",
        "SELECT must project ?dateApplicability",
        'query must filter with at least one CONTAINS(LCASE(?title), "keyword")'
      ]
    });
  });

  it("bounds the LIMIT", () => {
    expect(checkFormalQuery(VALID_BODY.replace("LIMIT 10", "LIMIT 500"), OPTIONS)).toEqual({
      ok: false,
      problems: ["LIMIT must be between 1 and 15"]
    });
    expect(checkFormalQuery(VALID_BODY.replace("LIMIT 10", ""), OPTIONS)).toEqual({
      ok: false,
      problems: ["query must end with LIMIT (at most 15)"]
    });
  });
});

describe("query helpers", () => {
  it("extracts keyword literals", () => {
    expect(extractKeywordLiterals('FILTER(CONTAINS(LCASE(?title), "asyl"))')).toEqual(["asyl"]);
  });

  it("prepends the registry prefix block", () => {
    expect(withPrefixes("SELECT ?x WHERE {}")).toBe(`${REGISTRY_PREFIXES}\n\nSELECT ?x WHERE {}`);
  });
});
