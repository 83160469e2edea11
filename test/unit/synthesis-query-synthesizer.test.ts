import { describe, expect, it, vi } from "vitest";
import { CallAbortedError } from "../../src/clients/request-policy.js";
import { SynthesisError } from "../../src/modules/analysis/errors.js";
import { QuerySynthesizer } from "../../src/modules/synthesis/query-synthesizer.js";
import { REGISTRY_PREFIXES } from "../../src/modules/synthesis/sparql-validator.js";
import { readFixture } from "../helpers/fake-registry-transport.js";
import { ScriptedLanguageModel } from "../helpers/scripted-language-model.js";

const VALID_BODY = readFixture("asylum-query.sparql").trim();
const QUERY = { text: "What are the requirements for asylum in Switzerland?", jurisdiction: "Switzerland" };

const createSynthesizer = (languageModel: ScriptedLanguageModel) =>
  new QuerySynthesizer({ languageModel, maxResults: 15, logInfo: vi.fn(), logWarn: vi.fn() });

describe("QuerySynthesizer", () => {
  it("returns a prefixed formal query with its filters", async () => {
    const languageModel = new ScriptedLanguageModel({
      synthesize: ["```sparql\nPREFIX dct: <http://purl.org/dc/terms/>\n" + VALID_BODY + "\n```"]
    });

    const formalQuery = await createSynthesizer(languageModel).synthesize(QUERY, "de");

    expect(formalQuery).toEqual({
      text: `${REGISTRY_PREFIXES}\n\n${VALID_BODY}`,
      body: VALID_BODY,
      language: "de",
      languageFilter: "http://publications.europa.eu/resource/authority/language/DEU",
      keywords: ["asyl", "flüchtling"],
      applicabilityPredicates: ["jolux:dateApplicability", "jolux:dateEndApplicability"],
      limit: 10,
      attempts: 1
    });
    expect(languageModel.calls[0]?.responseFormat).toBe("text");
  });

  it("retries once with the problems of the rejected query", async () => {
    const rejected = VALID_BODY.replace('"asyl"', '"Asyl"');
    const languageModel = new ScriptedLanguageModel({ synthesize: [rejected, VALID_BODY] });

    const formalQuery = await createSynthesizer(languageModel).synthesize(QUERY, "de");

    expect(formalQuery.attempts).toBe(2);
    const retryPrompt = languageModel.calls[1]?.prompt ?? "";
    expect(retryPrompt).toContain("Your previous query was rejected:");
    expect(retryPrompt).toContain('- keyword "Asyl" must be lower-case to match LCASE');
  });

  it("fails with the outstanding problems after the second rejection", async () => {
    const languageModel = new ScriptedLanguageModel({ synthesize: "SELECT ?work WHERE { ?work ?p ?o }" });

    const failure = createSynthesizer(languageModel).synthesize(QUERY, "de");

    await expect(failure).rejects.toBeInstanceOf(SynthesisError);
    await expect(failure).rejects.toMatchObject({
      kind: "synthesis",
      problems: expect.arrayContaining(["query must end with LIMIT (at most 15)"])
    });
    expect(languageModel.callsFor("synthesize")).toHaveLength(2);
  });

  it("turns model failures into synthesis errors", async () => {
    const languageModel = new ScriptedLanguageModel({ synthesize: new Error("model overloaded") });

    await expect(createSynthesizer(languageModel).synthesize(QUERY, "de")).rejects.toThrow(
      "Registry query generation failed: model overloaded"
    );
  });

  it("lets cancellation through", async () => {
    const languageModel = new ScriptedLanguageModel({ synthesize: new CallAbortedError("llm.synthesize") });

    await expect(createSynthesizer(languageModel).synthesize(QUERY, "de")).rejects.toBeInstanceOf(CallAbortedError);
  });
});
