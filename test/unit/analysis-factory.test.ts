import { describe, expect, it, vi } from "vitest";
import { createAnalysisOrchestrator } from "../../src/modules/analysis/factory.js";
import { FakeRegistryTransport } from "../helpers/fake-registry-transport.js";
import { ASYLUM_ACT_CONSOLIDATION, ASYLUM_ACT_MARKUP, ASYLUM_QUERY_BODY, asylumActRow } from "../helpers/registry-fixtures.js";
import { ScriptedLanguageModel } from "../helpers/scripted-language-model.js";

describe("createAnalysisOrchestrator", () => {
  it("wires the overrides and shares the registry cache across analyses", async () => {
    const languageModel = new ScriptedLanguageModel({
      classify: '{"route":"STRUCTURED","confidence":0.95,"rationale":"Statute lookup."}',
      synthesize: ASYLUM_QUERY_BODY,
      interpret: (request) => (request.responseFormat === "json" ? '{"citations":[]}' : "No citation needed.")
    });
    const registryTransport = new FakeRegistryTransport({
      bindings: [asylumActRow],
      documents: { [`${ASYLUM_ACT_CONSOLIDATION}|de`]: ASYLUM_ACT_MARKUP }
    });
    const vectorRetriever = { retrieve: vi.fn().mockResolvedValue([]) };

    const orchestrator = createAnalysisOrchestrator({ languageModel, registryTransport, vectorRetriever });
    const query = { text: "Which act governs asylum in Switzerland?", jurisdiction: "Switzerland" };

    const first = await orchestrator.analyze(query);
    const second = await orchestrator.analyze(query);

    expect(first.routeUsed).toBe("STRUCTURED");
    expect(second.answer).toBe("No citation needed.");
    expect(second.records.map((record) => record.registryNumber)).toEqual(["SR 142.31"]);
    expect(registryTransport.selectCalls).toHaveLength(1);
    expect(registryTransport.fetchCalls).toHaveLength(1);
    expect(vectorRetriever.retrieve).not.toHaveBeenCalled();
  });
});
