import { describe, expect, it } from "vitest";
import { CallAbortedError } from "../../src/clients/request-policy.js";
import { AnalysisCancelledError, QueryExecutionError, VectorRetrievalError } from "../../src/modules/analysis/errors.js";
import { runStage, throwIfCancelled } from "../../src/modules/analysis/pipeline.js";

describe("runStage", () => {
  it("wraps a successful path", async () => {
    await expect(runStage("vector", async () => ["doc"])).resolves.toEqual({ status: "ok", value: ["doc"] });
  });

  it("turns a path error into a degraded outcome", async () => {
    const error = new QueryExecutionError("Registry query failed after 3 attempts: timeout");

    await expect(runStage("structured", async () => Promise.reject(error))).resolves.toEqual({
      status: "degraded",
      failure: {
        path: "structured",
        kind: "query_execution",
        message: "Registry query failed after 3 attempts: timeout"
      },
      error
    });
  });

  it("reports cancellation instead of degrading", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runStage("vector", async () => Promise.reject(new VectorRetrievalError("aborted search")), controller.signal)
    ).rejects.toBeInstanceOf(AnalysisCancelledError);
    await expect(
      runStage("vector", async () => Promise.reject(new CallAbortedError("qdrant.search")))
    ).rejects.toBeInstanceOf(AnalysisCancelledError);
  });

  it("rethrows unexpected errors", async () => {
    await expect(runStage("structured", async () => Promise.reject(new TypeError("bug")))).rejects.toThrow("bug");
  });
});

describe("throwIfCancelled", () => {
  it("throws only for an aborted signal", () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow("Analysis was cancelled before completion.");
  });
});
