import { CallAbortedError } from "../../clients/request-policy.js";
import {
  AnalysisCancelledError,
  isPathError,
  type AnalysisPath,
  type PathError,
  type PathFailure
} from "./errors.js";

export type StageOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "degraded"; failure: PathFailure; error: PathError };

/**
 * Runs one knowledge path. Expected path failures come back as a `degraded`
 * outcome; cancellation and anything unexpected still throw.
 */
export async function runStage<T>(
  path: AnalysisPath,
  operation: () => Promise<T>,
  signal?: AbortSignal
): Promise<StageOutcome<T>> {
  try {
    return { status: "ok", value: await operation() };
  } catch (error) {
    if (error instanceof CallAbortedError || signal?.aborted) {
      throw new AnalysisCancelledError();
    }
    if (isPathError(error)) {
      return { status: "degraded", failure: { path, kind: error.kind, message: error.message }, error };
    }
    throw error;
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AnalysisCancelledError();
  }
}
