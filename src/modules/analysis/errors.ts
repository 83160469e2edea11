export type AnalysisErrorKind =
  | "synthesis"
  | "query_execution"
  | "vector_retrieval"
  | "analysis_unavailable"
  | "answer_generation"
  | "cancelled";

export type AnalysisPath = "structured" | "vector";

interface AnalysisErrorOptions {
  cause?: unknown;
}

export class AnalysisError extends Error {
  readonly kind: AnalysisErrorKind;

  constructor(kind: AnalysisErrorKind, message: string, options?: AnalysisErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AnalysisError";
    this.kind = kind;
  }
}

/** The registry query could not be generated in a well-formed shape. */
export class SynthesisError extends AnalysisError {
  readonly problems: string[];

  constructor(message: string, options?: AnalysisErrorOptions & { problems?: string[] }) {
    super("synthesis", message, options);
    this.name = "SynthesisError";
    this.problems = options?.problems ?? [];
  }
}

export class QueryExecutionError extends AnalysisError {
  constructor(message: string, options?: AnalysisErrorOptions) {
    super("query_execution", message, options);
    this.name = "QueryExecutionError";
  }
}

export class VectorRetrievalError extends AnalysisError {
  constructor(message: string, options?: AnalysisErrorOptions) {
    super("vector_retrieval", message, options);
    this.name = "VectorRetrievalError";
  }
}

export type PathError = SynthesisError | QueryExecutionError | VectorRetrievalError;

export const isPathError = (error: unknown): error is PathError =>
  error instanceof SynthesisError || error instanceof QueryExecutionError || error instanceof VectorRetrievalError;

export type PathFailure = {
  path: AnalysisPath;
  kind: PathError["kind"];
  message: string;
};

export class AnalysisUnavailableError extends AnalysisError {
  readonly failures: PathFailure[];

  constructor(failures: PathFailure[]) {
    super(
      "analysis_unavailable",
      `All requested knowledge paths failed: ${failures.map((failure) => `${failure.path} (${failure.message})`).join("; ")}`
    );
    this.name = "AnalysisUnavailableError";
    this.failures = failures;
  }
}

export class AnswerGenerationError extends AnalysisError {
  constructor(message: string, options?: AnalysisErrorOptions) {
    super("answer_generation", message, options);
    this.name = "AnswerGenerationError";
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor() {
    super("cancelled", "Analysis was cancelled before completion.");
    this.name = "AnalysisCancelledError";
  }
}

const SAFE_MESSAGES: Record<AnalysisErrorKind, string> = {
  synthesis: "The legislative registry query could not be prepared for this question.",
  query_execution: "The legislative registry is currently unavailable.",
  vector_retrieval: "The document search service is currently unavailable.",
  analysis_unavailable: "No knowledge source could be consulted for this question. Please try again later.",
  answer_generation: "The answer could not be generated right now. Please try again.",
  cancelled: "The analysis was cancelled."
};

export const toSafeUserErrorMessage = (error: AnalysisError): string => SAFE_MESSAGES[error.kind];
