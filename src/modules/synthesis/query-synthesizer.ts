import { config } from "../../config/index.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { SPARQL_SYNTHESIS_SYSTEM_PROMPT, buildSparqlSynthesisPrompt } from "../../prompts/index.js";
import { CallAbortedError } from "../../clients/request-policy.js";
import { SynthesisError } from "../analysis/errors.js";
import type { AnalysisQuery, CallOptions } from "../analysis/types.js";
import type { LanguageModel } from "../llm/language-model.js";
import { LANGUAGE_IRIS, REGISTRY_LANGUAGE_NAMES } from "../registry/languages.js";
import type { RegistryLanguage } from "../registry/types.js";
import { checkFormalQuery, cleanGeneratedQuery, withPrefixes } from "./sparql-validator.js";
import type { FormalQuery } from "./types.js";

const MAX_ATTEMPTS = 2;

export interface QuerySynthesizerDependencies {
  languageModel: LanguageModel;
  maxResults?: number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export class QuerySynthesizer {
  private readonly languageModel: LanguageModel;
  private readonly maxResults: number;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(dependencies: QuerySynthesizerDependencies) {
    this.languageModel = dependencies.languageModel;
    this.maxResults = dependencies.maxResults ?? config.REGISTRY_MAX_RESULTS;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  /**
   * Asks the model for a registry query and gates it through the
   * well-formedness check. A rejected query is retried once with the list of
   * problems as feedback.
   */
  async synthesize(query: AnalysisQuery, language: RegistryLanguage, options: CallOptions = {}): Promise<FormalQuery> {
    const correlation = options.correlation ?? {};
    const languageIri = LANGUAGE_IRIS[language];
    let feedback: { previousQuery: string; problems: string[] } | undefined;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      let raw: string;
      try {
        raw = await this.languageModel.complete({
          purpose: "synthesize",
          system: SPARQL_SYNTHESIS_SYSTEM_PROMPT,
          prompt: buildSparqlSynthesisPrompt({
            question: query.text,
            languageName: REGISTRY_LANGUAGE_NAMES[language],
            languageIri,
            maxResults: this.maxResults,
            feedback
          }),
          responseFormat: "text",
          signal: options.signal,
          correlation
        });
      } catch (error) {
        if (error instanceof CallAbortedError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : "unknown language model error";
        throw new SynthesisError(`Registry query generation failed: ${message}`, { cause: error });
      }

      const body = cleanGeneratedQuery(raw);
      const check = checkFormalQuery(body, { language, maxResults: this.maxResults });
      if (check.ok) {
        this.logInfo("synthesis.query.accepted", correlation, {
          attempt,
          language,
          keywords: check.keywords,
          limit: check.limit
        });
        return {
          text: withPrefixes(body),
          body,
          language,
          languageFilter: languageIri,
          keywords: check.keywords,
          applicabilityPredicates: check.applicabilityPredicates,
          limit: check.limit,
          attempts: attempt
        };
      }

      this.logWarn("synthesis.query.rejected", correlation, {
        attempt,
        language,
        problems: check.problems
      });
      if (attempt === MAX_ATTEMPTS) {
        throw new SynthesisError(
          `Generated registry query is not well-formed after ${attempt} attempts: ${check.problems.join("; ")}`,
          { problems: check.problems }
        );
      }
      feedback = { previousQuery: body, problems: check.problems };
    }

    throw new SynthesisError("Registry query generation did not run.");
  }
}
