import { CallAbortedError, withRetries, withTimeout } from "../../clients/request-policy.js";
import { config } from "../../config/index.js";
import { logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordCacheLookup, recordRegistryLatency } from "../../observability/metrics.js";
import { QueryExecutionError } from "../analysis/errors.js";
import type { FormalQuery } from "../synthesis/types.js";
import { assessApplicability, toIsoDay } from "./applicability.js";
import { parseFullText } from "./full-text-parser.js";
import {
  buildDocumentUrls,
  isRegistryLanguage,
  languageFallbackOrder,
  languageFromIri
} from "./languages.js";
import { TtlCache } from "./record-cache.js";
import { FullTextUnavailableError, HttpRegistryTransport } from "./registry-transport.js";
import type {
  FullText,
  LegislativeRecord,
  RecordEvidence,
  RegistryLanguage,
  RegistryLookupResult,
  RegistryTransport,
  SparqlBinding
} from "./types.js";

type RegistryRow = {
  work: string;
  consolidation: string;
  title: string;
  notation: string | null;
  documentDate: string | null;
  applicabilityStart: string | null;
  applicabilityEnd: string | null;
  language: RegistryLanguage | null;
};

type CachedQueryResult = {
  rows: RegistryRow[];
};

/** A fetched text, or `null` when the variant is known not to exist. */
type CachedFullText = {
  consolidationId: string;
  fullText: FullText | null;
  reason: string | null;
};

export interface LookupOptions {
  language: RegistryLanguage;
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

export interface RegistryClientOptions {
  transport?: RegistryTransport;
  queryCache?: TtlCache<CachedQueryResult>;
  fullTextCache?: TtlCache<CachedFullText>;
  timeoutMs?: number;
  fullTextTimeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  now?: () => Date;
  recordRegistryLatency?: typeof recordRegistryLatency;
  recordCacheLookup?: typeof recordCacheLookup;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const readValue = (binding: SparqlBinding, key: string): string | null => {
  const value = binding[key]?.value.trim();
  return value ? value : null;
};

const readLanguage = (binding: SparqlBinding): RegistryLanguage | null => {
  const raw = readValue(binding, "lang") ?? binding.title?.["xml:lang"] ?? null;
  if (!raw) {
    return null;
  }
  const code = raw.trim().toLowerCase();
  return languageFromIri(raw.trim()) ?? (isRegistryLanguage(code) ? code : null);
};

export const parseRegistryRows = (bindings: SparqlBinding[]): RegistryRow[] => {
  const rows: RegistryRow[] = [];
  for (const binding of bindings) {
    const work = readValue(binding, "work");
    const consolidation = readValue(binding, "consolidation");
    const title = readValue(binding, "title");
    if (!work || !consolidation || !title) {
      continue;
    }
    rows.push({
      work,
      consolidation,
      title,
      notation: readValue(binding, "sr_number"),
      documentDate: readValue(binding, "date"),
      applicabilityStart: readValue(binding, "dateApplicability"),
      applicabilityEnd: readValue(binding, "dateEndApplicability"),
      language: readLanguage(binding)
    });
  }
  return rows;
};

const toRegistryNumber = (notation: string | null): string | null => {
  if (!notation) {
    return null;
  }
  return /^SR\s/i.test(notation) ? `SR ${notation.replace(/^SR\s+/i, "")}` : `SR ${notation}`;
};

const startDay = (row: RegistryRow): string => row.applicabilityStart?.slice(0, 10) ?? "";

/**
 * One record per work. Among its consolidations the one with the latest
 * applicability start that is not in the future wins, otherwise the latest.
 */
export const selectConsolidations = (
  rows: RegistryRow[],
  fallbackLanguage: RegistryLanguage,
  now: Date
): LegislativeRecord[] => {
  const today = toIsoDay(now);
  const groups = new Map<string, RegistryRow[]>();
  for (const row of rows) {
    const group = groups.get(row.work);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.work, [row]);
    }
  }

  const records: LegislativeRecord[] = [];
  for (const [work, group] of groups) {
    const started = group.filter((row) => startDay(row) !== "" && startDay(row) <= today);
    const candidates = started.length > 0 ? started : group;
    const chosen = candidates.reduce((best, row) => (startDay(row) > startDay(best) ? row : best));
    const languages = [
      ...new Set(group.map((row) => row.language).filter((language): language is RegistryLanguage => language !== null))
    ];

    records.push({
      id: work,
      consolidationId: chosen.consolidation,
      title: chosen.title,
      registryNumber: toRegistryNumber(group.find((row) => row.notation !== null)?.notation ?? null),
      documentDate: chosen.documentDate,
      applicabilityStart: chosen.applicabilityStart,
      applicabilityEnd: chosen.applicabilityEnd,
      languages: languages.length > 0 ? languages : [fallbackLanguage],
      sourceUris: buildDocumentUrls(work)
    });
  }
  return records;
};

export class RegistryClient {
  private readonly transport: RegistryTransport;
  private readonly queryCache: TtlCache<CachedQueryResult>;
  private readonly fullTextCache: TtlCache<CachedFullText>;
  private readonly timeoutMs: number;
  private readonly fullTextTimeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;
  private readonly recordRegistryLatency: typeof recordRegistryLatency;
  private readonly recordCacheLookup: typeof recordCacheLookup;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(options: RegistryClientOptions = {}) {
    const cacheOptions = { ttlMs: config.RECORD_CACHE_TTL_MS, maxEntries: config.RECORD_CACHE_MAX_ENTRIES };
    this.transport = options.transport ?? new HttpRegistryTransport({ endpoint: config.REGISTRY_SPARQL_ENDPOINT });
    this.queryCache = options.queryCache ?? new TtlCache<CachedQueryResult>(cacheOptions);
    this.fullTextCache = options.fullTextCache ?? new TtlCache<CachedFullText>(cacheOptions);
    this.timeoutMs = options.timeoutMs ?? config.REGISTRY_TIMEOUT_MS;
    this.fullTextTimeoutMs = options.fullTextTimeoutMs ?? config.REGISTRY_FULLTEXT_TIMEOUT_MS;
    this.retries = options.retries ?? config.REGISTRY_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? config.REGISTRY_RETRY_DELAY_MS;
    this.now = options.now ?? (() => new Date());
    this.recordRegistryLatency = options.recordRegistryLatency ?? recordRegistryLatency;
    this.recordCacheLookup = options.recordCacheLookup ?? recordCacheLookup;
    this.logInfo = options.logInfo ?? logInfo;
    this.logWarn = options.logWarn ?? logWarn;
  }

  async lookup(formalQuery: FormalQuery, options: LookupOptions): Promise<RegistryLookupResult> {
    const correlation = options.correlation ?? {};
    const startedAt = this.now().getTime();

    const cached = this.queryCache.get(formalQuery.text);
    this.recordCacheLookup("registry_query", cached !== undefined);
    let rows: RegistryRow[];
    if (cached) {
      rows = cached.rows;
    } else {
      rows = parseRegistryRows(await this.select(formalQuery.text, options.signal));
      this.queryCache.set(formalQuery.text, { rows });
    }

    // Applicability is judged at read time so cached rows never outlive their window.
    const now = this.now();
    const applicable: Array<Omit<RecordEvidence, "fullText" | "fetchErrors">> = [];
    const excludedRecordIds: string[] = [];
    for (const record of selectConsolidations(rows, formalQuery.language, now)) {
      const applicability = assessApplicability(record.applicabilityStart, record.applicabilityEnd, now);
      if (applicability.isApplicable) {
        applicable.push({ record, applicability });
      } else {
        excludedRecordIds.push(record.id);
        this.logInfo("registry.record.excluded", correlation, {
          record_id: record.id,
          applicability_status: applicability.status,
          applicability_details: applicability.details
        });
      }
    }

    const records = await Promise.all(
      applicable.map(async (entry) => ({
        ...entry,
        ...(await this.loadFullText(entry.record, options.language, options.signal, correlation))
      }))
    );

    const latencyMs = this.now().getTime() - startedAt;
    this.recordRegistryLatency(latencyMs);
    this.logInfo("registry.lookup.complete", correlation, {
      latency_ms: latencyMs,
      cache_hit: cached !== undefined,
      row_count: rows.length,
      record_count: records.length,
      excluded_count: excludedRecordIds.length,
      metadata_only_count: records.filter((record) => record.fullText === null).length
    });

    return {
      formalQuery,
      rowCount: rows.length,
      records,
      excludedRecordIds,
      cacheHit: cached !== undefined
    };
  }

  private async select(query: string, signal: AbortSignal | undefined): Promise<SparqlBinding[]> {
    try {
      return await withRetries(
        async () =>
          withTimeout((callSignal) => this.transport.select(query, { signal: callSignal }), {
            label: "registry.select",
            timeoutMs: this.timeoutMs,
            signal
          }),
        { retries: this.retries, retryDelayMs: this.retryDelayMs, signal }
      );
    } catch (error) {
      if (error instanceof CallAbortedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "unknown registry error";
      throw new QueryExecutionError(`Registry query failed after ${this.retries} attempts: ${message}`, {
        cause: error
      });
    }
  }

  /** Preferred language first; a record with no fetchable variant stays metadata-only. */
  private async loadFullText(
    record: LegislativeRecord,
    preferred: RegistryLanguage,
    signal: AbortSignal | undefined,
    correlation: CorrelationContext
  ): Promise<Pick<RecordEvidence, "fullText" | "fetchErrors">> {
    const fetchErrors: string[] = [];

    for (const language of languageFallbackOrder(preferred)) {
      const cacheKey = `${record.id}|${language}`;
      const cached = this.fullTextCache.get(cacheKey);
      // An entry for an older consolidation of the work is stale.
      const hit = cached !== undefined && cached.consolidationId === record.consolidationId;
      this.recordCacheLookup("registry_fulltext", hit);
      if (cached && hit) {
        if (cached.fullText) {
          return { fullText: cached.fullText, fetchErrors };
        }
        fetchErrors.push(`${language}: ${cached.reason ?? "unavailable"}`);
        continue;
      }

      try {
        const fetched = await withRetries(
          async () =>
            withTimeout(
              (callSignal) => this.transport.fetchFullText(record.consolidationId, language, { signal: callSignal }),
              { label: "registry.fulltext", timeoutMs: this.fullTextTimeoutMs, signal }
            ),
          {
            retries: this.retries,
            retryDelayMs: this.retryDelayMs,
            signal,
            shouldRetry: (error) => !(error instanceof FullTextUnavailableError)
          }
        );
        const fullText = parseFullText({
          recordId: record.id,
          language,
          sourceUrl: fetched.url,
          markup: fetched.markup
        });
        if (fullText.nodes.length === 0) {
          this.rememberUnavailable(cacheKey, record, "document has no text");
          fetchErrors.push(`${language}: document has no text`);
          continue;
        }
        this.fullTextCache.set(cacheKey, { consolidationId: record.consolidationId, fullText, reason: null });
        return { fullText, fetchErrors };
      } catch (error) {
        if (error instanceof CallAbortedError) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : "unknown fetch error";
        // Transient failures are retried on the next lookup; a missing variant is not.
        if (error instanceof FullTextUnavailableError) {
          this.rememberUnavailable(cacheKey, record, reason);
        }
        fetchErrors.push(`${language}: ${reason}`);
      }
    }

    this.logWarn("registry.fulltext.unavailable", correlation, {
      record_id: record.id,
      consolidation_id: record.consolidationId,
      errors: fetchErrors
    });
    return { fullText: null, fetchErrors };
  }

  private rememberUnavailable(cacheKey: string, record: LegislativeRecord, reason: string): void {
    this.fullTextCache.set(cacheKey, { consolidationId: record.consolidationId, fullText: null, reason });
  }
}
