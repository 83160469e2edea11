import { getPostgresClient } from "../../clients/postgres.js";

export type AnalysisAuditEventType = "analysis.start" | "analysis.complete" | "analysis.error";

export interface AppendAuditEventInput {
  analysisId: string;
  requestId?: string | null;
  caseId?: string | null;
  eventType: AnalysisAuditEventType;
  payload: Record<string, unknown>;
}

export interface AnalysisAuditRecord {
  id: number;
  analysisId: string;
  requestId: string | null;
  caseId: string | null;
  eventType: string;
  payload: unknown;
  createdAt: Date;
}

type AnalysisAuditRow = {
  id: number;
  analysis_id: string;
  request_id: string | null;
  case_id: string | null;
  event_type: string;
  payload: unknown;
  created_at: Date;
};

export interface AnalysisAuditSink {
  appendEvent(input: AppendAuditEventInput): Promise<unknown>;
}

const toRecord = (row: AnalysisAuditRow): AnalysisAuditRecord => ({
  id: row.id,
  analysisId: row.analysis_id,
  requestId: row.request_id,
  caseId: row.case_id,
  eventType: row.event_type,
  payload: row.payload,
  createdAt: row.created_at
});

export class AnalysisAuditRepository implements AnalysisAuditSink {
  private readonly getPostgresClient: typeof getPostgresClient;

  constructor(dependencies?: { getPostgresClient?: typeof getPostgresClient }) {
    this.getPostgresClient = dependencies?.getPostgresClient ?? getPostgresClient;
  }

  async appendEvent(input: AppendAuditEventInput): Promise<AnalysisAuditRecord> {
    const { pool } = await this.getPostgresClient();
    const result = await pool.query<AnalysisAuditRow>(
      `
        INSERT INTO analysis_audit_events (analysis_id, request_id, case_id, event_type, payload)
        VALUES ($1, $2, $3, $4, $5::jsonb)
        RETURNING id, analysis_id, request_id, case_id, event_type, payload, created_at
      `,
      [input.analysisId, input.requestId ?? null, input.caseId ?? null, input.eventType, JSON.stringify(input.payload)]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error("Audit insert returned no row.");
    }
    return toRecord(row);
  }

  async listByAnalysisId(analysisId: string): Promise<AnalysisAuditRecord[]> {
    const { pool } = await this.getPostgresClient();
    const result = await pool.query<AnalysisAuditRow>(
      `
        SELECT id, analysis_id, request_id, case_id, event_type, payload, created_at
        FROM analysis_audit_events
        WHERE analysis_id = $1
        ORDER BY created_at ASC, id ASC
      `,
      [analysisId]
    );

    return result.rows.map(toRecord);
  }
}
