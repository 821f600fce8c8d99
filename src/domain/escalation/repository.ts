import type { Pool } from 'pg';
import { runQuery } from '../../infra/db/client';
import type { CaseStatus, EscalatedCase, Expert, RiskLevel } from '../../shared/types';

export interface NewCase {
  userId: string;
  validationId: number | null;
  assignedExpertId: number | null;
  originalQuery: string;
  botResponse: string;
  severity: RiskLevel;
  escalationReason: string;
  keywordsTriggered: string[];
}

export interface CaseTransition {
  caseId: number;
  from: readonly CaseStatus[];
  to: CaseStatus;
  notes: string | null;
}

export interface EscalationRepository {
  /** First active and available expert, lowest id first. */
  findAvailableExpert(): Promise<Expert | null>;
  createCase(input: NewCase): Promise<EscalatedCase>;
  getCase(caseId: number): Promise<EscalatedCase | null>;
  /** Compare-and-set; null when the case is missing or not in a `from` status. */
  transitionCase(transition: CaseTransition): Promise<EscalatedCase | null>;
  listCasesForExpert(expertId: number, statuses: readonly CaseStatus[]): Promise<EscalatedCase[]>;
}

interface ExpertRow {
  id: number;
  name: string;
  phone: string | null;
  specialization: string | null;
  is_active: boolean;
  is_available: boolean;
}

interface CaseRow {
  id: number;
  user_id: string;
  validation_id: number | null;
  assigned_expert_id: number | null;
  original_query: string;
  bot_response: string;
  severity: RiskLevel;
  escalation_reason: string;
  keywords_triggered: string[];
  status: CaseStatus;
  resolution_notes: string | null;
  created_at: Date;
  updated_at: Date;
  resolved_at: Date | null;
}

const CASE_COLUMNS = `id, user_id, validation_id, assigned_expert_id, original_query, bot_response,
  severity, escalation_reason, keywords_triggered, status, resolution_notes,
  created_at, updated_at, resolved_at`;

function mapCase(row: CaseRow): EscalatedCase {
  return {
    id: row.id,
    userId: row.user_id,
    validationId: row.validation_id,
    assignedExpertId: row.assigned_expert_id,
    originalQuery: row.original_query,
    botResponse: row.bot_response,
    severity: row.severity,
    escalationReason: row.escalation_reason,
    keywordsTriggered: row.keywords_triggered,
    status: row.status,
    resolutionNotes: row.resolution_notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    resolvedAt: row.resolved_at,
  };
}

export class PgEscalationRepository implements EscalationRepository {
  constructor(private db: Pool) {}

  async findAvailableExpert(): Promise<Expert | null> {
    const result = await runQuery<ExpertRow>(
      this.db,
      `SELECT id, name, phone, specialization, is_active, is_available
       FROM experts
       WHERE is_active AND is_available
       ORDER BY id ASC
       LIMIT 1`
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      id: row.id,
      name: row.name,
      phone: row.phone,
      specialization: row.specialization,
      isActive: row.is_active,
      isAvailable: row.is_available,
    };
  }

  async createCase(input: NewCase): Promise<EscalatedCase> {
    const result = await runQuery<CaseRow>(
      this.db,
      `INSERT INTO escalated_cases
         (user_id, validation_id, assigned_expert_id, original_query, bot_response,
          severity, escalation_reason, keywords_triggered, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'open')
       RETURNING ${CASE_COLUMNS}`,
      [
        input.userId,
        input.validationId,
        input.assignedExpertId,
        input.originalQuery,
        input.botResponse,
        input.severity,
        input.escalationReason,
        JSON.stringify(input.keywordsTriggered),
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Case insert returned no row');
    }
    return mapCase(row);
  }

  async getCase(caseId: number): Promise<EscalatedCase | null> {
    const result = await runQuery<CaseRow>(
      this.db,
      `SELECT ${CASE_COLUMNS} FROM escalated_cases WHERE id = $1`,
      [caseId]
    );
    const row = result.rows[0];
    return row ? mapCase(row) : null;
  }

  async transitionCase(transition: CaseTransition): Promise<EscalatedCase | null> {
    const result = await runQuery<CaseRow>(
      this.db,
      `UPDATE escalated_cases
       SET status = $2,
           resolution_notes = COALESCE($3, resolution_notes),
           updated_at = NOW(),
           resolved_at = CASE WHEN $2 = 'resolved' THEN NOW() ELSE resolved_at END
       WHERE id = $1 AND status = ANY($4::text[])
       RETURNING ${CASE_COLUMNS}`,
      [transition.caseId, transition.to, transition.notes, [...transition.from]]
    );
    const row = result.rows[0];
    return row ? mapCase(row) : null;
  }

  async listCasesForExpert(expertId: number, statuses: readonly CaseStatus[]): Promise<EscalatedCase[]> {
    const result = await runQuery<CaseRow>(
      this.db,
      `SELECT ${CASE_COLUMNS}
       FROM escalated_cases
       WHERE assigned_expert_id = $1 AND status = ANY($2::text[])
       ORDER BY created_at ASC, id ASC`,
      [expertId, [...statuses]]
    );
    return result.rows.map(mapCase);
  }
}
