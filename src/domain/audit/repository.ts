import type { Pool } from 'pg';
import { runQuery } from '../../infra/db/client';
import type { EscalationTrigger, ResponseValidationRecord, RiskLevel, ValidationResult } from '../../shared/types';

export interface NewValidationRecord {
  userId: string;
  messageId: string | null;
  userQuery: string;
  botResponse: string;
  result: ValidationResult;
}

export interface ValidationAuditFilter {
  userId?: string;
  messageId?: string;
  from?: Date;
  to?: Date;
  limit: number;
}

export interface EscalationOutcome {
  escalationId: number | null;
  escalationError: string | null;
}

export interface ValidationAuditRepository {
  record(input: NewValidationRecord): Promise<ResponseValidationRecord>;
  recordEscalation(validationId: number, outcome: EscalationOutcome): Promise<void>;
  list(filter: ValidationAuditFilter): Promise<ResponseValidationRecord[]>;
}

interface ValidationRow {
  id: number;
  user_id: string;
  message_id: string | null;
  user_query: string;
  bot_response: string;
  risk_level: RiskLevel;
  confidence_score: number;
  requires_escalation: boolean;
  escalation_trigger: EscalationTrigger | null;
  validation_message: string;
  emergency_keywords: string[];
  high_risk_keywords: string[];
  dangerous_patterns: string[];
  verified_claims: string[];
  contradicted_claims: string[];
  sources_used: string[];
  accuracy_score: number | null;
  appropriateness_score: number | null;
  semantic_confidence: number | null;
  semantic_ran: boolean;
  escalation_id: number | null;
  escalation_error: string | null;
  created_at: Date;
}

const VALIDATION_COLUMNS = `id, user_id, message_id, user_query, bot_response, risk_level, confidence_score,
  requires_escalation, escalation_trigger, validation_message, emergency_keywords, high_risk_keywords,
  dangerous_patterns, verified_claims, contradicted_claims, sources_used, accuracy_score,
  appropriateness_score, semantic_confidence, semantic_ran, escalation_id, escalation_error, created_at`;

function mapValidation(row: ValidationRow): ResponseValidationRecord {
  return {
    id: row.id,
    userId: row.user_id,
    messageId: row.message_id,
    userQuery: row.user_query,
    botResponse: row.bot_response,
    riskLevel: row.risk_level,
    confidenceScore: row.confidence_score,
    requiresEscalation: row.requires_escalation,
    escalationTrigger: row.escalation_trigger,
    validationMessage: row.validation_message,
    emergencyKeywordsDetected: row.emergency_keywords,
    highRiskKeywordsDetected: row.high_risk_keywords,
    dangerousPatternsDetected: row.dangerous_patterns,
    verifiedClaims: row.verified_claims,
    contradictedClaims: row.contradicted_claims,
    sourcesUsed: row.sources_used,
    scores: {
      accuracy: row.accuracy_score,
      appropriateness: row.appropriateness_score,
      semanticConfidence: row.semantic_confidence,
    },
    semanticRan: row.semantic_ran,
    escalationId: row.escalation_id,
    escalationError: row.escalation_error,
    createdAt: row.created_at,
  };
}

export class PgValidationAuditRepository implements ValidationAuditRepository {
  constructor(private db: Pool) {}

  async record(input: NewValidationRecord): Promise<ResponseValidationRecord> {
    const r = input.result;
    const result = await runQuery<ValidationRow>(
      this.db,
      `INSERT INTO response_validations
         (user_id, message_id, user_query, bot_response, risk_level, confidence_score,
          requires_escalation, escalation_trigger, validation_message, emergency_keywords,
          high_risk_keywords, dangerous_patterns, verified_claims, contradicted_claims, sources_used,
          accuracy_score, appropriateness_score, semantic_confidence, semantic_ran)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
       RETURNING ${VALIDATION_COLUMNS}`,
      [
        input.userId,
        input.messageId,
        input.userQuery,
        input.botResponse,
        r.riskLevel,
        r.confidenceScore,
        r.requiresEscalation,
        r.escalationTrigger,
        r.validationMessage,
        JSON.stringify(r.emergencyKeywordsDetected),
        JSON.stringify(r.highRiskKeywordsDetected),
        JSON.stringify(r.dangerousPatternsDetected),
        JSON.stringify(r.verifiedClaims),
        JSON.stringify(r.contradictedClaims),
        JSON.stringify(r.sourcesUsed),
        r.scores.accuracy,
        r.scores.appropriateness,
        r.scores.semanticConfidence,
        r.semanticRan,
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Validation insert returned no row');
    }
    return mapValidation(row);
  }

  async recordEscalation(validationId: number, outcome: EscalationOutcome): Promise<void> {
    await runQuery(
      this.db,
      `UPDATE response_validations
       SET escalation_id = $2, escalation_error = $3
       WHERE id = $1`,
      [validationId, outcome.escalationId, outcome.escalationError]
    );
  }

  async list(filter: ValidationAuditFilter): Promise<ResponseValidationRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    const add = (clause: string, value: unknown) => {
      params.push(value);
      conditions.push(clause.replace('?', `$${params.length}`));
    };

    if (filter.userId) add('user_id = ?', filter.userId);
    if (filter.messageId) add('message_id = ?', filter.messageId);
    if (filter.from) add('created_at >= ?', filter.from);
    if (filter.to) add('created_at <= ?', filter.to);

    params.push(filter.limit);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const result = await runQuery<ValidationRow>(
      this.db,
      `SELECT ${VALIDATION_COLUMNS}
       FROM response_validations
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length}`,
      params
    );
    return result.rows.map(mapValidation);
  }
}
