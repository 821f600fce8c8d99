import type { Pool } from 'pg';
import { runQuery } from '../../infra/db/client';
import type { Disclaimer, DisclaimerTracking, Language, RiskLevel } from '../../shared/types';

export interface NewDisclaimer {
  riskLevel: RiskLevel;
  language: Language;
  content: string;
  priority: number;
}

export interface NewTracking {
  userId: string;
  disclaimerId: number;
  messageId: string | null;
  context: Record<string, unknown>;
}

export interface DisclaimerHistoryEntry extends DisclaimerTracking {
  riskLevel: RiskLevel;
  language: Language;
  content: string;
}

export interface DisclaimerRepository {
  /** Active disclaimer with the highest priority, or null. */
  findActive(riskLevel: RiskLevel, language: Language): Promise<Disclaimer | null>;
  /** Inserts the default row unless an active default already exists. */
  insertDefaultIfAbsent(riskLevel: RiskLevel, language: Language, content: string): Promise<void>;
  create(input: NewDisclaimer): Promise<Disclaimer>;
  track(input: NewTracking): Promise<DisclaimerTracking>;
  listHistory(userId: string, limit: number): Promise<DisclaimerHistoryEntry[]>;
}

interface DisclaimerRow {
  id: number;
  risk_level: RiskLevel;
  language: Language;
  content: string;
  priority: number;
  is_active: boolean;
  is_default: boolean;
  created_at: Date;
}

interface TrackingRow {
  id: number;
  user_id: string;
  disclaimer_id: number;
  message_id: string | null;
  context: Record<string, unknown>;
  shown_at: Date;
}

interface HistoryRow extends TrackingRow {
  risk_level: RiskLevel;
  language: Language;
  content: string;
}

const DISCLAIMER_COLUMNS = 'id, risk_level, language, content, priority, is_active, is_default, created_at';

function mapDisclaimer(row: DisclaimerRow): Disclaimer {
  return {
    id: row.id,
    riskLevel: row.risk_level,
    language: row.language,
    content: row.content,
    priority: row.priority,
    isActive: row.is_active,
    isDefault: row.is_default,
    createdAt: row.created_at,
  };
}

function mapTracking(row: TrackingRow): DisclaimerTracking {
  return {
    id: row.id,
    userId: row.user_id,
    disclaimerId: row.disclaimer_id,
    messageId: row.message_id,
    context: row.context,
    shownAt: row.shown_at,
  };
}

export class PgDisclaimerRepository implements DisclaimerRepository {
  constructor(private db: Pool) {}

  async findActive(riskLevel: RiskLevel, language: Language): Promise<Disclaimer | null> {
    const result = await runQuery<DisclaimerRow>(
      this.db,
      `SELECT ${DISCLAIMER_COLUMNS}
       FROM disclaimers
       WHERE risk_level = $1 AND language = $2 AND is_active
       ORDER BY priority DESC, id ASC
       LIMIT 1`,
      [riskLevel, language]
    );
    const row = result.rows[0];
    return row ? mapDisclaimer(row) : null;
  }

  async insertDefaultIfAbsent(riskLevel: RiskLevel, language: Language, content: string): Promise<void> {
    await runQuery(
      this.db,
      `INSERT INTO disclaimers (risk_level, language, content, priority, is_active, is_default)
       VALUES ($1, $2, $3, 1, TRUE, TRUE)
       ON CONFLICT (risk_level, language) WHERE is_active AND is_default DO NOTHING`,
      [riskLevel, language, content]
    );
  }

  async create(input: NewDisclaimer): Promise<Disclaimer> {
    const result = await runQuery<DisclaimerRow>(
      this.db,
      `INSERT INTO disclaimers (risk_level, language, content, priority, is_active, is_default)
       VALUES ($1, $2, $3, $4, TRUE, FALSE)
       RETURNING ${DISCLAIMER_COLUMNS}`,
      [input.riskLevel, input.language, input.content, input.priority]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Disclaimer insert returned no row');
    }
    return mapDisclaimer(row);
  }

  async track(input: NewTracking): Promise<DisclaimerTracking> {
    const result = await runQuery<TrackingRow>(
      this.db,
      `INSERT INTO disclaimer_tracking (user_id, disclaimer_id, message_id, context)
       VALUES ($1, $2, $3, $4)
       RETURNING id, user_id, disclaimer_id, message_id, context, shown_at`,
      [input.userId, input.disclaimerId, input.messageId, JSON.stringify(input.context)]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Tracking insert returned no row');
    }
    return mapTracking(row);
  }

  async listHistory(userId: string, limit: number): Promise<DisclaimerHistoryEntry[]> {
    const result = await runQuery<HistoryRow>(
      this.db,
      `SELECT t.id, t.user_id, t.disclaimer_id, t.message_id, t.context, t.shown_at,
              d.risk_level, d.language, d.content
       FROM disclaimer_tracking t
       JOIN disclaimers d ON d.id = t.disclaimer_id
       WHERE t.user_id = $1
       ORDER BY t.shown_at DESC, t.id DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map((row) => ({
      ...mapTracking(row),
      riskLevel: row.risk_level,
      language: row.language,
      content: row.content,
    }));
  }
}
