import type { Pool } from 'pg';
import { runQuery } from '../../infra/db/client';
import type { FactType, MedicalCondition, MedicalSource, SourcedFact } from '../../shared/types';

export interface SourceSeed {
  name: string;
  sourceType: string;
  authorityLevel: number;
  url: string | null;
  description: string | null;
}

export interface ConditionSeed {
  name: string;
  icd10Code: string | null;
  description: string | null;
  aliases: string[];
  symptoms: string[];
  treatments: string[];
  contraindications: string[];
  warningSigns: string[];
}

export interface FactSeed {
  conditionId: number;
  sourceId: number;
  factType: FactType;
  factText: string;
  confidenceScore: number | null;
}

export interface FactQuery {
  factType: FactType;
  /** Facts whose text contains this, or is contained in it (case-insensitive). */
  text: string;
  conditionId?: number;
}

export interface KnowledgeRepository {
  listSources(): Promise<MedicalSource[]>;
  listConditions(): Promise<MedicalCondition[]>;
  findMatchingFacts(query: FactQuery): Promise<SourcedFact[]>;
  upsertSource(seed: SourceSeed): Promise<number>;
  upsertCondition(seed: ConditionSeed): Promise<number>;
  /** Returns false when the fact already existed. */
  insertFact(seed: FactSeed): Promise<boolean>;
}

interface SourceRow {
  id: number;
  name: string;
  source_type: string;
  authority_level: number;
  url: string | null;
  description: string | null;
  is_active: boolean;
}

interface ConditionRow {
  id: number;
  name: string;
  icd10_code: string | null;
  description: string | null;
  aliases: string[];
  symptoms: string[];
  treatments: string[];
  contraindications: string[];
  warning_signs: string[];
}

interface FactRow {
  id: number;
  condition_id: number;
  source_id: number;
  fact_type: FactType;
  fact_text: string;
  confidence_score: number | null;
  source_name: string;
  authority_level: number;
}

function mapSource(row: SourceRow): MedicalSource {
  return {
    id: row.id,
    name: row.name,
    sourceType: row.source_type,
    authorityLevel: row.authority_level,
    url: row.url,
    description: row.description,
    isActive: row.is_active,
  };
}

function mapCondition(row: ConditionRow): MedicalCondition {
  return {
    id: row.id,
    name: row.name,
    icd10Code: row.icd10_code,
    description: row.description,
    aliases: row.aliases,
    symptoms: row.symptoms,
    treatments: row.treatments,
    contraindications: row.contraindications,
    warningSigns: row.warning_signs,
  };
}

export class PgKnowledgeRepository implements KnowledgeRepository {
  constructor(private db: Pool) {}

  async listSources(): Promise<MedicalSource[]> {
    const result = await runQuery<SourceRow>(
      this.db,
      `SELECT id, name, source_type, authority_level, url, description, is_active
       FROM medical_sources
       ORDER BY authority_level ASC, id ASC`
    );
    return result.rows.map(mapSource);
  }

  async listConditions(): Promise<MedicalCondition[]> {
    const result = await runQuery<ConditionRow>(
      this.db,
      `SELECT id, name, icd10_code, description, aliases, symptoms, treatments,
              contraindications, warning_signs
       FROM medical_conditions
       ORDER BY id ASC`
    );
    return result.rows.map(mapCondition);
  }

  /** Substring candidates only; FactChecker applies the word-boundary match. */
  async findMatchingFacts(query: FactQuery): Promise<SourcedFact[]> {
    const result = await runQuery<FactRow>(
      this.db,
      `SELECT f.id, f.condition_id, f.source_id, f.fact_type, f.fact_text, f.confidence_score,
              s.name AS source_name, s.authority_level
       FROM medical_facts f
       JOIN medical_sources s ON s.id = f.source_id
       WHERE s.is_active
         AND f.fact_type = $1
         AND ($3::int IS NULL OR f.condition_id = $3)
         AND (
           POSITION(LOWER($2) IN LOWER(f.fact_text)) > 0
           OR POSITION(LOWER(f.fact_text) IN LOWER($2)) > 0
         )
       ORDER BY s.authority_level ASC, f.id ASC`,
      [query.factType, query.text, query.conditionId ?? null]
    );

    return result.rows.map((row) => ({
      id: row.id,
      conditionId: row.condition_id,
      sourceId: row.source_id,
      factType: row.fact_type,
      factText: row.fact_text,
      confidenceScore: row.confidence_score,
      sourceName: row.source_name,
      authorityLevel: row.authority_level,
    }));
  }

  async upsertSource(seed: SourceSeed): Promise<number> {
    const result = await runQuery<{ id: number }>(
      this.db,
      `INSERT INTO medical_sources (name, source_type, authority_level, url, description)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (name) DO UPDATE SET
         source_type = EXCLUDED.source_type,
         authority_level = EXCLUDED.authority_level,
         url = EXCLUDED.url,
         description = EXCLUDED.description
       RETURNING id`,
      [seed.name, seed.sourceType, seed.authorityLevel, seed.url, seed.description]
    );
    return requireId(result.rows[0], `source ${seed.name}`);
  }

  async upsertCondition(seed: ConditionSeed): Promise<number> {
    const result = await runQuery<{ id: number }>(
      this.db,
      `INSERT INTO medical_conditions
         (name, icd10_code, description, aliases, symptoms, treatments, contraindications, warning_signs)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (name) DO UPDATE SET
         icd10_code = EXCLUDED.icd10_code,
         description = EXCLUDED.description,
         aliases = EXCLUDED.aliases,
         symptoms = EXCLUDED.symptoms,
         treatments = EXCLUDED.treatments,
         contraindications = EXCLUDED.contraindications,
         warning_signs = EXCLUDED.warning_signs
       RETURNING id`,
      [
        seed.name,
        seed.icd10Code,
        seed.description,
        JSON.stringify(seed.aliases),
        JSON.stringify(seed.symptoms),
        JSON.stringify(seed.treatments),
        JSON.stringify(seed.contraindications),
        JSON.stringify(seed.warningSigns),
      ]
    );
    return requireId(result.rows[0], `condition ${seed.name}`);
  }

  async insertFact(seed: FactSeed): Promise<boolean> {
    const result = await runQuery(
      this.db,
      `INSERT INTO medical_facts (condition_id, source_id, fact_type, fact_text, confidence_score)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (condition_id, source_id, fact_type, fact_text) DO NOTHING`,
      [seed.conditionId, seed.sourceId, seed.factType, seed.factText, seed.confidenceScore]
    );
    return (result.rowCount ?? 0) > 0;
  }
}

function requireId(row: { id: number } | undefined, what: string): number {
  if (!row) {
    throw new Error(`Upsert returned no id for ${what}`);
  }
  return row.id;
}
