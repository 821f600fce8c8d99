import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { FactType } from '../../shared/types';
import { logger } from '../../infra/logging/logger';
import type { KnowledgeRepository } from './repository';

const textList = z.array(z.string().min(1)).default([]);

const seedFileSchema = z.object({
  sources: z.array(
    z.object({
      code: z.string().min(1),
      name: z.string().min(1),
      type: z.string().min(1),
      authorityLevel: z.number().int().min(1),
      url: z.string().url().nullable().default(null),
      description: z.string().nullable().default(null),
    })
  ),
  conditions: z.array(
    z.object({
      name: z.string().min(1),
      icd10Code: z.string().nullable().default(null),
      description: z.string().nullable().default(null),
      aliases: textList,
      symptoms: textList,
      treatments: textList,
      prevention: textList,
      contraindications: textList,
      warningSigns: textList,
      sources: z.array(z.string().min(1)).min(1),
      confidenceScore: z.number().min(0).max(1).nullable().default(null),
    })
  ),
});

export type KnowledgeSeed = z.infer<typeof seedFileSchema>;

export interface SeedSummary {
  sources: number;
  conditions: number;
  factsInserted: number;
}

export const DEFAULT_SEED_PATH = path.join(__dirname, '..', '..', '..', 'data', 'medical-knowledge.json');

export function readKnowledgeSeed(filePath: string = DEFAULT_SEED_PATH): KnowledgeSeed {
  return seedFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
}

/**
 * Upsert sources and conditions, then add one fact per
 * (condition, cited source, symptom/treatment/prevention entry).
 * Safe to run on every start.
 */
export async function seedKnowledge(
  repository: KnowledgeRepository,
  seed: KnowledgeSeed = readKnowledgeSeed()
): Promise<SeedSummary> {
  const sourceIds = new Map<string, number>();

  for (const source of seed.sources) {
    const id = await repository.upsertSource({
      name: source.name,
      sourceType: source.type,
      authorityLevel: source.authorityLevel,
      url: source.url,
      description: source.description,
    });
    sourceIds.set(source.code, id);
  }

  let factsInserted = 0;

  for (const condition of seed.conditions) {
    const conditionId = await repository.upsertCondition({
      name: condition.name,
      icd10Code: condition.icd10Code,
      description: condition.description,
      aliases: condition.aliases,
      symptoms: condition.symptoms,
      treatments: condition.treatments,
      contraindications: condition.contraindications,
      warningSigns: condition.warningSigns,
    });

    const factsByType: Array<[FactType, string[]]> = [
      ['symptom', condition.symptoms],
      ['treatment', condition.treatments],
      ['prevention', condition.prevention],
    ];

    for (const code of condition.sources) {
      const sourceId = sourceIds.get(code);
      if (sourceId === undefined) {
        logger.warn({ condition: condition.name, source: code }, 'Unknown source code in knowledge seed');
        continue;
      }

      for (const [factType, texts] of factsByType) {
        for (const factText of texts) {
          const inserted = await repository.insertFact({
            conditionId,
            sourceId,
            factType,
            factText,
            confidenceScore: condition.confidenceScore,
          });
          if (inserted) factsInserted++;
        }
      }
    }
  }

  const summary: SeedSummary = {
    sources: seed.sources.length,
    conditions: seed.conditions.length,
    factsInserted,
  };
  logger.info(summary, 'Medical knowledge seeded');
  return summary;
}
