import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { findKeywords, normalizeText } from '../../shared/matching';

/**
 * Keyword tables used by the rule ladder and the fallback claim extractor.
 * Loaded once from data/validation-keywords.json and validated at load time.
 */

const keywordList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

const combinationSchema = z.object({
  medication: z.string().min(1),
  aliases: keywordList.min(1),
  population: z.string().min(1),
  populationTerms: keywordList,
  populationPattern: z.string().optional(),
  reason: z.string().min(1),
});

const keywordFileSchema = z.object({
  emergencyKeywords: keywordList.min(1),
  emergencyDangerPatterns: keywordList,
  appropriateResponseMarkers: keywordList.min(1),
  highRiskKeywords: keywordList,
  medicalConditions: keywordList,
  goodPracticePhrases: keywordList,
  dangerousAdvicePhrases: keywordList,
  medicationCombinations: z.array(combinationSchema),
  claimKeywords: z.object({
    treatment: keywordList,
    symptom: keywordList,
    prevention: keywordList,
    warning: keywordList,
  }),
});

type KeywordFile = z.infer<typeof keywordFileSchema>;

export interface MedicationCombination {
  medication: string;
  aliases: string[];
  population: string;
  populationTerms: string[];
  populationPattern: RegExp | null;
  reason: string;
}

export interface KeywordTables extends Omit<KeywordFile, 'medicationCombinations'> {
  medicationCombinations: MedicationCombination[];
}

export type ClaimKeywordBucket = keyof KeywordFile['claimKeywords'];

export const DEFAULT_KEYWORDS_PATH = path.join(__dirname, '..', '..', '..', 'data', 'validation-keywords.json');

export function parseKeywordTables(raw: unknown): KeywordTables {
  const parsed = keywordFileSchema.parse(raw);

  return {
    ...parsed,
    medicationCombinations: parsed.medicationCombinations.map((combo) => ({
      ...combo,
      populationPattern: combo.populationPattern ? new RegExp(combo.populationPattern, 'i') : null,
    })),
  };
}

let cached: KeywordTables | null = null;

export function loadKeywordTables(filePath: string = DEFAULT_KEYWORDS_PATH): KeywordTables {
  if (filePath === DEFAULT_KEYWORDS_PATH && cached) {
    return cached;
  }

  const tables = parseKeywordTables(JSON.parse(fs.readFileSync(filePath, 'utf8')));
  if (filePath === DEFAULT_KEYWORDS_PATH) {
    cached = tables;
  }
  return tables;
}

/** Every medication alias across the combination table, deduplicated. */
export function knownMedicationAliases(tables: KeywordTables): string[] {
  const aliases = new Set<string>();
  for (const combo of tables.medicationCombinations) {
    for (const alias of combo.aliases) aliases.add(alias);
  }
  return [...aliases];
}

/** Whether text places someone in the combination's population. */
export function mentionsPopulation(
  text: string,
  combo: Pick<MedicationCombination, 'populationTerms' | 'populationPattern'>
): boolean {
  const normalized = normalizeText(text);
  return (
    findKeywords(normalized, combo.populationTerms).length > 0 ||
    (combo.populationPattern?.test(normalized) ?? false)
  );
}
