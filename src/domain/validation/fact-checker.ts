import type { FactMatch, FactType } from '../../shared/types';
import { normalizeText, phrasesOverlap } from '../../shared/matching';
import type { KnowledgeStore } from '../knowledge/service';

/** Confidence assumed for facts stored without a score. */
export const DEFAULT_FACT_CONFIDENCE = 0.8;

export interface FactVerification {
  verified: boolean;
  confidence: number;
  matches: FactMatch[];
}

export interface ContraindicationCheck {
  flagged: boolean;
  reasons: string[];
}

function noMatch(): FactVerification {
  return { verified: false, confidence: 0, matches: [] };
}

/**
 * Checks claim text against the knowledge base. A fact matches when either
 * text contains the other as whole words, so the fact "ors" never matches a
 * claim about "neighbors".
 */
export class FactChecker {
  constructor(private knowledge: KnowledgeStore) {}

  checkSymptom(claimText: string, conditionId?: number, signal?: AbortSignal): Promise<FactVerification> {
    return this.check('symptom', claimText, conditionId, signal);
  }

  checkTreatment(claimText: string, conditionId?: number, signal?: AbortSignal): Promise<FactVerification> {
    return this.check('treatment', claimText, conditionId, signal);
  }

  checkPrevention(claimText: string, conditionId?: number, signal?: AbortSignal): Promise<FactVerification> {
    return this.check('prevention', claimText, conditionId, signal);
  }

  async checkContraindications(
    treatment: string,
    conditionId: number,
    signal?: AbortSignal
  ): Promise<ContraindicationCheck> {
    if (!normalizeText(treatment)) return { flagged: false, reasons: [] };

    const condition = await this.knowledge.getCondition(conditionId, signal);
    if (!condition) return { flagged: false, reasons: [] };

    const reasons = condition.contraindications.filter((c) => phrasesOverlap(c, treatment));
    return { flagged: reasons.length > 0, reasons };
  }

  private async check(
    factType: FactType,
    claimText: string,
    conditionId: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<FactVerification> {
    const text = normalizeText(claimText);
    if (!text) return noMatch();

    const facts = await this.knowledge.findFacts(factType, text, conditionId, signal);

    const matches: FactMatch[] = facts
      .filter((fact) => phrasesOverlap(fact.factText, text))
      .sort((a, b) => a.authorityLevel - b.authorityLevel || a.id - b.id)
      .map((fact) => ({
        factId: fact.id,
        conditionId: fact.conditionId,
        factText: fact.factText,
        sourceName: fact.sourceName,
        authorityLevel: fact.authorityLevel,
        confidence: fact.confidenceScore ?? DEFAULT_FACT_CONFIDENCE,
      }));

    if (matches.length === 0) return noMatch();

    const confidence = matches.reduce((sum, m) => sum + m.confidence, 0) / matches.length;
    return { verified: true, confidence, matches };
  }
}
