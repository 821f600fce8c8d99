import type {
  ExtractedClaim,
  FactCheckResult,
  FactCheckStatus,
  MedicalCondition,
  SemanticReport,
  SemanticScores,
} from '../../shared/types';
import { KnowledgeLookupError, errorMessage, throwIfAborted } from '../../shared/errors';
import { findKeywords } from '../../shared/matching';
import { createChildLogger } from '../../infra/logging/logger';
import type { KnowledgeStore } from '../knowledge/service';
import type { ClaimExtractor } from './claim-extractor';
import type { FactChecker, FactVerification } from './fact-checker';
import { knownMedicationAliases, mentionsPopulation } from './keywords';
import type { KeywordTables, MedicationCombination } from './keywords';

const log = createChildLogger({ component: 'semantic-validator' });

const MAX_SOURCES_REPORTED = 5;
const UNVERIFIED_CONFIDENCE = 0.2;

const EMPTY_SCORES: SemanticScores = {
  semanticConfidence: 0.5,
  completeness: 0.3,
  accuracy: 0.5,
  appropriateness: 0.5,
};

interface ClaimContext {
  query: string;
  queryConditions: MedicalCondition[];
  signal?: AbortSignal;
}

type PopulationScope = Pick<MedicationCombination, 'populationTerms' | 'populationPattern'>;

/**
 * Extracts claims from an answer, checks each against the knowledge base
 * and aggregates the outcome into scores and a risk level.
 */
export class SemanticValidator {
  private readonly medicationAliases: string[];
  private readonly populationScopes: PopulationScope[];

  constructor(
    private extractor: ClaimExtractor,
    private factChecker: FactChecker,
    private knowledge: KnowledgeStore,
    keywords: KeywordTables
  ) {
    this.medicationAliases = knownMedicationAliases(keywords);
    this.populationScopes = keywords.medicationCombinations.filter((c) => c.populationTerms.length > 0);
  }

  async validate(
    query: string,
    response: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<SemanticReport> {
    const startTime = Date.now();
    const { signal } = options;

    const claims = await this.extractor.extract(response, { signal });

    if (claims.length === 0) {
      log.debug('No testable claims extracted');
      return {
        claims,
        factChecks: [],
        metrics: {
          totalClaims: 0,
          verifiedClaims: 0,
          contradictedClaims: 0,
          unverifiableClaims: 0,
          concerningClaims: 0,
        },
        scores: { ...EMPTY_SCORES },
        risk: 'low',
        triggers: [],
        requiresEscalation: false,
        sourcesUsed: [],
        durationMs: Date.now() - startTime,
      };
    }

    const context: ClaimContext = {
      query,
      queryConditions: await this.conditionsIn(query, signal),
      signal,
    };

    const factChecks: FactCheckResult[] = [];
    for (const claim of claims) {
      throwIfAborted(signal);
      factChecks.push(await this.checkClaim(claim, context));
    }

    const count = (status: FactCheckStatus) => factChecks.filter((c) => c.status === status).length;
    const total = claims.length;
    const verified = count('verified');
    const contradicted = count('contradicted');
    const unverifiable = count('unverifiable');
    const concerning = count('concerning');

    const accuracy = verified / total;
    const scores: SemanticScores = {
      semanticConfidence: accuracy,
      completeness: (total - unverifiable) / total,
      accuracy,
      appropriateness: contradicted > 0 ? Math.max(0, 0.7 - (contradicted / total) * 0.5) : 0.8,
    };

    const triggers = [
      ...new Set(
        factChecks
          .filter((c) => c.status === 'contradicted' || c.status === 'concerning')
          .map((c) => `${c.status}: ${c.claim}`)
      ),
    ];

    let risk: SemanticReport['risk'] = 'low';
    if (contradicted > 0 || concerning >= 3) {
      risk = 'high';
    } else if (concerning > 0 || unverifiable > total * 0.5) {
      risk = 'medium';
    }

    const report: SemanticReport = {
      claims,
      factChecks,
      metrics: {
        totalClaims: total,
        verifiedClaims: verified,
        contradictedClaims: contradicted,
        unverifiableClaims: unverifiable,
        concerningClaims: concerning,
      },
      scores,
      risk,
      triggers,
      requiresEscalation: risk === 'high' || concerning > 0,
      sourcesUsed: await this.topSources(signal),
      durationMs: Date.now() - startTime,
    };

    log.info(
      { total, verified, contradicted, unverifiable, concerning, risk, durationMs: report.durationMs },
      'Semantic validation complete'
    );

    return report;
  }

  private async checkClaim(claim: ExtractedClaim, context: ClaimContext): Promise<FactCheckResult> {
    const base = { claim: claim.text, claimType: claim.type };

    if (claim.type === 'warning' || claim.type === 'emergency') {
      return {
        ...base,
        status: 'concerning',
        confidence: claim.confidence,
        matchedFactIds: [],
        sources: [],
        details: 'Claim describes a warning sign or emergency and needs expert review',
      };
    }

    if (claim.type !== 'symptom' && claim.type !== 'treatment' && claim.type !== 'prevention') {
      return unverifiable(base, 'Claim type is not checked against the knowledge base');
    }

    let verification: FactVerification;
    try {
      verification = await this.verify(claim, context.signal);
    } catch (error) {
      if (!(error instanceof KnowledgeLookupError)) throw error;
      log.warn({ claim: claim.text, error: error.message }, 'Knowledge lookup failed for claim');
      return unverifiable(base, 'Knowledge base unavailable');
    }

    if (claim.type === 'treatment') {
      const contradiction = await this.findContraindication(claim.text, context);
      if (contradiction) {
        return {
          ...base,
          status: 'contradicted',
          confidence: 1,
          matchedFactIds: verification.matches.map((m) => m.factId),
          sources: uniqueSources(verification),
          details: contradiction,
        };
      }
    }

    if (!verification.verified) {
      return unverifiable(base, `No matching ${claim.type} fact found`);
    }

    return {
      ...base,
      status: 'verified',
      confidence: verification.confidence,
      matchedFactIds: verification.matches.map((m) => m.factId),
      sources: uniqueSources(verification),
      details: `Matched ${verification.matches.length} ${claim.type} fact(s)`,
    };
  }

  private verify(claim: ExtractedClaim, signal?: AbortSignal): Promise<FactVerification> {
    switch (claim.type) {
      case 'symptom':
        return this.factChecker.checkSymptom(claim.text, undefined, signal);
      case 'treatment':
        return this.factChecker.checkTreatment(claim.text, undefined, signal);
      default:
        return this.factChecker.checkPrevention(claim.text, undefined, signal);
    }
  }

  /**
   * A treatment naming a known medication is checked against the
   * contraindications of every condition the user mentioned. A reason that
   * names a population ("aspirin in children under 16") counts only when the
   * query places the user in it.
   */
  private async findContraindication(claimText: string, context: ClaimContext): Promise<string | null> {
    const medications = findKeywords(claimText, this.medicationAliases);
    if (medications.length === 0) return null;

    for (const condition of context.queryConditions) {
      for (const medication of medications) {
        try {
          const check = await this.factChecker.checkContraindications(medication, condition.id, context.signal);
          const reasons = check.reasons.filter((reason) => this.appliesToQuery(reason, context.query));
          if (reasons.length > 0) {
            return `Contraindicated for ${condition.name}: ${reasons.join('; ')}`;
          }
        } catch (error) {
          if (!(error instanceof KnowledgeLookupError)) throw error;
          log.warn({ condition: condition.name, error: error.message }, 'Contraindication lookup failed');
        }
      }
    }

    return null;
  }

  private appliesToQuery(reason: string, query: string): boolean {
    const scopes = this.populationScopes.filter((scope) => findKeywords(reason, scope.populationTerms).length > 0);
    if (scopes.length === 0) return true;

    return scopes.some((scope) => mentionsPopulation(query, scope));
  }

  private async conditionsIn(query: string, signal?: AbortSignal): Promise<MedicalCondition[]> {
    try {
      return await this.knowledge.findConditionsMentioned(query, signal);
    } catch (error) {
      if (!(error instanceof KnowledgeLookupError)) throw error;
      log.warn({ error: errorMessage(error) }, 'Could not resolve conditions in query');
      return [];
    }
  }

  private async topSources(signal?: AbortSignal): Promise<string[]> {
    try {
      const sources = await this.knowledge.getSources(signal);
      return sources.slice(0, MAX_SOURCES_REPORTED).map((s) => s.name);
    } catch (error) {
      if (!(error instanceof KnowledgeLookupError)) throw error;
      log.warn({ error: errorMessage(error) }, 'Could not load sources');
      return [];
    }
  }
}

function unverifiable(base: Pick<FactCheckResult, 'claim' | 'claimType'>, details: string): FactCheckResult {
  return {
    ...base,
    status: 'unverifiable',
    confidence: UNVERIFIED_CONFIDENCE,
    matchedFactIds: [],
    sources: [],
    details,
  };
}

function uniqueSources(verification: FactVerification): string[] {
  return [...new Set(verification.matches.map((m) => m.sourceName))];
}
