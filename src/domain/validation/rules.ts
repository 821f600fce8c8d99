import type { EscalationTrigger, RiskLevel } from '../../shared/types';
import { findKeywords } from '../../shared/matching';
import { mentionsPopulation } from './keywords';
import type { KeywordTables, MedicationCombination } from './keywords';

/**
 * Everything the heuristic rules look at, computed once per call.
 * High-risk keywords and conditions come from the query only; advice
 * phrases come from the response only.
 */
export interface RuleContext {
  baselineConfidence: number;
  emergencyInQuery: string[];
  emergencyInResponse: string[];
  dangerPatterns: string[];
  hasAppropriateMarker: boolean;
  dangerousCombinations: string[];
  highRiskKeywords: string[];
  conditions: string[];
  dangerousAdvice: string[];
  goodPractice: string[];
}

export interface RuleOutcome {
  riskLevel: RiskLevel;
  requiresEscalation: boolean;
  trigger: EscalationTrigger | null;
  message: string;
  /** Overrides the caller's baseline confidence. */
  confidenceScore?: number;
  contradictedClaims?: string[];
  dangerousPatterns?: string[];
  /** No later stage may run after a final outcome. */
  final?: boolean;
}

export interface Rule {
  name: string;
  evaluate(ctx: RuleContext): RuleOutcome | null;
}

export function buildRuleContext(
  query: string,
  response: string,
  baselineConfidence: number,
  tables: KeywordTables
): RuleContext {
  return {
    baselineConfidence,
    emergencyInQuery: findKeywords(query, tables.emergencyKeywords),
    emergencyInResponse: findKeywords(response, tables.emergencyKeywords),
    dangerPatterns: findKeywords(response, tables.emergencyDangerPatterns),
    hasAppropriateMarker: findKeywords(response, tables.appropriateResponseMarkers).length > 0,
    dangerousCombinations: findDangerousCombinations(query, response, tables.medicationCombinations),
    highRiskKeywords: findKeywords(query, tables.highRiskKeywords),
    conditions: findKeywords(query, tables.medicalConditions),
    dangerousAdvice: findKeywords(response, tables.dangerousAdvicePhrases),
    goodPractice: findKeywords(response, tables.goodPracticePhrases),
  };
}

/**
 * "<medication> + <population>: <reason>" for every medication named in the
 * response whose contraindicated population is named in the query.
 */
export function findDangerousCombinations(
  query: string,
  response: string,
  combinations: readonly MedicationCombination[]
): string[] {
  const found: string[] = [];

  for (const combo of combinations) {
    if (findKeywords(response, combo.aliases).length === 0) continue;
    if (!mentionsPopulation(query, combo)) continue;

    const entry = `${combo.medication} + ${combo.population}: ${combo.reason}`;
    if (!found.includes(entry)) found.push(entry);
  }

  return found;
}

function lowOutcome(): RuleOutcome {
  return { riskLevel: 'low', requiresEscalation: false, trigger: null, message: 'Response is appropriate' };
}

function list(items: string[], max: number): string {
  return items.slice(0, max).join(', ');
}

// ============================================================================
// Stage 1: emergencies
// ============================================================================

export const emergencyRule: Rule = {
  name: 'emergency_keywords',
  evaluate(ctx) {
    const { emergencyInQuery, emergencyInResponse } = ctx;
    if (emergencyInQuery.length === 0 && emergencyInResponse.length === 0) return null;

    const emergency = (riskLevel: RiskLevel, message: string, dangerousPatterns: string[] = []): RuleOutcome => ({
      riskLevel,
      requiresEscalation: true,
      trigger: 'emergency_keywords',
      message,
      confidenceScore: 1.0,
      dangerousPatterns,
      final: true,
    });

    const introduced = emergencyInResponse.filter((k) => !emergencyInQuery.includes(k));
    if (introduced.length > 0) {
      return emergency('critical', `Response raises an emergency the user did not mention: ${list(introduced, 3)}`);
    }

    if (ctx.dangerPatterns.length > 0) {
      return emergency(
        'critical',
        `Emergency answered with unsafe advice: ${list(ctx.dangerPatterns, 3)}`,
        ctx.dangerPatterns
      );
    }

    if (!ctx.hasAppropriateMarker) {
      return emergency('high', `Emergency not directed to urgent care: ${list(emergencyInQuery, 3)}`);
    }

    return emergency('critical', `Emergency situation detected: ${list(emergencyInQuery, 3)}`);
  },
};

// ============================================================================
// Stage 2: contraindicated medication for the named population
// ============================================================================

export const medicationCombinationRule: Rule = {
  name: 'dangerous_medication_combination',
  evaluate(ctx) {
    if (ctx.dangerousCombinations.length === 0) return null;

    return {
      riskLevel: 'high',
      requiresEscalation: true,
      trigger: 'dangerous_medication_combination',
      message: `Dangerous medication combination: ${list(ctx.dangerousCombinations, 2)}`,
      contradictedClaims: ctx.dangerousCombinations,
    };
  },
};

// ============================================================================
// Stage 3: high-risk topic vs. baseline confidence
// ============================================================================

export const highRiskLowConfidenceRule: Rule = {
  name: 'high_risk_low_confidence',
  evaluate(ctx) {
    if (ctx.highRiskKeywords.length === 0 || ctx.baselineConfidence >= 0.7) return null;

    return {
      riskLevel: 'high',
      requiresEscalation: true,
      trigger: 'high_risk_low_confidence',
      message: `High-risk medical topic with low confidence: ${list(ctx.highRiskKeywords, 2)}`,
    };
  },
};

export const confidentAdviceRule: Rule = {
  name: 'confident_advice_inspection',
  evaluate(ctx) {
    const topical = ctx.highRiskKeywords.length > 0 || ctx.conditions.length > 0;
    if (!topical || ctx.baselineConfidence < 0.7) return null;

    if (ctx.dangerousAdvice.length > 0) {
      return {
        riskLevel: 'high',
        requiresEscalation: true,
        trigger: 'dangerous_advice_pattern',
        message: `Response contains dangerous advice: ${list(ctx.dangerousAdvice, 2)}`,
        dangerousPatterns: ctx.dangerousAdvice,
      };
    }

    if (ctx.goodPractice.length > 0) {
      return {
        riskLevel: 'low',
        requiresEscalation: false,
        trigger: null,
        message: `Medical topic answered with recognised good practice: ${list(ctx.goodPractice, 2)}`,
      };
    }

    return {
      riskLevel: 'medium',
      requiresEscalation: false,
      trigger: null,
      message: 'Medical topic mentioned - response monitored',
    };
  },
};

export const moderateConfidenceRule: Rule = {
  name: 'moderate_confidence_topic',
  evaluate(ctx) {
    const topical = ctx.highRiskKeywords.length > 0 || ctx.conditions.length > 0;
    if (!topical || ctx.baselineConfidence < 0.5) return null;

    return {
      riskLevel: 'medium',
      requiresEscalation: false,
      trigger: null,
      message: 'Medical condition mentioned - response monitored',
    };
  },
};

export const conditionLowConfidenceRule: Rule = {
  name: 'condition_low_confidence',
  evaluate(ctx) {
    if (ctx.conditions.length === 0) return null;

    return {
      riskLevel: 'medium',
      requiresEscalation: true,
      trigger: 'condition_low_confidence',
      message: `Medical condition mentioned with low confidence: ${list(ctx.conditions, 2)}`,
    };
  },
};

export const veryLowConfidenceRule: Rule = {
  name: 'very_low_confidence',
  evaluate(ctx) {
    if (ctx.baselineConfidence >= 0.3) return null;

    return {
      riskLevel: 'high',
      requiresEscalation: true,
      trigger: 'very_low_confidence',
      message: 'Very low confidence - requires expert review',
    };
  },
};

export const defaultLowRule: Rule = {
  name: 'default_low',
  evaluate() {
    return lowOutcome();
  },
};

/** Evaluated in order; the first rule returning an outcome wins. */
export const DEFAULT_RULES: readonly Rule[] = [
  emergencyRule,
  medicationCombinationRule,
  highRiskLowConfidenceRule,
  confidentAdviceRule,
  moderateConfidenceRule,
  conditionLowConfidenceRule,
  veryLowConfidenceRule,
  defaultLowRule,
];

export function evaluateRules(
  rules: readonly Rule[],
  ctx: RuleContext
): { rule: string; outcome: RuleOutcome } {
  for (const rule of rules) {
    const outcome = rule.evaluate(ctx);
    if (outcome) return { rule: rule.name, outcome };
  }
  return { rule: defaultLowRule.name, outcome: lowOutcome() };
}
