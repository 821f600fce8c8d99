import type { RiskLevel, SemanticReport, ValidationResult } from '../../shared/types';
import { ValidationCancelledError, errorMessage, throwIfAborted } from '../../shared/errors';
import { createChildLogger } from '../../infra/logging/logger';
import type { KeywordTables } from './keywords';
import { DEFAULT_RULES, buildRuleContext, evaluateRules } from './rules';
import type { Rule, RuleContext, RuleOutcome } from './rules';
import type { SemanticValidator } from './semantic-validator';

const log = createChildLogger({ component: 'validation-orchestrator' });

export interface ValidateOptions {
  useSemantic?: boolean;
  signal?: AbortSignal;
}

/**
 * Single entry point for checking a bot answer. Runs the rule ladder, then
 * the optional semantic stage. Any unexpected failure yields a high-risk,
 * escalated result; cancellation throws ValidationCancelledError.
 */
export class ValidationOrchestrator {
  constructor(
    private keywords: KeywordTables,
    private semantic: SemanticValidator | null,
    private rules: readonly Rule[] = DEFAULT_RULES
  ) {}

  async validate(
    userQuery: string,
    botResponse: string,
    baselineConfidence: number,
    options: ValidateOptions = {}
  ): Promise<ValidationResult> {
    const { signal } = options;
    throwIfAborted(signal);

    try {
      const confidence = clampConfidence(baselineConfidence);
      const ctx = buildRuleContext(userQuery, botResponse, confidence, this.keywords);
      const { rule, outcome } = evaluateRules(this.rules, ctx);

      let result = fromOutcome(ctx, outcome);

      if (!outcome.final && options.useSemantic && this.semantic && !result.requiresEscalation) {
        result = await this.applySemantic(this.semantic, result, userQuery, botResponse, signal);
      }

      throwIfAborted(signal);

      log.info(
        {
          rule,
          riskLevel: result.riskLevel,
          requiresEscalation: result.requiresEscalation,
          trigger: result.escalationTrigger,
          semanticRan: result.semanticRan,
          confidence,
        },
        'Response validated'
      );

      return result;
    } catch (error) {
      if (error instanceof ValidationCancelledError) throw error;

      log.error({ error: errorMessage(error) }, 'Validation failed, returning fail-closed result');
      return failClosed(error);
    }
  }

  private async applySemantic(
    semantic: SemanticValidator,
    heuristic: ValidationResult,
    query: string,
    response: string,
    signal?: AbortSignal
  ): Promise<ValidationResult> {
    let report: SemanticReport;
    try {
      report = await semantic.validate(query, response, { signal });
    } catch (error) {
      if (error instanceof ValidationCancelledError) throw error;
      log.warn({ error: errorMessage(error) }, 'Semantic stage failed, keeping heuristic result');
      return heuristic;
    }

    // Several claims can share one clause; report each clause once.
    const verifiedClaims = unique(report.factChecks.filter((c) => c.status === 'verified').map((c) => c.claim));
    const contradictedClaims = unique(
      report.factChecks.filter((c) => c.status === 'contradicted').map((c) => `${c.claim}: ${c.details}`)
    );

    const result: ValidationResult = {
      ...heuristic,
      verifiedClaims,
      contradictedClaims: [...heuristic.contradictedClaims, ...contradictedClaims],
      sourcesUsed: report.sourcesUsed,
      scores: {
        accuracy: report.scores.accuracy,
        appropriateness: report.scores.appropriateness,
        semanticConfidence: report.scores.semanticConfidence,
      },
      semanticRan: true,
    };

    const { accuracy } = report.scores;

    if (report.metrics.contradictedClaims > 0) {
      return escalate(result, 'contradictions_detected', `Contradicted claims: ${contradictedClaims.slice(0, 2).join('; ')}`);
    }

    if (accuracy < 0.5) {
      return escalate(result, 'low_accuracy_response', `Low claim accuracy: ${accuracy.toFixed(2)}`);
    }

    if (accuracy > 0.7 && report.metrics.verifiedClaims > 0) {
      return {
        ...result,
        riskLevel: 'low',
        requiresEscalation: false,
        escalationTrigger: null,
        validationMessage: `Claims verified against medical sources (accuracy ${accuracy.toFixed(2)})`,
      };
    }

    return result;
  }
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function fromOutcome(ctx: RuleContext, outcome: RuleOutcome): ValidationResult {
  return {
    riskLevel: outcome.riskLevel,
    confidenceScore: outcome.confidenceScore ?? ctx.baselineConfidence,
    requiresEscalation: outcome.requiresEscalation,
    escalationTrigger: outcome.trigger,
    validationMessage: outcome.message,
    emergencyKeywordsDetected: [
      ...ctx.emergencyInQuery,
      ...ctx.emergencyInResponse.filter((k) => !ctx.emergencyInQuery.includes(k)),
    ],
    highRiskKeywordsDetected: [...ctx.highRiskKeywords, ...ctx.conditions],
    dangerousPatternsDetected: outcome.dangerousPatterns ?? [],
    verifiedClaims: [],
    contradictedClaims: outcome.contradictedClaims ?? [],
    sourcesUsed: [],
    scores: { accuracy: null, appropriateness: null, semanticConfidence: null },
    semanticRan: false,
  };
}

function escalate(
  result: ValidationResult,
  trigger: 'contradictions_detected' | 'low_accuracy_response',
  message: string
): ValidationResult {
  const riskLevel: RiskLevel = result.riskLevel === 'critical' ? 'critical' : 'high';
  return {
    ...result,
    riskLevel,
    requiresEscalation: true,
    escalationTrigger: trigger,
    validationMessage: message,
  };
}

export function failClosed(error: unknown): ValidationResult {
  return {
    riskLevel: 'high',
    confidenceScore: 0,
    requiresEscalation: true,
    escalationTrigger: 'validation_error',
    validationMessage: `Validation error: ${errorMessage(error)}`,
    emergencyKeywordsDetected: [],
    highRiskKeywordsDetected: [],
    dangerousPatternsDetected: [],
    verifiedClaims: [],
    contradictedClaims: [],
    sourcesUsed: [],
    scores: { accuracy: null, appropriateness: null, semanticConfidence: null },
    semanticRan: false,
  };
}
