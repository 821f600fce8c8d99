import type { Logger } from 'pino';
import type { Language, ValidationResult } from '../../shared/types';
import { errorMessage, withRetry } from '../../shared/errors';
import { createChildLogger, logExecution } from '../../infra/logging/logger';
import type { ValidationAuditRepository } from '../audit/repository';
import type { DisclaimerSelector } from '../disclaimer/service';
import type { EscalationManager } from '../escalation/service';
import type { ValidationOrchestrator } from '../validation/orchestrator';

const log = createChildLogger({ component: 'response-safety' });

export interface SafetyReviewInput {
  userId: string;
  messageId: string | null;
  language: Language;
  query: string;
  response: string;
  baselineConfidence: number;
  useSemantic?: boolean;
  correlationId?: string;
  signal?: AbortSignal;
}

export type DeliveryAction = 'send' | 'hold_for_review';

export interface SafetyDecision {
  validation: ValidationResult;
  validationId: number | null;
  escalation: {
    caseId: number | null;
    assignedExpertId: number | null;
    error: string | null;
  } | null;
  disclaimer: {
    id: number | null;
    content: string;
  };
  delivery: DeliveryAction;
  /** The answer with its disclaimer appended. */
  message: string;
}

export interface ResponseSafetyOptions {
  semanticByDefault: boolean;
  escalationRetries?: number;
  escalationRetryDelayMs?: number;
}

/**
 * Caller-side flow for one bot answer: validate, audit, escalate, attach a
 * disclaimer and decide whether the answer goes out now.
 */
export class ResponseSafetyService {
  constructor(
    private orchestrator: ValidationOrchestrator,
    private audit: ValidationAuditRepository,
    private escalation: EscalationManager,
    private disclaimers: DisclaimerSelector,
    private options: ResponseSafetyOptions
  ) {}

  async review(input: SafetyReviewInput): Promise<SafetyDecision> {
    const reviewLog = log.child({ correlationId: input.correlationId, userId: input.userId });

    const validation = await logExecution(
      input.correlationId ?? 'none',
      'validate-response',
      () =>
        this.orchestrator.validate(input.query, input.response, input.baselineConfidence, {
          useSemantic: input.useSemantic ?? this.options.semanticByDefault,
          signal: input.signal,
        }),
      reviewLog
    );

    const validationId = await this.recordAudit(input, validation, reviewLog);

    let escalation: SafetyDecision['escalation'] = null;
    if (validation.requiresEscalation) {
      escalation = await this.escalate(input, validation, validationId, reviewLog);
    }

    const disclaimer = await this.selectDisclaimer(input, validation, reviewLog);

    const delivery: DeliveryAction =
      validation.riskLevel === 'high' && escalation?.caseId != null ? 'hold_for_review' : 'send';

    reviewLog.info(
      {
        validationId,
        riskLevel: validation.riskLevel,
        caseId: escalation?.caseId ?? null,
        delivery,
      },
      'Response safety decision'
    );

    return {
      validation,
      validationId,
      escalation,
      disclaimer,
      delivery,
      message: `${input.response}\n\n${disclaimer.content}`,
    };
  }

  private async recordAudit(
    input: SafetyReviewInput,
    validation: ValidationResult,
    reviewLog: Logger
  ): Promise<number | null> {
    try {
      const record = await this.audit.record({
        userId: input.userId,
        messageId: input.messageId,
        userQuery: input.query,
        botResponse: input.response,
        result: validation,
      });
      return record.id;
    } catch (error) {
      reviewLog.error({ error: errorMessage(error) }, 'Failed to persist validation audit record');
      return null;
    }
  }

  private async escalate(
    input: SafetyReviewInput,
    validation: ValidationResult,
    validationId: number | null,
    reviewLog: Logger
  ): Promise<NonNullable<SafetyDecision['escalation']>> {
    try {
      const opened = await withRetry(
        () =>
          this.escalation.openCase({
            userId: input.userId,
            query: input.query,
            response: input.response,
            severity: validation.riskLevel,
            reason: validation.escalationTrigger ?? validation.validationMessage,
            keywords: [
              ...validation.emergencyKeywordsDetected,
              ...validation.highRiskKeywordsDetected,
              ...validation.dangerousPatternsDetected,
            ],
            validationId,
            correlationId: input.correlationId,
          }),
        {
          maxRetries: this.options.escalationRetries ?? 2,
          initialDelayMs: this.options.escalationRetryDelayMs ?? 250,
          maxDelayMs: 2000,
        }
      );

      await this.noteEscalation(validationId, opened.id, null, reviewLog);
      return { caseId: opened.id, assignedExpertId: opened.assignedExpertId, error: null };
    } catch (error) {
      const message = errorMessage(error);
      reviewLog.error(
        { validationId, riskLevel: validation.riskLevel, error: message },
        'Escalation required but case creation failed'
      );
      await this.noteEscalation(validationId, null, message, reviewLog);
      return { caseId: null, assignedExpertId: null, error: message };
    }
  }

  private async noteEscalation(
    validationId: number | null,
    caseId: number | null,
    error: string | null,
    reviewLog: Logger
  ): Promise<void> {
    if (validationId === null) return;
    try {
      await this.audit.recordEscalation(validationId, { escalationId: caseId, escalationError: error });
    } catch (auditError) {
      reviewLog.error({ validationId, error: errorMessage(auditError) }, 'Failed to link escalation to audit record');
    }
  }

  private async selectDisclaimer(
    input: SafetyReviewInput,
    validation: ValidationResult,
    reviewLog: Logger
  ): Promise<SafetyDecision['disclaimer']> {
    try {
      const disclaimer = await this.disclaimers.getDisclaimer(validation.riskLevel, input.language);
      await this.disclaimers.trackShown(
        input.userId,
        disclaimer.id,
        { riskLevel: validation.riskLevel, trigger: validation.escalationTrigger },
        input.messageId
      );
      return { id: disclaimer.id, content: disclaimer.content };
    } catch (error) {
      reviewLog.error(
        { riskLevel: validation.riskLevel, language: input.language, error: errorMessage(error) },
        'Disclaimer lookup failed, using built-in text'
      );
      return { id: null, content: this.disclaimers.defaultText(validation.riskLevel, input.language) };
    }
  }
}
