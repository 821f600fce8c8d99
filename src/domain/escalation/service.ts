import type { CaseStatus, EscalatedCase, ExpertNotificationJobData, RiskLevel } from '../../shared/types';
import { CaseNotFoundError, InvalidCaseTransitionError, errorMessage } from '../../shared/errors';
import { createChildLogger } from '../../infra/logging/logger';
import type { EscalationRepository } from './repository';

const log = createChildLogger({ component: 'escalation-manager' });

const PENDING_STATUSES: readonly CaseStatus[] = ['open', 'in_progress'];

/** Statuses a case may be in before moving to the key status. */
const ALLOWED_FROM: Record<Exclude<CaseStatus, 'open'>, readonly CaseStatus[]> = {
  in_progress: ['open'],
  resolved: ['open', 'in_progress'],
  closed: ['open', 'in_progress'],
};

/** Delivers a new-case alert to the assigned expert. */
export interface ExpertNotifier {
  notify(job: ExpertNotificationJobData): Promise<void>;
}

export interface OpenCaseInput {
  userId: string;
  query: string;
  response: string;
  severity: RiskLevel;
  reason: string;
  keywords: string[];
  validationId: number | null;
  correlationId?: string;
}

export class EscalationManager {
  constructor(
    private repository: EscalationRepository,
    private notifier: ExpertNotifier | null = null
  ) {}

  /**
   * Create a review case, assigned to the first available expert if any.
   * The case is created even when nobody is available. Notification
   * failures are logged and never fail the case.
   */
  async openCase(input: OpenCaseInput): Promise<EscalatedCase> {
    const expert = await this.repository.findAvailableExpert();

    const created = await this.repository.createCase({
      userId: input.userId,
      validationId: input.validationId,
      assignedExpertId: expert?.id ?? null,
      originalQuery: input.query,
      botResponse: input.response,
      severity: input.severity,
      escalationReason: input.reason,
      keywordsTriggered: input.keywords,
    });

    log.info(
      { caseId: created.id, severity: created.severity, expertId: created.assignedExpertId, correlationId: input.correlationId },
      expert ? 'Escalated case opened and assigned' : 'Escalated case opened without an available expert'
    );

    if (expert?.phone && this.notifier) {
      try {
        await this.notifier.notify({
          type: 'expert_notification',
          correlationId: input.correlationId ?? `case-${created.id}`,
          caseId: created.id,
          expertId: expert.id,
          expertPhone: expert.phone,
          severity: created.severity,
          reason: created.escalationReason,
          originalQuery: created.originalQuery,
        });
      } catch (error) {
        log.error({ caseId: created.id, expertId: expert.id, error: errorMessage(error) }, 'Expert notification failed');
      }
    }

    return created;
  }

  async getCase(caseId: number): Promise<EscalatedCase> {
    const found = await this.repository.getCase(caseId);
    if (!found) {
      throw new CaseNotFoundError(caseId);
    }
    return found;
  }

  startCase(caseId: number): Promise<EscalatedCase> {
    return this.transition(caseId, 'in_progress', null);
  }

  resolveCase(caseId: number, notes: string): Promise<EscalatedCase> {
    return this.transition(caseId, 'resolved', notes);
  }

  closeCase(caseId: number, notes?: string): Promise<EscalatedCase> {
    return this.transition(caseId, 'closed', notes ?? null);
  }

  listPending(expertId: number): Promise<EscalatedCase[]> {
    return this.repository.listCasesForExpert(expertId, PENDING_STATUSES);
  }

  private async transition(
    caseId: number,
    to: Exclude<CaseStatus, 'open'>,
    notes: string | null
  ): Promise<EscalatedCase> {
    const updated = await this.repository.transitionCase({ caseId, from: ALLOWED_FROM[to], to, notes });

    if (updated) {
      log.info({ caseId, status: to }, 'Escalated case updated');
      return updated;
    }

    const current = await this.repository.getCase(caseId);
    if (!current) {
      throw new CaseNotFoundError(caseId);
    }
    throw new InvalidCaseTransitionError(caseId, current.status, to);
  }
}
