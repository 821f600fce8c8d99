import type { ExpertNotificationJobData } from '../../shared/types';
import { logger } from '../../infra/logging/logger';
import type { ExpertNotifier } from './service';

/** The slice of a BullMQ queue the notifier uses. */
export interface NotificationQueue {
  add(name: string, data: ExpertNotificationJobData, opts?: { jobId?: string }): Promise<{ id?: string }>;
}

/** Hands expert alerts to the notification worker. */
export class QueueExpertNotifier implements ExpertNotifier {
  constructor(private queue: NotificationQueue) {}

  async notify(job: ExpertNotificationJobData): Promise<void> {
    const queued = await this.queue.add(job.type, job, {
      jobId: `case-${job.caseId}-expert-${job.expertId}`, // one alert per assignment
    });

    logger.info(
      { jobId: queued.id, caseId: job.caseId, expertId: job.expertId, correlationId: job.correlationId },
      'Expert notification queued'
    );
  }
}

export function formatExpertAlert(job: ExpertNotificationJobData): string {
  const query = job.originalQuery.length > 300 ? `${job.originalQuery.slice(0, 297)}...` : job.originalQuery;

  return [
    `🚨 New ${job.severity.toUpperCase()} case #${job.caseId} needs review`,
    `Reason: ${job.reason}`,
    `User asked: "${query}"`,
  ].join('\n');
}
