import type { Job } from 'bullmq';
import { logger } from '../infra/logging/logger';
import type { Messaging } from '../adapters/chatwoot/client';
import { formatExpertAlert } from '../domain/escalation/notifier';
import { isRetryableError } from '../shared/errors';
import type { ExpertNotificationJobData, JobResult } from '../shared/types';

export type NotificationJob = Pick<Job<ExpertNotificationJobData>, 'id' | 'data' | 'attemptsMade'>;

export function createNotificationProcessor(messaging: Messaging) {
  return async function processNotificationJob(job: NotificationJob): Promise<JobResult> {
    const startTime = Date.now();
    const { correlationId, type } = job.data;

    const jobLogger = logger.child({
      jobId: job.id,
      correlationId,
      type,
      attemptsMade: job.attemptsMade,
    });

    jobLogger.info('Processing job');

    if (type !== 'expert_notification') {
      jobLogger.warn('Unknown job type, skipping');
      return { status: 'skipped', correlationId, action: type };
    }

    try {
      await messaging.sendText(job.data.expertPhone, formatExpertAlert(job.data));

      jobLogger.info(
        { duration: Date.now() - startTime, caseId: job.data.caseId, expertId: job.data.expertId },
        'Expert notified'
      );
      return { status: 'completed', correlationId, action: 'expert_notified' };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      jobLogger.error({
        duration: Date.now() - startTime,
        error: err.message,
        stack: err.stack,
      }, 'Job processing failed');

      if (isRetryableError(err)) {
        throw err; // BullMQ will retry based on settings
      }

      // Non-retryable error - mark as failed permanently
      return { status: 'failed', correlationId, error: err.message };
    }
  };
}
