/**
 * Worker entry point: delivers expert alerts for newly escalated cases.
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { redis, closeRedis, NOTIFICATION_QUEUE_NAME } from '../infra/queue/client';
import { createNotificationProcessor } from './processor';
import { config } from '../config';
import { logger } from '../infra/logging/logger';
import { ChatwootClient } from '../adapters/chatwoot/client';
import type { ExpertNotificationJobData, JobResult } from '../shared/types';

const processNotificationJob = createNotificationProcessor(new ChatwootClient());

const worker = new Worker<ExpertNotificationJobData, JobResult>(NOTIFICATION_QUEUE_NAME, processNotificationJob, {
  connection: redis,
  concurrency: config.workerConcurrency,
  maxStalledCount: 2,
  stalledInterval: 30000,
  lockDuration: 60000,
  settings: {
    backoffStrategy: (attemptsMade: number) => {
      return Math.min(Math.pow(2, attemptsMade) * 1000, 16000);
    },
  },
});

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('ready', () => {
  logger.info({ queue: NOTIFICATION_QUEUE_NAME, concurrency: config.workerConcurrency }, 'Worker ready');
});

worker.on('completed', (job: Job<ExpertNotificationJobData, JobResult>) => {
  logger.info({
    jobId: job.id,
    correlationId: job.data.correlationId,
    caseId: job.data.caseId,
    duration: Date.now() - job.timestamp,
  }, 'Job completed');
});

worker.on('failed', (job: Job<ExpertNotificationJobData, JobResult> | undefined, err: Error) => {
  logger.error({
    jobId: job?.id,
    correlationId: job?.data.correlationId,
    caseId: job?.data.caseId,
    error: err.message,
    attemptsMade: job?.attemptsMade,
  }, 'Job failed');
});

worker.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Worker error');
});

worker.on('stalled', (jobId: string) => {
  logger.warn({ jobId }, 'Job stalled');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  try {
    await worker.pause();
    logger.info('Worker paused, waiting for active jobs...');

    const timeout = setTimeout(() => {
      logger.warn('Shutdown timeout, forcing close');
      process.exit(1);
    }, 30000);

    await worker.close();
    clearTimeout(timeout);

    await closeRedis();

    logger.info('Worker shut down gracefully');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during worker shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

logger.info({ queue: NOTIFICATION_QUEUE_NAME }, 'Worker starting...');
