import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../../config';
import { logger } from '../logging/logger';
import type { ExpertNotificationJobData } from '../../shared/types';

// Redis connection with production settings
export const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > 20) {
      logger.error('Redis connection failed after 20 retries');
      return null; // Stop retrying
    }
    return Math.min(times * 100, 3000);
  },
  reconnectOnError: (err) => {
    const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
    return targetErrors.some((e) => err.message.includes(e));
  },
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

redis.on('error', (err) => {
  logger.error({ error: err.message }, 'Redis error');
});

redis.on('close', () => {
  logger.warn('Redis connection closed');
});

// ============================================================================
// Queue Definitions
// ============================================================================

export const NOTIFICATION_QUEUE_NAME = 'expert-notifications';

export const notificationQueue = new Queue<ExpertNotificationJobData>(NOTIFICATION_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    attempts: 5,
    backoff: {
      type: 'exponential',
      delay: 2000,
    },
    removeOnComplete: {
      count: 1000,
      age: 86400,
    },
    removeOnFail: {
      count: 5000,  // Keep failed notifications for follow-up
      age: 7 * 86400,
    },
  },
});

export const queueEvents = new QueueEvents(NOTIFICATION_QUEUE_NAME, {
  connection: redis,
});

queueEvents.on('failed', ({ jobId, failedReason }) => {
  logger.warn({ jobId, reason: failedReason }, 'Notification job failed event');
});

queueEvents.on('stalled', ({ jobId }) => {
  logger.warn({ jobId }, 'Notification job stalled event');
});

// ============================================================================
// Queue Operations
// ============================================================================

export async function getQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}> {
  const [waiting, active, completed, failed, delayed, paused] = await Promise.all([
    notificationQueue.getWaitingCount(),
    notificationQueue.getActiveCount(),
    notificationQueue.getCompletedCount(),
    notificationQueue.getFailedCount(),
    notificationQueue.getDelayedCount(),
    notificationQueue.isPaused(),
  ]);

  return { waiting, active, completed, failed, delayed, paused };
}

// ============================================================================
// Health Check
// ============================================================================

export async function checkRedisHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
}> {
  const start = Date.now();

  try {
    await redis.ping();
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis health check failed');
    return { healthy: false, latencyMs: Date.now() - start };
  }
}

// ============================================================================
// Cleanup
// ============================================================================

export async function closeRedis(): Promise<void> {
  await notificationQueue.close();
  await queueEvents.close();
  await redis.quit();
  logger.info('Redis connections closed');
}
