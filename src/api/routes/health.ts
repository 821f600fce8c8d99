import type { FastifyInstance, FastifyPluginAsync } from 'fastify';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface DependencyHealth {
  healthy: boolean;
  latencyMs: number;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}

/** Checks the health routes call; wired to Postgres, Redis and BullMQ in production. */
export interface HealthChecks {
  database(): Promise<DependencyHealth & { connections?: { total: number; idle: number; waiting: number } }>;
  redis(): Promise<DependencyHealth>;
  queue(): Promise<QueueStats>;
}

export interface HealthRouteOptions {
  checks: HealthChecks;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  app: FastifyInstance,
  { checks }
) => {
  // Basic liveness check - always returns 200 if server is running
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness check - returns 200 only if all dependencies are healthy
  app.get('/ready', async (_request, reply) => {
    const [dbHealth, redisHealth] = await Promise.all([checks.database(), checks.redis()]);

    const isReady = dbHealth.healthy && redisHealth.healthy;

    if (!isReady) {
      reply.status(503);
    }

    return {
      status: isReady ? 'ready' : 'not_ready',
      checks: {
        database: dbHealth.healthy ? 'ok' : 'fail',
        redis: redisHealth.healthy ? 'ok' : 'fail',
      },
    };
  });

  // Full health check with detailed metrics
  app.get('/health', async (_request, reply) => {
    const [dbHealth, redisHealth, queueStats] = await Promise.all([
      checks.database(),
      checks.redis(),
      checks.queue(),
    ]);

    const isHealthy = dbHealth.healthy && redisHealth.healthy;

    // Undelivered expert alerts pile up here when the worker is down
    const queueHealthy = queueStats.waiting < 1000 && !queueStats.paused;

    if (!isHealthy) {
      reply.status(503);
    }

    return {
      status: isHealthy ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        database: {
          status: dbHealth.healthy ? 'ok' : 'fail',
          latencyMs: dbHealth.latencyMs,
          connections: dbHealth.connections,
        },
        redis: {
          status: redisHealth.healthy ? 'ok' : 'fail',
          latencyMs: redisHealth.latencyMs,
        },
        notificationQueue: {
          status: queueHealthy ? 'ok' : 'degraded',
          ...queueStats,
        },
      },
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        rss: Math.round(process.memoryUsage().rss / 1024 / 1024),
      },
    };
  });
};
