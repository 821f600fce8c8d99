import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { config } from './config';
import { logger } from './infra/logging/logger';
import { correlationMiddleware } from './api/middleware/correlation';
import { healthRoutes } from './api/routes/health';
import type { HealthChecks } from './api/routes/health';
import { validationRoutes } from './api/routes/validations';
import { caseRoutes } from './api/routes/cases';
import { disclaimerRoutes } from './api/routes/disclaimers';
import { knowledgeRoutes } from './api/routes/knowledge';
import { isAppError, TooManyRequestsError } from './shared/errors';
import type { ResponseSafetyService } from './domain/safety/service';
import type { ValidationAuditRepository } from './domain/audit/repository';
import type { EscalationManager } from './domain/escalation/service';
import type { DisclaimerSelector } from './domain/disclaimer/service';
import type { KnowledgeStore } from './domain/knowledge/service';

export interface AppDependencies {
  safety: ResponseSafetyService;
  audit: ValidationAuditRepository;
  escalation: EscalationManager;
  disclaimers: DisclaimerSelector;
  knowledge: KnowledgeStore;
  health: HealthChecks;
}

export async function buildApp(deps: AppDependencies) {
  const app = Fastify({
    logger: logger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  // Correlation ID middleware
  await app.register(correlationMiddleware);

  // Global error handler; route plugins only inherit it when set first
  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;

    if (error instanceof ZodError) {
      request.log.warn({ correlationId, issues: error.issues }, 'Request validation failed');
      return reply.status(400).send({
        success: false,
        error: 'Invalid request',
        details: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
        correlationId,
      });
    }

    const statusCode = isAppError(error) ? error.statusCode : error.statusCode || 500;

    request.log.error({
      correlationId,
      error: error.message,
      stack: error.stack,
      statusCode,
    }, 'Request error');

    if (error instanceof TooManyRequestsError && error.retryAfter !== undefined) {
      reply.header('retry-after', Math.ceil(error.retryAfter));
    }

    // Don't expose internal errors
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    return reply.status(statusCode).send({
      success: false,
      error: message,
      code: isAppError(error) ? error.code : undefined,
      correlationId,
    });
  });

  // Routes
  await app.register(healthRoutes, { checks: deps.health });
  await app.register(validationRoutes, { prefix: '/api', safety: deps.safety, audit: deps.audit });
  await app.register(caseRoutes, { prefix: '/api', escalation: deps.escalation });
  await app.register(disclaimerRoutes, { prefix: '/api', disclaimers: deps.disclaimers });
  await app.register(knowledgeRoutes, { prefix: '/api', knowledge: deps.knowledge });

  return app;
}

/** The Fastify instance carries the pino logger type. */
export type App = Awaited<ReturnType<typeof buildApp>>;
