import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { authMiddleware } from '../middleware/auth';
import { SUPPORTED_LANGUAGES } from '../../shared/types';
import type { ResponseSafetyService } from '../../domain/safety/service';
import type { ValidationAuditRepository } from '../../domain/audit/repository';

export interface ValidationRouteOptions {
  safety: ResponseSafetyService;
  audit: ValidationAuditRepository;
}

const reviewSchema = z.object({
  userId: z.string().min(1),
  messageId: z.string().min(1).nullable().default(null),
  language: z.enum(SUPPORTED_LANGUAGES).default('en'),
  query: z.string().min(1),
  response: z.string().min(1),
  baselineConfidence: z.number().min(0).max(1),
  useSemantic: z.boolean().optional(),
});

const listSchema = z.object({
  userId: z.string().min(1).optional(),
  messageId: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const validationRoutes: FastifyPluginAsync<ValidationRouteOptions> = async (
  app: FastifyInstance,
  { safety, audit }
) => {
  app.addHook('preHandler', authMiddleware);

  /**
   * POST /validations
   * Validate one bot answer before it is sent to the user. The answer comes
   * back with its disclaimer and a delivery decision.
   */
  app.post('/validations', async (request, reply) => {
    const body = reviewSchema.parse(request.body);

    // Stop validating if the caller goes away before we answer
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const decision = await safety.review({
      ...body,
      correlationId: request.correlationId,
      signal: controller.signal,
    });

    request.log.info(
      {
        userId: body.userId,
        riskLevel: decision.validation.riskLevel,
        delivery: decision.delivery,
        caseId: decision.escalation?.caseId ?? null,
      },
      'Response validated'
    );

    return { success: true, data: decision };
  });

  /**
   * GET /validations
   * Audit trail, newest first.
   */
  app.get('/validations', async (request) => {
    const filter = listSchema.parse(request.query);
    const records = await audit.list(filter);

    return { success: true, data: records };
  });
};
