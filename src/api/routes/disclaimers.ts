import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { authMiddleware } from '../middleware/auth';
import { RISK_LEVELS, SUPPORTED_LANGUAGES } from '../../shared/types';
import type { DisclaimerSelector } from '../../domain/disclaimer/service';

export interface DisclaimerRouteOptions {
  disclaimers: DisclaimerSelector;
}

const selectParams = z.object({
  riskLevel: z.enum(RISK_LEVELS),
  language: z.enum(SUPPORTED_LANGUAGES),
});

const createSchema = z.object({
  riskLevel: z.enum(RISK_LEVELS),
  language: z.enum(SUPPORTED_LANGUAGES),
  content: z.string().min(1).max(2000),
  priority: z.number().int().min(0).optional(),
});

const historyParams = z.object({ userId: z.string().min(1) });
const historyQuery = z.object({ limit: z.coerce.number().int().min(1).max(500).default(50) });

export const disclaimerRoutes: FastifyPluginAsync<DisclaimerRouteOptions> = async (
  app: FastifyInstance,
  { disclaimers }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/disclaimers/:riskLevel/:language', async (request) => {
    const { riskLevel, language } = selectParams.parse(request.params);
    const disclaimer = await disclaimers.getDisclaimer(riskLevel, language);

    return { success: true, data: disclaimer };
  });

  app.post('/disclaimers', async (request, reply) => {
    const body = createSchema.parse(request.body);
    const created = await disclaimers.createCustomDisclaimer(
      body.riskLevel,
      body.language,
      body.content,
      body.priority
    );

    reply.status(201);
    return { success: true, data: created };
  });

  app.get('/users/:userId/disclaimers', async (request) => {
    const { userId } = historyParams.parse(request.params);
    const { limit } = historyQuery.parse(request.query);
    const history = await disclaimers.getUserHistory(userId, limit);

    return { success: true, data: history };
  });
};
