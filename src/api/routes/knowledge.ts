import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { authMiddleware } from '../middleware/auth';
import type { KnowledgeStore } from '../../domain/knowledge/service';

export interface KnowledgeRouteOptions {
  knowledge: KnowledgeStore;
}

const conditionQuery = z.object({ q: z.string().default('') });

export const knowledgeRoutes: FastifyPluginAsync<KnowledgeRouteOptions> = async (
  app: FastifyInstance,
  { knowledge }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/knowledge/sources', async () => {
    const sources = await knowledge.getSources();
    return { success: true, data: sources };
  });

  app.get('/knowledge/conditions', async (request) => {
    const { q } = conditionQuery.parse(request.query);
    const conditions = await knowledge.searchConditions(q);

    return { success: true, data: conditions };
  });
};
