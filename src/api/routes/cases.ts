import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { authMiddleware } from '../middleware/auth';
import type { EscalationManager } from '../../domain/escalation/service';

export interface CaseRouteOptions {
  escalation: EscalationManager;
}

const caseParams = z.object({ id: z.coerce.number().int().positive() });
const expertParams = z.object({ expertId: z.coerce.number().int().positive() });
const resolveSchema = z.object({ notes: z.string().min(1) });
const closeSchema = z.object({ notes: z.string().min(1).optional() }).default({});

export const caseRoutes: FastifyPluginAsync<CaseRouteOptions> = async (
  app: FastifyInstance,
  { escalation }
) => {
  app.addHook('preHandler', authMiddleware);

  app.get('/cases/:id', async (request) => {
    const { id } = caseParams.parse(request.params);
    const found = await escalation.getCase(id);

    return { success: true, data: found };
  });

  // Open and in-progress cases assigned to an expert, oldest first
  app.get('/experts/:expertId/cases', async (request) => {
    const { expertId } = expertParams.parse(request.params);
    const cases = await escalation.listPending(expertId);

    return { success: true, data: cases };
  });

  app.post('/cases/:id/start', async (request) => {
    const { id } = caseParams.parse(request.params);
    const updated = await escalation.startCase(id);

    request.log.info({ caseId: id }, 'Case review started');
    return { success: true, data: updated };
  });

  app.post('/cases/:id/resolve', async (request) => {
    const { id } = caseParams.parse(request.params);
    const { notes } = resolveSchema.parse(request.body);
    const updated = await escalation.resolveCase(id, notes);

    request.log.info({ caseId: id }, 'Case resolved');
    return { success: true, data: updated };
  });

  app.post('/cases/:id/close', async (request) => {
    const { id } = caseParams.parse(request.params);
    const { notes } = closeSchema.parse(request.body ?? undefined);
    const updated = await escalation.closeCase(id, notes);

    request.log.info({ caseId: id }, 'Case closed');
    return { success: true, data: updated };
  });
};
