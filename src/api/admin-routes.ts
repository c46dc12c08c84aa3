import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { env } from '../config/env';
import { ContextEngineService } from '../engine/context-engine-service';
import { logger } from '../observability/logger';
import { cleanupSchema, forgetSchema } from './schemas';

export function verifyAdminKey(req: FastifyRequest, reply: FastifyReply, adminApiKey = env.security.adminApiKey): boolean {
  const key = req.headers['x-admin-api-key'];
  if (!adminApiKey || typeof key !== 'string' || key !== adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

export function registerAdminRoutes(
  app: FastifyInstance,
  service: ContextEngineService,
  adminApiKey = env.security.adminApiKey,
): void {
  /** Erase every stored fragment of a customer */
  app.delete<{ Params: { customerId: string } }>(
    '/customers/:customerId',
    { schema: forgetSchema },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply, adminApiKey)) return reply;

      const result = await service.forgetCustomer(req.params.customerId);
      logger.info({ admin: true, customerId: req.params.customerId, deleted: result.deleted }, 'Customer erased');
      return reply.status(result.degraded ? 503 : 200).send(result);
    },
  );

  /** Drop fragments older than the retention window */
  app.post<{ Body: { days: number } }>('/maintenance/cleanup', { schema: cleanupSchema }, async (req, reply) => {
    if (!verifyAdminKey(req, reply, adminApiKey)) return reply;

    const result = await service.cleanupOlderThan(req.body.days);
    logger.info({ admin: true, days: req.body.days, deleted: result.deleted }, 'Cleanup requested');
    return reply.send(result);
  });
}
