import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { DependencyHealthManager } from '../resilience/dependency-health';

export function registerHealthRoutes(
  app: FastifyInstance,
  health: DependencyHealthManager,
  redis?: Redis,
  enableMetrics = env.observability.enableMetrics,
): void {
  /** Liveness */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness: Redis ping plus the circuit breaker view of every store */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (redis) {
      const start = Date.now();
      try {
        await redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    for (const [name, dep] of Object.entries(health.getHealthSummary())) {
      checks[`dep_${name}`] = { status: dep.status === 'down' ? 'error' : 'ok' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      degradationLevel: health.getDegradationLevel(),
      timestamp: new Date().toISOString(),
    });
  });

  if (enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
