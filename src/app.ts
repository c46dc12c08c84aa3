import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { Engine, EngineOverrides, createEngine } from './engine/create-engine';
import { registerEngineRoutes } from './api/routes';
import { registerAdminRoutes } from './api/admin-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  engine: Engine;
}

export interface BuildAppOptions {
  engine?: EngineOverrides;
  adminApiKey?: string;
  enableMetrics?: boolean;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null;
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach before connect so connection errors are never unhandled
    redisInstance.on('error', (err: Error) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory stores');
    return undefined;
  }
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // pino is used directly
    trustProxy: true,
    bodyLimit: 1_048_576,
  });

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const overrides = options.engine ?? {};
  let redis = overrides.redis;
  if (!redis && env.redis.url) {
    redis = await connectRedis(env.redis.url);
  }

  const engine = createEngine({ ...overrides, redis });

  registerHealthRoutes(app, engine.health, redis, options.enableMetrics);
  registerEngineRoutes(app, engine.service);
  registerAdminRoutes(app, engine.service, options.adminApiKey);

  logger.info(
    {
      redis: Boolean(redis),
      identityThreshold: env.identity.confidenceThreshold,
      embedding: env.embedding.openaiApiKey ? env.embedding.model : 'local-hash',
    },
    'Context engine initialized',
  );

  return { app, redis, engine };
}
