import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { config, isDevelopment, isProduction, isTest } from '@/config';
import { typedLogger } from '@/lib/typed-logger';
import { errorHandler } from '@/middleware/error';
import { QuestEngine, questRoutes } from '@/modules/quests';
import dutyRoutes from '@/modules/duties/routes';
import characterRoutes from '@/modules/characters/routes';
import verificationRoutes from '@/modules/verification/routes';

export interface AppOptions {
  engine: QuestEngine;
}

const API_PREFIX = '/api/v1';

/**
 * Create and configure the Fastify application around a quest engine.
 */
export async function createApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: isTest
      ? false
      : {
          level: config.LOG_LEVEL,
          ...(isDevelopment && {
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }),
        },
    trustProxy: isProduction,
    bodyLimit: 1024 * 1024,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
  });

  app.setErrorHandler(errorHandler);

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });
  await app.register(helmet, { contentSecurityPolicy: false });

  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    environment: config.NODE_ENV,
  }));

  const routeOptions = { engine: options.engine };
  await app.register(questRoutes, { prefix: API_PREFIX, ...routeOptions });
  await app.register(dutyRoutes, { prefix: API_PREFIX, ...routeOptions });
  await app.register(characterRoutes, { prefix: API_PREFIX, ...routeOptions });
  await app.register(verificationRoutes, { prefix: API_PREFIX, ...routeOptions });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.code(404).send({
      success: false,
      error: 'NOT_FOUND',
      message: `Route ${request.method} ${request.url} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  typedLogger.debug('Routes registered', { prefix: API_PREFIX });
  return app;
}

export default createApp;
