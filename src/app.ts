import type { Server } from 'http';
import { createServer } from 'https';
import Fastify, { type FastifyInstance, type FastifyServerFactory } from 'fastify';
import helmet from '@fastify/helmet';

import type { Engine } from './engine.js';
import { getLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { pipelineRoutes } from './routes/pipeline.routes.js';

export interface AppOptions {
  /** PEM key and certificate; serve HTTPS when set */
  tls?: { key: Buffer; cert: Buffer };
}

/**
 * Build and configure Fastify application
 */
export async function buildApp(engine: Engine, options: AppOptions = {}): Promise<FastifyInstance> {
  const logger = getLogger();
  const { tls } = options;

  const serverFactory: FastifyServerFactory | undefined = tls
    ? (handler): Server => createServer({ key: tls.key, cert: tls.cert }, handler)
    : undefined;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    serverFactory,
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes, { engine });
  await app.register(pipelineRoutes, {
    dispatcher: engine.dispatcher,
    bodyLimit: engine.maxBodySize,
  });

  return app;
}
