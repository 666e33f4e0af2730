import type { FastifyInstance } from 'fastify';
import type { Engine } from '../engine.js';

interface HealthResponse {
  status: 'ok';
  timestamp: string;
}

interface ReadinessResponse extends HealthResponse {
  routeCount: number;
  nodeTypeCount: number;
}

export interface HealthRoutesOptions {
  engine: Engine;
}

/**
 * Health check routes
 */
export async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  /**
   * Liveness probe - is the service running?
   */
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Readiness probe - the engine is built before the server listens, so a
   * responding server is ready; the counts describe what it serves.
   */
  fastify.get<{ Reply: ReadinessResponse }>('/ready', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      routeCount: opts.engine.routes.size,
      nodeTypeCount: opts.engine.registry.size,
    });
  });
}
