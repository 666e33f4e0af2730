import type { FastifyInstance, FastifyRequest } from 'fastify';
import { HTTP_METHODS } from '../types/endpoint.types.js';
import type { RequestDispatcher } from '../dispatch/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'pipeline-routes' });

export interface PipelineRoutesOptions {
  dispatcher: RequestDispatcher;
  /** Bodies above this are refused by Fastify with 413 */
  bodyLimit: number;
}

interface CollectedBody {
  body: Buffer;
  /** Bytes received, including any past the limit that were not kept */
  size: number;
}

function declaresBody(request: FastifyRequest): boolean {
  const length = Number(request.headers['content-length'] ?? 0);
  return length > 0 || request.headers['transfer-encoding'] !== undefined;
}

/**
 * Read a body Fastify left unparsed (GET). Bytes past `limit` are counted, not kept.
 */
async function collectBody(request: FastifyRequest, limit: number): Promise<CollectedBody> {
  const chunks: Buffer[] = [];
  let kept = 0;
  let size = 0;

  for await (const chunk of request.raw) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (kept + buffer.length <= limit) {
      chunks.push(buffer);
      kept += buffer.length;
    }
  }

  return { body: Buffer.concat(chunks), size };
}

async function readBody(request: FastifyRequest, limit: number): Promise<CollectedBody> {
  if (Buffer.isBuffer(request.body)) {
    return { body: request.body, size: request.body.length };
  }
  if (!declaresBody(request)) {
    return { body: Buffer.alloc(0), size: 0 };
  }
  return collectBody(request, limit);
}

/**
 * Declared endpoints (catch-all; the route table does the matching)
 */
export async function pipelineRoutes(fastify: FastifyInstance, opts: PipelineRoutesOptions): Promise<void> {
  // Bodies reach the dispatcher as raw bytes; it decodes them after the size gate
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.route({
    method: [...HTTP_METHODS],
    url: '/*',
    bodyLimit: opts.bodyLimit,
    exposeHeadRoute: false,
    handler: async (request, reply) => {
      const { body, size } = await readBody(request, opts.bodyLimit);

      const result = await opts.dispatcher.dispatch({
        method: request.method,
        url: request.url,
        headers: request.headers,
        body,
        size,
        client: { address: request.ip, port: request.socket.remotePort ?? 0 },
        logger: logger.child({ requestId: request.id }),
      });

      reply.status(result.status).headers(result.headers);
      return reply.send(result.body);
    },
  });
}
