import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';

vi.mock('./utils/logger.js', () => {
  const logger = { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  logger.child.mockReturnValue(logger);
  return { createChildLogger: vi.fn(() => logger), getLogger: vi.fn(() => logger) };
});

import { buildApp } from './app.js';
import { buildEngine } from './engine.js';
import { parseDocument } from './config/document.js';

const transformer = (name: string, script: string) => ({
  name,
  type: 'data-transformer',
  version: '1.0',
  config: { transformer: script },
});

const DOCUMENT = {
  api: [
    {
      route: 'sum',
      version: '1.0',
      methods: ['POST'],
      pipeline: {
        name: 'sum',
        node: [transformer('T', 'data = {sum: data.param.a + data.param.b}')],
      },
    },
    {
      route: 'items/:id',
      methods: ['GET'],
      pipeline: {
        name: 'item',
        node: [
          transformer('T', 'data.item = {id: data.param.id}'),
          {
            name: 'R',
            type: 'http-reply',
            version: '1.0',
            config: { status: 203, headers: { 'X-Item': 'yes' }, body: 'item' },
          },
        ],
        digraph: ['T -> R'],
      },
    },
    {
      route: 'text',
      methods: ['GET'],
      pipeline: {
        name: 'text',
        node: [
          transformer('T', 'data.message = "plain"'),
          { name: 'R', type: 'http-reply', version: '1.0', config: { body: 'message' } },
        ],
        digraph: ['T -> R'],
      },
    },
    {
      route: 'small',
      methods: ['POST'],
      max_size: 4,
      pipeline: { name: 'small', node: [transformer('T', 'data = {ok: true}')] },
    },
    {
      route: 'client',
      methods: ['GET'],
      pipeline: { name: 'client', node: [transformer('T', 'data = {client: data.client}')] },
    },
    {
      route: 'peek',
      methods: ['GET'],
      min_size: 3,
      max_size: 8,
      pipeline: { name: 'peek', node: [transformer('T', 'data = {body: data.body}')] },
    },
    {
      route: 'fail',
      methods: ['GET'],
      pipeline: { name: 'fail', node: [transformer('T', 'data = 1')] },
    },
  ],
};

describe('app', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const engine = await buildEngine(parseDocument(DOCUMENT));
    app = await buildApp(engine);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('health', () => {
    it('GET /health should report liveness', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok' });
    });

    it('GET /ready should report what is served', async () => {
      const response = await app.inject({ method: 'GET', url: '/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', routeCount: 7, nodeTypeCount: 4 });
    });
  });

  describe('pipelines', () => {
    it('should run a pipeline on a JSON body', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/0/sum', payload: { a: 2, b: 40 } });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('application/json');
      expect(response.json()).toEqual({ sum: 42 });
    });

    it('should apply status, headers and body projection', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/items/abc' });

      expect(response.statusCode).toBe(203);
      expect(response.headers['x-item']).toBe('yes');
      expect(response.json()).toEqual({ id: 'abc' });
    });

    it('should send string bodies as text', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/text' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('plain');
    });

    it('should seed the caller address', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/client' });

      const body = response.json<{ client: [string, number] }>();
      expect(body.client[0]).toBe('127.0.0.1');
      expect(body.client[1]).toBeTypeOf('number');
    });

    it('should hand a GET body to the pipeline', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v0/0/peek',
        headers: { 'content-type': 'text/plain' },
        payload: 'hello',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ body: 'hello' });
    });

    it('should keep security headers', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/text' });
      expect(response.headers['x-content-type-options']).toBe('nosniff');
    });
  });

  describe('errors', () => {
    it('should answer unknown routes with 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: 'NO_SUCH_ENDPOINT',
        message: "No endpoint matches 'v0/0/missing'",
        statusCode: 404,
      });
    });

    it('should answer unversioned paths with 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/sum' });
      expect(response.statusCode).toBe(404);
    });

    it('should answer other methods with 405 and Allow', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/v1/0/sum' });

      expect(response.statusCode).toBe(405);
      expect(response.headers.allow).toBe('POST');
      expect(response.json()).toMatchObject({ error: 'METHOD_NOT_ALLOWED' });
    });

    it('should reject bodies above max_size with 413', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v0/0/small',
        headers: { 'content-type': 'text/plain' },
        payload: 'too long',
      });

      expect(response.statusCode).toBe(413);
      expect(response.json()).toEqual({
        error: 'PAYLOAD_SIZE_VIOLATION',
        message: 'Payload of 8 bytes is outside the accepted range [0, 4]',
        statusCode: 413,
      });
    });

    it('should apply max_size to GET bodies', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v0/0/peek',
        headers: { 'content-type': 'text/plain' },
        payload: 'x'.repeat(10),
      });

      expect(response.statusCode).toBe(413);
      expect(response.json()).toEqual({
        error: 'PAYLOAD_SIZE_VIOLATION',
        message: 'Payload of 10 bytes is outside the accepted range [3, 8]',
        statusCode: 413,
      });
    });

    it('should apply min_size to GET requests without a body', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/peek' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: 'PAYLOAD_SIZE_VIOLATION',
        message: 'Payload of 0 bytes is outside the accepted range [3, 8]',
      });
    });

    it('should reject malformed JSON with 400', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/0/sum',
        headers: { 'content-type': 'application/json' },
        payload: '{"a":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'MALFORMED_BODY', statusCode: 400 });
    });

    it('should hide node failures behind an error id', async () => {
      const response = await app.inject({ method: 'GET', url: '/v0/0/fail' });

      expect(response.statusCode).toBe(500);
      const body: unknown = response.json();
      expect(body).toEqual({
        error: 'PIPELINE_FAILED',
        message: 'Requested process failed',
        statusCode: 500,
        errorId: expect.stringMatching(/^[0-9a-f-]{36}$/),
      });
    });
  });
});

describe('app body limit', () => {
  it('should refuse bodies above every endpoint limit before routing', async () => {
    const engine = await buildEngine(
      parseDocument({
        api: [{ route: 'tiny', methods: ['POST'], max_size: 8, pipeline: { name: 'tiny', node: [transformer('T', 'data = {}')] } }],
      })
    );
    const app = await buildApp(engine);

    const response = await app.inject({
      method: 'POST',
      url: '/v0/0/tiny',
      headers: { 'content-type': 'text/plain' },
      payload: 'x'.repeat(64),
    });

    expect(response.statusCode).toBe(413);
    expect(response.json()).toMatchObject({ error: 'FST_ERR_CTP_BODY_TOO_LARGE', statusCode: 413 });
    await app.close();
  });
});
