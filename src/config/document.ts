/**
 * Configuration Document
 *
 * Zod schema for the YAML document that declares the served endpoints.
 * Parsing turns the loosely typed YAML into frozen EndpointSpec / PipelineDef
 * records; nothing downstream inspects raw configuration.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './env.js';
import { HTTP_METHODS, type DependencySpec, type EndpointSpec } from '../types/endpoint.types.js';
import type { Edge, PipelineDef } from '../nodes/types.js';
import { ValidationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/object.js';
import { formatVersion, parseVersion, type ApiVersion } from '../utils/version.js';

export const DEFAULT_ADDRESS = '0.0.0.0';
export const DEFAULT_PORT = 1979;
export const DEFAULT_MIN_SIZE = 0;
/** 1 MiB */
export const DEFAULT_MAX_SIZE = 1024 * 1024;

const EDGE_ARROW = '->';

/**
 * Expand an edge string into source -> target pairs.
 * `"A -> B -> C"` yields `[A, B]` and `[B, C]`. Returns null when malformed.
 */
export function parseEdgeSpec(spec: string): Edge[] | null {
  const names = spec.split(EDGE_ARROW).map((part) => part.trim());
  if (names.length < 2 || names.some((name) => name.length === 0)) {
    return null;
  }

  const edges: Edge[] = [];
  for (let i = 0; i < names.length - 1; i++) {
    edges.push([names[i], names[i + 1]]);
  }
  return edges;
}

const versionSchema = z.union([z.string(), z.number()]).transform((value, ctx): ApiVersion => {
  const parsed = parseVersion(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid version '${value}', expected 'major.minor'`,
    });
    return z.NEVER;
  }
  return parsed;
});

const nodeSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  version: versionSchema.transform(formatVersion),
  config: z
    .record(z.unknown())
    .nullish()
    .transform((config) => config ?? {}),
});

const digraphSchema = z
  .array(z.string())
  .default([])
  .transform((specs, ctx) => {
    const edges: Edge[] = [];
    specs.forEach((spec, index) => {
      const parsed = parseEdgeSpec(spec);
      if (!parsed) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid edge '${spec}', expected 'A -> B'`,
          path: [index],
        });
        return;
      }
      edges.push(...parsed);
    });
    return edges;
  });

export const pipelineSchema = z
  .object({
    name: z.string().min(1),
    node: z.array(nodeSchema).min(1, 'A pipeline needs at least one node'),
    digraph: digraphSchema,
    last: z.string().min(1).optional(),
  })
  .transform(
    (pipeline): PipelineDef => ({
      name: pipeline.name,
      nodes: pipeline.node,
      edges: pipeline.digraph,
      ...(pipeline.last !== undefined && { last: pipeline.last }),
    })
  );

const methodSchema = z
  .string()
  .transform((method) => method.toUpperCase())
  .pipe(z.enum(HTTP_METHODS));

export const endpointSchema = z
  .object({
    route: z.string().min(1),
    methods: z.array(methodSchema).nonempty().default(['GET', 'POST']),
    min_size: z.number().int().nonnegative().default(DEFAULT_MIN_SIZE),
    max_size: z.number().int().nonnegative().default(DEFAULT_MAX_SIZE),
    version: versionSchema.default('0.0'),
    depends: z.array(z.string().min(1)).default([]),
    pipeline: pipelineSchema,
  })
  .refine((endpoint) => endpoint.min_size <= endpoint.max_size, {
    message: 'min_size must not exceed max_size',
    path: ['min_size'],
  })
  .transform(
    (endpoint): EndpointSpec => ({
      route: endpoint.route,
      methods: endpoint.methods,
      minSize: endpoint.min_size,
      maxSize: endpoint.max_size,
      version: endpoint.version,
      depends: endpoint.depends,
      pipeline: endpoint.pipeline,
    })
  );

const dependencySchema = z.object({
  name: z.string().min(1),
  pipeline: pipelineSchema,
});

export const documentSchema = z.object({
  address: z.string().min(1).default(DEFAULT_ADDRESS),
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
  ssl: z
    .object({
      enabled: z.boolean().default(false),
      cert: z.string().min(1).optional(),
      key: z.string().min(1).optional(),
    })
    .default({})
    .refine((ssl) => !ssl.enabled || (ssl.cert !== undefined && ssl.key !== undefined), {
      message: 'ssl.cert and ssl.key are required when ssl is enabled',
    }),
  request_timeout_ms: z.number().int().positive().optional(),
  extensions: z.array(z.string().min(1)).default([]),
  dependencies: z.array(dependencySchema).default([]),
  api: z.array(endpointSchema).default([]),
});

/**
 * Parsed, validated configuration document
 */
export interface DocumentConfig {
  address: string;
  port: number;
  log: { level: (typeof LOG_LEVELS)[number] };
  ssl: { enabled: boolean; cert?: string; key?: string };
  requestTimeoutMs?: number;
  extensions: readonly string[];
  dependencies: readonly DependencySpec[];
  endpoints: readonly EndpointSpec[];
}

/**
 * Validate a raw document (already parsed from YAML) and freeze the result
 * @throws ValidationError listing every issue
 */
export function parseDocument(raw: unknown): DocumentConfig {
  const result = documentSchema.safeParse(raw ?? {});

  if (!result.success) {
    throw new ValidationError('Invalid configuration document', result.error.issues);
  }

  const doc = result.data;
  return deepFreeze({
    address: doc.address,
    port: doc.port,
    log: doc.log,
    ssl: doc.ssl,
    requestTimeoutMs: doc.request_timeout_ms,
    extensions: doc.extensions,
    dependencies: doc.dependencies,
    endpoints: doc.api,
  });
}
