import type { ApiVersion } from '../utils/version.js';
import type { PipelineDef } from '../nodes/types.js';

/**
 * HTTP verbs an endpoint may bind
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Endpoint declaration, immutable once loaded
 */
export interface EndpointSpec {
  route: string;
  methods: readonly HttpMethod[];
  /** Inclusive bounds on the raw request body length, in bytes */
  minSize: number;
  maxSize: number;
  version: ApiVersion;
  /** Names of dependency pipelines run before this endpoint's pipeline */
  depends: readonly string[];
  pipeline: PipelineDef;
}

/**
 * Named guard pipeline that endpoints may depend on
 */
export interface DependencySpec {
  name: string;
  pipeline: PipelineDef;
}
