/**
 * Engine assembly
 *
 * Startup sequence: built-in node types, extensions, compile every pipeline
 * (which freezes the registry), bind endpoints. Any failure here is fatal.
 */

import type { DocumentConfig } from './config/document.js';
import {
  compilePipeline,
  createRegistry,
  loadExtensions,
  type CompiledPipeline,
  type NodeTypeRegistry,
} from './nodes/index.js';
import { RequestDispatcher, bindEndpoints, type RouteTable } from './dispatch/index.js';
import { DEFAULT_MAX_SIZE } from './config/document.js';
import { DuplicatePipelineNameError } from './utils/errors.js';
import { createChildLogger } from './utils/logger.js';

const logger = createChildLogger({ service: 'engine' });

export interface Engine {
  registry: NodeTypeRegistry;
  routes: RouteTable;
  dispatcher: RequestDispatcher;
  /** Largest max_size of any endpoint; the transport's body limit */
  maxBodySize: number;
}

export interface EngineOptions {
  /** Directory relative extension specifiers resolve against */
  baseDir?: string;
  /** Overrides the document's request_timeout_ms */
  requestTimeoutMs?: number;
  /** Start from this registry instead of the built-in one */
  registry?: NodeTypeRegistry;
}

/**
 * Build the dispatch engine for a configuration document
 * @throws PipelineConfigError (any subclass) on a bad declaration
 */
export async function buildEngine(document: DocumentConfig, options: EngineOptions = {}): Promise<Engine> {
  const registry = options.registry ?? createRegistry();
  await loadExtensions(registry, document.extensions, options.baseDir ?? process.cwd());

  const pipelineNames = new Set<string>();
  const claim = (name: string): void => {
    if (pipelineNames.has(name)) {
      throw new DuplicatePipelineNameError(name);
    }
    pipelineNames.add(name);
  };

  const dependencies = new Map<string, CompiledPipeline>();
  for (const dependency of document.dependencies) {
    if (dependencies.has(dependency.name)) {
      throw new DuplicatePipelineNameError(dependency.name);
    }
    claim(dependency.pipeline.name);
    dependencies.set(dependency.name, compilePipeline(dependency.pipeline, registry));
  }

  const pipelines = document.endpoints.map((endpoint) => {
    claim(endpoint.pipeline.name);
    return compilePipeline(endpoint.pipeline, registry);
  });

  // No-op when a pipeline was compiled
  registry.freeze();

  const routes = bindEndpoints(document.endpoints, pipelines, dependencies);
  const dispatcher = new RequestDispatcher(routes, {
    requestTimeoutMs: options.requestTimeoutMs ?? document.requestTimeoutMs,
  });

  const maxBodySize = document.endpoints.reduce(
    (max, endpoint) => Math.max(max, endpoint.maxSize),
    document.endpoints.length > 0 ? 1 : DEFAULT_MAX_SIZE
  );

  logger.info(
    { routeCount: routes.size, nodeTypeCount: registry.size, pipelineCount: pipelineNames.size },
    'Engine ready'
  );

  return { registry, routes, dispatcher, maxBodySize };
}
