/**
 * Endpoint Binder
 *
 * Runs once at startup: exposes each endpoint as `v<major>/<minor>/<route>` and
 * adds one route-table binding per declared method.
 */

import type { EndpointSpec } from '../types/endpoint.types.js';
import type { CompiledPipeline } from '../nodes/types.js';
import { InternalError, UnknownDependencyError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { versionedRoute } from '../utils/version.js';
import { RouteTable } from './route-table.js';

const logger = createChildLogger({ service: 'endpoint-binder' });

/**
 * Bind endpoints to their compiled pipelines
 * @param endpoints - Endpoint declarations
 * @param pipelines - Compiled pipeline for each endpoint, same order
 * @param dependencies - Compiled guard pipelines by dependency name
 * @throws DuplicateRouteError | UnknownDependencyError
 */
export function bindEndpoints(
  endpoints: readonly EndpointSpec[],
  pipelines: readonly CompiledPipeline[],
  dependencies: ReadonlyMap<string, CompiledPipeline> = new Map()
): RouteTable {
  if (endpoints.length !== pipelines.length) {
    throw new InternalError(
      `Expected one compiled pipeline per endpoint, got ${pipelines.length} for ${endpoints.length}`
    );
  }

  const table = new RouteTable();

  endpoints.forEach((endpoint, index) => {
    const route = versionedRoute(endpoint.version, endpoint.route);

    const guards = endpoint.depends.map((name) => {
      const guard = dependencies.get(name);
      if (!guard) {
        throw new UnknownDependencyError(route, name);
      }
      return guard;
    });

    for (const method of endpoint.methods) {
      table.add({
        route,
        method,
        endpoint,
        pipeline: pipelines[index],
        dependencies: guards,
      });
    }

    logger.info(
      { route, methods: endpoint.methods, pipeline: pipelines[index].name, depends: endpoint.depends },
      'Endpoint bound'
    );
  });

  return table.freeze();
}
