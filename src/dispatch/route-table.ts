/**
 * Route Table
 *
 * Maps `(major, minor, route, method)` to a RouteBinding. Filled by the
 * Endpoint Binder at startup, frozen, then only read.
 */

import { HTTP_METHODS, type EndpointSpec, type HttpMethod } from '../types/endpoint.types.js';
import type { CompiledPipeline } from '../nodes/types.js';
import { DuplicateRouteError, InternalError, MethodNotAllowedError, NoSuchEndpointError } from '../utils/errors.js';
import { versionedRoute, type ApiVersion } from '../utils/version.js';
import { matchRoute, parseRoutePattern, splitPath, type RoutePattern } from './route-pattern.js';

/**
 * Everything the dispatcher needs to serve one (route, method)
 */
export interface RouteBinding {
  /** Exposed route, `v<major>/<minor>/<route>` */
  readonly route: string;
  readonly method: HttpMethod;
  readonly endpoint: EndpointSpec;
  readonly pipeline: CompiledPipeline;
  /** Guard pipelines, run in order before `pipeline` */
  readonly dependencies: readonly CompiledPipeline[];
}

export interface RouteMatch {
  binding: RouteBinding;
  params: Record<string, string>;
}

interface RouteEntry {
  pattern: RoutePattern;
  /** Position of the first declaration of this route */
  order: number;
  methods: Map<HttpMethod, RouteBinding>;
}

export class RouteTable {
  private entries = new Map<string, RouteEntry>();
  /** Kept sorted: fewer parameters first, then declaration order */
  private ranked: RouteEntry[] = [];
  private frozen = false;

  /**
   * Add a binding under its exposed route and method
   * @throws DuplicateRouteError if the pair is already bound
   */
  add(binding: RouteBinding): void {
    if (this.frozen) {
      throw new InternalError('Route table is frozen', 'ROUTE_TABLE_FROZEN');
    }

    const pattern = parseRoutePattern(binding.route);
    let entry = this.entries.get(pattern.key);
    if (!entry) {
      entry = { pattern, order: this.entries.size, methods: new Map() };
      this.entries.set(pattern.key, entry);
      this.ranked.push(entry);
      this.ranked.sort((a, b) => a.pattern.paramCount - b.pattern.paramCount || a.order - b.order);
    }

    if (entry.methods.has(binding.method)) {
      throw new DuplicateRouteError(binding.route, binding.method);
    }
    entry.methods.set(binding.method, Object.freeze(binding));
  }

  /**
   * Find the binding for a request
   * @throws NoSuchEndpointError when no route matches
   * @throws MethodNotAllowedError when routes match but none accepts the method
   */
  lookup(major: number, minor: number, route: string, method: string): RouteMatch {
    const version: ApiVersion = { major, minor };
    const path = versionedRoute(version, route);
    const segments = splitPath(path);

    const allowed = new Set<HttpMethod>();
    for (const entry of this.ranked) {
      const params = matchRoute(entry.pattern, segments);
      if (!params) continue;

      for (const [candidate, binding] of entry.methods) {
        if (candidate === method) {
          return { binding, params };
        }
        allowed.add(candidate);
      }
    }

    if (allowed.size === 0) {
      throw new NoSuchEndpointError(path);
    }
    throw new MethodNotAllowedError(
      method,
      path,
      HTTP_METHODS.filter((m) => allowed.has(m))
    );
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Number of (route, method) bindings
   */
  get size(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      count += entry.methods.size;
    }
    return count;
  }

  /**
   * Bound routes in lookup order
   */
  routes(): Array<{ route: string; methods: HttpMethod[] }> {
    return this.ranked.map((entry) => ({
      route: entry.pattern.source,
      methods: HTTP_METHODS.filter((m) => entry.methods.has(m)),
    }));
  }
}
