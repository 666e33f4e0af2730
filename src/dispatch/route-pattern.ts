/**
 * Route patterns
 *
 * A route is a `/`-separated list of segments. A segment written `:name` or
 * `{name}` captures one path segment; anything else must match literally.
 */

export type RouteSegment =
  | { readonly kind: 'static'; readonly value: string }
  | { readonly kind: 'param'; readonly name: string };

export interface RoutePattern {
  /** Route as written, slashes trimmed */
  readonly source: string;
  readonly segments: readonly RouteSegment[];
  readonly paramCount: number;
  /** Parameter names erased; equal keys are the same route */
  readonly key: string;
}

const COLON_PARAM = /^:([A-Za-z_][\w-]*)$/;
const BRACE_PARAM = /^\{([A-Za-z_][\w-]*)\}$/;

/**
 * Split a path into non-empty segments
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

function parseSegment(segment: string): RouteSegment {
  const match = COLON_PARAM.exec(segment) ?? BRACE_PARAM.exec(segment);
  return match ? { kind: 'param', name: match[1] } : { kind: 'static', value: segment };
}

export function parseRoutePattern(route: string): RoutePattern {
  const segments = splitPath(route).map(parseSegment);
  return {
    source: segments.map((s) => (s.kind === 'static' ? s.value : `:${s.name}`)).join('/'),
    segments,
    paramCount: segments.filter((s) => s.kind === 'param').length,
    key: segments.map((s) => (s.kind === 'static' ? s.value : ':')).join('/'),
  };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes are passed through as written
    return segment;
  }
}

/**
 * Match path segments against a pattern
 * @returns captured parameters, or null when the path does not match
 */
export function matchRoute(
  pattern: RoutePattern,
  pathSegments: readonly string[]
): Record<string, string> | null {
  if (pattern.segments.length !== pathSegments.length) {
    return null;
  }

  const params: Record<string, string> = {};
  for (let i = 0; i < pattern.segments.length; i++) {
    const segment = pattern.segments[i];
    const actual = pathSegments[i];
    if (segment.kind === 'static') {
      if (segment.value !== actual) return null;
    } else {
      params[segment.name] = decodeSegment(actual);
    }
  }
  return params;
}
