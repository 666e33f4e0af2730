/**
 * Version helpers
 *
 * Endpoint and node versions are written as `major.minor`. YAML turns an
 * unquoted `1.0` into the number 1, so numbers are accepted as well.
 */

export interface ApiVersion {
  readonly major: number;
  readonly minor: number;
}

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a `major.minor` version from a string or number.
 * Returns null when the value is not a non-negative version.
 */
export function parseVersion(value: string | number): ApiVersion | null {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = VERSION_PATTERN.exec(text);
  if (!match) return null;

  return {
    major: Number(match[1]),
    minor: match[2] === undefined ? 0 : Number(match[2]),
  };
}

/**
 * Canonical `major.minor` form
 */
export function formatVersion(version: ApiVersion): string {
  return `${version.major}.${version.minor}`;
}

/**
 * Externally visible route for a versioned endpoint: `v<major>/<minor>/<route>`
 */
export function versionedRoute(version: ApiVersion, route: string): string {
  const trimmed = route.replace(/^\/+/, '').replace(/\/+$/, '');
  return `v${version.major}/${version.minor}/${trimmed}`;
}
