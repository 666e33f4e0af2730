import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    env: 'development' | 'production' | 'test';
    /** Overrides the document's address when set */
    host?: string;
    /** Overrides the document's port when set */
    port?: number;
  };
  document: {
    path: string;
  };
  dispatch: {
    /** Overrides the document's request_timeout_ms when set */
    requestTimeoutMs?: number;
  };
  logging: {
    level: Env['LOG_LEVEL'];
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      env: env.NODE_ENV,
      host: env.HOST,
      port: env.PORT,
    },
    document: {
      path: env.CONFIG_PATH,
    },
    dispatch: {
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
