import { pino, type Logger, type LevelWithSilent } from 'pino';
import { getConfig } from '../config/index.js';

let logger: Logger | null = null;
const moduleLoggers = new Set<Logger>();

/**
 * Create or get the application logger
 */
export function getLogger(): Logger {
  if (logger) {
    return logger;
  }

  const config = getConfig();
  const isDev = config.server.env === 'development';

  logger = pino({
    level: config.logging.level,
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: 'pipegate',
      env: config.server.env,
    },
  });

  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  const child = getLogger().child(context);
  moduleLoggers.add(child);
  return child;
}

/**
 * Change the level of the root logger and of every logger made by createChildLogger.
 * pino children copy their parent's level at creation, so each one is updated.
 */
export function setLogLevel(level: LevelWithSilent): void {
  getLogger().level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}
