#!/usr/bin/env node
import 'dotenv/config';

import { readFile } from 'fs/promises';
import path from 'path';
import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { loadDocument } from './config/loader.js';
import { getLogger, setLogLevel } from './utils/logger.js';
import { USAGE, parseArgs } from './cli/args.js';
import { buildEngine } from './engine.js';
import { buildApp, type AppOptions } from './app.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  const { document, path: documentPath, baseDir } = await loadDocument(args.configPath ?? config.document.path);
  setLogLevel(document.log.level);

  logger.info({ env: config.server.env, config: documentPath }, 'Starting pipegate');

  const engine = await buildEngine(document, {
    baseDir,
    requestTimeoutMs: config.dispatch.requestTimeoutMs,
  });

  const appOptions: AppOptions = {};
  if (document.ssl.enabled && document.ssl.key && document.ssl.cert) {
    appOptions.tls = {
      key: await readFile(path.resolve(baseDir, document.ssl.key)),
      cert: await readFile(path.resolve(baseDir, document.ssl.cert)),
    };
  }

  const app = await buildApp(engine, appOptions);

  const host = config.server.host ?? document.address;
  const port = config.server.port ?? document.port;

  try {
    await app.listen({ port, host });

    logger.info(
      { port, host, tls: appOptions.tls !== undefined, routes: engine.routes.routes() },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
