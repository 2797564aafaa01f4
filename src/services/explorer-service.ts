/**
 * Explorer service entry point: loads the environment configuration,
 * starts the Express app and handles shutdown.
 *
 *   EXPLORER_DOC_FILE=./openapi.json EXPLORER_PORT=8080 node dist/services/explorer-service.js
 */

import { logger } from '../utils/logger.js';
import { createExplorerApp } from './explorer-app.js';
import { loadServiceConfig } from './service-config.js';
import type { ServiceConfig } from './service-config.js';

// ── Configuration ──

function loadConfigOrExit(): ServiceConfig {
  try {
    return loadServiceConfig();
  } catch (err) {
    logger.error('CONFIG', 'Explorer service not started', {}, err);
    return process.exit(1);
  }
}

const config = loadConfigOrExit();

// ── Server startup ──

const app = createExplorerApp(config);

const server = app.listen(config.port, config.host, () => {
  logger.info('SERVICE', `Explorer available at http://${config.host}:${config.port}${config.mountPath}/`);
});

// ── Graceful shutdown ──

function shutdown(signal: string): void {
  logger.info('SERVICE', `Received ${signal}, shutting down...`);

  // Force timeout: if server.close() doesn't complete in 5s, force exit
  const forceTimeout = setTimeout(() => {
    logger.warn('SERVICE', 'Forced shutdown after 5s timeout');
    process.exit(1);
  }, 5000);

  server.close(() => {
    clearTimeout(forceTimeout);
    logger.info('SERVICE', 'Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('SERVICE', 'Uncaught exception', {}, error);
  shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('SERVICE', 'Unhandled promise rejection', {}, reason);
});
