/**
 * swagger-explorer-express — Swagger UI explorer handler for Express applications
 *
 * @packageDocumentation
 */

// Export explorer handler, options and collaborators
export * from './services/explorer/index.js';

// Export demo application factory
export { createExplorerApp } from './services/explorer-app.js';
export type { ExplorerAppDeps } from './services/explorer-app.js';
export { loadServiceConfig } from './services/service-config.js';
export type { ServiceConfig } from './services/service-config.js';

// Export utilities
export { logger, LogLevel } from './utils/logger.js';
export type { Component, LogContext, LogSink } from './utils/logger.js';

// Version
export { VERSION } from './version.js';
