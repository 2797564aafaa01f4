/**
 * Explorer application: an Express app hosting the Swagger UI explorer.
 *
 * Mounted routes:
 *   GET /health           — liveness probe
 *   GET <mount>           — 301 to <mount>/ (by the explorer handler)
 *   ALL <mount>/*         — explorer handler (entry page, doc.json, UI bundle)
 *
 * Kept free of listen()/signals so tests can drive it in process.
 */

import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { AssetServer } from './explorer/assets.js';
import {
  assetServer,
  deepLinking,
  docExpansion,
  documentSource,
  instanceName,
  persistAuthorization,
} from './explorer/config.js';
import type { ExplorerOption } from './explorer/config.js';
import { createExplorerHandler } from './explorer/handler.js';
import {
  DEFAULT_INSTANCE_NAME,
  DocumentRegistry,
  FileDocumentProvider,
  JsonDocumentProvider,
} from './explorer/registry.js';
import { buildServiceSpec } from './openapi/spec.js';
import type { ServiceConfig } from './service-config.js';

export interface ExplorerAppDeps {
  /** Defaults to the process-wide registry. */
  registry?: DocumentRegistry;
  /** Defaults to the process-wide swagger-ui-dist server. */
  assetServer?: AssetServer;
}

function registerDocument(registry: DocumentRegistry, name: string, config: ServiceConfig): void {
  if (registry.has(name)) {
    logger.info('SERVICE', `Using already registered description document: ${name}`);
    return;
  }

  if (config.docFile) {
    registry.register(name, new FileDocumentProvider(config.docFile));
    logger.info('SERVICE', `Serving description document from ${config.docFile}`);
  } else {
    registry.register(name, new JsonDocumentProvider(buildServiceSpec(config.mountPath)));
    logger.info('SERVICE', 'No EXPLORER_DOC_FILE set, serving the service description');
  }
}

const handleError: ErrorRequestHandler = (err, req, res, next) => {
  logger.error('SERVICE', `Unhandled error on ${req.method} ${req.originalUrl}`, {}, err);
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(500).type('application/json').json({ error: 'Internal server error' });
};

export function createExplorerApp(config: ServiceConfig, deps: ExplorerAppDeps = {}): Express {
  const registry = deps.registry ?? DocumentRegistry.getInstance();
  const name = config.instanceName || DEFAULT_INSTANCE_NAME;
  registerDocument(registry, name, config);

  const app = express();

  // Security: the entry page bootstraps Swagger UI with an inline script
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        connectSrc: ["'self'"],
        frameSrc: ["'none'"]
      }
    }
  }));

  // CORS restricted to localhost
  app.use(cors({
    origin: [
      `http://localhost:${config.port}`,
      `http://127.0.0.1:${config.port}`,
      `http://${config.host}:${config.port}`
    ],
    maxAge: 86400
  }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      version: VERSION
    });
  });

  const options: ExplorerOption[] = [
    instanceName(name),
    docExpansion(config.docExpansion),
    deepLinking(config.deepLinking),
    persistAuthorization(config.persistAuthorization),
    documentSource(registry),
  ];
  if (deps.assetServer) {
    options.push(assetServer(deps.assetServer));
  }

  app.use(
    config.mountPath,
    rateLimit({
      windowMs: 60_000,
      max: config.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, retry later' }
    }),
    createExplorerHandler(...options)
  );

  app.use(handleError);

  return app;
}
