/**
 * Explorer request handler — Express middleware serving Swagger UI under
 * whatever path the application mounts it at.
 *
 *   GET <prefix>index.html  → entry page rendered from the configuration
 *   GET <prefix>doc.json    → description document from the document source
 *   GET <prefix>            → 301 to <prefix>index.html
 *   GET <mount> (no slash)  → 301 to <mount>/
 *   GET <prefix><other>     → static asset server
 *   anything but GET        → 405
 *
 *   app.use('/api/docs', createExplorerHandler(docExpansion('none')));
 */

import { STATUS_CODES } from 'http';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { logger } from '../../utils/logger.js';
import { getDefaultAssetServer } from './assets.js';
import type { AssetServer } from './assets.js';
import { newConfig } from './config.js';
import type { ExplorerConfig, ExplorerOption } from './config.js';
import { contentTypeFor } from './content-type.js';
import { resolvePath, splitUrl } from './path.js';
import { PrefixLatch } from './prefix-latch.js';
import { DocumentRegistry } from './registry.js';
import type { DocumentSource } from './registry.js';
import { LiquidTemplateRenderer } from './template.js';
import type { TemplateRenderer } from './template.js';

export const INDEX_PATH = 'index.html';
export const DOCUMENT_PATH = 'doc.json';

function sendStatus(res: Response, status: number, message = STATUS_CODES[status] ?? String(status)): void {
  res.status(status)
    .type('text/plain')
    .set('X-Content-Type-Options', 'nosniff')
    .send(message);
}

/**
 * Drops the Content-Type hint set for the requested file before an error
 * reaches the application's error handler.
 */
function forwardErrors(res: Response, next: NextFunction): NextFunction {
  return (err?: unknown) => {
    if (err !== undefined && err !== 'route' && err !== 'router' && !res.headersSent) {
      res.removeHeader('Content-Type');
    }
    next(err);
  };
}

class ExplorerDispatcher {
  private readonly latch = new PrefixLatch();
  private readonly assets: AssetServer;
  private readonly documents: DocumentSource;
  private readonly renderer: TemplateRenderer;

  constructor(private readonly config: ExplorerConfig) {
    this.assets = config.assetServer ?? getDefaultAssetServer();
    this.documents = config.documentSource ?? DocumentRegistry.getInstance();
    this.renderer = config.renderer ?? new LiquidTemplateRenderer();
  }

  async dispatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (req.method !== 'GET') {
      sendStatus(res, 405, 'Method not allowed');
      return;
    }

    // Express hands "/api/docs" to a handler mounted there; resolving it
    // would latch "/api/" for good.
    const { pathname, search } = splitUrl(req.originalUrl);
    if (req.path === '/' && !pathname.endsWith('/')) {
      res.redirect(301, req.baseUrl + '/' + search);
      return;
    }

    const { prefix, path } = resolvePath(req.originalUrl);

    const mountPrefix = this.latch.bind(prefix, (bound) => {
      this.assets.prefix = bound;
      logger.debug('EXPLORER', `Mount prefix latched: ${bound}`);
    });

    const contentType = contentTypeFor(path);
    if (contentType) {
      res.setHeader('Content-Type', contentType);
    }

    switch (path) {
      case INDEX_PATH:
        await this.serveIndex(res);
        return;
      case DOCUMENT_PATH:
        await this.serveDocument(res);
        return;
      case '':
        res.redirect(301, mountPrefix + INDEX_PATH);
        return;
      default:
        this.assets.serve(req, res, next);
    }
  }

  private async serveIndex(res: Response): Promise<void> {
    let html: string;
    try {
      html = await this.renderer.render(this.config);
    } catch (err) {
      logger.error('EXPLORER', 'Entry page rendering failed', {}, err);
      sendStatus(res, 500);
      return;
    }
    res.status(200).send(html);
  }

  private async serveDocument(res: Response): Promise<void> {
    let doc: string;
    try {
      doc = await this.documents.readDoc(this.config.instanceName);
    } catch (err) {
      logger.warn('EXPLORER', 'Description document unavailable', { instance: this.config.instanceName }, err);
      sendStatus(res, 500);
      return;
    }
    res.status(200).send(doc);
  }
}

export function createExplorerHandler(...options: ExplorerOption[]): RequestHandler {
  const dispatcher = new ExplorerDispatcher(newConfig(...options));

  return (req, res, next) => {
    const forward = forwardErrors(res, next);
    dispatcher.dispatch(req, res, forward).catch(forward);
  };
}

let wrapped: RequestHandler | null = null;

/**
 * Handler with every setting at its default, created on first use:
 *
 *   app.use('/swagger', wrapHandler);
 */
export const wrapHandler: RequestHandler = (req, res, next) => {
  if (!wrapped) {
    wrapped = createExplorerHandler();
  }
  wrapped(req, res, next);
};
