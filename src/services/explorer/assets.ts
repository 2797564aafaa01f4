/**
 * Static asset server for the Swagger UI bundle (scripts, styles, images).
 *
 * The explorer handler writes the mount prefix into `prefix` once, on the
 * first request it sees; the server strips it from the URL before looking
 * the file up under its root.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import swaggerUiDist from 'swagger-ui-dist';
import { logger } from '../../utils/logger.js';
import { splitUrl } from './path.js';

export interface AssetServer {
  /** URL prefix the assets are mounted under, e.g. `/api/docs/`. */
  prefix: string;
  serve(req: Request, res: Response, next: NextFunction): void;
}

function sendNotFound(res: Response): void {
  res.status(404).type('text/plain').send('Not Found');
}

export class StaticAssetServer implements AssetServer {
  prefix = '';
  private readonly serveStatic: ReturnType<typeof express.static>;

  constructor(readonly root: string) {
    this.serveStatic = express.static(root, {
      index: false,
      maxAge: '1h',
    });
  }

  serve(req: Request, res: Response, next: NextFunction): void {
    const { pathname, search } = splitUrl(req.originalUrl);
    if (!pathname.startsWith(this.prefix)) {
      sendNotFound(res);
      return;
    }

    const mountedUrl = req.url;
    req.url = '/' + pathname.slice(this.prefix.length) + search;

    this.serveStatic(req, res, (err?: unknown) => {
      req.url = mountedUrl;
      if (err) {
        next(err);
        return;
      }
      sendNotFound(res);
    });
  }
}

// ── Process-wide default ─────────────────────────────────────────────────────

let defaultServer: StaticAssetServer | null = null;

/**
 * The server used when no `assetServer()` option is given, rooted at the
 * installed `swagger-ui-dist` package. Shared by every handler in the
 * process, prefix included.
 */
export function getDefaultAssetServer(): StaticAssetServer {
  if (!defaultServer) {
    defaultServer = new StaticAssetServer(swaggerUiDist.getAbsoluteFSPath());
    logger.debug('ASSETS', 'Default asset server created', { root: defaultServer.root });
  }
  return defaultServer;
}

/** @internal */
export function _resetDefaultAssetServerForTests(): void {
  defaultServer = null;
}
