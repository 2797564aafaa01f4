import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import express from 'express';
import type { Express, RequestHandler } from 'express';
import request from 'supertest';
import swaggerUiDist from 'swagger-ui-dist';
import {
  StaticAssetServer,
  getDefaultAssetServer,
  _resetDefaultAssetServerForTests,
} from '../../src/services/explorer/assets.js';
import type { AssetServer } from '../../src/services/explorer/assets.js';

let root: string;

beforeAll(async () => {
  root = await mkdtemp(join(tmpdir(), 'explorer-assets-'));
  await writeFile(join(root, 'app.css'), 'body{}');
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

function appFor(server: AssetServer, ...before: RequestHandler[]): Express {
  const app = express();
  app.use(...before, (req, res, next) => server.serve(req, res, next));
  return app;
}

function staticServer(prefix: string): StaticAssetServer {
  const server = new StaticAssetServer(root);
  server.prefix = prefix;
  return server;
}

describe('StaticAssetServer', () => {
  it('serves a file below the prefix', async () => {
    const res = await request(appFor(staticServer('/static/'))).get('/static/app.css');

    expect(res.status).toBe(200);
    expect(res.text).toBe('body{}');
    expect(res.headers['content-type']).toBe('text/css; charset=UTF-8');
    expect(res.headers['cache-control']).toBe('public, max-age=3600');
  });

  it('ignores the query string when looking the file up', async () => {
    const res = await request(appFor(staticServer('/static/'))).get('/static/app.css?v=42');

    expect(res.status).toBe(200);
    expect(res.text).toBe('body{}');
  });

  it('answers 404 for a missing file', async () => {
    const res = await request(appFor(staticServer('/static/'))).get('/static/missing.js');

    expect(res.status).toBe(404);
    expect(res.text).toBe('Not Found');
  });

  it('answers 404 for a path outside the prefix', async () => {
    const res = await request(appFor(staticServer('/static/'))).get('/elsewhere/app.css');

    expect(res.status).toBe(404);
    expect(res.text).toBe('Not Found');
  });

  it('keeps a Content-Type that is already set', async () => {
    const preset: RequestHandler = (_req, res, next) => {
      res.setHeader('Content-Type', 'text/plain');
      next();
    };

    const res = await request(appFor(staticServer('/static/'), preset)).get('/static/app.css');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain');
  });
});

describe('getDefaultAssetServer', () => {
  afterEach(() => {
    _resetDefaultAssetServerForTests();
  });

  it('is rooted at the installed swagger-ui-dist bundle', () => {
    expect(getDefaultAssetServer().root).toBe(swaggerUiDist.getAbsoluteFSPath());
  });

  it('returns the same instance until reset', () => {
    const first = getDefaultAssetServer();
    expect(getDefaultAssetServer()).toBe(first);

    _resetDefaultAssetServerForTests();
    expect(getDefaultAssetServer()).not.toBe(first);
  });

  it('serves the Swagger UI stylesheet', async () => {
    const server = getDefaultAssetServer();
    server.prefix = '/docs/';

    const res = await request(appFor(server)).get('/docs/swagger-ui.css');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/css; charset=UTF-8');
  });
});
