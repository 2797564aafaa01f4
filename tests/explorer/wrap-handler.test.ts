/**
 * The zero-configuration handler: process-wide registry, swagger-ui-dist
 * assets and the default instance name.
 */

import { describe, it, expect, afterEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { wrapHandler } from '../../src/services/explorer/handler.js';
import { DocumentRegistry, JsonDocumentProvider } from '../../src/services/explorer/registry.js';
import { _resetDefaultAssetServerForTests } from '../../src/services/explorer/assets.js';

afterEach(() => {
  DocumentRegistry._resetForTests();
  _resetDefaultAssetServerForTests();
});

describe('wrapHandler', () => {
  it('serves the default document, the bundled assets and the redirect', async () => {
    DocumentRegistry.getInstance().register('swagger', new JsonDocumentProvider('{"swagger":"2.0"}'));
    const app = express();
    app.use('/swagger', wrapHandler);

    const doc = await request(app).get('/swagger/doc.json');
    expect(doc.status).toBe(200);
    expect(doc.text).toBe('{"swagger":"2.0"}');

    const css = await request(app).get('/swagger/swagger-ui.css');
    expect(css.status).toBe(200);
    expect(css.headers['content-type']).toBe('text/css; charset=utf-8');

    const root = await request(app).get('/swagger/');
    expect(root.status).toBe(301);
    expect(root.headers.location).toBe('/swagger/index.html');
  });
});
