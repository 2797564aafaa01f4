/**
 * Test suite for resolvePath: prefix / final segment extraction from raw URIs.
 */

import { describe, it, expect } from 'vitest';
import { resolvePath } from '../../src/services/explorer/path.js';

describe('resolvePath', () => {
  it('splits a file request into prefix and file name', () => {
    expect(resolvePath('/api/docs/index.html')).toEqual({ prefix: '/api/docs/', path: 'index.html' });
  });

  it('returns an empty path when the URI is exactly the prefix', () => {
    expect(resolvePath('/api/docs/')).toEqual({ prefix: '/api/docs/', path: '' });
  });

  it('treats the root URI as an empty path under "/"', () => {
    expect(resolvePath('/')).toEqual({ prefix: '/', path: '' });
  });

  describe('query strings and fragments', () => {
    it('drops the query string', () => {
      expect(resolvePath('/api/docs/index.html?foo=bar')).toEqual({ prefix: '/api/docs/', path: 'index.html' });
    });

    it('drops a query string that follows the bare prefix', () => {
      expect(resolvePath('/api/docs/?x=1')).toEqual({ prefix: '/api/docs/', path: '' });
    });

    it('starts the query at the first "?" when there are several', () => {
      expect(resolvePath('/api/docs/doc.json??a?b')).toEqual({ prefix: '/api/docs/', path: 'doc.json' });
    });

    it('ignores slashes inside the query string', () => {
      expect(resolvePath('/api/docs/index.html?next=/a/b')).toEqual({ prefix: '/api/docs/', path: 'index.html' });
    });

    it('drops a fragment', () => {
      expect(resolvePath('/api/docs/index.html#/pets')).toEqual({ prefix: '/api/docs/', path: 'index.html' });
    });

    it('returns empty components for a bare query', () => {
      expect(resolvePath('?x=1')).toEqual({ prefix: '', path: '' });
    });
  });

  describe('edge cases', () => {
    it('returns an empty prefix when the URI has no slash', () => {
      expect(resolvePath('index.html')).toEqual({ prefix: '', path: 'index.html' });
    });

    it('returns empty components for an empty URI', () => {
      expect(resolvePath('')).toEqual({ prefix: '', path: '' });
    });

    it('does not percent-decode the file name', () => {
      expect(resolvePath('/api/docs/%69ndex.html').path).toBe('%69ndex.html');
    });

    it('keeps dot segments in the prefix verbatim', () => {
      expect(resolvePath('/api/docs/v1/../doc.json')).toEqual({ prefix: '/api/docs/v1/../', path: 'doc.json' });
    });

    it('keeps nested asset directories in the prefix', () => {
      expect(resolvePath('/api/docs/lib/marked.js')).toEqual({ prefix: '/api/docs/lib/', path: 'marked.js' });
    });
  });
});
