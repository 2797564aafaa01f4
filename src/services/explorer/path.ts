/**
 * Splits a raw request URI into the mount prefix and the requested file.
 *
 *   /api/docs/index.html?x=1  → { prefix: '/api/docs/', path: 'index.html' }
 *   /api/docs/                → { prefix: '/api/docs/', path: '' }
 *
 * The query starts at the first `?` and the fragment at the first `#`,
 * whichever comes first; neither takes part in matching. Nothing is
 * percent-decoded.
 */

export interface ResolvedPath {
  /** Everything up to and including the last `/`. */
  prefix: string;
  /** Final segment; empty when the URI ends in `/`. */
  path: string;
}

const PATH_PATTERN = /^([^?#]*\/)?([^/?#]*)/;

export function resolvePath(uri: string): ResolvedPath {
  const match = PATH_PATTERN.exec(uri);
  return {
    prefix: match?.[1] ?? '',
    path: match?.[2] ?? '',
  };
}

export interface SplitUrl {
  pathname: string;
  /** The query including its `?`, or empty; a fragment is dropped. */
  search: string;
}

export function splitUrl(url: string): SplitUrl {
  const index = url.search(/[?#]/);
  if (index === -1) return { pathname: url, search: '' };
  const rest = url.slice(index);
  return {
    pathname: url.slice(0, index),
    search: rest.startsWith('?') ? rest.split('#')[0] : '',
  };
}
