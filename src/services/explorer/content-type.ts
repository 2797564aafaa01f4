import { extname } from 'path';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'application/javascript',
  '.png': 'image/png',
  '.json': 'application/json; charset=utf-8',
};

/**
 * Content-Type for a requested file, by extension (case-sensitive).
 * Undefined leaves the header to whoever writes the body.
 */
export function contentTypeFor(path: string): string | undefined {
  const ext = extname(path);
  return Object.hasOwn(CONTENT_TYPES, ext) ? CONTENT_TYPES[ext] : undefined;
}
