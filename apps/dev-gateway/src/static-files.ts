/**
 * Static front-end files served under /static/*
 */

import * as fs from 'node:fs/promises';
import type * as http from 'node:http';
import * as path from 'node:path';

export const STATIC_PREFIX = '/static/';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

/**
 * Resolve a request path to a file inside staticDir.
 * Returns null for malformed escapes and paths that leave the directory.
 */
export function resolveStaticPath(staticDir: string, pathname: string): string | null {
  if (!pathname.startsWith(STATIC_PREFIX)) return null;

  let relative: string;
  try {
    relative = decodeURIComponent(pathname.slice(STATIC_PREFIX.length));
  } catch {
    return null;
  }

  const root = path.resolve(staticDir);
  const filePath = path.resolve(root, relative);
  if (filePath !== root && !filePath.startsWith(root + path.sep)) {
    return null;
  }
  return filePath;
}

/**
 * Write a static file (or a 404) to the response
 * @returns status code sent
 */
export async function serveStatic(
  res: http.ServerResponse,
  staticDir: string,
  pathname: string,
  method: string
): Promise<number> {
  const filePath = resolveStaticPath(staticDir, pathname);

  let content: Buffer | null = null;
  if (filePath) {
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile()) {
        content = await fs.readFile(filePath);
      }
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        throw err;
      }
    }
  }

  if (!filePath || !content) {
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ detail: 'Not Found' }));
    return 404;
  }

  const contentType = CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
  res.writeHead(200, { 'Content-Type': contentType, 'Content-Length': content.length });
  res.end(method === 'HEAD' ? undefined : content);
  return 200;
}
