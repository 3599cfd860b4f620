/**
 * Static file serving for the built web client.
 *
 * Paths resolve inside the client build directory only; anything that is
 * not an existing file falls back to index.html so client-side routes work.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { readFileSync, existsSync, statSync } from 'fs';
import { join, extname, resolve, sep } from 'path';

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.js': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};

export function contentTypeFor(filePath: string): string {
  return MIME_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export type ResolvedPath =
  | { ok: true; filePath: string }
  | { ok: false; status: 403 | 404; message: string };

/**
 * Map a request URL path to a file under `rootDir`.
 */
export function resolveRequestPath(rootDir: string, urlPath: string): ResolvedPath {
  const root = resolve(rootDir);
  let filePath = resolve(root, '.' + decodeURIComponent(urlPath));

  // Prevent path traversal: the resolved path must stay within root
  if (filePath !== root && !filePath.startsWith(root + sep)) {
    return { ok: false, status: 403, message: 'Forbidden' };
  }

  // SPA fallback
  if (!existsSync(filePath) || statSync(filePath).isDirectory()) {
    filePath = join(root, 'index.html');
  }

  if (!existsSync(filePath)) {
    return { ok: false, status: 404, message: 'Not Found - run `npm run build` first' };
  }

  return { ok: true, filePath };
}

/**
 * Build a request handler serving files from `rootDir`.
 */
export function createStaticHandler(rootDir: string) {
  return (req: IncomingMessage, res: ServerResponse): void => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    let resolved: ResolvedPath;
    try {
      resolved = resolveRequestPath(rootDir, url.pathname);
    } catch {
      // Malformed percent-encoding
      resolved = { ok: false, status: 403, message: 'Forbidden' };
    }

    if (!resolved.ok) {
      res.writeHead(resolved.status, { 'Content-Type': 'text/plain' });
      res.end(resolved.message);
      return;
    }

    try {
      const content = readFileSync(resolved.filePath);
      res.writeHead(200, { 'Content-Type': contentTypeFor(resolved.filePath) });
      res.end(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to read ${resolved.filePath}: ${message}`);
      res.writeHead(500, { 'Content-Type': 'text/plain' });
      res.end('Internal Server Error');
    }
  };
}
