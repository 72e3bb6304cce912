import http from 'node:http';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { Socket } from 'node:net';
import path from 'node:path';
import { ServerStartFailedError } from '../errors.js';
import { noopLogger, type HarnessLogger } from '../browser/types.js';

export interface StaticServerOptions {
  root: string;
  port?: number;
  host?: string;
  logger?: HarnessLogger;
}

export interface StaticServer {
  host: string;
  port: number;
  root: string;
  urlBase: string;
  stop(): Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.map': 'application/json; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.ico': 'image/x-icon',
  '.wasm': 'application/wasm',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Maps a request path onto a file under `root`. Returns null for paths that escape the root
 * or cannot be decoded.
 */
export function resolveRequestPath(root: string, requestUrl: string): string | null {
  let pathname: string;
  try {
    pathname = decodeURIComponent(new URL(requestUrl, 'http://localhost').pathname);
  } catch {
    return null;
  }
  if (pathname.includes('\0')) {
    return null;
  }
  const resolvedRoot = path.resolve(root);
  const candidate = path.resolve(resolvedRoot, `.${pathname}`);
  if (candidate !== resolvedRoot && !candidate.startsWith(`${resolvedRoot}${path.sep}`)) {
    return null;
  }
  return candidate;
}

export async function startStaticServer(options: StaticServerOptions): Promise<StaticServer> {
  const logger = options.logger ?? noopLogger;
  const host = options.host ?? '127.0.0.1';
  const requestedPort = options.port ?? 0;
  const root = path.resolve(options.root);
  const sockets = new Set<Socket>();
  const server = http.createServer((req, res) => {
    handleRequest(root, req, res, logger).catch((error: unknown) => {
      logger(`[serve] ${req.method ?? 'GET'} ${req.url ?? '/'} failed: ${error instanceof Error ? error.message : String(error)}`);
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });
  server.on('connection', (socket) => {
    sockets.add(socket);
    socket.once('close', () => sockets.delete(socket));
  });

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(requestedPort, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    throw new ServerStartFailedError(root, requestedPort, error);
  }

  const address = server.address();
  if (!address || typeof address === 'string') {
    server.close();
    throw new ServerStartFailedError(root, requestedPort, new Error('Unable to determine server address.'));
  }
  const urlBase = `http://${host}:${address.port}`;
  logger(`Serving '${root}' on ${urlBase}`);

  let stopping: Promise<void> | null = null;
  return {
    host,
    port: address.port,
    root,
    urlBase,
    stop() {
      if (!stopping) {
        stopping = new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
          for (const socket of sockets) {
            socket.destroy();
          }
        });
      }
      return stopping;
    },
  };
}

async function handleRequest(
  root: string,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  logger: HarnessLogger,
): Promise<void> {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.writeHead(405, { Allow: 'GET, HEAD' });
    res.end();
    return;
  }
  const resolved = resolveRequestPath(root, req.url ?? '/');
  if (!resolved) {
    res.writeHead(404);
    res.end();
    return;
  }
  const filePath = await findServableFile(resolved);
  if (!filePath) {
    if (logger.verbose) {
      logger(`[serve] 404 ${req.url ?? '/'}`);
    }
    res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end('Not found');
    return;
  }
  const info = await stat(filePath);
  res.writeHead(200, {
    'Content-Type': contentTypeFor(filePath),
    'Content-Length': info.size,
    'Cache-Control': 'no-store',
  });
  if (req.method === 'HEAD') {
    res.end();
    return;
  }
  await new Promise<void>((resolve, reject) => {
    const stream = createReadStream(filePath);
    stream.once('error', reject);
    res.once('finish', resolve);
    res.once('close', resolve);
    stream.pipe(res);
  });
}

async function findServableFile(candidate: string): Promise<string | null> {
  try {
    const info = await stat(candidate);
    if (info.isFile()) {
      return candidate;
    }
    if (info.isDirectory()) {
      const index = path.join(candidate, 'index.html');
      const indexInfo = await stat(index);
      return indexInfo.isFile() ? index : null;
    }
    return null;
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return Boolean(
    error && typeof error === 'object' && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR'),
  );
}
