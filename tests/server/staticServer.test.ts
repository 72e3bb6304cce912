import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, afterEach, beforeAll, describe, expect, test } from 'vitest';
import { ServerStartFailedError } from '../../src/errors.js';
import {
  contentTypeFor,
  resolveRequestPath,
  startStaticServer,
  type StaticServer,
} from '../../src/server/staticServer.js';

describe('resolveRequestPath', () => {
  test('maps request paths under the root', () => {
    expect(resolveRequestPath('/srv/www', '/sub/app.js?v=1')).toBe(path.resolve('/srv/www/sub/app.js'));
    expect(resolveRequestPath('/srv/www', '/')).toBe(path.resolve('/srv/www'));
  });

  test('rejects encoded escapes from the root', () => {
    expect(resolveRequestPath('/srv/www', '/..%2f..%2fetc%2fpasswd')).toBeNull();
  });

  test('rejects NUL bytes and malformed escapes', () => {
    expect(resolveRequestPath('/srv/www', '/a%00b')).toBeNull();
    expect(resolveRequestPath('/srv/www', '/%E0%A4%A')).toBeNull();
  });
});

describe('contentTypeFor', () => {
  test('knows common web assets regardless of case', () => {
    expect(contentTypeFor('index.HTML')).toBe('text/html; charset=utf-8');
    expect(contentTypeFor('module.wasm')).toBe('application/wasm');
    expect(contentTypeFor('blob.bin')).toBe('application/octet-stream');
  });
});

describe('startStaticServer', () => {
  let root: string;
  let server: StaticServer | null = null;

  beforeAll(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'webharness-serve-'));
    await writeFile(path.join(root, 'index.html'), '<script src="app.js"></script>', 'utf8');
    await writeFile(path.join(root, 'app.js'), 'console.log("tests finished - passed");', 'utf8');
    await mkdir(path.join(root, 'nested'));
    await writeFile(path.join(root, 'nested', 'index.html'), '<p>nested</p>', 'utf8');
  });

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('serves files with their content type and no caching', async () => {
    server = await startStaticServer({ root });
    expect(server.urlBase).toBe(`http://127.0.0.1:${server.port}`);

    const response = await fetch(`${server.urlBase}/app.js`);
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/javascript; charset=utf-8');
    expect(response.headers.get('cache-control')).toBe('no-store');
    expect(await response.text()).toBe('console.log("tests finished - passed");');
  });

  test('serves index.html for directories', async () => {
    server = await startStaticServer({ root });
    const top = await fetch(`${server.urlBase}/`);
    expect(await top.text()).toBe('<script src="app.js"></script>');
    const nested = await fetch(`${server.urlBase}/nested/`);
    expect(await nested.text()).toBe('<p>nested</p>');
  });

  test('answers 404 for missing files', async () => {
    server = await startStaticServer({ root });
    const response = await fetch(`${server.urlBase}/missing.js`);
    expect(response.status).toBe(404);
    expect(await response.text()).toBe('Not found');
  });

  test('answers HEAD without a body and refuses other methods', async () => {
    server = await startStaticServer({ root });
    const head = await fetch(`${server.urlBase}/index.html`, { method: 'HEAD' });
    expect(head.status).toBe(200);
    expect(head.headers.get('content-length')).toBe('30');
    const post = await fetch(`${server.urlBase}/index.html`, { method: 'POST', body: 'x' });
    expect(post.status).toBe(405);
    expect(post.headers.get('allow')).toBe('GET, HEAD');
  });

  test('logs where it serves from', async () => {
    const messages: string[] = [];
    server = await startStaticServer({ root, logger: (message) => messages.push(message) });
    expect(messages).toEqual([`Serving '${path.resolve(root)}' on ${server.urlBase}`]);
  });

  test('stop is idempotent and closes the port', async () => {
    const running = await startStaticServer({ root });
    await Promise.all([running.stop(), running.stop()]);
    await expect(fetch(`${running.urlBase}/index.html`)).rejects.toThrow();
  });

  test('fails with ServerStartFailedError when the port is taken', async () => {
    server = await startStaticServer({ root });
    await expect(startStaticServer({ root, port: server.port })).rejects.toBeInstanceOf(ServerStartFailedError);
  });
});
