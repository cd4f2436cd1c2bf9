import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import fastify from 'fastify';
import { describe, expect, it } from 'vitest';
import { MENU_ETAG, registerMenuRoutes } from './menu.js';

const menuPath = fileURLToPath(new URL('../../menu.json', import.meta.url));

async function makeApp(opts: { menuPath?: string } = {}) {
  const app = fastify({ logger: false });
  await registerMenuRoutes(app, { menuPath: opts.menuPath ?? menuPath });
  return app;
}

describe('GET /menu.json', () => {
  it('serves the menu file with cache headers', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/menu.json' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(res.headers['cache-control']).toBe('public, max-age=300');
    expect(res.headers.etag).toBe('"menu-v1"');
    expect(res.json()).toEqual(JSON.parse(fs.readFileSync(menuPath, 'utf8')));
    await app.close();
  });

  it('answers 304 when the client already has this version', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/menu.json', headers: { 'if-none-match': MENU_ETAG } });

    expect(res.statusCode).toBe(304);
    expect(res.body).toBe('');
    await app.close();
  });

  it('answers 404 when the menu file is missing', async () => {
    const app = await makeApp({ menuPath: fileURLToPath(new URL('../../no-such-menu.json', import.meta.url)) });
    const res = await app.inject({ method: 'GET', url: '/menu.json' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'Menu not found' });
    await app.close();
  });

  it.each(['menu-v1', 'W/"menu-v1"', '"menu-v0", "menu-v1"'])('treats If-None-Match %s as a match', async (tag) => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/menu.json', headers: { 'if-none-match': tag } });

    expect(res.statusCode).toBe(304);
    await app.close();
  });

  it('serves the body again for a stale tag', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/menu.json', headers: { 'if-none-match': '"menu-v0"' } });

    expect(res.statusCode).toBe(200);
    await app.close();
  });
});
