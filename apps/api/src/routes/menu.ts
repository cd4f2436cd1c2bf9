import fs from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';

import { fail, logAndSendError } from './httpResponses.js';

export const MENU_ETAG = '"menu-v1"';
const MENU_CACHE_CONTROL = 'public, max-age=300';

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

export type MenuRoutesOptions = {
  menuPath: string;
};

// Clients that stored the bare tag from older responses still revalidate.
function matchesMenuEtag(header: string | undefined): boolean {
  if (!header) return false;
  return header.split(',').some((tag) => {
    const t = tag.trim().replace(/^W\//, '');
    return t === MENU_ETAG || t === MENU_ETAG.slice(1, -1);
  });
}

export async function registerMenuRoutes(app: FastifyInstance, opts: MenuRoutesOptions) {
  app.get('/menu.json', async (req, reply) => {
    reply.header('cache-control', MENU_CACHE_CONTROL).header('etag', MENU_ETAG);
    if (matchesMenuEtag(req.headers['if-none-match'])) {
      return reply.status(304).send();
    }

    let menu: string;
    try {
      menu = await fs.readFile(opts.menuPath, 'utf8');
    } catch (e) {
      if (isMissingFile(e)) return reply.status(404).send(fail('Menu not found'));
      return logAndSendError(req, reply, 500, 'Menu unavailable', e);
    }

    return reply.status(200).type('application/json; charset=utf-8').send(menu);
  });
}
