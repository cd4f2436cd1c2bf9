import type { FastifyRequest } from 'fastify';

const TMA_SCHEME_RE = /^tma\s+(.+)$/i;

/**
 * Mini App clients send initData as `Authorization: tma <initData>`; older
 * clients put it in the body or query as `init_data`. The header wins.
 */
export function readInitData(req: FastifyRequest, fallback: unknown): string {
  const header = req.headers.authorization;
  if (typeof header === 'string') {
    const match = header.trim().match(TMA_SCHEME_RE);
    const fromHeader = match?.[1]?.trim();
    if (fromHeader) return fromHeader;
  }
  return typeof fallback === 'string' ? fallback.trim() : '';
}

export function initDataField(source: unknown): unknown {
  if (!source || typeof source !== 'object' || !('init_data' in source)) return undefined;
  return source.init_data;
}
