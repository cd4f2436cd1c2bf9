import fastify from 'fastify';
import type { FastifyError, FastifyServerOptions } from 'fastify';

import type { Clock } from './admission/pipeline.js';
import { createAdmissionPipeline, systemClock } from './admission/pipeline.js';
import { FixedWindowRateGate } from './admission/rateGate.js';
import type { AppConfig } from './config.js';
import { loadConfig } from './config.js';
import { createSqlClient, getPool } from './db.js';
import { MemoryOrderStore } from './orders/memoryOrderStore.js';
import type { OrderStore } from './orders/orderStore.js';
import { PgOrderStore } from './orders/pgOrderStore.js';
import { fail, ok } from './routes/httpResponses.js';
import { registerMenuRoutes } from './routes/menu.js';
import { registerOrderRoutes } from './routes/orders.js';
import { makeThrottleHook } from './routes/throttle.js';

export type BuildAppOptions = {
  logger?: FastifyServerOptions['logger'];
  config?: AppConfig;
  store?: OrderStore;
  clock?: Clock;
  gate?: FixedWindowRateGate;
};

const SECURITY_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'x-xss-protection': '1; mode=block',
  'referrer-policy': 'strict-origin-when-cross-origin',
});

async function createOrderStore(config: AppConfig, clock: Clock): Promise<{ store: OrderStore; close: () => Promise<void> }> {
  if (!config.databaseUrl) {
    return { store: new MemoryOrderStore(() => new Date(clock())), close: async () => undefined };
  }

  const pool = getPool(config.databaseUrl);
  const store = new PgOrderStore(createSqlClient(pool));
  await store.ensureSchema();
  return { store, close: () => pool.end() };
}

export async function buildApp(opts: BuildAppOptions = {}) {
  const config = opts.config ?? loadConfig();
  const clock = opts.clock ?? systemClock;

  const app = fastify({
    logger: opts.logger ?? {
      level: config.logLevel,
      redact: ['req.headers.authorization', 'req.query.init_data', 'req.body.init_data'],
    },
    trustProxy: config.trustProxy,
    bodyLimit: 64 * 1024,
  });

  let store = opts.store;
  if (!store) {
    const created = await createOrderStore(config, clock);
    store = created.store;
    app.addHook('onClose', created.close);
  }

  const pipeline = createAdmissionPipeline({
    botToken: config.botToken,
    clock,
    gate: opts.gate ?? new FixedWindowRateGate(),
  });

  app.addHook('onRequest', makeThrottleHook(pipeline));

  app.addHook('onSend', async (_req, reply, payload) => {
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) reply.header(name, value);
    return payload;
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    // Fastify's own client errors (bad JSON, oversized body) keep their status.
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send(fail(err.message));
    }
    req.log.error({ err }, 'unhandled error');
    return reply.status(500).send(fail('Internal server error. Please try again later.'));
  });

  const orderStore = store;
  app.get('/health', async (req, reply) => {
    try {
      const ordersCount = await orderStore.countOrders();
      return ok({
        status: 'healthy',
        database: 'connected',
        ordersCount,
        timestamp: new Date(clock()).toISOString(),
      });
    } catch (e) {
      req.log.error({ err: e }, 'health check failed');
      return reply.status(503).send(fail('Service unhealthy'));
    }
  });

  await registerMenuRoutes(app, { menuPath: config.menuPath });
  await registerOrderRoutes(app, { pipeline, store: orderStore });

  return app;
}
