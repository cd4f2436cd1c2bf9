import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import type { AuthenticatedIdentity } from '../admission/initData.js';
import type { AdmissionPipeline } from '../admission/pipeline.js';
import type { OrderRecord, OrderStore } from '../orders/orderStore.js';
import { serializeOrder } from '../orders/orderStore.js';
import { fail, logAndSendError, ok, sendAdmissionError } from './httpResponses.js';
import { initDataField, readInitData } from './initDataSource.js';

export const ESTIMATED_READY = '15-20 min';

const historyQuerySchema = z.object({
  init_data: z.string().optional(),
  user_id: z.string().trim().min(1).max(32).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const orderParamsSchema = z.object({
  orderId: z.coerce.number().int().positive(),
});

const orderQuerySchema = z.object({
  init_data: z.string().optional(),
});

export type OrderRoutesOptions = {
  pipeline: AdmissionPipeline;
  store: OrderStore;
};

export async function registerOrderRoutes(app: FastifyInstance, opts: OrderRoutesOptions) {
  const { pipeline, store } = opts;

  function authenticate(req: FastifyRequest, reply: FastifyReply, fallback: unknown): AuthenticatedIdentity | null {
    const result = pipeline.authenticate(readInitData(req, fallback));
    if (result.kind === 'rejected') {
      sendAdmissionError(req, reply, result.error);
      return null;
    }
    return result.identity;
  }

  // The app-level onRequest hook has already counted this request against the gate.
  app.post('/api/order', async (req, reply) => {
    const result = pipeline.screen({
      initData: readInitData(req, initDataField(req.body)),
      body: req.body,
    });
    if (result.kind === 'rejected') {
      return sendAdmissionError(req, reply, result.error);
    }

    const { order, identity } = result;
    let record: OrderRecord;
    try {
      record = await store.createOrder(order, identity);
    } catch (e) {
      return logAndSendError(req, reply, 503, 'Order store unavailable', e);
    }

    req.log.info(
      { orderId: record.id, userId: identity.userId, total: record.total, itemsCount: record.items.length },
      'order created',
    );

    return reply.status(201).send(
      ok({
        orderId: record.id,
        status: record.status,
        estimatedReady: ESTIMATED_READY,
        total: record.total,
      }),
    );
  });

  app.get('/api/orders/history', async (req, reply) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.status(400).send(fail('Invalid query', { issues: parsed.error.issues }));
    }

    const identity = authenticate(req, reply, parsed.data.init_data);
    if (!identity) return reply;

    const userId = String(identity.userId);
    if (parsed.data.user_id !== undefined && parsed.data.user_id !== userId) {
      return reply.status(401).send(fail('Unauthorized'));
    }

    let orders: OrderRecord[];
    try {
      orders = await store.listOrdersForUser(userId, parsed.data.limit);
    } catch (e) {
      return logAndSendError(req, reply, 503, 'Order store unavailable', e);
    }

    return ok({ orders: orders.map(serializeOrder) });
  });

  app.get('/api/orders/:orderId', async (req, reply) => {
    const params = orderParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send(fail('Invalid order id'));
    }
    const query = orderQuerySchema.safeParse(req.query);
    if (!query.success) {
      return reply.status(400).send(fail('Invalid query', { issues: query.error.issues }));
    }

    const identity = authenticate(req, reply, query.data.init_data);
    if (!identity) return reply;

    let order: OrderRecord | null;
    try {
      order = await store.findOrderById(params.data.orderId);
    } catch (e) {
      return logAndSendError(req, reply, 503, 'Order store unavailable', e);
    }

    if (!order) {
      return reply.status(404).send(fail('Order not found'));
    }
    if (order.userId !== String(identity.userId)) {
      return reply.status(403).send(fail('Access denied'));
    }

    return ok({ order: serializeOrder(order) });
  });
}
