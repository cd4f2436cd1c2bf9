import { describe, expect, it } from 'vitest';
import type { ValidatedOrder } from '../admission/orderValidator.js';
import { MemoryOrderStore } from './memoryOrderStore.js';
import { serializeOrder } from './orderStore.js';

const order: ValidatedOrder = {
  items: [{ id: 'latte', name: 'Latte', quantity: 2, unitPrice: 4 }],
  declaredTotal: 8,
  computedTotal: 8,
  note: null,
  paymentMethod: 'cash',
};

describe('MemoryOrderStore', () => {
  it('assigns sequential ids and the received status', async () => {
    const at = new Date('2026-02-07T12:00:00.000Z');
    const store = new MemoryOrderStore(() => at);

    const first = await store.createOrder(order, { userId: 1, authDate: 1 });
    const second = await store.createOrder(order, { userId: 2, username: 'bo', authDate: 1 });

    expect([first.id, second.id]).toEqual([1, 2]);
    expect(first).toMatchObject({ userId: '1', username: null, status: 'received', total: 8, createdAt: at });
    expect(second.username).toBe('bo');
    expect(await store.countOrders()).toBe(2);
  });

  it('lists one user newest first, up to the limit', async () => {
    const store = new MemoryOrderStore();
    for (const userId of [5, 6, 5, 5]) await store.createOrder(order, { userId, authDate: 1 });

    expect((await store.listOrdersForUser('5', 10)).map((o) => o.id)).toEqual([4, 3, 1]);
    expect((await store.listOrdersForUser('5', 2)).map((o) => o.id)).toEqual([4, 3]);
    expect(await store.listOrdersForUser('7', 10)).toEqual([]);
  });

  it('returns copies that do not write back', async () => {
    const store = new MemoryOrderStore();
    const created = await store.createOrder(order, { userId: 5, authDate: 1 });
    created.status = 'cancelled';

    expect((await store.findOrderById(created.id))?.status).toBe('received');
    expect(await store.findOrderById(99)).toBeNull();
  });
});

describe('serializeOrder', () => {
  it('exposes the public fields with an ISO timestamp', async () => {
    const store = new MemoryOrderStore(() => new Date('2026-02-07T12:00:00.000Z'));
    const created = await store.createOrder(order, { userId: 5, authDate: 1 });

    expect(serializeOrder(created)).toEqual({
      id: 1,
      status: 'received',
      total: 8,
      items: [{ id: 'latte', name: 'Latte', qty: 2, price: 4 }],
      createdAt: '2026-02-07T12:00:00.000Z',
      notes: null,
      paymentMethod: 'cash',
    });
  });
});
