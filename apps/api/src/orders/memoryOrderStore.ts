import type { AuthenticatedIdentity } from '../admission/initData.js';
import type { ValidatedOrder } from '../admission/orderValidator.js';
import type { OrderRecord, OrderStore } from './orderStore.js';
import { toStoredItems } from './orderStore.js';

// Used when DATABASE_URL is unset (local runs) and by the route tests.
export class MemoryOrderStore implements OrderStore {
  private readonly orders: OrderRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createOrder(order: ValidatedOrder, identity: AuthenticatedIdentity): Promise<OrderRecord> {
    const createdAt = this.now();
    const record: OrderRecord = {
      id: this.orders.length + 1,
      userId: String(identity.userId),
      username: identity.username ?? null,
      items: toStoredItems(order.items),
      total: order.declaredTotal,
      notes: order.note,
      status: 'received',
      paymentMethod: order.paymentMethod,
      createdAt,
      updatedAt: createdAt,
    };
    this.orders.push(record);
    return { ...record };
  }

  async findOrderById(id: number): Promise<OrderRecord | null> {
    const found = this.orders.find((o) => o.id === id);
    return found ? { ...found } : null;
  }

  async listOrdersForUser(userId: string, limit: number): Promise<OrderRecord[]> {
    return this.orders
      .filter((o) => o.userId === userId)
      .reverse()
      .slice(0, limit)
      .map((o) => ({ ...o }));
  }

  async countOrders(): Promise<number> {
    return this.orders.length;
  }
}
