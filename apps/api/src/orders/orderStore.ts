import type { AuthenticatedIdentity } from '../admission/initData.js';
import type { OrderItemSpec, PaymentMethod, ValidatedOrder } from '../admission/orderValidator.js';

export const ORDER_STATUSES = ['received', 'preparing', 'ready', 'completed', 'cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type StoredOrderItem = {
  id: string | number;
  name: string;
  qty: number;
  price: number;
};

export type OrderRecord = {
  id: number;
  userId: string;
  username: string | null;
  items: StoredOrderItem[];
  total: number;
  notes: string | null;
  status: OrderStatus;
  paymentMethod: PaymentMethod;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Persistence for admitted orders. Assigns the id, timestamps and the initial
 * `received` status; the admission pipeline never writes through it.
 */
export interface OrderStore {
  createOrder(order: ValidatedOrder, identity: AuthenticatedIdentity): Promise<OrderRecord>;
  findOrderById(id: number): Promise<OrderRecord | null>;
  listOrdersForUser(userId: string, limit: number): Promise<OrderRecord[]>;
  countOrders(): Promise<number>;
}

export function toStoredItems(items: readonly OrderItemSpec[]): StoredOrderItem[] {
  return items.map((item) => ({ id: item.id, name: item.name, qty: item.quantity, price: item.unitPrice }));
}

export function serializeOrder(order: OrderRecord) {
  return {
    id: order.id,
    status: order.status,
    total: order.total,
    items: order.items,
    createdAt: order.createdAt.toISOString(),
    notes: order.notes,
    paymentMethod: order.paymentMethod,
  };
}
