import fs from 'node:fs/promises';
import { z } from 'zod';

import type { AuthenticatedIdentity } from '../admission/initData.js';
import { paymentMethodSchema } from '../admission/orderValidator.js';
import type { ValidatedOrder } from '../admission/orderValidator.js';
import type { SqlClient } from '../db.js';
import type { OrderRecord, OrderStore } from './orderStore.js';
import { ORDER_STATUSES, toStoredItems } from './orderStore.js';

export const ORDER_SCHEMA_SQL_URL = new URL('../../sql/orders.sql', import.meta.url);

const ORDER_COLUMNS =
  'id, telegram_user_id, telegram_username, items, total, notes, status, payment_method, created_at, updated_at';

const storedItemSchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string(),
  qty: z.number(),
  price: z.number(),
});

// NUMERIC comes back from pg as a string.
const orderRowSchema = z.object({
  id: z.number().int(),
  telegram_user_id: z.string(),
  telegram_username: z.string().nullable(),
  items: z.array(storedItemSchema),
  total: z.coerce.number(),
  notes: z.string().nullable(),
  status: z.enum(ORDER_STATUSES),
  payment_method: paymentMethodSchema,
  created_at: z.date(),
  updated_at: z.date(),
});

const countRowSchema = z.object({ count: z.coerce.number().int() });

function toRecord(row: unknown): OrderRecord {
  const r = orderRowSchema.parse(row);
  return {
    id: r.id,
    userId: r.telegram_user_id,
    username: r.telegram_username,
    items: r.items,
    total: r.total,
    notes: r.notes,
    status: r.status,
    paymentMethod: r.payment_method,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export class PgOrderStore implements OrderStore {
  constructor(private readonly sql: SqlClient) {}

  async ensureSchema(schemaUrl: URL = ORDER_SCHEMA_SQL_URL): Promise<void> {
    const ddl = await fs.readFile(schemaUrl, 'utf8');
    await this.sql.query(ddl);
  }

  async createOrder(order: ValidatedOrder, identity: AuthenticatedIdentity): Promise<OrderRecord> {
    const res = await this.sql.query(
      `INSERT INTO orders (telegram_user_id, telegram_username, items, total, notes, status, payment_method)
       VALUES ($1, $2, $3::jsonb, $4, $5, 'received', $6)
       RETURNING ${ORDER_COLUMNS}`,
      [
        String(identity.userId),
        identity.username ?? null,
        JSON.stringify(toStoredItems(order.items)),
        order.declaredTotal,
        order.note,
        order.paymentMethod,
      ],
    );
    const [row] = res.rows;
    if (!row) throw new Error('INSERT INTO orders returned no row');
    return toRecord(row);
  }

  async findOrderById(id: number): Promise<OrderRecord | null> {
    const res = await this.sql.query(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`, [id]);
    const [row] = res.rows;
    return row ? toRecord(row) : null;
  }

  async listOrdersForUser(userId: string, limit: number): Promise<OrderRecord[]> {
    const res = await this.sql.query(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE telegram_user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2`,
      [userId, limit],
    );
    return res.rows.map(toRecord);
  }

  async countOrders(): Promise<number> {
    const res = await this.sql.query('SELECT count(*) AS count FROM orders');
    return countRowSchema.parse(res.rows[0]).count;
  }
}
