import { z } from 'zod';

import { AdmissionError } from './errors.js';

export const MAX_ITEMS = 50;
export const MIN_QUANTITY = 1;
export const MAX_QUANTITY = 100;
export const MAX_UNIT_PRICE = 1000;
export const MAX_TOTAL = 10_000;
export const MAX_NOTE_LENGTH = 500;
export const TOTAL_TOLERANCE = 0.01;
// Absorbs binary float error so a difference of exactly one cent still passes.
const TOLERANCE_EPSILON = 1e-9;

export const paymentMethodSchema = z.enum(['cash', 'card', 'telegram_stars']);
export type PaymentMethod = z.infer<typeof paymentMethodSchema>;

// Numbers may arrive as strings from form-ish clients; ranges are checked by validateOrder.
const numericInputSchema = z.union([z.number(), z.string().max(32)]);

const orderItemInputSchema = z.object({
  id: z.union([z.string().min(1).max(64), z.number().int()]),
  name: z.string(),
  qty: numericInputSchema,
  price: numericInputSchema,
});

const orderSubmissionSchema = z.object({
  items: z.array(orderItemInputSchema),
  total: numericInputSchema,
  notes: z.string().nullable().optional(),
  payment_method: paymentMethodSchema.optional(),
});

export type OrderSubmissionInput = z.infer<typeof orderSubmissionSchema>;

export type OrderItemSpec = Readonly<{
  id: string | number;
  name: string;
  quantity: number;
  unitPrice: number;
}>;

export type ValidatedOrder = Readonly<{
  items: readonly OrderItemSpec[];
  declaredTotal: number;
  computedTotal: number;
  note: string | null;
  paymentMethod: PaymentMethod;
}>;

function toNumber(value: number | string): number {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  return trimmed ? Number(trimmed) : Number.NaN;
}

function toCents(value: number): number {
  return Math.round(value * 100);
}

export function parseOrderSubmission(raw: unknown): OrderSubmissionInput {
  const parsed = orderSubmissionSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const path = first ? first.path.join('.') : '';
    throw new AdmissionError('MalformedOrder', 'Invalid order body', path ? { path } : {});
  }
  return parsed.data;
}

function validateItem(item: OrderSubmissionInput['items'][number], index: number): { spec: OrderItemSpec; cents: number } {
  const quantity = toNumber(item.qty);
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_QUANTITY) {
    throw new AdmissionError('InvalidQuantity', `Quantity must be an integer between ${MIN_QUANTITY} and ${MAX_QUANTITY}`, {
      index,
    });
  }

  const price = toNumber(item.price);
  if (!Number.isFinite(price) || price < 0 || price > MAX_UNIT_PRICE) {
    throw new AdmissionError('InvalidPrice', 'Invalid price range', { index });
  }

  const cents = toCents(price);
  return {
    spec: Object.freeze({ id: item.id, name: item.name, quantity, unitPrice: cents / 100 }),
    cents: cents * quantity,
  };
}

function normalizeNote(notes: string | null | undefined): string | null {
  const trimmed = (notes ?? '').trim();
  if (!trimmed) return null;
  if (Array.from(trimmed).length > MAX_NOTE_LENGTH) {
    throw new AdmissionError('NoteTooLong', `Notes too long (max ${MAX_NOTE_LENGTH} chars)`);
  }
  return trimmed;
}

/**
 * Checks structure first, then economics, and stops at the first failure.
 * Line totals are summed in integer cents; the declared total is compared as sent.
 */
export function validateOrder(submission: OrderSubmissionInput): ValidatedOrder {
  const count = submission.items.length;
  if (count === 0) {
    throw new AdmissionError('EmptyOrder', 'Order must contain at least one item');
  }
  if (count > MAX_ITEMS) {
    throw new AdmissionError('TooManyItems', 'Too many items in order', { count, max: MAX_ITEMS });
  }

  const validated = submission.items.map((item, index) => validateItem(item, index));

  const declared = toNumber(submission.total);
  if (!Number.isFinite(declared) || declared < 0 || declared > MAX_TOTAL) {
    throw new AdmissionError('InvalidTotal', `Total must be between 0 and ${MAX_TOTAL}`);
  }

  const note = normalizeNote(submission.notes);

  const computedCents = validated.reduce((sum, v) => sum + v.cents, 0);
  const computed = computedCents / 100;
  if (Math.abs(declared - computed) > TOTAL_TOLERANCE + TOLERANCE_EPSILON) {
    throw new AdmissionError('TotalMismatch', 'Total amount mismatch', {
      expected: computed,
      received: declared,
    });
  }

  return Object.freeze({
    items: Object.freeze(validated.map((v) => v.spec)),
    declaredTotal: declared,
    computedTotal: computed,
    note,
    paymentMethod: submission.payment_method ?? 'cash',
  });
}
