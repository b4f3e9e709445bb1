// backend/services/order/src/contracts/order.contract.ts
import { z } from "zod";

/**
 * Smallest amount an order may carry. Request validation and the storage
 * schema both read this value.
 */
export const MIN_ORDER_AMOUNT = 0.1;

/** ISO 8601 date-time as produced by Date#toISOString(). */
const ISO_DATETIME_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z$/;

/** Wire shape of a persisted order. */
export const orderContract = z.object({
  id: z.number().int().positive(),
  customerName: z.string().min(1),
  amount: z.number().min(MIN_ORDER_AMOUNT),
  createdAt: z.string().regex(ISO_DATETIME_RE, "Expected ISO 8601 date-time"),
});

export type OrderDto = z.infer<typeof orderContract>;

/** Domain shape: what the service and repositories pass around. */
export type Order = {
  id: number;
  customerName: string;
  amount: number;
  createdAt: Date;
};

/** An order not yet persisted; the repository assigns `id`. */
export type NewOrder = Omit<Order, "id">;
