// backend/services/order/src/mappers/order.mapper.ts
import {
  orderContract,
  type Order,
  type NewOrder,
  type OrderDto,
} from "../contracts/order.contract";

// Domain ↔ DB ↔ wire mappers. Keep thin; no business logic here.

/** Lean document as read back from the orders collection. */
export type OrderRow = {
  _id: number;
  customerName: string;
  amount: number;
  createdAt: Date;
};

export function dbToDomain(row: OrderRow): Order {
  return {
    id: row._id,
    customerName: row.customerName,
    amount: row.amount,
    createdAt: row.createdAt,
  };
}

export function domainToDb(id: number, order: NewOrder): OrderRow {
  return {
    _id: id,
    customerName: order.customerName,
    amount: order.amount,
    createdAt: order.createdAt,
  };
}

/** Outbound DTO, checked against the wire contract; throws on a bad row. */
export function toOrderDto(order: Order): OrderDto {
  return orderContract.parse({
    id: order.id,
    customerName: order.customerName,
    amount: order.amount,
    createdAt: order.createdAt.toISOString(),
  });
}
