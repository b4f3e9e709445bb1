// backend/services/order/src/repo/orderRepo.ts
import type { Order, NewOrder } from "../contracts/order.contract";
import { OrderModel } from "../models/order.model";
import { CounterModel } from "../models/counter.model";
import { dbToDomain, domainToDb, type OrderRow } from "../mappers/order.mapper";

/**
 * Storage seam consumed by OrderService. Errors from the backing store
 * propagate unchanged.
 */
export interface OrderRepository {
  /** Persist an order without id; resolves with the storage-assigned id filled in. */
  save(order: NewOrder): Promise<Order>;
  /** Every persisted order, in storage order. Empty array when none exist. */
  findAll(): Promise<Order[]>;
}

type CounterRow = { _id: string; seq: number };

/**
 * Mongo-backed repository. Connection lifecycle is owned by db.ts;
 * this class only issues queries.
 */
export class MongoOrderRepository implements OrderRepository {
  private readonly sequence: string;

  public constructor(opts: { sequence?: string } = {}) {
    this.sequence = opts.sequence ?? "orders";
  }

  /** Atomically issue the next id from the counters collection. */
  private async nextId(): Promise<number> {
    const counter = await CounterModel.findOneAndUpdate(
      { _id: this.sequence },
      { $inc: { seq: 1 } },
      { new: true, upsert: true }
    )
      .lean<CounterRow | null>()
      .exec();
    if (!counter) {
      throw new Error(`counter "${this.sequence}" was not returned by upsert`);
    }
    return counter.seq;
  }

  public async save(order: NewOrder): Promise<Order> {
    const id = await this.nextId();
    const row = domainToDb(id, order);
    await OrderModel.create(row);
    return dbToDomain(row);
  }

  public async findAll(): Promise<Order[]> {
    const rows = await OrderModel.find({}).lean<OrderRow[]>().exec();
    return rows.map(dbToDomain);
  }
}
