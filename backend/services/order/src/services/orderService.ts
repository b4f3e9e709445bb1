// backend/services/order/src/services/orderService.ts
import type { Logger } from "pino";
import { logger as rootLogger } from "../../../shared/utils/logger";
import type { Order } from "../contracts/order.contract";
import type { CreateOrderDto } from "../validators/order.dto";
import type { OrderRepository } from "../repo/orderRepo";

export type OrderServiceOptions = {
  now?: () => Date;
  logger?: Logger;
};

/**
 * Order use cases. Callers validate input first (validateCreateOrderRequest);
 * the service stamps createdAt and hands off to the repository.
 */
export class OrderService {
  private readonly repo: OrderRepository;
  private readonly now: () => Date;
  private readonly log: Logger;

  public constructor(repo: OrderRepository, opts: OrderServiceOptions = {}) {
    this.repo = repo;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "OrderService" });
  }

  public async createOrder(request: CreateOrderDto): Promise<Order> {
    this.log.info(
      { customerName: request.customerName },
      "creating order for customer"
    );
    return this.repo.save({
      customerName: request.customerName,
      amount: request.amount,
      createdAt: this.now(),
    });
  }

  public async getAllOrders(): Promise<Order[]> {
    return this.repo.findAll();
  }
}
