// backend/services/order/src/controllers/order/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { toOrderDto } from "../../../mappers/order.mapper";
import type { OrderService } from "../../../services/orderService";

export function list(service: OrderService): RequestHandler {
  return asyncHandler(async (req, res) => {
    req.log.debug("[order.controller.list] enter");
    const orders = await service.getAllOrders();
    req.log.debug({ count: orders.length }, "[order.controller.list] exit");
    res.status(200).json(orders.map(toOrderDto));
  });
}
