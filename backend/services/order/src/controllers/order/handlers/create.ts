// backend/services/order/src/controllers/order/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import {
  validateCreateOrderRequest,
  toFieldErrorMap,
} from "../../../validators/order.dto";
import { toOrderDto } from "../../../mappers/order.mapper";
import type { OrderService } from "../../../services/orderService";

/**
 * POST /api/orders
 * - 400 with `{ field: message }` when validation fails; service is not called.
 * - 200 with the created order otherwise.
 */
export function create(service: OrderService): RequestHandler {
  return asyncHandler(async (req, res) => {
    req.log.debug("[order.controller.create] enter");

    const result = validateCreateOrderRequest(req.body);
    if (!result.ok) {
      req.log.debug(
        { fields: result.errors.map((e) => e.field) },
        "[order.controller.create] validation failed"
      );
      res.status(400).json(toFieldErrorMap(result.errors));
      return;
    }

    const created = await service.createOrder(result.value);
    req.log.debug({ id: created.id }, "[order.controller.create] exit");
    res.status(200).json(toOrderDto(created));
  });
}
