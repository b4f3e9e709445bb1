// backend/services/order/src/routes/orderRoutes.ts
import { Router } from "express";

// Direct handler imports (no barrels)
import { create } from "../controllers/order/handlers/create";
import { list } from "../controllers/order/handlers/list";
import type { OrderService } from "../services/orderService";

export function makeOrderRouter(service: OrderService): Router {
  const router = Router();

  router.post("/", create(service));
  router.get("/", list(service));

  return router;
}
