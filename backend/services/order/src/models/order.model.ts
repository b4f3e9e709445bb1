// backend/services/order/src/models/order.model.ts
import { Schema, model } from "mongoose";
import { MIN_ORDER_AMOUNT } from "../contracts/order.contract";

/**
 * Orders are keyed by a numeric sequence (see counter.model.ts) instead of
 * an ObjectId, so the wire id stays a plain integer.
 */
const OrderSchema = new Schema(
  {
    _id: { type: Number, required: true },
    customerName: {
      type: String,
      required: true,
      validate: {
        validator: (v: string) => v.trim().length > 0,
        message: "customerName must not be blank",
      },
    },
    amount: { type: Number, required: true, min: MIN_ORDER_AMOUNT },
    createdAt: { type: Date, required: true, immutable: true },
  },
  {
    collection: "orders",
    strict: true,
    versionKey: false,
  }
);

export const OrderModel = model("Order", OrderSchema);
