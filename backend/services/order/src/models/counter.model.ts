// backend/services/order/src/models/counter.model.ts
import { Schema, model } from "mongoose";

// One document per named sequence: { _id: "orders", seq: <last issued> }
const CounterSchema = new Schema(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { collection: "counters", versionKey: false }
);

export const CounterModel = model("Counter", CounterSchema);
