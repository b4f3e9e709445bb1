// backend/services/order/src/validators/order.dto.ts
import { z } from "zod";
import { MIN_ORDER_AMOUNT } from "../contracts/order.contract";

/**
 * CREATE (API surface): caller supplies only business fields.
 * Unknown keys are stripped.
 */
export const createOrderDto = z.object({
  customerName: z
    .string({
      required_error: "Customer name is required",
      invalid_type_error: "Customer name is required",
    })
    .refine((v) => v.trim().length > 0, "Customer name is required"),
  amount: z
    .number({
      required_error: "Amount is required",
      invalid_type_error: "Amount must be a number",
    })
    .finite("Amount must be a number")
    .min(MIN_ORDER_AMOUNT, `Amount must be at least ${MIN_ORDER_AMOUNT}`),
});

export type CreateOrderDto = z.infer<typeof createOrderDto>;

export type FieldError = { field: string; message: string };

export type ValidationResult =
  | { ok: true; value: CreateOrderDto }
  | { ok: false; errors: FieldError[] };

const FIELD_ORDER = Object.keys(createOrderDto.shape);

/**
 * Validate an inbound create-order payload. Never throws.
 * Reports at most one error per field, in declaration order.
 */
export function validateCreateOrderRequest(body: unknown): ValidationResult {
  // null and a missing body both mean every field is absent
  const input =
    typeof body === "object" && body !== null && !Array.isArray(body)
      ? body
      : {};

  const parsed = createOrderDto.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };

  const byField = new Map<string, string>();
  for (const issue of parsed.error.issues) {
    const field = String(issue.path[0] ?? "");
    // amount: null → report as missing rather than a type error
    const message =
      issue.code === "invalid_type" && issue.received === "null"
        ? requiredMessage(field, issue.message)
        : issue.message;
    if (!byField.has(field)) byField.set(field, message);
  }

  const errors = [...byField.entries()]
    .sort(([a], [b]) => rank(a) - rank(b))
    .map(([field, message]) => ({ field, message }));
  return { ok: false, errors };
}

function requiredMessage(field: string, fallback: string): string {
  if (field === "amount") return "Amount is required";
  if (field === "customerName") return "Customer name is required";
  return fallback;
}

function rank(field: string): number {
  const i = FIELD_ORDER.indexOf(field);
  return i === -1 ? FIELD_ORDER.length : i;
}

/** Wire form of a validation failure: `{ field: message, ... }`. */
export function toFieldErrorMap(errors: FieldError[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const e of errors) out[e.field] = e.message;
  return out;
}
