/**
 * Request Schemas
 *
 * One canonical zod schema per operation. Bodies are parsed at the API
 * boundary; the domain only ever sees the parsed output types.
 */

import { z, type ZodError, type ZodTypeAny } from "zod";
import { ValidationError } from "./errors";

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

export const addressSchema = z.object({
  full_name: z.string().optional(),
  street_address: z.string().optional(),
  address_locality: z.string().optional(),
  address_region: z.string().optional(),
  postal_code: z.string().optional(),
  address_country: z.string().min(2).max(3).optional(),
});

const destinationSchema = addressSchema.extend({
  id: z.string().min(1).optional(),
});

const groupSchema = z.object({
  id: z.string().min(1).optional(),
  line_item_ids: z.array(z.string()).optional(),
  selected_option_id: z.string().min(1).nullable().optional(),
});

const methodSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.enum(["shipping", "pickup"]).optional(),
  line_item_ids: z.array(z.string()).optional(),
  destinations: z.array(destinationSchema).optional(),
  selected_destination_id: z.string().min(1).nullable().optional(),
  groups: z.array(groupSchema).optional(),
});

export const fulfillmentSchema = z.object({
  methods: z.array(methodSchema).optional(),
});

export const buyerSchema = z
  .object({
    id: z.string().min(1).optional(),
    email: z.string().email().optional(),
    full_name: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    phone_number: z.string().optional(),
  })
  .passthrough();

export const instrumentSchema = z.object({
  id: z.string().min(1),
  handler_id: z.string().optional(),
  type: z.string().optional(),
  selected: z.boolean().optional(),
  display: z.record(z.unknown()).optional(),
  credential: z.object({ type: z.string(), token: z.string() }).optional(),
});

export const paymentSchema = z.object({
  handler_id: z.string().min(1).optional(),
  selected_instrument_id: z.string().min(1).optional(),
  instruments: z.array(instrumentSchema).optional(),
});

const quantity = z.number().int().min(1).max(10_000);

export const lineItemInputSchema = z.object({
  item: z.object({
    id: z.string().min(1),
    variant_id: z.string().min(1).optional(),
  }),
  quantity: quantity.default(1),
});

const currencySchema = z
  .string()
  .length(3)
  .transform((v) => v.toUpperCase());

// ---------------------------------------------------------------------------
// Checkout operations
// ---------------------------------------------------------------------------

export const createCheckoutSchema = z.object({
  buyer: buyerSchema.optional(),
  currency: currencySchema.optional(),
  line_items: z.array(lineItemInputSchema).default([]),
  payment: paymentSchema.optional(),
  fulfillment: fulfillmentSchema.optional(),
});

/** `{ id, quantity }` sets an existing item (0 removes); `{ item, quantity }` adds one. */
export const lineItemUpdateSchema = z.union([
  z.object({ id: z.string().min(1), quantity: z.number().int().min(0).max(10_000) }),
  lineItemInputSchema,
]);

export const updateCheckoutSchema = z.object({
  currency: currencySchema.optional(),
  buyer: buyerSchema.optional(),
  line_items: z.array(lineItemUpdateSchema).optional(),
  fulfillment: fulfillmentSchema.optional(),
  discounts: z.object({ codes: z.array(z.string().min(1)) }).optional(),
  payment: paymentSchema.optional(),
});

export const addLineItemSchema = z.object({
  product_id: z.string().min(1),
  variant_id: z.string().min(1).optional(),
  quantity: quantity.default(1),
});

export const updateLineItemSchema = z.object({
  quantity: z.number().int().min(0).max(10_000),
});

export const applyDiscountSchema = z.object({
  code: z.string().min(1),
});

export const setFulfillmentSchema = z.object({
  /** Shipping rate id */
  method_id: z.string().min(1),
  address: addressSchema.optional(),
});

export const setPaymentSchema = z.object({
  handler_id: z.string().min(1),
  instrument: instrumentSchema.optional(),
});

export const completeCheckoutSchema = z.object({
  payment_data: z.object({ id: z.string().min(1) }).passthrough().optional(),
  payment: paymentSchema.optional(),
});

// ---------------------------------------------------------------------------
// Order operations
// ---------------------------------------------------------------------------

const lineItemRefs = z.array(z.object({ id: z.string(), quantity: z.number().int().min(0) }));

export const orderStatusSchema = z.enum([
  "pending",
  "confirmed",
  "processing",
  "shipped",
  "delivered",
  "canceled",
]);

export const fulfillmentEventSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1),
  timestamp: z.string().optional(),
  line_items: lineItemRefs.optional(),
  tracking: z
    .object({
      carrier: z.string().optional(),
      tracking_number: z.string().optional(),
      tracking_url: z.string().optional(),
    })
    .optional(),
  description: z.string().optional(),
});

export const adjustmentSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1),
  occurred_at: z.string().optional(),
  status: z.string().optional(),
  amount: z.number().int().optional(),
  description: z.string().optional(),
  line_items: lineItemRefs.optional(),
});

export const updateOrderSchema = z.object({
  status: orderStatusSchema.optional(),
  fulfillment: z.object({ events: z.array(fulfillmentEventSchema).optional() }).optional(),
  adjustments: z.array(adjustmentSchema).optional(),
});

export const listOrdersSchema = z.object({
  buyer_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

// ---------------------------------------------------------------------------
// Types & parsing
// ---------------------------------------------------------------------------

export type CreateCheckoutRequest = z.output<typeof createCheckoutSchema>;
export type UpdateCheckoutRequest = z.output<typeof updateCheckoutSchema>;
export type AddLineItemRequest = z.output<typeof addLineItemSchema>;
export type UpdateLineItemRequest = z.output<typeof updateLineItemSchema>;
export type ApplyDiscountRequest = z.output<typeof applyDiscountSchema>;
export type SetFulfillmentRequest = z.output<typeof setFulfillmentSchema>;
export type SetPaymentRequest = z.output<typeof setPaymentSchema>;
export type CompleteCheckoutRequest = z.output<typeof completeCheckoutSchema>;
export type PaymentRequest = z.output<typeof paymentSchema>;
export type UpdateOrderRequest = z.output<typeof updateOrderSchema>;
export type ListOrdersRequest = z.output<typeof listOrdersSchema>;

function toJsonPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, part) => (typeof part === "number" ? `${acc}[${part}]` : `${acc}.${part}`),
    "$"
  );
}

export function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) return new ValidationError("Invalid request");
  const path = toJsonPath(issue.path);
  return new ValidationError(`${path}: ${issue.message}`, path);
}

/** Parse a request body, turning the first zod issue into a ValidationError. */
export function parseRequest<S extends ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) throw toValidationError(result.error);
  return result.data;
}
