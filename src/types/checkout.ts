/**
 * Checkout & Order Domain Types
 *
 * Checkout and Order are the aggregates the engine works on. Fulfillment,
 * event and adjustment payloads keep their wire (snake_case) field names
 * since they are persisted and returned as-is.
 */

import type { CheckoutStatus } from "./ucp";

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export type DiscountType = "percentage" | "fixed";
export type FulfillmentType = "shipping" | "pickup";

export interface Address {
  full_name?: string;
  street_address?: string;
  address_locality?: string;
  address_region?: string;
  postal_code?: string;
  /** ISO 3166-1 alpha-2 */
  address_country?: string;
}

/** Buyer profile blob; only `id` and `email` are interpreted. */
export interface BuyerProfile {
  id?: string;
  email?: string;
  full_name?: string;
  first_name?: string;
  last_name?: string;
  phone_number?: string;
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Fulfillment
// ---------------------------------------------------------------------------

export interface FulfillmentDestination extends Address {
  id: string;
}

export interface FulfillmentGroup {
  id: string;
  /** Absent means every line item the method covers */
  line_item_ids?: string[];
  selected_option_id?: string;
  /** Title of the selected option at selection time, e.g. "Standard Shipping (Free)" */
  selected_option_title?: string;
}

export interface FulfillmentMethod {
  id: string;
  type: FulfillmentType;
  /** Absent means every current line item */
  line_item_ids?: string[];
  destinations: FulfillmentDestination[];
  selected_destination_id?: string;
  groups: FulfillmentGroup[];
}

export interface FulfillmentState {
  methods: FulfillmentMethod[];
}

/** A priced option, computed on read and never persisted. */
export interface FulfillmentOption {
  id: string;
  title: string;
  price: number;
  type: FulfillmentType;
  serviceLevel: string;
}

// ---------------------------------------------------------------------------
// Checkout
// ---------------------------------------------------------------------------

export interface LineItem {
  id: string;
  productId: string;
  variantId?: string;
  title: string;
  /** Unit price in minor units, always from the catalog */
  price: number;
  quantity: number;
}

export interface AppliedDiscount {
  code: string;
  type: DiscountType;
  value: number;
}

export interface PaymentInstrument {
  id: string;
  handler_id?: string;
  type?: string;
  selected?: boolean;
  display?: Record<string, unknown>;
  credential?: { type: string; token: string };
}

export interface PaymentSelection {
  handlerId?: string;
  instrument?: PaymentInstrument;
}

export interface Checkout {
  id: string;
  status: CheckoutStatus;
  currency: string;
  buyerId?: string;
  buyer?: BuyerProfile;
  lineItems: LineItem[];
  discounts: AppliedDiscount[];
  fulfillment: FulfillmentState;
  payment: PaymentSelection;
  /** Cached derived amounts, recomputed on every mutation */
  subtotal: number;
  fulfillmentPrice: number;
  total: number;
  createdAt: string;
  updatedAt: string;
}

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

export interface DiscountApplication extends AppliedDiscount {
  title: string;
  /** Amount this discount took off the running total */
  amount: number;
}

export interface PricingResult {
  subtotal: number;
  discountAmount: number;
  fulfillmentPrice: number;
  total: number;
  applications: DiscountApplication[];
}

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

export type OrderStatus =
  | "pending"
  | "confirmed"
  | "processing"
  | "shipped"
  | "delivered"
  | "canceled";

export interface OrderLineItem {
  id: string;
  productId: string;
  variantId?: string;
  title: string;
  price: number;
  quantity: number;
}

export interface FulfillmentExpectation {
  id: string;
  line_items: Array<{ id: string; quantity: number }>;
  method_type: FulfillmentType;
  destination: Address;
  description: string;
}

export interface FulfillmentEvent {
  id: string;
  type: string;
  timestamp: string;
  line_items?: Array<{ id: string; quantity: number }>;
  tracking?: {
    carrier?: string;
    tracking_number?: string;
    tracking_url?: string;
  };
  description?: string;
}

export interface OrderAdjustment {
  id: string;
  type: string;
  occurred_at: string;
  status?: string;
  amount?: number;
  description?: string;
  line_items?: Array<{ id: string; quantity: number }>;
}

export interface OrderTotals {
  subtotal: number;
  discount: number;
  fulfillment: number;
  total: number;
}

export interface Order {
  id: string;
  checkoutId: string;
  buyerId?: string;
  status: OrderStatus;
  currency: string;
  lineItems: OrderLineItem[];
  fulfillment: {
    expectations: FulfillmentExpectation[];
    events: FulfillmentEvent[];
  };
  totals: OrderTotals;
  adjustments: OrderAdjustment[];
  createdAt: string;
  updatedAt: string;
}
