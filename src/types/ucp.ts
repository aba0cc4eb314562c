/**
 * UCP (Universal Commerce Protocol) Wire Types
 *
 * Based on UCP specification version 2026-01-11.
 * These are the response shapes returned for checkouts and orders.
 */

import type { PaymentHandlerConfig } from "./config";
import type {
  FulfillmentEvent,
  FulfillmentExpectation,
  OrderAdjustment,
  PaymentInstrument,
} from "./checkout";

// ---------------------------------------------------------------------------
// Checkout Status
// ---------------------------------------------------------------------------

export type CheckoutStatus =
  | "incomplete"
  | "ready_for_complete"
  | "requires_escalation"
  | "complete_in_progress"
  | "completed"
  | "canceled";

export const TERMINAL_STATUSES: readonly CheckoutStatus[] = ["completed", "canceled"];

export const CHECKOUT_CAPABILITY = "dev.ucp.shopping.checkout";
export const ORDER_CAPABILITY = "dev.ucp.shopping.order";

// ---------------------------------------------------------------------------
// Totals & Line Items
// ---------------------------------------------------------------------------

export type UcpTotalType = "subtotal" | "discount" | "fulfillment" | "total";

export interface UcpTotal {
  type: UcpTotalType;
  display_text?: string;
  amount: number;
}

export interface UcpLineItemProduct {
  /** Product ID (from catalog) */
  id: string;
  title: string;
  /** Unit price in minor units */
  price: number;
}

export interface UcpLineItem {
  id: string;
  item: UcpLineItemProduct;
  quantity: number;
  totals: UcpTotal[];
}

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export interface UcpEnvelope {
  version: string;
  capabilities: Record<string, Array<{ version: string }>>;
  payment_handlers?: Record<string, PaymentHandlerConfig[]>;
}

export interface UcpLink {
  type: "privacy_policy" | "terms_of_service";
  url: string;
}

// ---------------------------------------------------------------------------
// Fulfillment view
// ---------------------------------------------------------------------------

export interface UcpFulfillmentOptionView {
  id: string;
  title: string;
  totals: UcpTotal[];
}

export interface UcpFulfillmentGroupView {
  id: string;
  line_item_ids: string[];
  options: UcpFulfillmentOptionView[];
  selected_option_id?: string;
}

export interface UcpFulfillmentDestinationView {
  id: string;
  full_name?: string;
  street_address?: string;
  address_locality?: string;
  address_region?: string;
  postal_code?: string;
  address_country?: string;
}

export interface UcpFulfillmentMethodView {
  id: string;
  type: "shipping" | "pickup";
  line_item_ids: string[];
  destinations: UcpFulfillmentDestinationView[];
  selected_destination_id?: string;
  groups: UcpFulfillmentGroupView[];
}

// ---------------------------------------------------------------------------
// Checkout & Order views
// ---------------------------------------------------------------------------

export interface UcpOrderReference {
  id: string;
  status: string;
  permalink_url: string;
}

export interface UcpCheckoutView {
  ucp: UcpEnvelope;
  id: string;
  status: CheckoutStatus;
  currency: string;
  buyer?: Record<string, unknown>;
  line_items: UcpLineItem[];
  totals: UcpTotal[];
  links: UcpLink[];
  fulfillment: { methods: UcpFulfillmentMethodView[] };
  payment: {
    handler_id?: string;
    instruments: PaymentInstrument[];
    selected_instrument_id?: string;
  };
  discounts?: {
    codes: string[];
    applied: Array<{ code: string; title: string; amount: number }>;
  };
  order?: UcpOrderReference;
  created_at: string;
  updated_at: string;
}

export interface UcpOrderLineItem {
  id: string;
  item: UcpLineItemProduct;
  quantity: { total: number; fulfilled: number };
  totals: UcpTotal[];
  status: "processing" | "fulfilled" | "canceled";
}

export interface UcpOrderView {
  ucp: UcpEnvelope;
  id: string;
  checkout_id: string;
  status: string;
  currency: string;
  permalink_url: string;
  line_items: UcpOrderLineItem[];
  fulfillment: {
    expectations: FulfillmentExpectation[];
    events: FulfillmentEvent[];
  };
  totals: UcpTotal[];
  adjustments?: OrderAdjustment[];
  created_at: string;
}

// ---------------------------------------------------------------------------
// MCP Transport Meta
// ---------------------------------------------------------------------------

export interface UcpMcpMeta {
  "ucp-agent"?: {
    profile: string;
  };
  "idempotency-key"?: string;
}
