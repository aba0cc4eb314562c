/**
 * UCP Response Builders
 *
 * Shapes checkouts and orders into their UCP wire views. Fulfillment options
 * are recomputed on every read; nothing here is cached.
 */

import type { ShopConfig } from "../types/config";
import type {
  Checkout,
  FulfillmentMethod,
  Order,
  OrderStatus,
} from "../types/checkout";
import {
  CHECKOUT_CAPABILITY,
  ORDER_CAPABILITY,
  type CheckoutStatus,
  type UcpCheckoutView,
  type UcpEnvelope,
  type UcpFulfillmentMethodView,
  type UcpLineItem,
  type UcpOrderLineItem,
  type UcpOrderReference,
  type UcpOrderView,
  type UcpTotal,
} from "../types/ucp";
import { recalculate } from "./pricing";
import type { FulfillmentResolver } from "./fulfillment";
import {
  destinationCountry,
  groupLineItemIds,
  methodLineItemIds,
  selectedDestination,
} from "./fulfillment-state";

export type ResponseConfig = Pick<ShopConfig, "ucp" | "baseUrl">;

// ---------------------------------------------------------------------------
// Status aliasing
// ---------------------------------------------------------------------------

const STATUS_ALIASES: Record<string, CheckoutStatus> = {
  in_progress: "incomplete",
  active: "incomplete",
  cancelled: "canceled",
};

const KNOWN_STATUSES: readonly string[] = [
  "incomplete",
  "requires_escalation",
  "ready_for_complete",
  "complete_in_progress",
  "completed",
  "canceled",
];

function isCheckoutStatus(value: string): value is CheckoutStatus {
  return KNOWN_STATUSES.includes(value);
}

/** Map any stored spelling onto the externally visible status set. */
export function toUcpStatus(raw: string): CheckoutStatus {
  const value = raw.trim().toLowerCase();
  if (isCheckoutStatus(value)) return value;
  return STATUS_ALIASES[value] ?? "incomplete";
}

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

export function buildUcpEnvelope(config: ResponseConfig, capability: string): UcpEnvelope {
  return {
    version: config.ucp.version,
    capabilities: { [capability]: [{ version: config.ucp.version }] },
    payment_handlers: config.ucp.paymentHandlers,
  };
}

/** Subtotal, discount and fulfillment appear only when non-zero; total always. */
export function buildTotals(amounts: {
  subtotal: number;
  discount: number;
  fulfillment: number;
  total: number;
}): UcpTotal[] {
  const totals: UcpTotal[] = [];
  if (amounts.subtotal > 0) {
    totals.push({ type: "subtotal", display_text: "Subtotal", amount: amounts.subtotal });
  }
  if (amounts.discount > 0) {
    totals.push({ type: "discount", display_text: "Discount", amount: amounts.discount });
  }
  if (amounts.fulfillment > 0) {
    totals.push({ type: "fulfillment", display_text: "Shipping", amount: amounts.fulfillment });
  }
  totals.push({ type: "total", display_text: "Total", amount: amounts.total });
  return totals;
}

function lineTotals(price: number, quantity: number): UcpTotal[] {
  const amount = price * quantity;
  return [
    { type: "subtotal", amount },
    { type: "total", amount },
  ];
}

export function orderPermalink(config: ResponseConfig, orderId: string): string {
  return `${config.baseUrl}/orders/${orderId}`;
}

export function orderReference(config: ResponseConfig, order: Order): UcpOrderReference {
  return { id: order.id, status: order.status, permalink_url: orderPermalink(config, order.id) };
}

// ---------------------------------------------------------------------------
// Checkout view
// ---------------------------------------------------------------------------

function buildMethodViews(checkout: Checkout, resolver: FulfillmentResolver): UcpFulfillmentMethodView[] {
  const productIds = checkout.lineItems.map((li) => li.productId);
  const methods: FulfillmentMethod[] =
    checkout.fulfillment.methods.length > 0
      ? checkout.fulfillment.methods
      : [{ id: "shipping_method_0", type: "shipping", destinations: [], groups: [] }];

  return methods.map((method, i) => {
    const lineItemIds = methodLineItemIds(method, checkout.lineItems);
    const destination = selectedDestination(method);
    const options = destination
      ? resolver
          .calculateOptions(destinationCountry(destination), productIds, checkout.subtotal, method.type)
          .map((o) => ({
            id: o.id,
            title: o.title,
            totals: [
              { type: "subtotal" as const, amount: o.price },
              { type: "total" as const, amount: o.price },
            ],
          }))
      : [];

    const groups =
      method.groups.length > 0
        ? method.groups.map((g) => ({
            id: g.id,
            line_item_ids: groupLineItemIds(g, method, checkout.lineItems),
            options,
            ...(g.selected_option_id ? { selected_option_id: g.selected_option_id } : {}),
          }))
        : destination
          ? [{ id: `group_${i}_0`, line_item_ids: lineItemIds, options }]
          : [];

    return {
      id: method.id,
      type: method.type,
      line_item_ids: lineItemIds,
      destinations: method.destinations,
      ...(method.selected_destination_id
        ? { selected_destination_id: method.selected_destination_id }
        : {}),
      groups,
    };
  });
}

export function buildCheckoutResponse(
  checkout: Checkout,
  context: { config: ResponseConfig; resolver: FulfillmentResolver; order?: Order }
): UcpCheckoutView {
  const { config, resolver, order } = context;
  const pricing = recalculate({
    lineItems: checkout.lineItems,
    discounts: checkout.discounts,
    fulfillmentPrice: checkout.fulfillmentPrice,
    currency: checkout.currency,
  });

  const lineItems: UcpLineItem[] = checkout.lineItems.map((li) => ({
    id: li.id,
    item: { id: li.productId, title: li.title, price: li.price },
    quantity: li.quantity,
    totals: lineTotals(li.price, li.quantity),
  }));

  const instrument = checkout.payment.instrument;
  const view: UcpCheckoutView = {
    ucp: buildUcpEnvelope(config, CHECKOUT_CAPABILITY),
    id: checkout.id,
    status: toUcpStatus(checkout.status),
    currency: checkout.currency,
    ...(checkout.buyer ? { buyer: checkout.buyer } : {}),
    line_items: lineItems,
    totals: buildTotals({
      subtotal: pricing.subtotal,
      discount: pricing.discountAmount,
      fulfillment: pricing.fulfillmentPrice,
      total: pricing.total,
    }),
    links: [
      { type: "privacy_policy", url: `${config.baseUrl}/legal/privacy` },
      { type: "terms_of_service", url: `${config.baseUrl}/legal/terms` },
    ],
    fulfillment: { methods: buildMethodViews(checkout, resolver) },
    payment: {
      ...(checkout.payment.handlerId ? { handler_id: checkout.payment.handlerId } : {}),
      instruments: instrument ? [instrument] : [],
      ...(instrument ? { selected_instrument_id: instrument.id } : {}),
    },
    created_at: checkout.createdAt,
    updated_at: checkout.updatedAt,
  };

  if (checkout.discounts.length > 0) {
    view.discounts = {
      codes: checkout.discounts.map((d) => d.code),
      applied: pricing.applications.map((a) => ({ code: a.code, title: a.title, amount: a.amount })),
    };
  }
  if (order) view.order = orderReference(config, order);

  return view;
}

// ---------------------------------------------------------------------------
// Order view
// ---------------------------------------------------------------------------

function lineItemStatus(status: OrderStatus): UcpOrderLineItem["status"] {
  if (status === "canceled") return "canceled";
  if (status === "shipped" || status === "delivered") return "fulfilled";
  return "processing";
}

export function buildOrderResponse(order: Order, config: ResponseConfig): UcpOrderView {
  const itemStatus = lineItemStatus(order.status);
  const view: UcpOrderView = {
    ucp: buildUcpEnvelope(config, ORDER_CAPABILITY),
    id: order.id,
    checkout_id: order.checkoutId,
    status: order.status,
    currency: order.currency,
    permalink_url: orderPermalink(config, order.id),
    line_items: order.lineItems.map((li) => ({
      id: li.id,
      item: { id: li.productId, title: li.title, price: li.price },
      quantity: { total: li.quantity, fulfilled: itemStatus === "fulfilled" ? li.quantity : 0 },
      totals: lineTotals(li.price, li.quantity),
      status: itemStatus,
    })),
    fulfillment: {
      expectations: order.fulfillment.expectations,
      events: order.fulfillment.events,
    },
    totals: buildTotals(order.totals),
    created_at: order.createdAt,
  };
  if (order.adjustments.length > 0) view.adjustments = order.adjustments;
  return view;
}
