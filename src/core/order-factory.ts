/**
 * Order Factory
 *
 * Snapshots a checkout into an order: fresh line-item ids, copied titles and
 * prices, one fulfillment expectation per method with a destination and an
 * option selected. Totals come from the snapshot, so later changes to the
 * checkout never reach a placed order.
 */

import type {
  Address,
  Checkout,
  FulfillmentExpectation,
  Order,
  OrderLineItem,
} from "../types/checkout";
import { newId } from "./ids";
import { recalculate } from "./pricing";
import {
  DEFAULT_DESTINATION_COUNTRY,
  groupLineItemIds,
  selectedDestination,
} from "./fulfillment-state";

export interface OrderFactoryOptions {
  now?: () => Date;
  idFactory?: (prefix: "order" | "li") => string;
}

export class OrderFactory {
  private readonly now: () => Date;
  private readonly idFactory: (prefix: "order" | "li") => string;

  constructor(options: OrderFactoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? newId;
  }

  createFromCheckout(checkout: Checkout): Order {
    const idMap = new Map<string, string>();
    const lineItems: OrderLineItem[] = checkout.lineItems.map((li) => {
      const id = this.idFactory("li");
      idMap.set(li.id, id);
      return {
        id,
        productId: li.productId,
        variantId: li.variantId,
        title: li.title,
        price: li.price,
        quantity: li.quantity,
      };
    });

    const pricing = recalculate({
      lineItems,
      discounts: checkout.discounts,
      fulfillmentPrice: checkout.fulfillmentPrice,
      currency: checkout.currency,
    });

    const timestamp = this.now().toISOString();
    return {
      id: this.idFactory("order"),
      checkoutId: checkout.id,
      buyerId: checkout.buyerId,
      status: "confirmed",
      currency: checkout.currency,
      lineItems,
      fulfillment: {
        expectations: buildExpectations(checkout, idMap),
        events: [],
      },
      totals: {
        subtotal: pricing.subtotal,
        discount: pricing.discountAmount,
        fulfillment: pricing.fulfillmentPrice,
        total: pricing.total,
      },
      adjustments: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }
}

function buildExpectations(
  checkout: Checkout,
  idMap: Map<string, string>
): FulfillmentExpectation[] {
  const expectations: FulfillmentExpectation[] = [];

  for (const method of checkout.fulfillment.methods) {
    const destination = selectedDestination(method);
    const group = method.groups.find((g) => g.selected_option_id);
    if (!destination || !group?.selected_option_id) continue;

    const covered = new Set(
      method.groups
        .filter((g) => g.selected_option_id)
        .flatMap((g) => groupLineItemIds(g, method, checkout.lineItems))
    );
    const snapshotItems = checkout.lineItems
      .filter((li) => covered.has(li.id))
      .flatMap((li) => {
        const id = idMap.get(li.id);
        return id ? [{ id, quantity: li.quantity }] : [];
      });

    const address: Address = {
      street_address: destination.street_address,
      address_locality: destination.address_locality,
      address_region: destination.address_region,
      postal_code: destination.postal_code,
      address_country: destination.address_country || DEFAULT_DESTINATION_COUNTRY,
    };
    if (destination.full_name) address.full_name = destination.full_name;

    expectations.push({
      id: `exp_${expectations.length + 1}`,
      line_items: snapshotItems,
      method_type: method.type,
      destination: address,
      description: group.selected_option_title ?? group.selected_option_id,
    });
  }

  return expectations;
}
