import { describe, expect, it } from "vitest";
import { OrderFactory } from "../order-factory";
import type { Checkout, FulfillmentMethod } from "../../types/checkout";

const NOW = new Date("2026-01-15T10:00:00.000Z");

function factory(): OrderFactory {
  let n = 0;
  return new OrderFactory({ now: () => NOW, idFactory: (prefix) => `${prefix}_${++n}` });
}

function shippingMethod(extra: Partial<FulfillmentMethod> = {}): FulfillmentMethod {
  return {
    id: "shipping_method_0",
    type: "shipping",
    destinations: [
      { id: "dest_1", full_name: "Sam Doe", street_address: "1 Main St", postal_code: "10001", address_country: "US" },
    ],
    selected_destination_id: "dest_1",
    groups: [{ id: "group_0_0", selected_option_id: "rate_std_us", selected_option_title: "Standard Shipping" }],
    ...extra,
  };
}

function checkout(methods: FulfillmentMethod[]): Checkout {
  return {
    id: "checkout_1",
    status: "completed",
    currency: "USD",
    buyerId: "buyer_1",
    lineItems: [
      { id: "li_a", productId: "prod_a", title: "Item A", price: 1000, quantity: 2 },
      { id: "li_b", productId: "prod_b", title: "Item B", price: 500, quantity: 1 },
    ],
    discounts: [{ code: "SAVE5", type: "fixed", value: 500 }],
    fulfillment: { methods },
    payment: {},
    subtotal: 2500,
    fulfillmentPrice: 499,
    total: 2499,
    createdAt: "2026-01-15T09:00:00.000Z",
    updatedAt: "2026-01-15T09:30:00.000Z",
  };
}

describe("OrderFactory", () => {
  it("snapshots line items under fresh ids with totals from the snapshot", () => {
    const order = factory().createFromCheckout(checkout([shippingMethod()]));

    expect(order.id).toBe("order_3");
    expect(order.checkoutId).toBe("checkout_1");
    expect(order.buyerId).toBe("buyer_1");
    expect(order.status).toBe("confirmed");
    expect(order.lineItems.map((li) => [li.id, li.productId, li.title, li.price, li.quantity])).toEqual([
      ["li_1", "prod_a", "Item A", 1000, 2],
      ["li_2", "prod_b", "Item B", 500, 1],
    ]);
    expect(order.totals).toEqual({ subtotal: 2500, discount: 500, fulfillment: 499, total: 2499 });
    expect(order.fulfillment.events).toEqual([]);
    expect(order.adjustments).toEqual([]);
    expect(order.createdAt).toBe("2026-01-15T10:00:00.000Z");
  });

  it("creates one expectation per method with a destination and an option", () => {
    const order = factory().createFromCheckout(checkout([shippingMethod()]));

    expect(order.fulfillment.expectations).toEqual([
      {
        id: "exp_1",
        line_items: [
          { id: "li_1", quantity: 2 },
          { id: "li_2", quantity: 1 },
        ],
        method_type: "shipping",
        destination: {
          full_name: "Sam Doe",
          street_address: "1 Main St",
          postal_code: "10001",
          address_country: "US",
        },
        description: "Standard Shipping",
      },
    ]);
  });

  it("falls back to the option id and a US destination", () => {
    const method = shippingMethod({
      destinations: [{ id: "dest_1", street_address: "9 Side Rd" }],
      groups: [{ id: "group_0_0", line_item_ids: ["li_b"], selected_option_id: "rate_exp_us" }],
    });
    const [expectation] = factory().createFromCheckout(checkout([method])).fulfillment.expectations;

    expect(expectation.description).toBe("rate_exp_us");
    expect(expectation.destination).toEqual({ street_address: "9 Side Rd", address_country: "US" });
    expect(expectation.line_items).toEqual([{ id: "li_2", quantity: 1 }]);
  });

  it("skips methods without a selected destination or option", () => {
    const order = factory().createFromCheckout(
      checkout([
        shippingMethod({ selected_destination_id: undefined }),
        shippingMethod({ id: "shipping_method_1", groups: [{ id: "group_1_0" }] }),
      ])
    );
    expect(order.fulfillment.expectations).toEqual([]);
  });

  it("is not affected by later changes to the checkout", () => {
    const source = checkout([shippingMethod()]);
    const order = factory().createFromCheckout(source);
    source.lineItems[0].quantity = 99;
    source.discounts.push({ code: "WELCOME10", type: "percentage", value: 10 });

    expect(order.lineItems[0].quantity).toBe(2);
    expect(order.totals.total).toBe(2499);
  });
});
