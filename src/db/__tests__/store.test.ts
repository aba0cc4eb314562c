import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDatabase, type DatabaseHandle } from "../index";
import { products } from "../schema";
import { seedCatalog } from "../seed";
import { DrizzleCheckoutStore } from "../store";
import type { Checkout, Order } from "../../types/checkout";

let handle: DatabaseHandle;
let store: DrizzleCheckoutStore;

beforeEach(() => {
  handle = createDatabase(":memory:");
  seedCatalog(handle.db, {
    products: [{ id: "prod_a", title: "Item A", price: 1000, stock: 3 }],
    discounts: [{ code: "SAVE5", type: "fixed", value: 500 }],
    shipping_rates: [
      { id: "rate_std", title: "Standard", price: 599 },
      { id: "rate_std_ca", title: "Standard", price: 899, country_code: "CA" },
      { id: "rate_std_de", title: "Standard", price: 799, country_code: "DE" },
      { id: "rate_old", title: "Old", price: 1, active: false },
    ],
    customers: [{ email: "pat@example.com", addresses: [{ street_address: "5 Elm", address_country: "CA" }] }],
  });
  store = new DrizzleCheckoutStore(handle.db);
});

afterEach(() => {
  handle.close();
});

function checkout(id: string): Checkout {
  return {
    id,
    status: "incomplete",
    currency: "USD",
    lineItems: [],
    discounts: [],
    fulfillment: { methods: [] },
    payment: {},
    subtotal: 0,
    fulfillmentPrice: 0,
    total: 0,
    createdAt: "2026-01-15T10:00:00.000Z",
    updatedAt: "2026-01-15T10:00:00.000Z",
  };
}

function order(id: string, createdAt: string, buyerId?: string): Order {
  return {
    id,
    checkoutId: `checkout_${id}`,
    buyerId,
    status: "confirmed",
    currency: "USD",
    lineItems: [{ id: `li_${id}`, productId: "prod_a", title: "Item A", price: 1000, quantity: 1 }],
    fulfillment: { expectations: [], events: [] },
    totals: { subtotal: 1000, discount: 0, fulfillment: 0, total: 1000 },
    adjustments: [],
    createdAt,
    updatedAt: createdAt,
  };
}

describe("DrizzleCheckoutStore", () => {
  it("treats a product without inventory as out of stock", () => {
    handle.db.insert(products).values({ id: "prod_b", title: "Item B", price: 200 }).run();
    expect(store.getAvailableQuantity("prod_a")).toBe(3);
    expect(store.getAvailableQuantity("prod_b")).toBe(0);
  });

  it("lists active rates for the country plus defaults in listing order", () => {
    expect(store.listShippingRates("CA").map((r) => r.id)).toEqual(["rate_std", "rate_std_ca"]);
    expect(store.listShippingRates("US").map((r) => r.id)).toEqual(["rate_std"]);
    expect(store.getShippingRate("rate_old")?.active).toBe(false);
  });

  it("finds customers by email ignoring case", () => {
    const customer = store.findCustomerByEmail("PAT@Example.com");
    expect(customer?.email).toBe("pat@example.com");
    expect(store.listCustomerAddresses(customer?.id ?? "").map((a) => a.streetAddress)).toEqual(["5 Elm"]);
  });

  it("keeps line items and discounts in insertion order", () => {
    store.insertCheckout(checkout("checkout_1"));
    store.insertLineItem("checkout_1", { id: "li_2", productId: "prod_a", title: "Item A", price: 1000, quantity: 1 });
    store.insertLineItem("checkout_1", { id: "li_1", productId: "prod_a", title: "Item A", price: 1000, quantity: 2 });

    expect(store.insertCheckoutDiscount("checkout_1", { code: "SAVE5", type: "fixed", value: 500 })).toBe(true);
    expect(store.insertCheckoutDiscount("checkout_1", { code: "SAVE5", type: "fixed", value: 500 })).toBe(false);

    const loaded = store.getCheckout("checkout_1");
    expect(loaded?.lineItems.map((li) => li.id)).toEqual(["li_2", "li_1"]);
    expect(loaded?.discounts).toEqual([{ code: "SAVE5", type: "fixed", value: 500 }]);
  });

  it("copies the buyer id when the buyer is updated", () => {
    store.insertCheckout(checkout("checkout_1"));
    store.updateCheckout("checkout_1", { buyer: { id: "buyer_9", email: "x@example.com" }, updatedAt: "t2" });
    const loaded = store.getCheckout("checkout_1");
    expect(loaded?.buyerId).toBe("buyer_9");
    expect(loaded?.buyer).toEqual({ id: "buyer_9", email: "x@example.com" });
    expect(loaded?.updatedAt).toBe("t2");
  });

  it("rolls back every write of a failed transaction", () => {
    expect(() =>
      store.transaction((tx) => {
        tx.insertCheckout(checkout("checkout_1"));
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(store.getCheckout("checkout_1")).toBeUndefined();
  });

  it("lists orders newest first with their line items", () => {
    store.insertOrder(order("order_1", "2026-01-15T10:00:00.000Z", "buyer_a"));
    store.insertOrder(order("order_2", "2026-01-15T11:00:00.000Z", "buyer_b"));
    store.insertOrder(order("order_3", "2026-01-15T12:00:00.000Z", "buyer_a"));

    expect(store.listOrders({ limit: 10, offset: 0 }).map((o) => o.id)).toEqual(["order_3", "order_2", "order_1"]);
    const mine = store.listOrders({ buyerId: "buyer_a", limit: 10, offset: 0 });
    expect(mine.map((o) => o.id)).toEqual(["order_3", "order_1"]);
    expect(mine[1].lineItems.map((li) => li.id)).toEqual(["li_order_1"]);
  });

  it("allows one order per checkout", () => {
    store.insertOrder(order("order_1", "2026-01-15T10:00:00.000Z"));
    expect(() => store.insertOrder({ ...order("order_2", "2026-01-15T10:00:00.000Z"), checkoutId: "checkout_order_1" })).toThrow();
  });
});
