/**
 * Checkout Store
 *
 * The narrow persistence contract the checkout engine works against, plus
 * its drizzle/better-sqlite3 implementation. All calls are synchronous so a
 * whole mutation can run inside one SQLite transaction.
 */

import { and, asc, desc, eq, inArray, or, sql } from "drizzle-orm";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import type { RunResult } from "better-sqlite3";
import * as schema from "./schema";
import type {
  CatalogDiscount,
  CheckoutLineItemRow,
  CheckoutRow,
  Customer,
  CustomerAddress,
  OrderLineItemRow,
  OrderRow,
  Product,
  Promotion,
  ShippingRate,
} from "./schema";
import type {
  Address,
  AppliedDiscount,
  BuyerProfile,
  Checkout,
  FulfillmentEvent,
  FulfillmentState,
  LineItem,
  Order,
  OrderAdjustment,
  OrderStatus,
  PaymentSelection,
} from "../types/checkout";
import type { CheckoutStatus } from "../types/ucp";
import { newShortId } from "../core/ids";

const {
  products,
  inventory,
  discounts,
  shippingRates,
  promotions,
  customers,
  customerAddresses,
  checkouts,
  checkoutLineItems,
  checkoutDiscounts,
  orders,
  orderLineItems,
} = schema;

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface CheckoutPatch {
  status?: CheckoutStatus;
  currency?: string;
  buyer?: BuyerProfile;
  subtotal?: number;
  fulfillmentPrice?: number;
  total?: number;
  payment?: PaymentSelection;
  fulfillment?: FulfillmentState;
  updatedAt: string;
}

export interface OrderPatch {
  status?: OrderStatus;
  events?: FulfillmentEvent[];
  adjustments?: OrderAdjustment[];
  updatedAt: string;
}

export interface OrderQuery {
  buyerId?: string;
  limit: number;
  offset: number;
}

export interface CheckoutStore {
  /** Run `fn` atomically; any throw rolls every write back. */
  transaction<T>(fn: (tx: CheckoutStore) => T): T;

  getProduct(id: string): Product | undefined;
  /** Units in stock; a product without an inventory record has none. */
  getAvailableQuantity(productId: string): number;
  getDiscount(code: string): CatalogDiscount | undefined;
  /** Active rates for the country plus the "default" ones, in listing order. */
  listShippingRates(countryCode: string): ShippingRate[];
  getShippingRate(id: string): ShippingRate | undefined;
  listActivePromotions(): Promotion[];

  findCustomerByEmail(email: string): Customer | undefined;
  createCustomer(email: string, fullName?: string): Customer;
  listCustomerAddresses(customerId: string): CustomerAddress[];
  insertCustomerAddress(customerId: string, address: Address & { id: string }): void;

  getCheckout(id: string): Checkout | undefined;
  insertCheckout(checkout: Checkout): void;
  updateCheckout(id: string, patch: CheckoutPatch): void;
  insertLineItem(checkoutId: string, item: LineItem): void;
  updateLineItemQuantity(checkoutId: string, lineItemId: string, quantity: number): void;
  deleteLineItem(checkoutId: string, lineItemId: string): void;
  /** Returns false when the code is already applied to the checkout. */
  insertCheckoutDiscount(checkoutId: string, discount: AppliedDiscount): boolean;

  insertOrder(order: Order): void;
  getOrder(id: string): Order | undefined;
  listOrders(query: OrderQuery): Order[];
  updateOrder(id: string, patch: OrderPatch): void;
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

type SyncDatabase = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

function orUndefined<T>(value: T | null): T | undefined {
  return value ?? undefined;
}

function toLineItem(row: CheckoutLineItemRow | OrderLineItemRow): LineItem {
  return {
    id: row.id,
    productId: row.productId,
    variantId: orUndefined(row.variantId),
    title: row.title,
    price: row.price,
    quantity: row.quantity,
  };
}

function toCheckout(
  row: CheckoutRow,
  items: CheckoutLineItemRow[],
  applied: AppliedDiscount[]
): Checkout {
  return {
    id: row.id,
    status: row.status,
    currency: row.currency,
    buyerId: orUndefined(row.buyerId),
    buyer: orUndefined(row.buyerData),
    lineItems: items.map(toLineItem),
    discounts: applied,
    fulfillment: row.fulfillmentData,
    payment: {
      handlerId: orUndefined(row.paymentHandlerId),
      instrument: orUndefined(row.paymentInstrument),
    },
    subtotal: row.subtotal,
    fulfillmentPrice: row.fulfillmentPrice,
    total: row.total,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toOrder(row: OrderRow, items: OrderLineItemRow[]): Order {
  return {
    id: row.id,
    checkoutId: row.checkoutId,
    buyerId: orUndefined(row.buyerId),
    status: row.status,
    currency: row.currency,
    lineItems: items.map(toLineItem),
    fulfillment: { expectations: row.expectations, events: row.events },
    totals: {
      subtotal: row.subtotal,
      discount: row.discount,
      fulfillment: row.fulfillment,
      total: row.total,
    },
    adjustments: row.adjustments,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export class DrizzleCheckoutStore implements CheckoutStore {
  constructor(private readonly db: SyncDatabase) {}

  transaction<T>(fn: (tx: CheckoutStore) => T): T {
    return this.db.transaction((tx) => fn(new DrizzleCheckoutStore(tx)));
  }

  // -------------------------------------------------------------------------
  // Catalog
  // -------------------------------------------------------------------------

  getProduct(id: string): Product | undefined {
    return this.db.select().from(products).where(eq(products.id, id)).get();
  }

  getAvailableQuantity(productId: string): number {
    const row = this.db
      .select({ quantity: inventory.quantity })
      .from(inventory)
      .where(eq(inventory.productId, productId))
      .get();
    return row?.quantity ?? 0;
  }

  getDiscount(code: string): CatalogDiscount | undefined {
    return this.db.select().from(discounts).where(eq(discounts.code, code)).get();
  }

  listShippingRates(countryCode: string): ShippingRate[] {
    return this.db
      .select()
      .from(shippingRates)
      .where(
        and(
          eq(shippingRates.active, true),
          or(eq(shippingRates.countryCode, countryCode), eq(shippingRates.countryCode, "default"))
        )
      )
      .orderBy(sql`rowid`)
      .all();
  }

  getShippingRate(id: string): ShippingRate | undefined {
    return this.db.select().from(shippingRates).where(eq(shippingRates.id, id)).get();
  }

  listActivePromotions(): Promotion[] {
    return this.db
      .select()
      .from(promotions)
      .where(eq(promotions.active, true))
      .orderBy(sql`rowid`)
      .all();
  }

  // -------------------------------------------------------------------------
  // Customers
  // -------------------------------------------------------------------------

  findCustomerByEmail(email: string): Customer | undefined {
    return this.db
      .select()
      .from(customers)
      .where(sql`lower(${customers.email}) = ${email.toLowerCase()}`)
      .get();
  }

  createCustomer(email: string, fullName?: string): Customer {
    const customer: Customer = { id: newShortId("cust"), email, fullName: fullName ?? null };
    this.db.insert(customers).values(customer).run();
    return customer;
  }

  listCustomerAddresses(customerId: string): CustomerAddress[] {
    return this.db
      .select()
      .from(customerAddresses)
      .where(eq(customerAddresses.customerId, customerId))
      .orderBy(sql`rowid`)
      .all();
  }

  insertCustomerAddress(customerId: string, address: Address & { id: string }): void {
    this.db
      .insert(customerAddresses)
      .values({
        id: address.id,
        customerId,
        fullName: address.full_name,
        streetAddress: address.street_address,
        addressLocality: address.address_locality,
        addressRegion: address.address_region,
        postalCode: address.postal_code,
        addressCountry: address.address_country,
      })
      .run();
  }

  // -------------------------------------------------------------------------
  // Checkouts
  // -------------------------------------------------------------------------

  getCheckout(id: string): Checkout | undefined {
    const row = this.db.select().from(checkouts).where(eq(checkouts.id, id)).get();
    if (!row) return undefined;

    const items = this.db
      .select()
      .from(checkoutLineItems)
      .where(eq(checkoutLineItems.checkoutId, id))
      .orderBy(asc(checkoutLineItems.position))
      .all();
    const applied = this.db
      .select({ code: checkoutDiscounts.code, type: checkoutDiscounts.type, value: checkoutDiscounts.value })
      .from(checkoutDiscounts)
      .where(eq(checkoutDiscounts.checkoutId, id))
      .orderBy(asc(checkoutDiscounts.position))
      .all();

    return toCheckout(row, items, applied);
  }

  insertCheckout(checkout: Checkout): void {
    this.db
      .insert(checkouts)
      .values({
        id: checkout.id,
        buyerId: checkout.buyerId,
        buyerData: checkout.buyer,
        status: checkout.status,
        currency: checkout.currency,
        subtotal: checkout.subtotal,
        total: checkout.total,
        fulfillmentPrice: checkout.fulfillmentPrice,
        paymentHandlerId: checkout.payment.handlerId,
        paymentInstrument: checkout.payment.instrument,
        fulfillmentData: checkout.fulfillment,
        createdAt: checkout.createdAt,
        updatedAt: checkout.updatedAt,
      })
      .run();
    for (const item of checkout.lineItems) {
      this.insertLineItem(checkout.id, item);
    }
    for (const discount of checkout.discounts) {
      this.insertCheckoutDiscount(checkout.id, discount);
    }
  }

  updateCheckout(id: string, patch: CheckoutPatch): void {
    const set: Partial<typeof checkouts.$inferInsert> = { updatedAt: patch.updatedAt };
    if (patch.status !== undefined) set.status = patch.status;
    if (patch.currency !== undefined) set.currency = patch.currency;
    if (patch.buyer !== undefined) {
      set.buyerData = patch.buyer;
      set.buyerId = patch.buyer.id ?? null;
    }
    if (patch.subtotal !== undefined) set.subtotal = patch.subtotal;
    if (patch.fulfillmentPrice !== undefined) set.fulfillmentPrice = patch.fulfillmentPrice;
    if (patch.total !== undefined) set.total = patch.total;
    if (patch.payment !== undefined) {
      set.paymentHandlerId = patch.payment.handlerId ?? null;
      set.paymentInstrument = patch.payment.instrument ?? null;
    }
    if (patch.fulfillment !== undefined) set.fulfillmentData = patch.fulfillment;

    this.db.update(checkouts).set(set).where(eq(checkouts.id, id)).run();
  }

  insertLineItem(checkoutId: string, item: LineItem): void {
    const last = this.db
      .select({ position: sql<number>`coalesce(max(${checkoutLineItems.position}), -1)` })
      .from(checkoutLineItems)
      .where(eq(checkoutLineItems.checkoutId, checkoutId))
      .get();
    this.db
      .insert(checkoutLineItems)
      .values({
        id: item.id,
        checkoutId,
        productId: item.productId,
        variantId: item.variantId,
        title: item.title,
        price: item.price,
        quantity: item.quantity,
        position: (last?.position ?? -1) + 1,
      })
      .run();
  }

  updateLineItemQuantity(checkoutId: string, lineItemId: string, quantity: number): void {
    this.db
      .update(checkoutLineItems)
      .set({ quantity })
      .where(and(eq(checkoutLineItems.checkoutId, checkoutId), eq(checkoutLineItems.id, lineItemId)))
      .run();
  }

  deleteLineItem(checkoutId: string, lineItemId: string): void {
    this.db
      .delete(checkoutLineItems)
      .where(and(eq(checkoutLineItems.checkoutId, checkoutId), eq(checkoutLineItems.id, lineItemId)))
      .run();
  }

  insertCheckoutDiscount(checkoutId: string, discount: AppliedDiscount): boolean {
    const last = this.db
      .select({ position: sql<number>`coalesce(max(${checkoutDiscounts.position}), -1)` })
      .from(checkoutDiscounts)
      .where(eq(checkoutDiscounts.checkoutId, checkoutId))
      .get();
    const result = this.db
      .insert(checkoutDiscounts)
      .values({
        checkoutId,
        code: discount.code,
        type: discount.type,
        value: discount.value,
        position: (last?.position ?? -1) + 1,
      })
      .onConflictDoNothing()
      .run();
    return result.changes > 0;
  }

  // -------------------------------------------------------------------------
  // Orders
  // -------------------------------------------------------------------------

  insertOrder(order: Order): void {
    this.db
      .insert(orders)
      .values({
        id: order.id,
        checkoutId: order.checkoutId,
        buyerId: order.buyerId,
        status: order.status,
        currency: order.currency,
        subtotal: order.totals.subtotal,
        discount: order.totals.discount,
        fulfillment: order.totals.fulfillment,
        total: order.totals.total,
        expectations: order.fulfillment.expectations,
        events: order.fulfillment.events,
        adjustments: order.adjustments,
        createdAt: order.createdAt,
        updatedAt: order.updatedAt,
      })
      .run();
    order.lineItems.forEach((item, position) => {
      this.db
        .insert(orderLineItems)
        .values({
          id: item.id,
          orderId: order.id,
          productId: item.productId,
          variantId: item.variantId,
          title: item.title,
          price: item.price,
          quantity: item.quantity,
          position,
        })
        .run();
    });
  }

  getOrder(id: string): Order | undefined {
    const row = this.db.select().from(orders).where(eq(orders.id, id)).get();
    if (!row) return undefined;
    return toOrder(row, this.orderItems([row.id]).get(row.id) ?? []);
  }

  listOrders(query: OrderQuery): Order[] {
    const rows = this.db
      .select()
      .from(orders)
      .where(query.buyerId !== undefined ? eq(orders.buyerId, query.buyerId) : undefined)
      .orderBy(desc(orders.createdAt), desc(sql`rowid`))
      .limit(query.limit)
      .offset(query.offset)
      .all();
    const items = this.orderItems(rows.map((r) => r.id));
    return rows.map((row) => toOrder(row, items.get(row.id) ?? []));
  }

  updateOrder(id: string, patch: OrderPatch): void {
    const set: Partial<typeof orders.$inferInsert> = { updatedAt: patch.updatedAt };
    if (patch.status !== undefined) set.status = patch.status;
    if (patch.events !== undefined) set.events = patch.events;
    if (patch.adjustments !== undefined) set.adjustments = patch.adjustments;
    this.db.update(orders).set(set).where(eq(orders.id, id)).run();
  }

  private orderItems(orderIds: string[]): Map<string, OrderLineItemRow[]> {
    const byOrder = new Map<string, OrderLineItemRow[]>();
    if (orderIds.length === 0) return byOrder;
    const rows = this.db
      .select()
      .from(orderLineItems)
      .where(inArray(orderLineItems.orderId, orderIds))
      .orderBy(asc(orderLineItems.position))
      .all();
    for (const row of rows) {
      const list = byOrder.get(row.orderId) ?? [];
      list.push(row);
      byOrder.set(row.orderId, list);
    }
    return byOrder;
  }
}
