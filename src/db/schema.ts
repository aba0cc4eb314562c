import {
  sqliteTable,
  integer,
  text,
  primaryKey,
} from "drizzle-orm/sqlite-core";
import type {
  BuyerProfile,
  DiscountType,
  FulfillmentEvent,
  FulfillmentExpectation,
  FulfillmentState,
  FulfillmentType,
  OrderAdjustment,
  OrderStatus,
  PaymentInstrument,
} from "../types/checkout";
import type { CheckoutStatus } from "../types/ucp";

// ---------------------------------------------------------------------------
// Catalog: Products & Inventory
// ---------------------------------------------------------------------------

export const products = sqliteTable("products", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  description: text("description"),
  category: text("category"),
  /** Price in minor units (e.g., 2999 = $29.99) */
  price: integer("price").notNull(),
  /** ISO 4217 currency code */
  currency: text("currency").default("USD").notNull(),
  imageUrl: text("image_url"),
  sku: text("sku"),
});

export const inventory = sqliteTable("inventory", {
  productId: text("product_id")
    .primaryKey()
    .references(() => products.id, { onDelete: "cascade" }),
  quantity: integer("quantity").default(0).notNull(),
  lowStockThreshold: integer("low_stock_threshold").default(5).notNull(),
});

// ---------------------------------------------------------------------------
// Catalog: Discounts, Shipping Rates & Promotions
// ---------------------------------------------------------------------------

export const discounts = sqliteTable("discounts", {
  code: text("code").primaryKey(),
  type: text("type").$type<DiscountType>().notNull(),
  /** Percent (0-100) for percentage, minor units for fixed */
  value: integer("value").notNull(),
  description: text("description"),
  active: integer("active", { mode: "boolean" }).default(true).notNull(),
});

export const shippingRates = sqliteTable("shipping_rates", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  type: text("type").$type<FulfillmentType>().default("shipping").notNull(),
  price: integer("price").notNull(),
  /** ISO country code, or "default" for the fallback rate */
  countryCode: text("country_code").default("default").notNull(),
  serviceLevel: text("service_level").default("standard").notNull(),
  deliveryDaysMin: integer("delivery_days_min"),
  deliveryDaysMax: integer("delivery_days_max"),
  active: integer("active", { mode: "boolean" }).default(true).notNull(),
});

export const promotions = sqliteTable("promotions", {
  id: text("id").primaryKey(),
  type: text("type").$type<"free_shipping">().notNull(),
  /** Threshold form: subtotal (minor units) at or above which the promotion applies */
  minSubtotal: integer("min_subtotal"),
  /** Item form: product ids that unlock the promotion */
  eligibleItemIds: text("eligible_item_ids", { mode: "json" }).$type<string[]>(),
  description: text("description"),
  active: integer("active", { mode: "boolean" }).default(true).notNull(),
});

// ---------------------------------------------------------------------------
// Customers
// ---------------------------------------------------------------------------

export const customers = sqliteTable("customers", {
  id: text("id").primaryKey(),
  email: text("email").notNull().unique(),
  fullName: text("full_name"),
});

export const customerAddresses = sqliteTable("customer_addresses", {
  id: text("id").primaryKey(),
  customerId: text("customer_id")
    .references(() => customers.id, { onDelete: "cascade" })
    .notNull(),
  fullName: text("full_name"),
  streetAddress: text("street_address"),
  addressLocality: text("address_locality"),
  addressRegion: text("address_region"),
  postalCode: text("postal_code"),
  addressCountry: text("address_country"),
});

// ---------------------------------------------------------------------------
// Checkouts
// ---------------------------------------------------------------------------

export const checkouts = sqliteTable("checkouts", {
  id: text("id").primaryKey(),
  buyerId: text("buyer_id"),
  buyerData: text("buyer_data", { mode: "json" }).$type<BuyerProfile>(),
  status: text("status").$type<CheckoutStatus>().default("incomplete").notNull(),
  currency: text("currency").notNull(),
  /** Cached derived amounts (minor units) */
  subtotal: integer("subtotal").default(0).notNull(),
  total: integer("total").default(0).notNull(),
  fulfillmentPrice: integer("fulfillment_price").default(0).notNull(),
  paymentHandlerId: text("payment_handler_id"),
  paymentInstrument: text("payment_instrument", { mode: "json" }).$type<PaymentInstrument>(),
  fulfillmentData: text("fulfillment_data", { mode: "json" })
    .$type<FulfillmentState>()
    .notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export const checkoutLineItems = sqliteTable("checkout_line_items", {
  id: text("id").primaryKey(),
  checkoutId: text("checkout_id")
    .references(() => checkouts.id, { onDelete: "cascade" })
    .notNull(),
  productId: text("product_id").notNull(),
  variantId: text("variant_id"),
  title: text("title").notNull(),
  price: integer("price").notNull(),
  quantity: integer("quantity").notNull(),
  /** Insertion order within the checkout */
  position: integer("position").notNull(),
});

export const checkoutDiscounts = sqliteTable(
  "checkout_discounts",
  {
    checkoutId: text("checkout_id")
      .references(() => checkouts.id, { onDelete: "cascade" })
      .notNull(),
    code: text("code").notNull(),
    type: text("type").$type<DiscountType>().notNull(),
    value: integer("value").notNull(),
    position: integer("position").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.checkoutId, table.code] }),
  })
);

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

export const orders = sqliteTable("orders", {
  id: text("id").primaryKey(),
  /** One order per checkout */
  checkoutId: text("checkout_id").notNull().unique(),
  buyerId: text("buyer_id"),
  status: text("status").$type<OrderStatus>().default("confirmed").notNull(),
  currency: text("currency").notNull(),
  subtotal: integer("subtotal").notNull(),
  discount: integer("discount").default(0).notNull(),
  fulfillment: integer("fulfillment").default(0).notNull(),
  total: integer("total").notNull(),
  expectations: text("expectations", { mode: "json" })
    .$type<FulfillmentExpectation[]>()
    .notNull(),
  events: text("events", { mode: "json" }).$type<FulfillmentEvent[]>().notNull(),
  adjustments: text("adjustments", { mode: "json" }).$type<OrderAdjustment[]>().notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export const orderLineItems = sqliteTable("order_line_items", {
  id: text("id").primaryKey(),
  orderId: text("order_id")
    .references(() => orders.id, { onDelete: "cascade" })
    .notNull(),
  productId: text("product_id").notNull(),
  variantId: text("variant_id"),
  title: text("title").notNull(),
  price: integer("price").notNull(),
  quantity: integer("quantity").notNull(),
  position: integer("position").notNull(),
});

// ---------------------------------------------------------------------------
// Type Exports
// ---------------------------------------------------------------------------

export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
export type InventoryRow = typeof inventory.$inferSelect;
export type CatalogDiscount = typeof discounts.$inferSelect;
export type NewCatalogDiscount = typeof discounts.$inferInsert;
export type ShippingRate = typeof shippingRates.$inferSelect;
export type NewShippingRate = typeof shippingRates.$inferInsert;
export type Promotion = typeof promotions.$inferSelect;
export type NewPromotion = typeof promotions.$inferInsert;
export type Customer = typeof customers.$inferSelect;
export type CustomerAddress = typeof customerAddresses.$inferSelect;
export type CheckoutRow = typeof checkouts.$inferSelect;
export type CheckoutLineItemRow = typeof checkoutLineItems.$inferSelect;
export type OrderRow = typeof orders.$inferSelect;
export type OrderLineItemRow = typeof orderLineItems.$inferSelect;
