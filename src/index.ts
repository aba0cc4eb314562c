/**
 * UCP Checkout Engine
 *
 * Checkout sessions, pricing, fulfillment resolution, idempotent mutations
 * and order webhooks behind a transport-neutral API and an MCP tool surface.
 *
 * @example
 * ```typescript
 * import { CheckoutApi, createShop, loadConfig, seedDemoCatalog } from "ucp-checkout-engine";
 *
 * const shop = createShop({ config: loadConfig() });
 * seedDemoCatalog(shop.database.db);
 * const api = new CheckoutApi(shop);
 * const res = await api.createCheckout({ body: { line_items: [{ item: { id: "prod_wool_socks" } }] } });
 * ```
 */

// Types
export type { ShopConfig, UcpConfig, PaymentHandlerConfig, CacheLimits } from "./types/config";
export type {
  Address, BuyerProfile, Checkout, LineItem, AppliedDiscount, FulfillmentState,
  FulfillmentMethod, FulfillmentGroup, FulfillmentDestination, FulfillmentOption,
  PaymentSelection, PaymentInstrument, Order, OrderStatus, OrderLineItem,
  FulfillmentExpectation, FulfillmentEvent, OrderAdjustment, PricingResult,
} from "./types/checkout";
export type {
  CheckoutStatus, UcpCheckoutView, UcpOrderView, UcpTotal, UcpLineItem, UcpEnvelope, UcpMcpMeta,
} from "./types/ucp";
export { TERMINAL_STATUSES, CHECKOUT_CAPABILITY, ORDER_CAPABILITY } from "./types/ucp";

// Configuration & logging
export { loadConfig, defaultPaymentHandlers, ensureHttpsBaseUrl, UCP_VERSION } from "./core/config";
export { createLogger, silentLogger } from "./core/logger";
export type { Logger, LogLevel, LogSink } from "./core/logger";

// Errors
export {
  CommerceError, NotFoundError, ValidationError, FulfillmentRequiredError,
  PaymentFailureError, IdempotencyConflictError, InvalidStateError,
  ForbiddenError, QueueFullError, isCommerceError,
} from "./core/errors";
export type { CommerceErrorCode } from "./core/errors";

// Engine
export { createShop } from "./core/shop";
export type { Shop, ShopOptions } from "./core/shop";
export { recalculate, applyDiscount, discountTitle } from "./core/pricing";
export { FulfillmentResolver } from "./core/fulfillment";
export { reconcileFulfillment } from "./core/fulfillment-state";
export { IdempotencyGuard, hashRequest, canonicalJson } from "./core/idempotency";
export { BoundedCache } from "./core/bounded-cache";
export { KeyedMutex } from "./core/keyed-mutex";
export { CheckoutSessionManager } from "./core/checkout-session-manager";
export { OrderFactory } from "./core/order-factory";
export { OrderManager } from "./core/order-manager";
export { WebhookNotifier, parseProfileUrl, findWebhookUrl } from "./core/webhook-notifier";
export { buildCheckoutResponse, buildOrderResponse } from "./core/ucp-response";

// Currency utilities
export { minorToMajor, formatCurrencyDisplay, getCurrencyExponent } from "./core/currency";

// Persistence
export { createDatabase } from "./db";
export type { ShopDatabase, DatabaseHandle } from "./db";
export { DrizzleCheckoutStore } from "./db/store";
export type { CheckoutStore } from "./db/store";
export { seedCatalog, seedDemoCatalog, catalogSeedSchema } from "./db/seed";
export type { CatalogSeed } from "./db/seed";

// Surfaces
export { CheckoutApi } from "./handlers/checkout-api";
export type { ApiRequest, ApiResponse } from "./handlers/checkout-api";
export { createMcpServer } from "./handlers/mcp-route";
export { buildDiscoveryProfile } from "./handlers/well-known-ucp";
