/**
 * Checkout Engine Configuration Types
 *
 * Runtime settings for the engine: protocol version, URLs, caches,
 * webhook delivery and the payment sentinel.
 */

import type { LogLevel } from "../core/logger";

// ---------------------------------------------------------------------------
// UCP Configuration
// ---------------------------------------------------------------------------

export interface PaymentHandlerConfig {
  id: string;
  version: string;
  spec?: string;
  schema?: string;
  config: Record<string, unknown>;
}

export interface UcpConfig {
  /** UCP version to advertise (default: "2026-01-11") */
  version: string;
  /**
   * Payment handler declarations advertised on every checkout and
   * accepted by set_payment. Keyed by handler namespace.
   */
  paymentHandlers: Record<string, PaymentHandlerConfig[]>;
  /** Reject plain-http base URLs outside localhost */
  strict: boolean;
}

// ---------------------------------------------------------------------------
// Cache Configuration
// ---------------------------------------------------------------------------

export interface CacheLimits {
  /** Maximum number of live entries before the least recently used is evicted */
  maxEntries: number;
  /** Entry lifetime in milliseconds */
  ttlMs: number;
}

// ---------------------------------------------------------------------------
// Top-Level Configuration
// ---------------------------------------------------------------------------

export interface ShopConfig {
  ucp: UcpConfig;
  /** Public base URL, used for order permalinks and legal links */
  baseUrl: string;
  /** SQLite location, "file:./data/shop.db" or ":memory:" */
  databaseUrl: string;
  defaultCurrency: string;
  /** Instrument id that always fails payment */
  paymentFailureInstrumentId: string;
  idempotency: CacheLimits;
  profileCache: CacheLimits;
  webhook: {
    timeoutMs: number;
    /** Number of delivery records kept for inspection */
    maxDeliveryLog: number;
  };
  /** When set, simulate-shipping requests must present this value */
  simulationSecret?: string;
  logLevel: LogLevel;
}
