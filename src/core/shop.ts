/**
 * Shop Assembly
 *
 * Wires the store, caches, locks and services for one shop instance.
 * Callers own the lifetime: `close()` stops webhook delivery and closes the
 * database.
 */

import { createDatabase, type DatabaseHandle } from "../db";
import { DrizzleCheckoutStore, type CheckoutStore } from "../db/store";
import type { ShopConfig } from "../types/config";
import { BoundedCache } from "./bounded-cache";
import { CheckoutSessionManager } from "./checkout-session-manager";
import { FulfillmentResolver } from "./fulfillment";
import { IdempotencyGuard, type IdempotencyRecord } from "./idempotency";
import { KeyedMutex } from "./keyed-mutex";
import { createLogger, type Logger } from "./logger";
import { OrderFactory } from "./order-factory";
import { OrderManager } from "./order-manager";
import { WebhookNotifier, type AgentProfile } from "./webhook-notifier";

export interface ShopOptions {
  config: ShopConfig;
  /** Existing database; opened from `config.databaseUrl` when absent */
  database?: DatabaseHandle;
  fetch?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

export interface Shop {
  config: ShopConfig;
  database: DatabaseHandle;
  store: CheckoutStore;
  resolver: FulfillmentResolver;
  sessions: CheckoutSessionManager;
  orders: OrderManager;
  idempotency: IdempotencyGuard;
  notifier: WebhookNotifier;
  logger: Logger;
  close(): Promise<void>;
}

export function createShop(options: ShopOptions): Shop {
  const { config } = options;
  const logger = options.logger ?? createLogger(config.logLevel, "shop");
  const database = options.database ?? createDatabase(config.databaseUrl);
  const store = new DrizzleCheckoutStore(database.db);
  const locks = new KeyedMutex();
  const resolver = new FulfillmentResolver(store);

  const sessions = new CheckoutSessionManager({
    store,
    config,
    resolver,
    orderFactory: new OrderFactory({ now: options.now }),
    locks,
    logger: logger.child("checkout"),
    now: options.now,
  });

  const orders = new OrderManager({
    store,
    locks,
    simulationSecret: config.simulationSecret,
    logger: logger.child("orders"),
    now: options.now,
  });

  const idempotency = new IdempotencyGuard({
    cache: new BoundedCache<IdempotencyRecord>(config.idempotency),
    locks,
    logger: logger.child("idempotency"),
  });

  const notifier = new WebhookNotifier({
    profileCache: new BoundedCache<AgentProfile>(config.profileCache),
    fetch: options.fetch,
    timeoutMs: config.webhook.timeoutMs,
    maxDeliveryLog: config.webhook.maxDeliveryLog,
    logger: logger.child("webhooks"),
    now: options.now,
  });

  return {
    config,
    database,
    store,
    resolver,
    sessions,
    orders,
    idempotency,
    notifier,
    logger,
    async close() {
      await notifier.close();
      database.close();
    },
  };
}
