/**
 * Order Manager
 *
 * Post-purchase operations on placed orders. Events and adjustments are
 * append-only; status moves forward until the order ships or is canceled.
 */

import type { CheckoutStore } from "../db/store";
import type { FulfillmentEvent, Order, OrderAdjustment, OrderStatus } from "../types/checkout";
import { ForbiddenError, InvalidStateError, NotFoundError } from "./errors";
import { newShortId } from "./ids";
import { KeyedMutex } from "./keyed-mutex";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { ListOrdersRequest, UpdateOrderRequest } from "./request-schemas";

const CANCELABLE: readonly OrderStatus[] = ["pending", "confirmed"];
const SHIPPABLE: readonly OrderStatus[] = ["confirmed", "processing"];

export const MOCK_CARRIER = "Mock Carrier";

export interface OrderManagerOptions {
  store: CheckoutStore;
  locks?: KeyedMutex;
  /** When set, simulateShipping requires the caller to present it */
  simulationSecret?: string;
  logger?: Logger;
  now?: () => Date;
}

export class OrderManager {
  private readonly store: CheckoutStore;
  private readonly locks: KeyedMutex;
  private readonly simulationSecret?: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OrderManagerOptions) {
    this.store = options.store;
    this.locks = options.locks ?? new KeyedMutex();
    this.simulationSecret = options.simulationSecret;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async getOrder(id: string): Promise<Order> {
    return this.requireOrder(this.store, id);
  }

  /** Newest first. */
  async listOrders(query: ListOrdersRequest): Promise<Order[]> {
    return this.store.listOrders({
      buyerId: query.buyer_id,
      limit: query.limit,
      offset: query.offset,
    });
  }

  async updateOrder(id: string, input: UpdateOrderRequest): Promise<Order> {
    return this.mutate(id, (current, timestamp) => {
      if (current.status === "canceled") {
        throw new InvalidStateError("order", current.status, "update");
      }

      const events: FulfillmentEvent[] = (input.fulfillment?.events ?? []).map((e) => ({
        ...e,
        id: e.id ?? newShortId("evt"),
        timestamp: e.timestamp ?? timestamp,
      }));
      const adjustments: OrderAdjustment[] = (input.adjustments ?? []).map((a) => ({
        ...a,
        id: a.id ?? newShortId("adj"),
        occurred_at: a.occurred_at ?? timestamp,
      }));

      return {
        status: input.status ?? current.status,
        events: [...current.fulfillment.events, ...events],
        adjustments: [...current.adjustments, ...adjustments],
      };
    });
  }

  async cancelOrder(id: string): Promise<Order> {
    const order = await this.mutate(id, (current) => {
      if (!CANCELABLE.includes(current.status)) {
        throw new InvalidStateError("order", current.status, "cancel");
      }
      return { status: "canceled" };
    });
    this.logger.info("order_canceled", { order_id: id });
    return order;
  }

  /** Mark the order shipped with mock tracking details. */
  async simulateShipping(id: string, secret?: string): Promise<Order> {
    if (this.simulationSecret && secret !== this.simulationSecret) {
      throw new ForbiddenError("Invalid simulation secret");
    }

    const order = await this.mutate(id, (current, timestamp) => {
      if (!SHIPPABLE.includes(current.status)) {
        throw new InvalidStateError("order", current.status, "ship");
      }
      const trackingNumber = `MOCK${id.slice(0, 8).toUpperCase()}`;
      const shipped: FulfillmentEvent = {
        id: `event_${id}_shipped`,
        type: "shipped",
        timestamp,
        line_items: current.lineItems.map((li) => ({ id: li.id, quantity: li.quantity })),
        tracking: {
          carrier: MOCK_CARRIER,
          tracking_number: trackingNumber,
          tracking_url: `https://example.com/track/${trackingNumber}`,
        },
        description: "Shipped via simulation",
      };
      return { status: "shipped", events: [...current.fulfillment.events, shipped] };
    });

    this.logger.info("order_shipped", { order_id: id });
    return order;
  }

  // -------------------------------------------------------------------------

  private requireOrder(store: CheckoutStore, id: string): Order {
    const order = store.getOrder(id);
    if (!order) throw new NotFoundError("order", id);
    return order;
  }

  private async mutate(
    id: string,
    apply: (
      current: Order,
      timestamp: string
    ) => { status?: OrderStatus; events?: FulfillmentEvent[]; adjustments?: OrderAdjustment[] }
  ): Promise<Order> {
    return this.locks.runExclusive(`order:${id}`, () =>
      this.store.transaction((tx) => {
        const current = this.requireOrder(tx, id);
        const timestamp = this.now().toISOString();
        const patch = apply(current, timestamp);
        tx.updateOrder(id, { ...patch, updatedAt: timestamp });
        return this.requireOrder(tx, id);
      })
    );
  }
}
