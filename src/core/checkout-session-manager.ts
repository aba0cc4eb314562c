/**
 * Checkout Session Manager
 *
 * Drives a checkout from `incomplete` to `completed` or `canceled`. Every
 * mutation holds the checkout's lock and runs in one store transaction, so a
 * failed step leaves nothing behind. Subtotal, fulfillment price and total
 * are recomputed before each write.
 */

import type { CheckoutStore } from "../db/store";
import type { ShopConfig } from "../types/config";
import type {
  Checkout,
  FulfillmentGroup,
  FulfillmentMethod,
  FulfillmentOption,
  FulfillmentState,
  Order,
  PaymentInstrument,
  PaymentSelection,
} from "../types/checkout";
import {
  FulfillmentRequiredError,
  InvalidStateError,
  NotFoundError,
  PaymentFailureError,
  ValidationError,
} from "./errors";
import { FulfillmentResolver } from "./fulfillment";
import {
  addressesMatch,
  createDestinationDirectory,
  destinationCountry,
  emptyFulfillment,
  hasSelectedDestination,
  hasSelectedOption,
  reconcileFulfillment,
  selectedDestination,
} from "./fulfillment-state";
import { newId } from "./ids";
import { KeyedMutex } from "./keyed-mutex";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { OrderFactory } from "./order-factory";
import { recalculate } from "./pricing";
import type {
  AddLineItemRequest,
  ApplyDiscountRequest,
  CompleteCheckoutRequest,
  CreateCheckoutRequest,
  PaymentRequest,
  SetFulfillmentRequest,
  SetPaymentRequest,
  UpdateCheckoutRequest,
  UpdateLineItemRequest,
} from "./request-schemas";

export type SessionConfig = Pick<
  ShopConfig,
  "defaultCurrency" | "paymentFailureInstrumentId" | "ucp"
>;

export interface CheckoutSessionManagerOptions {
  store: CheckoutStore;
  config: SessionConfig;
  resolver?: FulfillmentResolver;
  orderFactory?: OrderFactory;
  locks?: KeyedMutex;
  logger?: Logger;
  now?: () => Date;
}

export interface CompletionResult {
  checkout: Checkout;
  order: Order;
}

function withoutSelection(group: FulfillmentGroup): FulfillmentGroup {
  return group.line_item_ids ? { id: group.id, line_item_ids: group.line_item_ids } : { id: group.id };
}

type CheckoutChanges = Partial<Pick<Checkout, "currency" | "buyer" | "payment" | "fulfillment">>;

export class CheckoutSessionManager {
  private readonly store: CheckoutStore;
  private readonly config: SessionConfig;
  private readonly resolver: FulfillmentResolver;
  private readonly orderFactory: OrderFactory;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CheckoutSessionManagerOptions) {
    this.store = options.store;
    this.config = options.config;
    this.resolver = options.resolver ?? new FulfillmentResolver(options.store);
    this.orderFactory = options.orderFactory ?? new OrderFactory({ now: options.now });
    this.locks = options.locks ?? new KeyedMutex();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get fulfillmentResolver(): FulfillmentResolver {
    return this.resolver;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async createCheckout(input: CreateCheckoutRequest): Promise<Checkout> {
    const checkout = this.store.transaction((tx) => {
      const timestamp = this.now().toISOString();
      const draft: Checkout = {
        id: newId("checkout"),
        status: "incomplete",
        currency: input.currency ?? this.config.defaultCurrency,
        buyerId: input.buyer?.id,
        buyer: input.buyer,
        lineItems: [],
        discounts: [],
        fulfillment: emptyFulfillment(),
        payment: input.payment ? this.paymentSelection(input.payment, {}) : {},
        subtotal: 0,
        fulfillmentPrice: 0,
        total: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      const requested = new Map<string, number>();
      input.line_items.forEach((li, i) => {
        const product = tx.getProduct(li.item.id);
        if (!product) {
          throw new ValidationError(`Product not found: ${li.item.id}`, `$.line_items[${i}].item.id`);
        }
        const quantity = (requested.get(product.id) ?? 0) + li.quantity;
        this.assertStock(tx, product.id, quantity);
        requested.set(product.id, quantity);
        draft.lineItems.push({
          id: newId("li"),
          productId: product.id,
          variantId: li.item.variant_id,
          title: product.title,
          price: product.price,
          quantity: li.quantity,
        });
      });

      if (input.fulfillment) {
        draft.fulfillment = reconcileFulfillment(
          draft.fulfillment,
          input.fulfillment,
          createDestinationDirectory(tx, draft.buyer?.email)
        );
      }

      const priced = this.reprice(draft);
      tx.insertCheckout(priced);
      return priced;
    });

    this.logger.info("checkout_created", {
      checkout_id: checkout.id,
      line_items: checkout.lineItems.length,
      total: checkout.total,
    });
    return checkout;
  }

  async getCheckout(id: string): Promise<Checkout> {
    return this.requireCheckout(this.store, id);
  }

  async updateCheckout(id: string, input: UpdateCheckoutRequest): Promise<Checkout> {
    return this.mutate(id, "update", (tx, checkout) => {
      const changes: CheckoutChanges = {};
      if (input.currency) changes.currency = input.currency;
      if (input.buyer) changes.buyer = { ...checkout.buyer, ...input.buyer };

      input.line_items?.forEach((entry, i) => {
        if ("id" in entry) {
          this.setQuantity(tx, checkout, entry.id, entry.quantity, `$.line_items[${i}]`);
        } else {
          this.addProduct(tx, checkout, entry.item.id, entry.quantity, entry.item.variant_id);
        }
      });

      input.discounts?.codes.forEach((code, i) => {
        this.applyDiscountCode(tx, checkout.id, code, `$.discounts.codes[${i}]`);
      });

      if (input.payment) {
        changes.payment = this.paymentSelection(input.payment, checkout.payment);
      }

      if (input.fulfillment) {
        const email = (changes.buyer ?? checkout.buyer)?.email;
        changes.fulfillment = reconcileFulfillment(
          checkout.fulfillment,
          input.fulfillment,
          createDestinationDirectory(tx, email)
        );
      }
      return changes;
    });
  }

  async completeCheckout(id: string, input: CompleteCheckoutRequest = {}): Promise<CompletionResult> {
    const result = await this.locks.runExclusive(id, () =>
      this.store.transaction((tx) => {
        const current = this.requireCheckout(tx, id);
        this.assertIncomplete(current, "complete");

        if (current.lineItems.length === 0) {
          throw new ValidationError("Cannot complete a checkout without line items", "$.line_items");
        }
        const checkout = this.reprice(current);
        if (!hasSelectedDestination(checkout.fulfillment)) {
          throw new FulfillmentRequiredError("A fulfillment destination must be selected");
        }
        if (!hasSelectedOption(checkout.fulfillment)) {
          throw new FulfillmentRequiredError("A fulfillment option must be selected");
        }

        const payment = input.payment
          ? this.paymentSelection(input.payment, checkout.payment)
          : checkout.payment;
        const instrumentId = input.payment_data?.id ?? payment.instrument?.id;
        if (instrumentId === this.config.paymentFailureInstrumentId) {
          throw new PaymentFailureError(instrumentId);
        }

        const completed: Checkout = {
          ...checkout,
          payment,
          status: "completed",
          updatedAt: this.now().toISOString(),
        };
        const order = this.orderFactory.createFromCheckout(completed);
        tx.insertOrder(order);
        this.save(tx, completed);
        return { checkout: completed, order };
      })
    );

    this.logger.info("checkout_completed", {
      checkout_id: id,
      order_id: result.order.id,
      total: result.order.totals.total,
    });
    return result;
  }

  async cancelCheckout(id: string): Promise<Checkout> {
    const checkout = await this.locks.runExclusive(id, () =>
      this.store.transaction((tx) => {
        const current = this.requireCheckout(tx, id);
        this.assertIncomplete(current, "cancel");
        const canceled: Checkout = {
          ...current,
          status: "canceled",
          updatedAt: this.now().toISOString(),
        };
        tx.updateCheckout(id, { status: "canceled", updatedAt: canceled.updatedAt });
        return canceled;
      })
    );
    this.logger.info("checkout_canceled", { checkout_id: id });
    return checkout;
  }

  // -------------------------------------------------------------------------
  // Line items, discounts, fulfillment, payment
  // -------------------------------------------------------------------------

  async addLineItem(id: string, input: AddLineItemRequest): Promise<Checkout> {
    return this.mutate(id, "add line items to", (tx, checkout) => {
      this.addProduct(tx, checkout, input.product_id, input.quantity, input.variant_id);
      return {};
    });
  }

  async updateLineItem(id: string, lineItemId: string, input: UpdateLineItemRequest): Promise<Checkout> {
    return this.mutate(id, "update line items of", (tx, checkout) => {
      this.setQuantity(tx, checkout, lineItemId, input.quantity, "$.quantity");
      return {};
    });
  }

  async removeLineItem(id: string, lineItemId: string): Promise<Checkout> {
    return this.mutate(id, "remove line items from", (tx, checkout) => {
      this.requireLineItem(checkout, lineItemId);
      tx.deleteLineItem(checkout.id, lineItemId);
      return {};
    });
  }

  async applyDiscount(id: string, input: ApplyDiscountRequest): Promise<Checkout> {
    return this.mutate(id, "apply discounts to", (tx, checkout) => {
      this.applyDiscountCode(tx, checkout.id, input.code, "$.code");
      return {};
    });
  }

  /**
   * Select a shipping rate by id. The rate becomes the selected option of
   * every group of the method of its type; an address, when given, becomes
   * the selected destination.
   */
  async setFulfillment(id: string, input: SetFulfillmentRequest): Promise<Checkout> {
    return this.mutate(id, "set fulfillment on", (tx, checkout) => {
      const rate = tx.getShippingRate(input.method_id);
      if (!rate || !rate.active) {
        throw new ValidationError(`Unknown fulfillment method: ${input.method_id}`, "$.method_id");
      }

      const methods = checkout.fulfillment.methods.map((m) => ({ ...m }));
      let index = methods.findIndex((m) => m.type === rate.type);
      if (index < 0) {
        methods.push({ id: `${rate.type}_method_${methods.length}`, type: rate.type, destinations: [], groups: [] });
        index = methods.length - 1;
      }
      const method: FulfillmentMethod = methods[index];

      if (input.address) {
        const address = input.address;
        const match = method.destinations.find((d) => addressesMatch(d, address));
        if (match) {
          method.selected_destination_id = match.id;
        } else {
          const destId = createDestinationDirectory(tx, checkout.buyer?.email).register(address);
          method.destinations = [...method.destinations, { ...address, id: destId }];
          method.selected_destination_id = destId;
        }
      }

      const groups = method.groups.length > 0 ? method.groups : [{ id: `group_${index}_0` }];
      method.groups = groups.map((g) => ({ ...withoutSelection(g), selected_option_id: rate.id }));

      return { fulfillment: { methods } };
    });
  }

  async setPayment(id: string, input: SetPaymentRequest): Promise<Checkout> {
    return this.mutate(id, "set payment on", () => {
      this.assertPaymentHandler(input.handler_id);
      return { payment: { handlerId: input.handler_id, instrument: input.instrument } };
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async mutate(
    id: string,
    operation: string,
    apply: (tx: CheckoutStore, checkout: Checkout) => CheckoutChanges
  ): Promise<Checkout> {
    const checkout = await this.locks.runExclusive(id, () =>
      this.store.transaction((tx) => {
        const current = this.requireCheckout(tx, id);
        this.assertIncomplete(current, operation);
        const changes = apply(tx, current);

        // line items and discounts may have changed underneath
        const reloaded = this.requireCheckout(tx, id);
        const next = this.reprice({
          ...reloaded,
          ...changes,
          updatedAt: this.now().toISOString(),
        });
        this.save(tx, next);
        return next;
      })
    );
    this.logger.debug("checkout_updated", { checkout_id: id, operation, total: checkout.total });
    return checkout;
  }

  private save(tx: CheckoutStore, checkout: Checkout): void {
    tx.updateCheckout(checkout.id, {
      status: checkout.status,
      currency: checkout.currency,
      buyer: checkout.buyer,
      payment: checkout.payment,
      fulfillment: checkout.fulfillment,
      subtotal: checkout.subtotal,
      fulfillmentPrice: checkout.fulfillmentPrice,
      total: checkout.total,
      updatedAt: checkout.updatedAt,
    });
  }

  private requireCheckout(store: CheckoutStore, id: string): Checkout {
    const checkout = store.getCheckout(id);
    if (!checkout) throw new NotFoundError("checkout", id);
    return checkout;
  }

  private assertIncomplete(checkout: Checkout, operation: string): void {
    if (checkout.status !== "incomplete") {
      throw new InvalidStateError("checkout", checkout.status, operation);
    }
  }

  private requireLineItem(checkout: Checkout, lineItemId: string) {
    const item = checkout.lineItems.find((li) => li.id === lineItemId);
    if (!item) throw new NotFoundError("line_item", lineItemId);
    return item;
  }

  private assertStock(tx: CheckoutStore, productId: string, quantity: number): void {
    const available = tx.getAvailableQuantity(productId);
    if (available < quantity) {
      throw new ValidationError(
        `Insufficient stock for ${productId}: requested ${quantity}, available ${available}`
      );
    }
  }

  /** Adds a product, merging into an existing line for the same product and variant. */
  private addProduct(
    tx: CheckoutStore,
    checkout: Checkout,
    productId: string,
    quantity: number,
    variantId?: string
  ): void {
    const product = tx.getProduct(productId);
    if (!product) throw new ValidationError(`Product not found: ${productId}`);

    const current = tx.getCheckout(checkout.id)?.lineItems ?? checkout.lineItems;
    const existing = current.find((li) => li.productId === productId && li.variantId === variantId);
    if (existing) {
      this.assertStock(tx, productId, existing.quantity + quantity);
      tx.updateLineItemQuantity(checkout.id, existing.id, existing.quantity + quantity);
      return;
    }

    this.assertStock(tx, productId, quantity);
    tx.insertLineItem(checkout.id, {
      id: newId("li"),
      productId,
      variantId,
      title: product.title,
      price: product.price,
      quantity,
    });
  }

  private setQuantity(
    tx: CheckoutStore,
    checkout: Checkout,
    lineItemId: string,
    quantity: number,
    path: string
  ): void {
    const item = this.requireLineItem(checkout, lineItemId);
    if (quantity === 0) {
      tx.deleteLineItem(checkout.id, lineItemId);
      return;
    }
    const available = tx.getAvailableQuantity(item.productId);
    if (available < quantity) {
      throw new ValidationError(
        `Insufficient stock for ${item.productId}: requested ${quantity}, available ${available}`,
        path
      );
    }
    tx.updateLineItemQuantity(checkout.id, lineItemId, quantity);
  }

  private applyDiscountCode(tx: CheckoutStore, checkoutId: string, code: string, path: string): void {
    const discount = tx.getDiscount(code);
    if (!discount || !discount.active) {
      throw new ValidationError(`Invalid discount code: ${code}`, path);
    }
    const added = tx.insertCheckoutDiscount(checkoutId, {
      code: discount.code,
      type: discount.type,
      value: discount.value,
    });
    if (!added) this.logger.debug("discount_already_applied", { checkout_id: checkoutId, code });
  }

  private assertPaymentHandler(handlerId: string): void {
    const handlers = this.config.ucp.paymentHandlers;
    const known = Object.entries(handlers).some(
      ([namespace, list]) => namespace === handlerId || list.some((h) => h.id === handlerId)
    );
    if (!known) {
      throw new ValidationError(`Unknown payment handler: ${handlerId}`, "$.handler_id");
    }
  }

  private paymentSelection(input: PaymentRequest, current: PaymentSelection): PaymentSelection {
    if (input.handler_id) this.assertPaymentHandler(input.handler_id);
    const instruments = input.instruments ?? [];
    const chosen: PaymentInstrument | undefined =
      instruments.find((i) => i.id === input.selected_instrument_id) ??
      instruments.find((i) => i.selected) ??
      instruments[0] ??
      (input.selected_instrument_id ? { id: input.selected_instrument_id } : current.instrument);
    return {
      handlerId: input.handler_id ?? chosen?.handler_id ?? current.handlerId,
      instrument: chosen,
    };
  }

  /**
   * Price the selected option of every group. A selection made in this
   * request (no remembered title) must resolve; a stored one that no longer
   * resolves is dropped.
   */
  private reprice(checkout: Checkout): Checkout {
    const productIds = checkout.lineItems.map((li) => li.productId);
    const subtotal = checkout.lineItems.reduce((sum, li) => sum + li.price * li.quantity, 0);
    let fulfillmentPrice = 0;

    const methods = checkout.fulfillment.methods.map((method, i) => ({
      ...method,
      groups: method.groups.map((group, j) => {
        if (!group.selected_option_id) return withoutSelection(group);
        const option = this.priceSelection(method, group.selected_option_id, productIds, subtotal);
        if (!option) {
          if (group.selected_option_title === undefined) {
            throw new ValidationError(
              `Unknown fulfillment option: ${group.selected_option_id}`,
              `$.fulfillment.methods[${i}].groups[${j}].selected_option_id`
            );
          }
          this.logger.warn("fulfillment_option_dropped", {
            checkout_id: checkout.id,
            option_id: group.selected_option_id,
          });
          return withoutSelection(group);
        }
        fulfillmentPrice += option.price;
        return { ...group, selected_option_title: option.title };
      }),
    }));
    const fulfillment: FulfillmentState = { methods };

    const pricing = recalculate({
      lineItems: checkout.lineItems,
      discounts: checkout.discounts,
      fulfillmentPrice,
      currency: checkout.currency,
    });
    return {
      ...checkout,
      fulfillment,
      subtotal: pricing.subtotal,
      fulfillmentPrice: pricing.fulfillmentPrice,
      total: pricing.total,
    };
  }

  private priceSelection(
    method: FulfillmentMethod,
    optionId: string,
    productIds: string[],
    subtotal: number
  ): FulfillmentOption | undefined {
    const destination = selectedDestination(method);
    if (destination) {
      const offered = this.resolver
        .calculateOptions(destinationCountry(destination), productIds, subtotal, method.type)
        .find((o) => o.id === optionId);
      if (offered) return offered;
    }
    const rate = this.resolver.resolveRate(optionId, productIds, subtotal);
    return rate && rate.type === method.type ? rate : undefined;
  }
}
