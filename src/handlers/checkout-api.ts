/**
 * Checkout API
 *
 * Transport-neutral facade over the checkout and order services. Each
 * method takes the request body plus the relevant headers and answers
 * `{ status, body }`, so HTTP routes and MCP tools share one code path.
 *
 * Mutations honour an idempotency key; errors become `{ error, message }`
 * bodies with the status their kind maps to.
 */

import type { Shop } from "../core/shop";
import type { Checkout, Order } from "../types/checkout";
import type { UcpCheckoutView } from "../types/ucp";
import { isCommerceError, ValidationError } from "../core/errors";
import type { StoredResponse } from "../core/idempotency";
import type { Logger } from "../core/logger";
import {
  addLineItemSchema,
  applyDiscountSchema,
  completeCheckoutSchema,
  createCheckoutSchema,
  listOrdersSchema,
  parseRequest,
  setFulfillmentSchema,
  setPaymentSchema,
  updateCheckoutSchema,
  updateLineItemSchema,
  updateOrderSchema,
} from "../core/request-schemas";
import { buildCheckoutResponse, buildOrderResponse, buildUcpEnvelope } from "../core/ucp-response";
import { ORDER_CAPABILITY } from "../types/ucp";
import { buildDiscoveryProfile } from "./well-known-ucp";

export interface ApiRequest {
  body?: unknown;
  /** `Idempotency-Key` header */
  idempotencyKey?: string;
  /** `UCP-Agent` header, carries the agent profile URL */
  ucpAgent?: string;
  /** `X-Simulation-Secret` header */
  simulationSecret?: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export class CheckoutApi {
  private readonly logger: Logger;

  constructor(private readonly shop: Shop) {
    this.logger = shop.logger.child("api");
  }

  /** GET /.well-known/ucp */
  getDiscoveryProfile(): ApiResponse {
    return { status: 200, body: buildDiscoveryProfile(this.shop.config) };
  }

  // -------------------------------------------------------------------------
  // Checkout
  // -------------------------------------------------------------------------

  createCheckout(req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("create_checkout", undefined, req, async () => {
      const input = parseRequest(createCheckoutSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.createCheckout(input), 201);
    });
  }

  getCheckout(id: string): Promise<ApiResponse> {
    return this.query(async () => this.checkoutResponse(await this.shop.sessions.getCheckout(id)));
  }

  updateCheckout(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("update_checkout", id, req, async () => {
      const input = parseRequest(updateCheckoutSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.updateCheckout(id, input));
    });
  }

  addLineItem(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("add_line_item", id, req, async () => {
      const input = parseRequest(addLineItemSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.addLineItem(id, input));
    });
  }

  updateLineItem(id: string, lineItemId: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("update_line_item", `${id}/${lineItemId}`, req, async () => {
      const input = parseRequest(updateLineItemSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.updateLineItem(id, lineItemId, input));
    });
  }

  removeLineItem(id: string, lineItemId: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("remove_line_item", `${id}/${lineItemId}`, req, async () =>
      this.checkoutResponse(await this.shop.sessions.removeLineItem(id, lineItemId))
    );
  }

  applyDiscount(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("apply_discount", id, req, async () => {
      const input = parseRequest(applyDiscountSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.applyDiscount(id, input));
    });
  }

  setFulfillment(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("set_fulfillment", id, req, async () => {
      const input = parseRequest(setFulfillmentSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.setFulfillment(id, input));
    });
  }

  setPayment(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("set_payment", id, req, async () => {
      const input = parseRequest(setPaymentSchema, req.body);
      return this.checkoutResponse(await this.shop.sessions.setPayment(id, input));
    });
  }

  completeCheckout(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("complete_checkout", id, req, async () => {
      const input = parseRequest(completeCheckoutSchema, req.body);
      const { checkout, order } = await this.shop.sessions.completeCheckout(id, input);
      this.notify(req, "order_placed", order);
      return this.checkoutResponse(checkout, 200, order);
    });
  }

  cancelCheckout(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("cancel_checkout", id, req, async () =>
      this.checkoutResponse(await this.shop.sessions.cancelCheckout(id))
    );
  }

  // -------------------------------------------------------------------------
  // Orders
  // -------------------------------------------------------------------------

  getOrder(id: string): Promise<ApiResponse> {
    return this.query(async () => this.orderResponse(await this.shop.orders.getOrder(id)));
  }

  listOrders(req: ApiRequest = {}): Promise<ApiResponse> {
    return this.query(async () => {
      const query = parseRequest(listOrdersSchema, req.body);
      const orders = await this.shop.orders.listOrders(query);
      return {
        status: 200,
        body: {
          ucp: buildUcpEnvelope(this.shop.config, ORDER_CAPABILITY),
          orders: orders.map((o) => buildOrderResponse(o, this.shop.config)),
          limit: query.limit,
          offset: query.offset,
        },
      };
    });
  }

  updateOrder(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("update_order", id, req, async () => {
      const input = parseRequest(updateOrderSchema, req.body);
      return this.orderResponse(await this.shop.orders.updateOrder(id, input));
    });
  }

  cancelOrder(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.mutation("cancel_order", id, req, async () =>
      this.orderResponse(await this.shop.orders.cancelOrder(id))
    );
  }

  simulateShipping(id: string, req: ApiRequest = {}): Promise<ApiResponse> {
    return this.query(async () => {
      const order = await this.shop.orders.simulateShipping(id, req.simulationSecret);
      this.notify(req, "order_shipped", order);
      return this.orderResponse(order);
    });
  }

  // -------------------------------------------------------------------------
  // Plumbing
  // -------------------------------------------------------------------------

  private checkoutResponse(checkout: Checkout, status = 200, order?: Order): ApiResponse {
    const view: UcpCheckoutView = buildCheckoutResponse(checkout, {
      config: this.shop.config,
      resolver: this.shop.resolver,
      order,
    });
    return { status, body: view };
  }

  private orderResponse(order: Order): ApiResponse {
    return { status: 200, body: buildOrderResponse(order, this.shop.config) };
  }

  private notify(req: ApiRequest, event: "order_placed" | "order_shipped", order: Order): void {
    this.shop.notifier.dispatch(
      req.ucpAgent,
      event,
      buildOrderResponse(order, this.shop.config),
      order.checkoutId
    );
  }

  private async query(run: () => Promise<ApiResponse>): Promise<ApiResponse> {
    try {
      return await run();
    } catch (err) {
      return this.errorResponse(err);
    }
  }

  /**
   * Runs a mutation under the idempotency guard. The key covers the
   * operation, its target and the body, so one key cannot be reused across
   * operations.
   */
  private async mutation(
    operation: string,
    target: string | undefined,
    req: ApiRequest,
    run: () => Promise<ApiResponse>
  ): Promise<ApiResponse> {
    const fingerprint = { operation, target: target ?? null, body: req.body ?? null };
    try {
      const stored = await this.shop.idempotency.execute(req.idempotencyKey, fingerprint, async () =>
        serialize(await run())
      );
      const body: unknown = JSON.parse(stored.body);
      return { status: stored.status, body };
    } catch (err) {
      return this.errorResponse(err);
    }
  }

  private errorResponse(err: unknown): ApiResponse {
    if (isCommerceError(err)) {
      this.logger.debug("request_rejected", { code: err.code, message: err.message });
      return {
        status: err.httpStatus,
        body: {
          error: err.code,
          message: err.message,
          ...(err instanceof ValidationError && err.path ? { path: err.path } : {}),
        },
      };
    }
    this.logger.error("request_failed", { error: err });
    return { status: 500, body: { error: "internal_error", message: "Internal server error" } };
  }
}

function serialize(response: ApiResponse): StoredResponse {
  return { status: response.status, body: JSON.stringify(response.body) };
}
