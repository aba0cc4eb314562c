/**
 * MCP Checkout Tools
 *
 * Exposes the checkout API as MCP tools (UCP MCP binding v2026-01-11).
 * Every tool takes a `meta` object carrying the agent profile and an
 * optional idempotency key; results are the JSON response body as text.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { UcpMcpMeta } from "../types/ucp";
import type { ApiRequest, ApiResponse, CheckoutApi } from "./checkout-api";

const metaSchema = z
  .object({
    "ucp-agent": z
      .object({ profile: z.string().describe("Platform profile URI") })
      .optional(),
    "idempotency-key": z.string().optional().describe("UUID for retry safety"),
  })
  .optional();

/** Request payloads are validated by the API, not by the tool schema. */
const payload = z.record(z.unknown());

function toRequest(meta: UcpMcpMeta | undefined, body?: unknown): ApiRequest {
  const profile = meta?.["ucp-agent"]?.profile;
  return {
    body,
    idempotencyKey: meta?.["idempotency-key"],
    ucpAgent: profile ? `profile="${profile}"` : undefined,
  };
}

function toToolResult(response: ApiResponse) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(response.body) }],
    ...(response.status >= 400 ? { isError: true } : {}),
  };
}

export function createMcpServer(api: CheckoutApi, info = { name: "UCP Checkout", version: "0.1.0" }) {
  const server = new McpServer(info);

  // -----------------------------------------------------------------------
  // Checkout lifecycle
  // -----------------------------------------------------------------------

  server.tool(
    "create_checkout",
    "UCP: Create a new checkout session. Provide line_items with item IDs referencing product IDs, and optionally buyer, fulfillment and payment.",
    { meta: metaSchema, checkout: payload.optional().describe("Checkout create request") },
    async ({ meta, checkout }) => toToolResult(await api.createCheckout(toRequest(meta, checkout)))
  );

  server.tool(
    "get_checkout",
    "UCP: Get the current state of a checkout session by ID.",
    { meta: metaSchema, id: z.string().describe("Checkout session ID") },
    async ({ id }) => toToolResult(await api.getCheckout(id))
  );

  server.tool(
    "update_checkout",
    "UCP: Update a checkout session. Omitted fields keep their current values.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      checkout: payload.describe("Checkout update request"),
    },
    async ({ meta, id, checkout }) => toToolResult(await api.updateCheckout(id, toRequest(meta, checkout)))
  );

  server.tool(
    "complete_checkout",
    "UCP: Finalize checkout and place the order.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      checkout: payload.optional().describe("Optional payment data"),
    },
    async ({ meta, id, checkout }) => toToolResult(await api.completeCheckout(id, toRequest(meta, checkout)))
  );

  server.tool(
    "cancel_checkout",
    "UCP: Cancel a checkout session.",
    { meta: metaSchema, id: z.string().describe("Checkout session ID") },
    async ({ meta, id }) => toToolResult(await api.cancelCheckout(id, toRequest(meta)))
  );

  // -----------------------------------------------------------------------
  // Cart editing
  // -----------------------------------------------------------------------

  server.tool(
    "add_line_item",
    "Add a product to the checkout. Adding the same product again increases its quantity.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      product_id: z.string().describe("Product ID"),
      variant_id: z.string().optional(),
      quantity: z.number().int().optional().describe("Defaults to 1"),
    },
    async ({ meta, id, ...body }) => toToolResult(await api.addLineItem(id, toRequest(meta, body)))
  );

  server.tool(
    "update_line_item",
    "Set the quantity of a line item. Quantity 0 removes it.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      line_item_id: z.string(),
      quantity: z.number().int(),
    },
    async ({ meta, id, line_item_id, quantity }) =>
      toToolResult(await api.updateLineItem(id, line_item_id, toRequest(meta, { quantity })))
  );

  server.tool(
    "remove_line_item",
    "Remove a line item from the checkout.",
    { meta: metaSchema, id: z.string().describe("Checkout session ID"), line_item_id: z.string() },
    async ({ meta, id, line_item_id }) =>
      toToolResult(await api.removeLineItem(id, line_item_id, toRequest(meta)))
  );

  server.tool(
    "apply_discount",
    "Apply a discount code to the checkout.",
    { meta: metaSchema, id: z.string().describe("Checkout session ID"), code: z.string() },
    async ({ meta, id, code }) => toToolResult(await api.applyDiscount(id, toRequest(meta, { code })))
  );

  server.tool(
    "set_fulfillment",
    "Select a shipping rate and, optionally, the address to ship to.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      method_id: z.string().describe("Shipping rate ID"),
      address: payload.optional().describe("Destination address"),
    },
    async ({ meta, id, ...body }) => toToolResult(await api.setFulfillment(id, toRequest(meta, body)))
  );

  server.tool(
    "set_payment",
    "Choose the payment handler and instrument for the checkout.",
    {
      meta: metaSchema,
      id: z.string().describe("Checkout session ID"),
      handler_id: z.string(),
      instrument: payload.optional(),
    },
    async ({ meta, id, ...body }) => toToolResult(await api.setPayment(id, toRequest(meta, body)))
  );

  // -----------------------------------------------------------------------
  // Orders
  // -----------------------------------------------------------------------

  server.tool(
    "get_order",
    "Get a placed order by ID.",
    { meta: metaSchema, id: z.string().describe("Order ID") },
    async ({ id }) => toToolResult(await api.getOrder(id))
  );

  server.tool(
    "list_orders",
    "List placed orders, newest first.",
    {
      meta: metaSchema,
      buyer_id: z.string().optional(),
      limit: z.number().int().optional().describe("Max orders to return (default 20)"),
      offset: z.number().int().optional(),
    },
    async ({ meta, ...query }) => toToolResult(await api.listOrders(toRequest(meta, query)))
  );

  return server;
}
