import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createTestShop, steppingClock } from "../../db/test-utils";
import type { Shop } from "../../core/shop";
import { CheckoutApi } from "../checkout-api";
import { createMcpServer } from "../mcp-route";

let shop: Shop;
let client: Client;

beforeEach(async () => {
  shop = createTestShop({ now: steppingClock() });
  const server = createMcpServer(new CheckoutApi(shop));
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-agent", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
  await shop.close();
});

async function call(name: string, args: Record<string, unknown>): Promise<{ isError: boolean; body: unknown }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  const body: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, body };
}

const checkoutBody = z.object({
  id: z.string(),
  line_items: z.array(z.object({ id: z.string(), quantity: z.number() })),
  totals: z.array(z.object({ type: z.string(), amount: z.number() })),
});

describe("MCP checkout tools", () => {
  it("registers every checkout and order tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "add_line_item",
      "apply_discount",
      "cancel_checkout",
      "complete_checkout",
      "create_checkout",
      "get_checkout",
      "get_order",
      "list_orders",
      "remove_line_item",
      "set_fulfillment",
      "set_payment",
      "update_checkout",
      "update_line_item",
    ]);
  });

  it("creates and edits a checkout", async () => {
    const created = await call("create_checkout", {
      meta: { "idempotency-key": "key-1" },
      checkout: { line_items: [{ item: { id: "prod_wool_socks" }, quantity: 1 }] },
    });
    expect(created.isError).toBe(false);
    const { id } = checkoutBody.parse(created.body);

    const added = checkoutBody.parse((await call("add_line_item", { id, product_id: "prod_wool_socks", quantity: 2 })).body);
    expect(added.line_items).toHaveLength(1);
    expect(added.line_items[0].quantity).toBe(3);
    expect(added.totals.find((t) => t.type === "total")?.amount).toBe(5400);

    const discounted = checkoutBody.parse((await call("apply_discount", { id, code: "SAVE5" })).body);
    expect(discounted.totals.find((t) => t.type === "total")?.amount).toBe(4900);
  });

  it("flags failures as tool errors", async () => {
    const missing = await call("get_checkout", { id: "checkout_missing" });
    expect(missing.isError).toBe(true);
    expect(missing.body).toEqual({ error: "not_found", message: "checkout checkout_missing not found" });

    const { id } = checkoutBody.parse(
      (await call("create_checkout", { checkout: { line_items: [{ item: { id: "prod_wool_socks" } }] } })).body
    );
    const incomplete = await call("complete_checkout", { id });
    expect(incomplete.isError).toBe(true);
    expect(incomplete.body).toMatchObject({ error: "fulfillment_required" });
  });

  it("places an order and reads it back", async () => {
    const { id } = checkoutBody.parse(
      (await call("create_checkout", { checkout: { line_items: [{ item: { id: "prod_water_bottle" } }] } })).body
    );
    await call("set_fulfillment", {
      id,
      method_id: "rate_std_us",
      address: { street_address: "1 Main St", address_country: "US" },
    });
    const completed = await call("complete_checkout", { id, checkout: { payment_data: { id: "instr_ok" } } });
    const { order } = z.object({ order: z.object({ id: z.string() }) }).parse(completed.body);

    const fetched = await call("get_order", { id: order.id });
    expect(fetched.body).toMatchObject({ id: order.id, checkout_id: id, status: "confirmed" });

    const listed = z.object({ orders: z.array(z.object({ id: z.string() })) }).parse((await call("list_orders", {})).body);
    expect(listed.orders.map((o) => o.id)).toEqual([order.id]);
  });
});
