import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createTestShop, steppingClock, TEST_SIMULATION_SECRET, type TestShopOptions } from "../../db/test-utils";
import type { Shop } from "../../core/shop";
import { CheckoutApi } from "../checkout-api";
import { checkouts } from "../../db/schema";

const US_ADDRESS = { street_address: "1 Main St", postal_code: "12207", address_country: "US" };
const PROFILE_URL = "https://agent.example/profile.json";
const HOOK_URL = "https://agent.example/hooks/orders";

const idBody = z.object({ id: z.string() });
const errorBody = z.object({ error: z.string(), message: z.string(), path: z.string().optional() });
const completedBody = z.object({
  status: z.string(),
  order: z.object({ id: z.string(), status: z.string(), permalink_url: z.string() }),
});

let shop: Shop | undefined;

afterEach(async () => {
  await shop?.close();
  shop = undefined;
});

function setup(options: TestShopOptions = {}): CheckoutApi {
  shop = createTestShop({ now: steppingClock(), ...options });
  return new CheckoutApi(shop);
}

async function openCheckout(api: CheckoutApi): Promise<string> {
  const res = await api.createCheckout({
    body: { line_items: [{ item: { id: "prod_wool_socks" }, quantity: 2 }] },
  });
  return idBody.parse(res.body).id;
}

async function readyCheckout(api: CheckoutApi): Promise<string> {
  const id = await openCheckout(api);
  await api.setFulfillment(id, { body: { method_id: "rate_std_us", address: US_ADDRESS } });
  return id;
}

describe("CheckoutApi", () => {
  it("creates a checkout with 201 and catalog totals", async () => {
    const api = setup();
    const res = await api.createCheckout({
      body: { line_items: [{ item: { id: "prod_wool_socks" }, quantity: 2 }] },
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      status: "incomplete",
      currency: "USD",
      totals: [
        { type: "subtotal", display_text: "Subtotal", amount: 3600 },
        { type: "total", display_text: "Total", amount: 3600 },
      ],
    });
  });

  it("answers validation errors with the offending path", async () => {
    const api = setup();
    const res = await api.createCheckout({
      body: { line_items: [{ item: { id: "prod_wool_socks" }, quantity: 0 }] },
    });

    expect(res.status).toBe(400);
    expect(errorBody.parse(res.body)).toEqual({
      error: "validation_error",
      message: "$.line_items[0].quantity: Number must be greater than or equal to 1",
      path: "$.line_items[0].quantity",
    });
  });

  it("answers 404 for a missing checkout", async () => {
    const api = setup();
    const res = await api.getCheckout("checkout_missing");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "not_found", message: "checkout checkout_missing not found" });
  });

  it("replays an idempotent create and rejects a reused key", async () => {
    const api = setup();
    const body = { line_items: [{ item: { id: "prod_water_bottle" }, quantity: 1 }] };

    const first = await api.createCheckout({ body, idempotencyKey: "key-1" });
    const replay = await api.createCheckout({ body, idempotencyKey: "key-1" });
    expect(replay.status).toBe(201);
    expect(idBody.parse(replay.body).id).toBe(idBody.parse(first.body).id);

    const conflict = await api.createCheckout({
      body: { line_items: [{ item: { id: "prod_water_bottle" }, quantity: 2 }] },
      idempotencyKey: "key-1",
    });
    expect(conflict.status).toBe(409);
    expect(errorBody.parse(conflict.body).error).toBe("idempotency_conflict");

    const other = await api.createCheckout({ body, idempotencyKey: "key-2" });
    expect(idBody.parse(other.body).id).not.toBe(idBody.parse(first.body).id);
  });

  it("replays byte-identical responses and creates one checkout", async () => {
    const api = setup();
    const body = { line_items: [{ item: { id: "prod_water_bottle" }, quantity: 1 }] };

    const first = await api.createCheckout({ body, idempotencyKey: "key-seq" });
    const replay = await api.createCheckout({ body, idempotencyKey: "key-seq" });
    expect(JSON.stringify(replay.body)).toBe(JSON.stringify(first.body));
    expect(shop?.database.db.select().from(checkouts).all()).toHaveLength(1);

    const [a, b] = await Promise.all([
      api.createCheckout({ body, idempotencyKey: "key-par" }),
      api.createCheckout({ body, idempotencyKey: "key-par" }),
    ]);
    expect(a.status).toBe(201);
    expect(b.status).toBe(201);
    expect(JSON.stringify(b.body)).toBe(JSON.stringify(a.body));
    expect(shop?.database.db.select().from(checkouts).all()).toHaveLength(2);
  });

  it("does not remember failed mutations", async () => {
    const api = setup();
    const id = await openCheckout(api);

    const failed = await api.completeCheckout(id, { idempotencyKey: "key-c" });
    expect(failed.status).toBe(400);
    expect(errorBody.parse(failed.body).error).toBe("fulfillment_required");

    await api.setFulfillment(id, { body: { method_id: "rate_std_us", address: US_ADDRESS } });
    const retried = await api.completeCheckout(id, { idempotencyKey: "key-c" });
    expect(retried.status).toBe(200);
  });

  it("completes a checkout, links the order and notifies the agent", async () => {
    const posted: unknown[] = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
      if (url === PROFILE_URL) {
        return new Response(
          JSON.stringify({
            ucp: { capabilities: { "dev.ucp.shopping.order": [{ config: { webhook_url: HOOK_URL } }] } },
          }),
          { status: 200 }
        );
      }
      if (url === HOOK_URL) {
        posted.push(JSON.parse(String(init?.body)));
        return new Response(null, { status: 204 });
      }
      return new Response(null, { status: 404 });
    };
    const api = setup({ fetch: fetchImpl });
    const id = await readyCheckout(api);

    const res = await api.completeCheckout(id, {
      body: { payment_data: { id: "instr_ok" } },
      ucpAgent: `profile="${PROFILE_URL}"`,
    });
    expect(res.status).toBe(200);
    const completed = completedBody.parse(res.body);
    expect(completed.status).toBe("completed");
    expect(completed.order.status).toBe("confirmed");
    expect(completed.order.permalink_url).toBe(`http://localhost:8000/orders/${completed.order.id}`);

    await shop?.notifier.idle();
    expect(posted).toHaveLength(1);
    expect(posted[0]).toMatchObject({
      event_type: "order_placed",
      checkout_id: id,
      order: { id: completed.order.id, status: "confirmed" },
    });

    const order = await api.getOrder(completed.order.id);
    expect(order.status).toBe(200);
    expect(order.body).toMatchObject({
      id: completed.order.id,
      checkout_id: id,
      totals: [
        { type: "subtotal", display_text: "Subtotal", amount: 3600 },
        { type: "fulfillment", display_text: "Shipping", amount: 499 },
        { type: "total", display_text: "Total", amount: 4099 },
      ],
    });

    const again = await api.addLineItem(id, { body: { product_id: "prod_wool_socks" } });
    expect(again.status).toBe(409);
    expect(errorBody.parse(again.body).error).toBe("invalid_state");
  });

  it("answers 402 for a declined instrument", async () => {
    const api = setup();
    const id = await readyCheckout(api);
    const res = await api.completeCheckout(id, { body: { payment_data: { id: "instr_fail" } } });

    expect(res.status).toBe(402);
    expect(res.body).toEqual({ error: "payment_failure", message: "Payment failed for instrument instr_fail" });
    expect((await api.getCheckout(id)).body).toMatchObject({ status: "incomplete" });
  });

  it("guards shipping simulation with the secret", async () => {
    const api = setup({ env: { SIMULATION_SECRET: TEST_SIMULATION_SECRET } });
    const id = await readyCheckout(api);
    const completed = completedBody.parse((await api.completeCheckout(id)).body);

    const denied = await api.simulateShipping(completed.order.id, { simulationSecret: "wrong" });
    expect(denied.status).toBe(403);

    const shipped = await api.simulateShipping(completed.order.id, { simulationSecret: TEST_SIMULATION_SECRET });
    expect(shipped.status).toBe(200);
    expect(shipped.body).toMatchObject({ status: "shipped" });
  });

  it("lists orders with paging metadata", async () => {
    const api = setup();
    for (let i = 0; i < 2; i++) {
      await api.completeCheckout(await readyCheckout(api));
    }

    const res = await api.listOrders({ body: { limit: "1" } });
    expect(res.status).toBe(200);
    const body = z.object({ orders: z.array(idBody), limit: z.number(), offset: z.number() }).parse(res.body);
    expect(body.orders).toHaveLength(1);
    expect(body.limit).toBe(1);
    expect(body.offset).toBe(0);

    const bad = await api.listOrders({ body: { limit: 500 } });
    expect(bad.status).toBe(400);
  });

  it("serves the discovery profile", () => {
    const api = setup();
    const res = api.getDiscoveryProfile();
    const profile = z
      .object({
        ucp: z.object({
          services: z.record(z.array(z.object({ transport: z.string(), endpoint: z.string() }))),
          capabilities: z.record(z.array(z.object({ extends: z.string().optional() }))),
        }),
        payment_handlers: z.record(z.unknown()),
      })
      .parse(res.body);

    expect(res.status).toBe(200);
    expect(profile.ucp.services["dev.ucp.shopping"]).toEqual([
      { transport: "rest", endpoint: "http://localhost:8000" },
      { transport: "mcp", endpoint: "http://localhost:8000/api/mcp" },
    ]);
    expect(Object.keys(profile.ucp.capabilities)).toEqual([
      "dev.ucp.shopping.checkout",
      "dev.ucp.shopping.order",
      "dev.ucp.shopping.fulfillment",
      "dev.ucp.shopping.discount",
    ]);
    expect(profile.ucp.capabilities["dev.ucp.shopping.discount"][0].extends).toBe("dev.ucp.shopping.checkout");
    expect(Object.keys(profile.payment_handlers)).toEqual(["com.demo.mock_payment"]);
  });
});
