import { describe, expect, it } from "vitest";
import { BoundedCache } from "../bounded-cache";
import {
  WebhookNotifier,
  findWebhookUrl,
  parseProfileUrl,
  type AgentProfile,
  type WebhookNotifierOptions,
} from "../webhook-notifier";
import type { UcpOrderView } from "../../types/ucp";

const PROFILE_URL = "https://agent.example/profiles/shopper.json";
const HOOK_URL = "https://agent.example/hooks/orders";
const AGENT_HEADER = `agent="shopper"; profile="${PROFILE_URL}"`;
const NOW = new Date("2026-01-15T10:00:00.000Z");

const ORDER: UcpOrderView = {
  ucp: { version: "2026-01-11", capabilities: { "dev.ucp.shopping.order": [{ version: "2026-01-11" }] } },
  id: "order_1",
  checkout_id: "checkout_1",
  status: "confirmed",
  currency: "USD",
  permalink_url: "http://localhost:8000/orders/order_1",
  line_items: [],
  fulfillment: { expectations: [], events: [] },
  totals: [{ type: "total", display_text: "Total", amount: 0 }],
  created_at: "2026-01-15T09:00:00.000Z",
};

const RECORD_PROFILE = {
  ucp: { capabilities: { "dev.ucp.shopping.order": [{ version: "2026-01-11", config: { webhook_url: HOOK_URL } }] } },
};

type Route = (init: RequestInit | undefined) => Promise<Response> | Response;

interface Call {
  url: string;
  init?: RequestInit;
}

function fakeFetch(routes: Record<string, Route>) {
  const calls: Call[] = [];
  const impl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    const route = routes[url];
    if (!route) throw new Error(`unexpected request to ${url}`);
    return route(init);
  };
  return { impl, calls };
}

const json = (body: unknown, status = 200) => () => new Response(JSON.stringify(body), { status });

/** Never settles until the request is aborted. */
const hang: Route = (init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });

/** Headers arrive at once; the body never does until the request is aborted. */
const stalledBody: Route = (init) =>
  new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        init?.signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
      },
    }),
    { status: 200 }
  );

function notifier(fetchImpl: typeof fetch, extra: Partial<WebhookNotifierOptions> = {}): WebhookNotifier {
  return new WebhookNotifier({
    profileCache: new BoundedCache<AgentProfile>({ maxEntries: 10 }),
    fetch: fetchImpl,
    now: () => NOW,
    ...extra,
  });
}

describe("parseProfileUrl", () => {
  it("reads the quoted profile or a bare URL", () => {
    expect(parseProfileUrl(AGENT_HEADER)).toBe(PROFILE_URL);
    expect(parseProfileUrl(` ${PROFILE_URL} `)).toBe(PROFILE_URL);
    expect(parseProfileUrl('agent="shopper"')).toBeUndefined();
    expect(parseProfileUrl(undefined)).toBeUndefined();
  });
});

describe("findWebhookUrl", () => {
  it("supports record and list capability forms", () => {
    expect(findWebhookUrl(RECORD_PROFILE)).toBe(HOOK_URL);
    expect(
      findWebhookUrl({
        capabilities: [
          { name: "dev.ucp.shopping.checkout", config: { webhook_url: "https://agent.example/other" } },
          { name: "dev.ucp.shopping.order", config: { webhook_url: HOOK_URL } },
        ],
      })
    ).toBe(HOOK_URL);
    expect(findWebhookUrl({ ucp: { capabilities: { "dev.ucp.shopping.checkout": [] } } })).toBeUndefined();
  });
});

describe("WebhookNotifier", () => {
  it("posts the order event to the profile's webhook", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: json(RECORD_PROFILE), [HOOK_URL]: json({}, 202) });
    const n = notifier(impl);

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();

    expect(calls.map((c) => c.url)).toEqual([PROFILE_URL, HOOK_URL]);
    const post = calls[1].init;
    expect(post?.method).toBe("POST");
    expect(JSON.parse(String(post?.body))).toEqual({
      event_type: "order_placed",
      checkout_id: "checkout_1",
      order: ORDER,
      timestamp: "2026-01-15T10:00:00.000Z",
    });
    expect(n.deliveries).toEqual([
      {
        url: HOOK_URL,
        eventType: "order_placed",
        orderId: "order_1",
        status: 202,
        ok: true,
        at: "2026-01-15T10:00:00.000Z",
      },
    ]);
  });

  it("fetches each profile once", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: json(RECORD_PROFILE), [HOOK_URL]: json({}) });
    const n = notifier(impl);

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();
    n.dispatch(PROFILE_URL, "order_shipped", ORDER, "checkout_1");
    await n.idle();

    expect(calls.filter((c) => c.url === PROFILE_URL)).toHaveLength(1);
    expect(calls.filter((c) => c.url === HOOK_URL)).toHaveLength(2);
  });

  it("shares one profile fetch between concurrent dispatches", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: json(RECORD_PROFILE), [HOOK_URL]: json({}) });
    const n = notifier(impl);

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    n.dispatch(PROFILE_URL, "order_shipped", ORDER, "checkout_1");
    await n.idle();

    expect(calls.filter((c) => c.url === PROFILE_URL)).toHaveLength(1);
    expect(calls.filter((c) => c.url === HOOK_URL)).toHaveLength(2);
    expect(n.deliveries.map((d) => d.eventType).sort()).toEqual(["order_placed", "order_shipped"]);
  });

  it("does not cache a failed profile fetch", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: json({ error: "down" }, 500) });
    const n = notifier(impl);

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();
    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();

    expect(calls.map((c) => c.url)).toEqual([PROFILE_URL, PROFILE_URL]);
    expect(n.deliveries).toEqual([]);
  });

  it("records delivery failures without throwing", async () => {
    const { impl } = fakeFetch({
      [PROFILE_URL]: json(RECORD_PROFILE),
      [HOOK_URL]: () => {
        throw new Error("connection refused");
      },
    });
    const n = notifier(impl);

    expect(() => n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1")).not.toThrow();
    await n.idle();

    expect(n.deliveries).toHaveLength(1);
    expect(n.deliveries[0]).toMatchObject({ url: HOOK_URL, ok: false, error: "connection refused" });
  });

  it("gives up on a webhook after the timeout", async () => {
    const { impl } = fakeFetch({ [PROFILE_URL]: json(RECORD_PROFILE), [HOOK_URL]: hang });
    const n = notifier(impl, { timeoutMs: 20 });

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();

    expect(n.deliveries[0]).toMatchObject({ ok: false, error: "aborted" });
  });

  it("applies the timeout to reading the profile body", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: stalledBody });
    const n = notifier(impl, { timeoutMs: 20 });

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();

    expect(calls.map((c) => c.url)).toEqual([PROFILE_URL]);
    expect(n.deliveries).toEqual([]);
  });

  it("aborts a profile body read on close", async () => {
    const { impl } = fakeFetch({ [PROFILE_URL]: stalledBody });
    const n = notifier(impl, { timeoutMs: 60_000 });

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.close();

    expect(n.deliveries).toEqual([]);
  });

  it("aborts in-flight deliveries on close", async () => {
    const { impl, calls } = fakeFetch({ [PROFILE_URL]: hang });
    const n = notifier(impl, { timeoutMs: 60_000 });

    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.close();
    n.dispatch(AGENT_HEADER, "order_placed", ORDER, "checkout_1");
    await n.idle();

    expect(calls).toHaveLength(1);
  });

  it("skips agents without a profile", async () => {
    const { impl, calls } = fakeFetch({});
    const n = notifier(impl);
    n.dispatch(undefined, "order_placed", ORDER, "checkout_1");
    n.dispatch('agent="shopper"', "order_placed", ORDER, "checkout_1");
    await n.idle();
    expect(calls).toEqual([]);
  });

  it("keeps a bounded delivery log", async () => {
    const { impl } = fakeFetch({ [PROFILE_URL]: json(RECORD_PROFILE), [HOOK_URL]: json({}) });
    const n = notifier(impl, { maxDeliveryLog: 2 });

    for (const id of ["order_1", "order_2", "order_3"]) {
      n.dispatch(AGENT_HEADER, "order_placed", { ...ORDER, id }, "checkout_1");
      await n.idle();
    }
    expect(n.deliveries.map((d) => d.orderId)).toEqual(["order_2", "order_3"]);
  });
});
