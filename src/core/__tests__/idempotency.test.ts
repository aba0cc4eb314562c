import { describe, expect, it, vi } from "vitest";
import { BoundedCache } from "../bounded-cache";
import { IdempotencyGuard, canonicalJson, hashRequest, type IdempotencyRecord } from "../idempotency";
import { IdempotencyConflictError } from "../errors";

function guard(): IdempotencyGuard {
  return new IdempotencyGuard({ cache: new BoundedCache<IdempotencyRecord>({ maxEntries: 10 }) });
}

const ok = (body: unknown) => ({ status: 201, body: JSON.stringify(body) });

describe("canonicalJson", () => {
  it("sorts keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [{ y: 1, x: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"x":2,"y":1}]},"b":1}'
    );
    expect(hashRequest({ a: 1, b: 2 })).toBe(hashRequest({ b: 2, a: 1 }));
  });
});

describe("IdempotencyGuard", () => {
  it("always proceeds without a key", async () => {
    const g = guard();
    const op = vi.fn(async () => ok({ n: 1 }));
    await g.execute(undefined, { a: 1 }, op);
    await g.execute(undefined, { a: 1 }, op);
    expect(op).toHaveBeenCalledTimes(2);
    expect(g.check(undefined, { a: 1 })).toEqual({ kind: "proceed" });
  });

  it("replays the stored response for the same body", async () => {
    const g = guard();
    const op = vi.fn(async () => ok({ id: "checkout_1" }));

    const first = await g.execute("key-1", { a: 1 }, op);
    const second = await g.execute("key-1", { a: 1 }, op);

    expect(op).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(second.body).toBe('{"id":"checkout_1"}');
  });

  it("rejects the same key with a different body", async () => {
    const g = guard();
    await g.execute("key-1", { a: 1 }, async () => ok({}));
    await expect(g.execute("key-1", { a: 2 }, async () => ok({}))).rejects.toBeInstanceOf(
      IdempotencyConflictError
    );
    expect(g.check("key-1", { a: 2 })).toEqual({ kind: "conflict" });
  });

  it("does not remember failures", async () => {
    const g = guard();
    await expect(
      g.execute("key-1", { a: 1 }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await g.execute("key-1", { a: 1 }, async () => ({ status: 400, body: "{}" }));
    expect(g.check("key-1", { a: 1 })).toEqual({ kind: "proceed" });
  });

  it("runs concurrent requests with a fresh key only once", async () => {
    const g = guard();
    let calls = 0;
    const op = async () => {
      calls++;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return ok({ n: calls });
    };

    const [a, b] = await Promise.all([g.execute("k", { x: 1 }, op), g.execute("k", { x: 1 }, op)]);
    expect(calls).toBe(1);
    expect(a.body).toBe(b.body);
  });
});
