/**
 * Idempotency Guard
 *
 * Deduplicates mutating requests by client key. A key remembers the SHA-256
 * of the canonical request body and the serialized response: the same body
 * replays the stored bytes, a different body is a conflict. Only successful
 * (2xx) responses are remembered.
 */

import { createHash } from "crypto";
import { BoundedCache } from "./bounded-cache";
import { KeyedMutex } from "./keyed-mutex";
import { IdempotencyConflictError } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export interface StoredResponse {
  status: number;
  /** Serialized JSON body, replayed byte for byte */
  body: string;
}

export interface IdempotencyRecord {
  hash: string;
  response: StoredResponse;
}

export type IdempotencyDecision =
  | { kind: "proceed" }
  | { kind: "replay"; response: StoredResponse }
  | { kind: "conflict" };

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v && typeof v === "object" && !Array.isArray(v)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(v).sort()) {
        sorted[k] = Reflect.get(v, k);
      }
      return sorted;
    }
    return v;
  });
}

export function hashRequest(body: unknown): string {
  return createHash("sha256").update(canonicalJson(body ?? null)).digest("hex");
}

export interface IdempotencyGuardOptions {
  cache: BoundedCache<IdempotencyRecord>;
  locks?: KeyedMutex;
  logger?: Logger;
}

export class IdempotencyGuard {
  private readonly cache: BoundedCache<IdempotencyRecord>;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;

  constructor(options: IdempotencyGuardOptions) {
    this.cache = options.cache;
    this.locks = options.locks ?? new KeyedMutex();
    this.logger = options.logger ?? silentLogger;
  }

  check(key: string | undefined, body: unknown): IdempotencyDecision {
    if (!key) return { kind: "proceed" };
    const record = this.cache.get(key);
    if (!record) return { kind: "proceed" };
    if (record.hash !== hashRequest(body)) return { kind: "conflict" };
    return { kind: "replay", response: record.response };
  }

  store(key: string | undefined, body: unknown, response: StoredResponse): void {
    if (!key) return;
    this.cache.set(key, { hash: hashRequest(body), response });
  }

  /**
   * check → operation → store, atomic per key. Without a key the operation
   * simply runs.
   */
  async execute(
    key: string | undefined,
    body: unknown,
    operation: () => Promise<StoredResponse>
  ): Promise<StoredResponse> {
    if (!key) return operation();

    return this.locks.runExclusive(`idem:${key}`, async () => {
      const decision = this.check(key, body);
      if (decision.kind === "replay") {
        this.logger.debug("idempotent_replay", { key });
        return decision.response;
      }
      if (decision.kind === "conflict") {
        this.logger.warn("idempotency_conflict", { key });
        throw new IdempotencyConflictError(key);
      }

      const response = await operation();
      if (response.status >= 200 && response.status < 300) {
        this.store(key, body, response);
      }
      return response;
    });
  }
}
