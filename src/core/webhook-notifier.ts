/**
 * Webhook Notifier
 *
 * Tells the buying agent about order events. The agent's profile URL comes
 * from its `UCP-Agent` header; the profile names a webhook URL under the
 * `dev.ucp.shopping.order` capability. Delivery runs in the background:
 * one attempt, no retry, and failures are logged, never thrown.
 */

import { z } from "zod";
import type { UcpOrderView } from "../types/ucp";
import { ORDER_CAPABILITY } from "../types/ucp";
import { BoundedCache } from "./bounded-cache";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export type OrderEventType = "order_placed" | "order_shipped";

export interface WebhookPayload {
  event_type: OrderEventType;
  checkout_id: string;
  order: UcpOrderView;
  timestamp: string;
}

export interface DeliveryRecord {
  url: string;
  eventType: OrderEventType;
  orderId: string;
  /** HTTP status, absent when the request never completed */
  status?: number;
  ok: boolean;
  error?: string;
  at: string;
}

// ---------------------------------------------------------------------------
// Agent profile
// ---------------------------------------------------------------------------

const capabilityEntrySchema = z
  .object({
    name: z.string().optional(),
    config: z.object({ webhook_url: z.string().url().optional() }).passthrough().optional(),
  })
  .passthrough();

/** Record form `{ "<name>": [{ config }] }` or list form `[{ name, config }]`. */
const capabilitiesSchema = z.union([
  z.record(z.array(capabilityEntrySchema)),
  z.array(capabilityEntrySchema),
]);

const agentProfileSchema = z
  .object({
    ucp: z.object({ capabilities: capabilitiesSchema.optional() }).passthrough().optional(),
    capabilities: capabilitiesSchema.optional(),
  })
  .passthrough();

export type AgentProfile = z.infer<typeof agentProfileSchema>;

/** `profile="https://..."` inside a UCP-Agent header, or a bare URL. */
export function parseProfileUrl(agentReference: string | undefined): string | undefined {
  if (!agentReference) return undefined;
  const quoted = /profile="([^"]+)"/.exec(agentReference);
  if (quoted) return quoted[1];
  const bare = agentReference.trim();
  return /^https?:\/\//.test(bare) ? bare : undefined;
}

export function findWebhookUrl(profile: AgentProfile): string | undefined {
  const capabilities = profile.ucp?.capabilities ?? profile.capabilities;
  if (!capabilities) return undefined;
  const entries = Array.isArray(capabilities)
    ? capabilities.filter((c) => c.name === ORDER_CAPABILITY)
    : capabilities[ORDER_CAPABILITY] ?? [];
  return entries.find((c) => c.config?.webhook_url)?.config?.webhook_url;
}

// ---------------------------------------------------------------------------
// Notifier
// ---------------------------------------------------------------------------

export interface WebhookNotifierOptions {
  profileCache: BoundedCache<AgentProfile>;
  fetch?: typeof fetch;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** Delivery records kept (default: 100) */
  maxDeliveryLog?: number;
  logger?: Logger;
  now?: () => Date;
}

export class WebhookNotifier {
  private readonly profileCache: BoundedCache<AgentProfile>;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly maxDeliveryLog: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly inFlight = new Set<Promise<void>>();
  private readonly controllers = new Set<AbortController>();
  /** Profile fetches in progress, shared by concurrent dispatches */
  private readonly pendingProfiles = new Map<string, Promise<AgentProfile | undefined>>();
  private readonly log: DeliveryRecord[] = [];
  private closed = false;

  constructor(options: WebhookNotifierOptions) {
    this.profileCache = options.profileCache;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxDeliveryLog = options.maxDeliveryLog ?? 100;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Fire and forget. Use `idle()` to wait for delivery. */
  dispatch(
    agentReference: string | undefined,
    eventType: OrderEventType,
    order: UcpOrderView,
    checkoutId: string
  ): void {
    if (this.closed) return;
    const profileUrl = parseProfileUrl(agentReference);
    if (!profileUrl) return;

    const task: Promise<void> = this.deliver(profileUrl, eventType, order, checkoutId)
      .catch((err: unknown) => {
        this.logger.error("webhook_dispatch_failed", { order_id: order.id, error: err });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Abort everything in flight and refuse new dispatches. */
  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.controllers) controller.abort();
    await this.idle();
  }

  get deliveries(): readonly DeliveryRecord[] {
    return this.log;
  }

  async resolveWebhookUrl(profileUrl: string): Promise<string | undefined> {
    const profile = await this.loadProfile(profileUrl);
    return profile ? findWebhookUrl(profile) : undefined;
  }

  // -------------------------------------------------------------------------

  private async deliver(
    profileUrl: string,
    eventType: OrderEventType,
    order: UcpOrderView,
    checkoutId: string
  ): Promise<void> {
    const url = await this.resolveWebhookUrl(profileUrl);
    if (!url) {
      this.logger.debug("webhook_url_missing", { profile_url: profileUrl });
      return;
    }

    const payload: WebhookPayload = {
      event_type: eventType,
      checkout_id: checkoutId,
      order,
      timestamp: this.now().toISOString(),
    };

    try {
      const { status, ok } = await this.request(
        url,
        { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(payload) },
        async (response) => ({ status: response.status, ok: response.ok })
      );
      this.record({ url, eventType, orderId: order.id, status, ok });
      this.logger.info("webhook_sent", { url, event_type: eventType, status });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.record({ url, eventType, orderId: order.id, ok: false, error: message });
      this.logger.warn("webhook_failed", { url, event_type: eventType, error: err });
    }
  }

  private loadProfile(profileUrl: string): Promise<AgentProfile | undefined> {
    const cached = this.profileCache.get(profileUrl);
    if (cached) return Promise.resolve(cached);

    const pending = this.pendingProfiles.get(profileUrl);
    if (pending) return pending;

    const load = this.fetchProfile(profileUrl).finally(() => {
      this.pendingProfiles.delete(profileUrl);
    });
    this.pendingProfiles.set(profileUrl, load);
    return load;
  }

  private async fetchProfile(profileUrl: string): Promise<AgentProfile | undefined> {
    try {
      const result = await this.request(profileUrl, { method: "GET" }, async (response) => {
        if (!response.ok) return { ok: false as const, status: response.status };
        const body: unknown = await response.json();
        return { ok: true as const, body };
      });
      if (!result.ok) {
        this.logger.warn("agent_profile_fetch_failed", { profile_url: profileUrl, status: result.status });
        return undefined;
      }
      const parsed = agentProfileSchema.safeParse(result.body);
      if (!parsed.success) {
        this.logger.warn("agent_profile_invalid", { profile_url: profileUrl });
        return undefined;
      }
      this.profileCache.set(profileUrl, parsed.data);
      return parsed.data;
    } catch (err) {
      this.logger.warn("agent_profile_fetch_failed", { profile_url: profileUrl, error: err });
      return undefined;
    }
  }

  /** The timeout and `close()` cover the body read as well as the headers. */
  private async request<T>(
    url: string,
    init: RequestInit,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    this.controllers.add(controller);
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      return await read(response);
    } finally {
      clearTimeout(timer);
      this.controllers.delete(controller);
    }
  }

  private record(entry: Omit<DeliveryRecord, "at">): void {
    this.log.push({ ...entry, at: this.now().toISOString() });
    if (this.log.length > this.maxDeliveryLog) this.log.shift();
  }
}
