/**
 * Environment Configuration Loader
 *
 * Reads the engine settings from environment variables, validated with zod.
 * Anything not set falls back to a local development default.
 */

import { z } from "zod";
import type { PaymentHandlerConfig, ShopConfig } from "../types/config";
import { ValidationError } from "./errors";

export const UCP_VERSION = "2026-01-11";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => v === "true" || v === "1");

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  UCP_VERSION: z.string().min(1).default(UCP_VERSION),
  BASE_URL: z.string().url().default("http://localhost:8000"),
  DATABASE_URL: z.string().min(1).default("file:./data/shop.db"),
  DEFAULT_CURRENCY: z
    .string()
    .length(3)
    .transform((v) => v.toUpperCase())
    .default("USD"),
  PAYMENT_FAILURE_INSTRUMENT_ID: z.string().min(1).default("instr_fail"),
  IDEMPOTENCY_MAX_ENTRIES: positiveInt(10_000),
  IDEMPOTENCY_TTL_MS: positiveInt(24 * 60 * 60 * 1000),
  PROFILE_CACHE_MAX_ENTRIES: positiveInt(500),
  PROFILE_CACHE_TTL_MS: positiveInt(60 * 60 * 1000),
  WEBHOOK_TIMEOUT_MS: positiveInt(10_000),
  WEBHOOK_DELIVERY_LOG_SIZE: positiveInt(100),
  SIMULATION_SECRET: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  UCP_STRICT: booleanFlag,
});

export function defaultPaymentHandlers(
  version: string
): Record<string, PaymentHandlerConfig[]> {
  return {
    "com.demo.mock_payment": [
      {
        id: "mock_payment_handler",
        version,
        spec: "https://example.com/specs/mock-payment",
        schema: "https://example.com/schemas/mock-payment.json",
        config: {},
      },
    ],
  };
}

/**
 * In strict mode every base URL that is not localhost must be https.
 */
export function ensureHttpsBaseUrl(baseUrl: string, strict: boolean): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  if (!strict) return trimmed;
  const url = new URL(trimmed);
  const local = url.hostname === "localhost" || url.hostname === "127.0.0.1";
  if (url.protocol !== "https:" && !local) {
    throw new ValidationError(`BASE_URL must use https in strict mode (got ${trimmed})`, "$.BASE_URL");
  }
  return trimmed;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ShopConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") ?? "env";
    throw new ValidationError(`Invalid ${name}: ${issue?.message ?? "bad value"}`, `$.${name}`);
  }
  const e = parsed.data;

  return {
    ucp: {
      version: e.UCP_VERSION,
      paymentHandlers: defaultPaymentHandlers(e.UCP_VERSION),
      strict: e.UCP_STRICT,
    },
    baseUrl: ensureHttpsBaseUrl(e.BASE_URL, e.UCP_STRICT),
    databaseUrl: e.DATABASE_URL,
    defaultCurrency: e.DEFAULT_CURRENCY,
    paymentFailureInstrumentId: e.PAYMENT_FAILURE_INSTRUMENT_ID,
    idempotency: { maxEntries: e.IDEMPOTENCY_MAX_ENTRIES, ttlMs: e.IDEMPOTENCY_TTL_MS },
    profileCache: { maxEntries: e.PROFILE_CACHE_MAX_ENTRIES, ttlMs: e.PROFILE_CACHE_TTL_MS },
    webhook: { timeoutMs: e.WEBHOOK_TIMEOUT_MS, maxDeliveryLog: e.WEBHOOK_DELIVERY_LOG_SIZE },
    simulationSecret: e.SIMULATION_SECRET,
    logLevel: e.LOG_LEVEL,
  };
}
