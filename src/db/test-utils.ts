/**
 * Test helpers: a fully wired shop on an in-memory SQLite database seeded
 * with the demo catalog.
 */

import { loadConfig } from "../core/config";
import { createShop, type Shop } from "../core/shop";
import { silentLogger, type Logger } from "../core/logger";
import { createDatabase } from "./index";
import { seedCatalog, seedDemoCatalog, type CatalogSeed } from "./seed";

export const TEST_SIMULATION_SECRET = "test-secret";

export interface TestShopOptions {
  env?: Record<string, string | undefined>;
  /** Replaces the demo catalog */
  seed?: CatalogSeed;
  fetch?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

export function createTestShop(options: TestShopOptions = {}): Shop {
  const config = loadConfig({
    DATABASE_URL: ":memory:",
    LOG_LEVEL: "silent",
    ...options.env,
  });
  const database = createDatabase(":memory:");
  if (options.seed) seedCatalog(database.db, options.seed);
  else seedDemoCatalog(database.db);

  return createShop({
    config,
    database,
    fetch: options.fetch ?? (async () => new Response(null, { status: 404 })),
    logger: options.logger ?? silentLogger,
    now: options.now,
  });
}

/** Clock advancing one second per call, starting at 2026-01-15T10:00:00Z. */
export function steppingClock(start = Date.UTC(2026, 0, 15, 10, 0, 0)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}
