import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import * as schema from "./schema";
import { SCHEMA_SQL } from "./migrations";

export type ShopDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: ShopDatabase;
  close(): void;
}

/** "file:./data/shop.db" -> "./data/shop.db" */
export function resolveSqlitePath(databaseUrl: string): string {
  return databaseUrl.replace(/^file:/, "");
}

/**
 * Open (or create) the SQLite store and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function createDatabase(databaseUrl: string): DatabaseHandle {
  const path = resolveSqlitePath(databaseUrl);
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  if (path !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(SCHEMA_SQL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

export { schema };
