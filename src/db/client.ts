import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { env } from "../core/config";
import { logger } from "../core/logger";

export type AppDatabase = BetterSQLite3Database;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: AppDatabase;
}

export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  return { sqlite, db: drizzle(sqlite) };
}

let handle: DatabaseHandle | null = null;

function getHandle(): DatabaseHandle {
  if (!handle) {
    handle = openDatabase(env.DATABASE_PATH);
    logger.info({ path: env.DATABASE_PATH }, "Database connected");
  }
  return handle;
}

export function getDb(): AppDatabase {
  return getHandle().db;
}

export function getSqlite(): Database.Database {
  return getHandle().sqlite;
}

export function closeDb(): void {
  if (handle) {
    handle.sqlite.close();
    handle = null;
    logger.info("Database connection closed");
  }
}
