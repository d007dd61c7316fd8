import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { z } from "zod";
import { logger } from "../core/logger";

const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

const appliedRowsSchema = z.array(z.object({ hash: z.string() }));

function isBenignSchemaError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : "";
  return message.includes("already exists") || message.includes("duplicate column");
}

/** Applies every `*.sql` file in the migrations directory not yet recorded in `__drizzle_migrations`. */
export function runMigrations(sqlite: Database.Database, migrationsDir: string = MIGRATIONS_DIR): string[] {
  logger.info("Running database migrations...");

  if (!existsSync(migrationsDir)) {
    logger.info({ migrationsDir }, "No migrations directory found");
    return [];
  }

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedRows = appliedRowsSchema.parse(sqlite.prepare("SELECT hash FROM __drizzle_migrations").all());
  const appliedMigrations = new Set(appliedRows.map((row) => row.hash));

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const applied: string[] = [];

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    logger.info({ file }, "Applying migration...");

    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        try {
          logger.debug({ statement: statement.substring(0, 200) }, "Executing statement");
          sqlite.exec(statement);
        } catch (error) {
          if (!isBenignSchemaError(error)) {
            logger.error({ error, statement: statement.substring(0, 200) }, "Statement failed");
            throw error;
          }
          logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
        }
      }
      sqlite.prepare("INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });

    apply();
    applied.push(file);
    logger.info({ file }, "Migration applied successfully");
  }

  logger.info({ applied: applied.length }, "All migrations completed");
  return applied;
}
