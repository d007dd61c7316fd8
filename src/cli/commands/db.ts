import type { Command } from "commander";
import { runMigrations } from "../../db/migrate";
import { getSqlite, closeDb } from "../../db/client";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Run database migrations")
    .action(() => {
      try {
        runMigrations(getSqlite());
      } finally {
        closeDb();
      }
    });
};
