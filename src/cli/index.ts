import { Command } from "commander";
import { logger } from "../core/logger";
import { commands as collectCommands } from "./commands/collect";
import { commands as sessionsCommands } from "./commands/sessions";
import { commands as dbCommands } from "./commands/db";

const program = new Command();

program
  .name("follow-snapshot")
  .description("Snapshot the follower and following graph of one account into SQLite")
  .version("0.1.0");

collectCommands(program);
sessionsCommands(program);
dbCommands(program);

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ error }, "Command failed");
  process.exitCode = 1;
});
