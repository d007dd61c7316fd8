import type { Command } from "commander";
import { z } from "zod";
import { env } from "../../core/config";
import { ConfigError } from "../../core/errors";
import { logger } from "../../core/logger";
import { getSqlite, closeDb } from "../../db/client";
import { runMigrations } from "../../db/migrate";
import { SqliteFollowGraphStorage } from "../../db/storage";
import { XApiClient } from "../../platforms/x";
import { runCollection } from "../../orchestration/collection-run";
import { recoverStaleSessions } from "../../orchestration/session-lifecycle";

const CollectOptionsSchema = z.object({
  target: z.string().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).max(200).optional(),
  channelCapacity: z.coerce.number().int().min(1).optional(),
});

export const commands = (program: Command) => {
  program
    .command("collect")
    .description("Snapshot the follower and following lists of one account")
    .option("--target <screen_name>", "Account whose graph is collected (defaults to TARGET_SCREEN_NAME)")
    .option("--page-size <n>", "Accounts requested per page")
    .option("--channel-capacity <n>", "Commands buffered between fetching and persistence")
    .action(async (rawOptions: unknown) => {
      const options = CollectOptionsSchema.parse(rawOptions);
      const targetScreenName = (options.target ?? env.TARGET_SCREEN_NAME)?.replace(/^@/, "").trim();
      if (!targetScreenName) {
        throw new ConfigError("A target account is required: pass --target or set TARGET_SCREEN_NAME");
      }

      const source = new XApiClient();

      try {
        runMigrations(getSqlite());
        const storage = new SqliteFollowGraphStorage();
        await recoverStaleSessions(storage, env.SESSION_STALE_TIMEOUT_SECONDS);

        const result = await runCollection({
          storage,
          source,
          targetScreenName,
          pageSize: options.pageSize ?? env.PAGE_SIZE,
          channelCapacity: options.channelCapacity ?? env.COMMAND_CHANNEL_CAPACITY,
        });

        if (result.error) {
          logger.error(
            {
              sessionId: result.sessionId,
              kind: result.error.kind,
              code: result.error.code,
              retryAt: result.error.kind === "rate_limited" ? result.error.retryAt : undefined,
            },
            "Collection failed"
          );
        } else {
          logger.info(
            {
              sessionId: result.sessionId,
              followerCount: result.followerCount,
              followingCount: result.followingCount,
            },
            "Collection finished"
          );
        }

        process.exitCode = result.state === "failed" ? 1 : 0;
      } finally {
        closeDb();
      }
    });
};
