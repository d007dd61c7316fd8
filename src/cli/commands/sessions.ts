import type { Command } from "commander";
import { z } from "zod";
import { logger } from "../../core/logger";
import { closeDb } from "../../db/client";
import type { Session } from "../../db/schema";
import { SqliteFollowGraphStorage } from "../../db/storage";

const ListOptionsSchema = z.object({
  limit: z.coerce.number().int().min(1).default(20),
});

const SessionIdSchema = z.coerce.number().int().positive();

function formatTime(seconds: number | null): string {
  return seconds === null ? "-" : new Date(seconds * 1000).toISOString();
}

export function formatSessionLine(session: Session): string {
  const icon = session.state === "finished" ? "✓" : session.state === "failed" ? "✗" : "○";
  const counts =
    session.state === "finished"
      ? ` (${session.followerCount ?? 0} followers, ${session.followingCount ?? 0} following)`
      : session.errorCode
        ? ` [${session.errorCode}]`
        : "";
  return `${icon} [${session.id}] @${session.targetScreenName} ${session.state} - ${formatTime(session.startedAt)}${counts}`;
}

export const commands = (program: Command) => {
  const sessionsCmd = program.command("sessions");

  sessionsCmd
    .command("list")
    .option("--limit <n>", "Number of sessions to show", "20")
    .action(async (rawOptions: unknown) => {
      const { limit } = ListOptionsSchema.parse(rawOptions);
      const storage = new SqliteFollowGraphStorage();

      try {
        const sessions = await storage.listRecentSessions(limit);
        logger.info({ count: sessions.length }, "Recent sessions");
        for (const session of sessions) {
          console.log(`  ${formatSessionLine(session)}`);
        }
      } finally {
        closeDb();
      }
    });

  sessionsCmd
    .command("show")
    .argument("<id>", "Session ID")
    .action(async (rawId: unknown) => {
      const sessionId = SessionIdSchema.parse(rawId);
      const storage = new SqliteFollowGraphStorage();

      try {
        const session = await storage.findSession(sessionId);
        if (!session) {
          logger.error({ sessionId }, "Session not found");
          process.exitCode = 1;
          return;
        }

        const rows = await storage.countSessionRows(sessionId);
        console.log(formatSessionLine(session));
        console.log(`    finished:  ${formatTime(session.finishedAt)}`);
        console.log(`    snapshots: ${rows.snapshots}`);
        console.log(`    edges:     ${rows.followerEdges} follower, ${rows.followingEdges} following`);
        if (session.errorDetail) {
          console.log(`    error:     ${session.errorDetail}`);
        }
      } finally {
        closeDb();
      }
    });
};
