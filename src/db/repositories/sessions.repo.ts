import { eq, and, desc, lt } from "drizzle-orm";
import type { Session, NewSession } from "../schema";
import { sessions } from "../schema";
import { getDb } from "../client";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";

export class SessionsRepository {
  constructor(private readonly database?: AppDatabase) {}

  private get db(): AppDatabase {
    return this.database ?? getDb();
  }

  async create(data: NewSession): Promise<Session> {
    const result = await this.db.insert(sessions).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create session");
    }
    logger.info({ sessionId: result[0].id, target: result[0].targetScreenName }, "Session created");
    return result[0];
  }

  async findById(id: number): Promise<Session | null> {
    const [result] = await this.db.select().from(sessions).where(eq(sessions.id, id)).limit(1);
    return result ?? null;
  }

  async listRecent(limit: number = 20): Promise<Session[]> {
    return this.db
      .select()
      .from(sessions)
      .orderBy(desc(sessions.startedAt), desc(sessions.id))
      .limit(limit);
  }

  /** Updates the session only while it is still `started`; returns null when no such row exists. */
  async updateIfStarted(id: number, data: Partial<NewSession>): Promise<Session | null> {
    const [result] = await this.db
      .update(sessions)
      .set(data)
      .where(and(eq(sessions.id, id), eq(sessions.state, "started")))
      .returning();
    return result ?? null;
  }

  async markStaleAsFailed(startedBefore: number, finishedAt: number): Promise<Session[]> {
    return this.db
      .update(sessions)
      .set({
        state: "failed",
        finishedAt,
        errorCode: "STALE_SESSION",
        errorDetail: "Session was still running past the stale timeout",
      })
      .where(and(eq(sessions.state, "started"), lt(sessions.startedAt, startedBefore)))
      .returning();
  }
}
