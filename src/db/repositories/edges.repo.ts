import { eq, and, count } from "drizzle-orm";
import { followEdges } from "../schema";
import { getDb } from "../client";
import type { AppDatabase } from "../client";
import type { FollowDirection } from "../../domain/models";

export class EdgesRepository {
  constructor(private readonly database?: AppDatabase) {}

  private get db(): AppDatabase {
    return this.database ?? getDb();
  }

  /** Insert-or-ignore; resolves false when the edge was already recorded for the session. */
  async create(direction: FollowDirection, sessionId: number, accountId: string): Promise<boolean> {
    const inserted = await this.db
      .insert(followEdges)
      .values({ sessionId, direction, accountId })
      .onConflictDoNothing({ target: [followEdges.sessionId, followEdges.direction, followEdges.accountId] })
      .returning({ id: followEdges.id });
    return inserted.length > 0;
  }

  async listAccountIds(direction: FollowDirection, sessionId: number): Promise<string[]> {
    const rows = await this.db
      .select({ accountId: followEdges.accountId })
      .from(followEdges)
      .where(and(eq(followEdges.sessionId, sessionId), eq(followEdges.direction, direction)))
      .orderBy(followEdges.id);
    return rows.map((row) => row.accountId);
  }

  async countBySession(direction: FollowDirection, sessionId: number): Promise<number> {
    const [result] = await this.db
      .select({ value: count() })
      .from(followEdges)
      .where(and(eq(followEdges.sessionId, sessionId), eq(followEdges.direction, direction)));
    return result?.value ?? 0;
  }
}
