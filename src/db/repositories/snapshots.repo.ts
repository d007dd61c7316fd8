import { eq, count } from "drizzle-orm";
import type { Snapshot, NewSnapshot } from "../schema";
import { snapshots } from "../schema";
import { getDb } from "../client";
import type { AppDatabase } from "../client";

export class SnapshotsRepository {
  constructor(private readonly database?: AppDatabase) {}

  private get db(): AppDatabase {
    return this.database ?? getDb();
  }

  /** Returns null when a snapshot for the same session and account already exists. */
  async create(data: NewSnapshot): Promise<Snapshot | null> {
    const [result] = await this.db
      .insert(snapshots)
      .values(data)
      .onConflictDoNothing({ target: [snapshots.sessionId, snapshots.accountId] })
      .returning();
    return result ?? null;
  }

  async findBySession(sessionId: number): Promise<Snapshot[]> {
    return this.db.select().from(snapshots).where(eq(snapshots.sessionId, sessionId));
  }

  async countBySession(sessionId: number): Promise<number> {
    const [result] = await this.db
      .select({ value: count() })
      .from(snapshots)
      .where(eq(snapshots.sessionId, sessionId));
    return result?.value ?? 0;
  }
}
