import type { Session } from "./schema";
import type { AppDatabase } from "./client";
import { SessionsRepository } from "./repositories/sessions.repo";
import { SnapshotsRepository } from "./repositories/snapshots.repo";
import { EdgesRepository } from "./repositories/edges.repo";
import { SessionStateError } from "../core/errors";
import type { UserSnapshot } from "../domain/models";

export interface SessionRowCounts {
  snapshots: number;
  followerEdges: number;
  followingEdges: number;
}

/**
 * Everything the collector reads from or writes to storage. Each mutating call is a
 * single statement; inserts are idempotent per (session, account).
 */
export interface FollowGraphStorage {
  createSession(data: { startedAt: number; targetScreenName: string }): Promise<Session>;
  insertSnapshot(sessionId: number, snapshot: UserSnapshot): Promise<boolean>;
  insertFollowerEdge(sessionId: number, accountId: string): Promise<boolean>;
  insertFollowingEdge(sessionId: number, accountId: string): Promise<boolean>;
  finalizeSession(
    sessionId: number,
    data: { finishedAt: number; followerCount: number; followingCount: number }
  ): Promise<Session>;
  failSession(sessionId: number, data: { finishedAt: number; errorCode: string; errorDetail: string }): Promise<Session>;
  recoverStaleSessions(startedBefore: number, finishedAt: number): Promise<Session[]>;
  findSession(sessionId: number): Promise<Session | null>;
  listRecentSessions(limit: number): Promise<Session[]>;
  countSessionRows(sessionId: number): Promise<SessionRowCounts>;
}

export class SqliteFollowGraphStorage implements FollowGraphStorage {
  private readonly sessions: SessionsRepository;
  private readonly snapshots: SnapshotsRepository;
  private readonly edges: EdgesRepository;

  constructor(database?: AppDatabase) {
    this.sessions = new SessionsRepository(database);
    this.snapshots = new SnapshotsRepository(database);
    this.edges = new EdgesRepository(database);
  }

  createSession(data: { startedAt: number; targetScreenName: string }): Promise<Session> {
    return this.sessions.create({ ...data, state: "started" });
  }

  async insertSnapshot(sessionId: number, snapshot: UserSnapshot): Promise<boolean> {
    const row = await this.snapshots.create({ sessionId, ...snapshot });
    return row !== null;
  }

  insertFollowerEdge(sessionId: number, accountId: string): Promise<boolean> {
    return this.edges.create("followers", sessionId, accountId);
  }

  insertFollowingEdge(sessionId: number, accountId: string): Promise<boolean> {
    return this.edges.create("following", sessionId, accountId);
  }

  async finalizeSession(
    sessionId: number,
    data: { finishedAt: number; followerCount: number; followingCount: number }
  ): Promise<Session> {
    const updated = await this.sessions.updateIfStarted(sessionId, { state: "finished", ...data });
    return updated ?? this.rejectTerminal(sessionId, "finished");
  }

  async failSession(
    sessionId: number,
    data: { finishedAt: number; errorCode: string; errorDetail: string }
  ): Promise<Session> {
    const updated = await this.sessions.updateIfStarted(sessionId, { state: "failed", ...data });
    return updated ?? this.rejectTerminal(sessionId, "failed");
  }

  recoverStaleSessions(startedBefore: number, finishedAt: number): Promise<Session[]> {
    return this.sessions.markStaleAsFailed(startedBefore, finishedAt);
  }

  findSession(sessionId: number): Promise<Session | null> {
    return this.sessions.findById(sessionId);
  }

  listRecentSessions(limit: number): Promise<Session[]> {
    return this.sessions.listRecent(limit);
  }

  async countSessionRows(sessionId: number): Promise<SessionRowCounts> {
    const [snapshots, followerEdges, followingEdges] = await Promise.all([
      this.snapshots.countBySession(sessionId),
      this.edges.countBySession("followers", sessionId),
      this.edges.countBySession("following", sessionId),
    ]);
    return { snapshots, followerEdges, followingEdges };
  }

  private async rejectTerminal(sessionId: number, target: "finished" | "failed"): Promise<never> {
    const existing = await this.sessions.findById(sessionId);
    if (!existing) {
      throw new SessionStateError(`Session ${sessionId} does not exist`, "SESSION_NOT_FOUND");
    }
    throw new SessionStateError(
      `Session ${sessionId} is already ${existing.state} and cannot become ${target}`,
      "SESSION_ALREADY_TERMINAL"
    );
  }
}
