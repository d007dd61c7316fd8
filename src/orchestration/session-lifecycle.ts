import { logger as rootLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import type { CollectionError } from "../core/errors";
import type { SessionState } from "../domain/models";
import { validateTransition } from "../domain/session-state-machine";
import { toUnixSeconds } from "../domain/snapshot-mapper";
import type { Session } from "../db/schema";
import type { FollowGraphStorage } from "../db/storage";

export class SessionLifecycle {
  private constructor(
    private readonly storage: FollowGraphStorage,
    private session: Session,
    private readonly now: () => Date,
    private readonly logger: Logger
  ) {}

  static async start(
    storage: FollowGraphStorage,
    options: { targetScreenName: string; now?: () => Date; logger?: Logger }
  ): Promise<SessionLifecycle> {
    const now = options.now ?? (() => new Date());
    const session = await storage.createSession({
      startedAt: toUnixSeconds(now()),
      targetScreenName: options.targetScreenName,
    });
    return new SessionLifecycle(storage, session, now, options.logger ?? rootLogger);
  }

  get id(): number {
    return this.session.id;
  }

  get state(): SessionState {
    return this.session.state;
  }

  get current(): Session {
    return this.session;
  }

  async finish(counts: { followerCount: number; followingCount: number }): Promise<Session> {
    validateTransition(this.session.state, "finished");
    this.session = await this.storage.finalizeSession(this.session.id, {
      finishedAt: toUnixSeconds(this.now()),
      ...counts,
    });
    this.logger.info({ sessionId: this.session.id, ...counts }, "Session finished");
    return this.session;
  }

  async fail(error: CollectionError): Promise<Session> {
    validateTransition(this.session.state, "failed");
    this.session = await this.storage.failSession(this.session.id, {
      finishedAt: toUnixSeconds(this.now()),
      errorCode: error.code,
      errorDetail: error.message,
    });
    this.logger.warn({ sessionId: this.session.id, kind: error.kind, code: error.code }, "Session failed");
    return this.session;
  }
}

/** Fails sessions a crashed process left in `started` for longer than `timeoutSeconds`. */
export async function recoverStaleSessions(
  storage: FollowGraphStorage,
  timeoutSeconds: number,
  now: Date = new Date()
): Promise<Session[]> {
  const nowSeconds = toUnixSeconds(now);
  const recovered = await storage.recoverStaleSessions(nowSeconds - timeoutSeconds, nowSeconds);
  if (recovered.length > 0) {
    rootLogger.warn(
      { sessionIds: recovered.map((s) => s.id), timeoutSeconds },
      "Recovered stale sessions left running"
    );
  }
  return recovered;
}
