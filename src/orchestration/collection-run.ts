import { createChannel } from "../core/channel";
import { StorageError, TransportError, errorMessage, isCollectionError } from "../core/errors";
import type { CollectionError } from "../core/errors";
import { logger as rootLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import type { DatabaseCommand, SessionState } from "../domain/models";
import type { FollowGraphStorage } from "../db/storage";
import type { FollowGraphSource } from "../platforms/adapter";
import { FetchOrchestrator } from "./fetch-orchestrator";
import type { FetchResult } from "./fetch-orchestrator";
import { PersistenceWorker } from "./persistence-worker";
import type { PersistenceReport } from "./persistence-worker";
import { SessionLifecycle } from "./session-lifecycle";

export interface CollectionRunOptions {
  storage: FollowGraphStorage;
  source: FollowGraphSource;
  targetScreenName: string;
  pageSize: number;
  channelCapacity: number;
  logger?: Logger;
  now?: () => Date;
}

export interface CollectionRunResult {
  sessionId: number;
  state: SessionState;
  followerCount: number;
  followingCount: number;
  error: CollectionError | null;
  fetch: FetchResult | null;
  persistence: PersistenceReport | null;
}

function settledError(reason: unknown, wrap: (message: string) => CollectionError): CollectionError {
  if (isCollectionError(reason)) {
    return reason;
  }
  return wrap(errorMessage(reason));
}

/**
 * One end-to-end run: opens a session, runs both fetch pipelines against a single
 * persistence worker, and settles the session as finished or failed once all three are done.
 */
export async function runCollection(options: CollectionRunOptions): Promise<CollectionRunResult> {
  const log = (options.logger ?? rootLogger).child({ span: "session", target: options.targetScreenName });

  const session = await SessionLifecycle.start(options.storage, {
    targetScreenName: options.targetScreenName,
    now: options.now,
    logger: log,
  });
  log.info({ sessionId: session.id }, "Session started");

  const { sender, receiver } = createChannel<DatabaseCommand>(options.channelCapacity);
  const worker = new PersistenceWorker(session.id, options.storage, receiver, log);
  const orchestrator = new FetchOrchestrator({
    source: options.source,
    targetScreenName: options.targetScreenName,
    pageSize: options.pageSize,
    logger: log,
    now: options.now,
  });

  const [persisted, fetched] = await Promise.allSettled([worker.run(), orchestrator.run(sender)]);

  const fetch = fetched.status === "fulfilled" ? fetched.value : null;
  const persistence = persisted.status === "fulfilled" ? persisted.value : null;
  const followerCount = fetch?.followers.accountsSeen ?? 0;
  const followingCount = fetch?.following.accountsSeen ?? 0;

  let error: CollectionError | null = null;
  if (persisted.status === "rejected") {
    error = settledError(persisted.reason, (message) => new StorageError(message, "WORKER_FAILED"));
  } else if (fetched.status === "rejected") {
    error = settledError(fetched.reason, (message) => new TransportError(message, "UNCLASSIFIED"));
  } else if (fetch?.firstError) {
    error = fetch.firstError;
  } else if (persistence && persistence.failedDirections.length > 0) {
    error = new TransportError(
      `Pipelines reported failure: ${persistence.failedDirections.join(", ")}`,
      "PIPELINE_REPORTED_FAILURE"
    );
  }

  if (error) {
    await session.fail(error);
  } else {
    await session.finish({ followerCount, followingCount });
  }

  log.info(
    { sessionId: session.id, state: session.state, followerCount, followingCount, persistence },
    "Collection run settled"
  );

  return {
    sessionId: session.id,
    state: session.state,
    followerCount,
    followingCount,
    error,
    fetch,
    persistence,
  };
}
