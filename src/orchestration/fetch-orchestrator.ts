import type { Sender } from "../core/channel";
import { walkPages } from "../core/page-walker";
import type { PageFetcher } from "../core/page-walker";
import { ChannelClosedError, StorageError, isFetchError, TransportError, errorMessage } from "../core/errors";
import type { CollectionError, FetchError } from "../core/errors";
import { logger as rootLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import { edgeCommand } from "../domain/models";
import type { DatabaseCommand, FollowDirection, RemoteAccount } from "../domain/models";
import { toUserSnapshot } from "../domain/snapshot-mapper";
import type { FollowGraphSource } from "../platforms/adapter";

export interface FetchOrchestratorOptions {
  source: FollowGraphSource;
  targetScreenName: string;
  pageSize: number;
  logger?: Logger;
  now?: () => Date;
}

export type PipelineOutcome =
  | { direction: FollowDirection; status: "completed"; accountsSeen: number }
  | { direction: FollowDirection; status: "failed"; accountsSeen: number; error: CollectionError };

export interface FetchResult {
  followers: PipelineOutcome;
  following: PipelineOutcome;
  /** The failure observed first in time across both pipelines. */
  firstError: CollectionError | null;
}

/**
 * Walks the follower and following lists of one account concurrently, turning every
 * account into a `store_snapshot` followed by the matching edge command on a shared channel.
 */
export class FetchOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: FetchOrchestratorOptions) {
    this.logger = options.logger ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Takes ownership of `sender`: it is closed once both pipelines are done with it. */
  async run(sender: Sender<DatabaseCommand>): Promise<FetchResult> {
    const { source, targetScreenName } = this.options;
    const failures: CollectionError[] = [];

    const followersSender = sender.clone();
    const followingSender = sender.clone();
    sender.close();

    const track = async (pipeline: Promise<PipelineOutcome>): Promise<PipelineOutcome> => {
      const outcome = await pipeline;
      if (outcome.status === "failed") {
        failures.push(outcome.error);
      }
      return outcome;
    };

    const [followers, following] = await Promise.all([
      track(this.runPipeline("followers", () => source.followers(targetScreenName), followersSender)),
      track(this.runPipeline("following", () => source.following(targetScreenName), followingSender)),
    ]);

    return { followers, following, firstError: failures[0] ?? null };
  }

  private async runPipeline(
    direction: FollowDirection,
    openFetcher: () => PageFetcher<RemoteAccount>,
    sender: Sender<DatabaseCommand>
  ): Promise<PipelineOutcome> {
    const span = this.logger.child({ span: `fetch_${direction}`, target: this.options.targetScreenName });
    const seen = new Set<string>();

    span.info("Starting pipeline");

    try {
      const fetchPage = openFetcher();
      for await (const account of walkPages(fetchPage, { pageSize: this.options.pageSize, logger: span })) {
        seen.add(account.accountId);
        await sender.send({ type: "store_snapshot", snapshot: toUserSnapshot(account, this.now()) });
        await sender.send(edgeCommand(direction, account.accountId));
      }

      span.info({ accountsSeen: seen.size }, "Pipeline completed");
      return { direction, status: "completed", accountsSeen: seen.size };
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        span.error({ accountsSeen: seen.size }, "Persistence worker stopped consuming; abandoning pipeline");
        return {
          direction,
          status: "failed",
          accountsSeen: seen.size,
          error: new StorageError(
            `Command channel closed while the ${direction} pipeline was sending`,
            "CHANNEL_CLOSED",
            { cause: error }
          ),
        };
      }

      const failure = isFetchError(error)
        ? error
        : new TransportError(`The ${direction} pipeline failed: ${errorMessage(error)}`, "UNCLASSIFIED", {
            cause: error,
          });

      span.error(
        { accountsSeen: seen.size, kind: failure.kind, code: failure.code, error: failure.message },
        "Pipeline failed"
      );
      await this.reportFailure(direction, failure, sender, span);
      return { direction, status: "failed", accountsSeen: seen.size, error: failure };
    } finally {
      sender.close();
    }
  }

  private async reportFailure(
    direction: FollowDirection,
    error: FetchError,
    sender: Sender<DatabaseCommand>,
    span: Logger
  ): Promise<void> {
    try {
      await sender.send({ type: "failed_session", direction, error });
    } catch (sendError) {
      if (!(sendError instanceof ChannelClosedError)) {
        throw sendError;
      }
      // The worker has already failed, which fails the session on its own.
      span.warn({ direction }, "Could not deliver failed_session: command channel closed");
    }
  }
}
