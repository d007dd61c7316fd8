import type { Receiver } from "../core/channel";
import { StorageError, errorMessage } from "../core/errors";
import { logger as rootLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import type { DatabaseCommand, FollowDirection } from "../domain/models";
import type { FollowGraphStorage } from "../db/storage";

export interface PersistenceReport {
  commandsApplied: number;
  snapshotsWritten: number;
  followerEdgesWritten: number;
  followingEdgesWritten: number;
  duplicatesIgnored: number;
  failedDirections: FollowDirection[];
}

/**
 * Drains the command channel into storage, one command at a time. While it runs it is
 * the only code touching storage, so nothing here needs locking.
 */
export class PersistenceWorker {
  private readonly logger: Logger;
  private readonly report: PersistenceReport = {
    commandsApplied: 0,
    snapshotsWritten: 0,
    followerEdgesWritten: 0,
    followingEdgesWritten: 0,
    duplicatesIgnored: 0,
    failedDirections: [],
  };

  constructor(
    private readonly sessionId: number,
    private readonly storage: FollowGraphStorage,
    private readonly receiver: Receiver<DatabaseCommand>,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ span: "persistence_worker", sessionId });
  }

  /**
   * Resolves once every sender has closed and the channel is drained. The first failed
   * command closes the channel and rejects with `StorageError`.
   */
  async run(): Promise<PersistenceReport> {
    this.logger.info("Persistence worker started");

    for await (const command of this.receiver) {
      try {
        await this.apply(command);
      } catch (error) {
        this.receiver.close();
        const failure =
          error instanceof StorageError
            ? error
            : new StorageError(`Failed to apply ${command.type}: ${errorMessage(error)}`, "APPLY_FAILED", {
                cause: error,
              });
        this.logger.error(
          { command: command.type, code: failure.code, error: failure.message, applied: this.report.commandsApplied },
          "Persistence worker stopped"
        );
        throw failure;
      }
      this.report.commandsApplied++;
    }

    this.logger.info({ ...this.report }, "Persistence worker drained channel");
    return { ...this.report, failedDirections: [...this.report.failedDirections] };
  }

  private async apply(command: DatabaseCommand): Promise<void> {
    switch (command.type) {
      case "store_snapshot": {
        const inserted = await this.storage.insertSnapshot(this.sessionId, command.snapshot);
        if (inserted) {
          this.report.snapshotsWritten++;
        } else {
          this.report.duplicatesIgnored++;
          this.logger.debug({ accountId: command.snapshot.accountId }, "Snapshot already stored for session");
        }
        return;
      }
      case "store_follower": {
        const inserted = await this.storage.insertFollowerEdge(this.sessionId, command.accountId);
        if (inserted) this.report.followerEdgesWritten++;
        else this.report.duplicatesIgnored++;
        return;
      }
      case "store_following": {
        const inserted = await this.storage.insertFollowingEdge(this.sessionId, command.accountId);
        if (inserted) this.report.followingEdgesWritten++;
        else this.report.duplicatesIgnored++;
        return;
      }
      case "failed_session": {
        this.report.failedDirections.push(command.direction);
        this.logger.warn(
          { direction: command.direction, code: command.error.code, kind: command.error.kind },
          "Pipeline reported failure; session will be marked failed"
        );
        return;
      }
    }
  }
}
