import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createChannel } from "../../src/core/channel";
import { ChannelClosedError, StorageError, TransportError } from "../../src/core/errors";
import type { DatabaseCommand } from "../../src/domain/models";
import { toUserSnapshot } from "../../src/domain/snapshot-mapper";
import { SqliteFollowGraphStorage } from "../../src/db/storage";
import { PersistenceWorker } from "../../src/orchestration/persistence-worker";
import { createTestStorage, makeAccount, expectInstanceOf } from "../helpers/fixtures";
import type { TestStorage } from "../helpers/fixtures";

const capturedAt = new Date("2024-05-01T12:00:00Z");

function snapshotCommand(accountId: string): DatabaseCommand {
  return { type: "store_snapshot", snapshot: toUserSnapshot(makeAccount(accountId), capturedAt) };
}

class BrokenEdgeStorage extends SqliteFollowGraphStorage {
  async insertFollowerEdge(): Promise<boolean> {
    throw new Error("SQLITE_FULL: database or disk is full");
  }
}

describe("PersistenceWorker", () => {
  let testDb: TestStorage;
  let sessionId: number;

  beforeEach(async () => {
    testDb = createTestStorage();
    const session = await testDb.storage.createSession({ startedAt: 1714564800, targetScreenName: "graph_owner" });
    sessionId = session.id;
  });

  afterEach(() => {
    testDb.sqlite.close();
  });

  it("should apply every command and stop once the channel is drained", async () => {
    const { sender, receiver } = createChannel<DatabaseCommand>(8);
    const worker = new PersistenceWorker(sessionId, testDb.storage, receiver);

    await sender.send(snapshotCommand("1"));
    await sender.send({ type: "store_follower", accountId: "1" });
    await sender.send(snapshotCommand("2"));
    await sender.send({ type: "store_following", accountId: "2" });
    sender.close();

    const report = await worker.run();

    expect(report).toEqual({
      commandsApplied: 4,
      snapshotsWritten: 2,
      followerEdgesWritten: 1,
      followingEdgesWritten: 1,
      duplicatesIgnored: 0,
      failedDirections: [],
    });
    expect(await testDb.storage.countSessionRows(sessionId)).toEqual({
      snapshots: 2,
      followerEdges: 1,
      followingEdges: 1,
    });
  });

  it("should store one snapshot row when the same account arrives twice", async () => {
    const { sender, receiver } = createChannel<DatabaseCommand>(8);
    const worker = new PersistenceWorker(sessionId, testDb.storage, receiver);

    await sender.send(snapshotCommand("9"));
    await sender.send(snapshotCommand("9"));
    sender.close();

    const report = await worker.run();

    expect(report.snapshotsWritten).toBe(1);
    expect(report.duplicatesIgnored).toBe(1);
    expect((await testDb.storage.countSessionRows(sessionId)).snapshots).toBe(1);
  });

  it("should store one follower edge row when the same follower arrives twice", async () => {
    const { sender, receiver } = createChannel<DatabaseCommand>(8);
    const worker = new PersistenceWorker(sessionId, testDb.storage, receiver);

    await sender.send({ type: "store_follower", accountId: "9" });
    await sender.send({ type: "store_follower", accountId: "9" });
    sender.close();

    const report = await worker.run();

    expect(report.followerEdgesWritten).toBe(1);
    expect(report.duplicatesIgnored).toBe(1);
    expect((await testDb.storage.countSessionRows(sessionId)).followerEdges).toBe(1);
  });

  it("should record failed_session signals without touching the session row", async () => {
    const { sender, receiver } = createChannel<DatabaseCommand>(8);
    const worker = new PersistenceWorker(sessionId, testDb.storage, receiver);

    await sender.send({
      type: "failed_session",
      direction: "following",
      error: new TransportError("X API responded 500", "HTTP_500"),
    });
    sender.close();

    const report = await worker.run();

    expect(report.failedDirections).toEqual(["following"]);
    expect((await testDb.storage.findSession(sessionId))?.state).toBe("started");
  });

  it("should wait for commands sent after it starts", async () => {
    const { sender, receiver } = createChannel<DatabaseCommand>(1);
    const worker = new PersistenceWorker(sessionId, testDb.storage, receiver);

    const running = worker.run();
    for (const id of ["1", "2", "3"]) {
      await sender.send(snapshotCommand(id));
    }
    sender.close();

    expect((await running).snapshotsWritten).toBe(3);
  });

  it("should stop on the first failed command, close the channel and reject with StorageError", async () => {
    const storage = new BrokenEdgeStorage(testDb.db);
    const { sender, receiver } = createChannel<DatabaseCommand>(1);
    const worker = new PersistenceWorker(sessionId, storage, receiver);

    await sender.send(snapshotCommand("1"));
    const running = worker.run();
    await sender.send({ type: "store_follower", accountId: "1" });
    await sender.send(snapshotCommand("2"));

    const failure = await running.then(
      () => null,
      (error: unknown) => error
    );
    const error = expectInstanceOf(failure, StorageError);
    expect(error.code).toBe("APPLY_FAILED");
    expect(error.message).toBe("Failed to apply store_follower: SQLITE_FULL: database or disk is full");

    await expect(sender.send(snapshotCommand("3"))).rejects.toBeInstanceOf(ChannelClosedError);
    expect((await testDb.storage.countSessionRows(sessionId)).snapshots).toBe(1);
  });
});
