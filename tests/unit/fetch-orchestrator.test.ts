import { describe, it, expect } from "vitest";
import { createChannel } from "../../src/core/channel";
import type { Receiver } from "../../src/core/channel";
import { RateLimitError, StorageError, TransportError } from "../../src/core/errors";
import type { DatabaseCommand } from "../../src/domain/models";
import { FetchOrchestrator } from "../../src/orchestration/fetch-orchestrator";
import { ScriptedSource, makeAccount, expectInstanceOf } from "../helpers/fixtures";
import type { PageStep } from "../helpers/fixtures";
import type { RemoteAccount } from "../../src/domain/models";
import type { PageFetcher } from "../../src/core/page-walker";

const A = makeAccount("1");
const B = makeAccount("2");
const C = makeAccount("3");
const D = makeAccount("4");

async function drain(receiver: Receiver<DatabaseCommand>): Promise<DatabaseCommand[]> {
  const commands: DatabaseCommand[] = [];
  for await (const command of receiver) {
    commands.push(command);
  }
  return commands;
}

async function runWith(
  followers: PageStep<RemoteAccount>[],
  following: PageStep<RemoteAccount>[],
  capacity = 32
) {
  const source = new ScriptedSource(followers, following);
  const orchestrator = new FetchOrchestrator({
    source,
    targetScreenName: "graph_owner",
    pageSize: 2,
    now: () => new Date("2024-05-01T12:00:00Z"),
  });
  const { sender, receiver } = createChannel<DatabaseCommand>(capacity);
  const [result, commands] = await Promise.all([orchestrator.run(sender), drain(receiver)]);
  return { result, commands, source };
}

function edgeIds(commands: DatabaseCommand[], type: "store_follower" | "store_following"): string[] {
  return commands.flatMap((c) => (c.type === type ? [c.accountId] : []));
}

describe("FetchOrchestrator", () => {
  it("should emit a snapshot then an edge for every account in both lists", async () => {
    const { result, commands, source } = await runWith([[A, B], [C], []], [[B, D], []]);

    expect(source.requestedScreenNames).toEqual(["graph_owner", "graph_owner"]);
    expect(result.followers).toEqual({ direction: "followers", status: "completed", accountsSeen: 3 });
    expect(result.following).toEqual({ direction: "following", status: "completed", accountsSeen: 2 });
    expect(result.firstError).toBeNull();

    expect(edgeIds(commands, "store_follower")).toEqual(["1", "2", "3"]);
    expect(edgeIds(commands, "store_following")).toEqual(["2", "4"]);
    expect(commands.filter((c) => c.type === "store_snapshot")).toHaveLength(5);
    expect(commands.some((c) => c.type === "failed_session")).toBe(false);
  });

  it("should send each edge after the snapshot of the same account", async () => {
    const { commands } = await runWith([[A, B], []], [[C], []]);

    commands.forEach((command, index) => {
      if (command.type !== "store_follower" && command.type !== "store_following") return;
      const snapshotIndex = commands.findIndex(
        (c) => c.type === "store_snapshot" && c.snapshot.accountId === command.accountId
      );
      expect(snapshotIndex).toBeGreaterThanOrEqual(0);
      expect(snapshotIndex).toBeLessThan(index);
    });
  });

  it("should stamp snapshots with the capture time", async () => {
    const { commands } = await runWith([[A], []], [[]]);

    const snapshot = commands.find((c) => c.type === "store_snapshot");
    expect(snapshot?.type === "store_snapshot" ? snapshot.snapshot.snapshotTime : null).toBe(1714564800);
  });

  it("should count distinct accounts when a list repeats an account", async () => {
    const { result, commands } = await runWith([[A, B], [B, C], []], [[]]);

    expect(result.followers.accountsSeen).toBe(3);
    expect(edgeIds(commands, "store_follower")).toEqual(["1", "2", "2", "3"]);
  });

  it("should send one failed_session and nothing more from a rate-limited pipeline", async () => {
    const rateLimit = new RateLimitError("rate limited", "RATE_LIMITED", 1700000900);
    const { result, commands } = await runWith([[A, B], rateLimit, [C]], [[D], []]);

    expect(result.followers).toEqual({ direction: "followers", status: "failed", accountsSeen: 2, error: rateLimit });
    expect(result.following.status).toBe("completed");
    expect(result.firstError).toBe(rateLimit);

    const failed = commands.filter((c) => c.type === "failed_session");
    expect(failed).toEqual([{ type: "failed_session", direction: "followers", error: rateLimit }]);

    const failedIndex = commands.findIndex((c) => c.type === "failed_session");
    const laterFollowerEdges = commands.slice(failedIndex).filter((c) => c.type === "store_follower");
    expect(laterFollowerEdges).toEqual([]);
    expect(edgeIds(commands, "store_follower")).toEqual(["1", "2"]);
    expect(edgeIds(commands, "store_following")).toEqual(["4"]);
  });

  it("should let the other pipeline finish after one fails", async () => {
    const { result, commands } = await runWith(
      [new TransportError("X API responded 503", "HTTP_503")],
      [[A, B], [C, D], []],
      1
    );

    expect(result.followers.status).toBe("failed");
    expect(result.following).toEqual({ direction: "following", status: "completed", accountsSeen: 4 });
    expect(edgeIds(commands, "store_following")).toEqual(["1", "2", "3", "4"]);
  });

  it("should report the failure observed first when both pipelines fail", async () => {
    const early = new TransportError("X API responded 500", "HTTP_500");
    const late = new RateLimitError("rate limited", "RATE_LIMITED", 1700000900);

    const { result, commands } = await runWith([early], [[A], { delayMs: 20, step: late }]);

    expect(result.firstError).toBe(early);
    expect(result.followers.status).toBe("failed");
    expect(result.following.status).toBe("failed");
    expect(commands.filter((c) => c.type === "failed_session").map((c) => c.type === "failed_session" && c.direction)).toEqual([
      "followers",
      "following",
    ]);
  });

  it("should close the channel and report failure when the source cannot open a list", async () => {
    class UnavailableFollowersSource extends ScriptedSource {
      followers(): PageFetcher<RemoteAccount> {
        throw new Error("source unavailable");
      }
    }
    const orchestrator = new FetchOrchestrator({
      source: new UnavailableFollowersSource([], [[A, B], []]),
      targetScreenName: "graph_owner",
      pageSize: 2,
    });
    const { sender, receiver } = createChannel<DatabaseCommand>(1);

    const [result, commands] = await Promise.all([orchestrator.run(sender), drain(receiver)]);

    expect(result.followers.status).toBe("failed");
    const error = expectInstanceOf(result.firstError, TransportError);
    expect(error.code).toBe("UNCLASSIFIED");
    expect(error.message).toBe("The followers pipeline failed: source unavailable");
    expect(result.following).toEqual({ direction: "following", status: "completed", accountsSeen: 2 });
    expect(commands.filter((c) => c.type === "failed_session")).toEqual([
      { type: "failed_session", direction: "followers", error },
    ]);
  });

  it("should fail with CHANNEL_CLOSED when the receiver stops consuming", async () => {
    const source = new ScriptedSource([[A], []], [[B], []]);
    const orchestrator = new FetchOrchestrator({ source, targetScreenName: "graph_owner", pageSize: 2 });
    const { sender, receiver } = createChannel<DatabaseCommand>(4);
    receiver.close();

    const result = await orchestrator.run(sender);

    expect(result.followers.status).toBe("failed");
    expect(result.following.status).toBe("failed");
    const error = expectInstanceOf(result.firstError, StorageError);
    expect(error.code).toBe("CHANNEL_CLOSED");
  });
});
