import type { PageFetcher } from "../../src/core/page-walker";
import type { RemoteAccount } from "../../src/domain/models";
import type { FollowGraphSource } from "../../src/platforms/adapter";
import { openDatabase } from "../../src/db/client";
import type { DatabaseHandle } from "../../src/db/client";
import { runMigrations } from "../../src/db/migrate";
import { SqliteFollowGraphStorage } from "../../src/db/storage";

export function makeAccount(accountId: string, overrides: Partial<RemoteAccount> = {}): RemoteAccount {
  return {
    accountId,
    accountCreatedAt: 1584264600,
    screenName: `user_${accountId}`,
    location: null,
    description: null,
    url: null,
    followerCount: 10,
    followingCount: 20,
    statusCount: 30,
    verified: false,
    ...overrides,
  };
}

/** A page step is either the records of that page or the error the call rejects with. */
export type PageStep<T> = T[] | Error | { delayMs: number; step: T[] | Error };

/**
 * Serves `steps` by cursor: the empty cursor is step 0, cursor `c<n>` is step n.
 * Steps past the end answer an empty page.
 */
export function scriptedFetcher<T>(steps: PageStep<T>[]) {
  const calls: Array<{ cursor: string; pageSize: number }> = [];

  const fetchPage: PageFetcher<T> = async (cursor, pageSize) => {
    calls.push({ cursor, pageSize });
    const index = cursor === "" ? 0 : Number(cursor.slice(1));
    let step = steps[index] ?? [];
    if (!Array.isArray(step) && !(step instanceof Error)) {
      const { delayMs } = step;
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      step = step.step;
    }
    if (step instanceof Error) {
      throw step;
    }
    return { records: step, nextCursor: `c${index + 1}` };
  };

  return { fetchPage, calls };
}

export class ScriptedSource implements FollowGraphSource {
  readonly platform = "test";
  readonly requestedScreenNames: string[] = [];

  constructor(
    private readonly followerSteps: PageStep<RemoteAccount>[],
    private readonly followingSteps: PageStep<RemoteAccount>[]
  ) {}

  followers(screenName: string): PageFetcher<RemoteAccount> {
    this.requestedScreenNames.push(screenName);
    return scriptedFetcher(this.followerSteps).fetchPage;
  }

  following(screenName: string): PageFetcher<RemoteAccount> {
    this.requestedScreenNames.push(screenName);
    return scriptedFetcher(this.followingSteps).fetchPage;
  }
}

export interface TestStorage extends DatabaseHandle {
  storage: SqliteFollowGraphStorage;
}

export function createTestStorage(): TestStorage {
  const handle = openDatabase(":memory:");
  runMigrations(handle.sqlite);
  return { ...handle, storage: new SqliteFollowGraphStorage(handle.db) };
}

export function expectInstanceOf<T>(value: unknown, ctor: new (...args: never[]) => T): T {
  if (!(value instanceof ctor)) {
    throw new Error(`Expected an instance of ${ctor.name}, got ${String(value)}`);
  }
  return value;
}
