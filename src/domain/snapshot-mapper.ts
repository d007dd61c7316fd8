import type { RemoteAccount, UserSnapshot } from "./models";

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Captures a remote account as observed at `now`. */
export function toUserSnapshot(account: RemoteAccount, now: Date = new Date()): UserSnapshot {
  return {
    accountId: account.accountId,
    snapshotTime: toUnixSeconds(now),
    accountCreatedAt: account.accountCreatedAt,
    screenName: account.screenName,
    location: account.location,
    description: account.description,
    url: account.url,
    followerCount: account.followerCount,
    followingCount: account.followingCount,
    statusCount: account.statusCount,
    verified: account.verified,
  };
}
