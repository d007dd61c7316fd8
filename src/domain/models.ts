import { z } from "zod";
import type { FetchError } from "../core/errors";

export const SessionStateSchema = z.enum(["started", "finished", "failed"]);
export type SessionState = z.infer<typeof SessionStateSchema>;

export const FollowDirectionSchema = z.enum(["followers", "following"]);
export type FollowDirection = z.infer<typeof FollowDirectionSchema>;

export const RemoteAccountSchema = z.object({
  accountId: z.string().regex(/^\d+$/),
  accountCreatedAt: z.number().int(),
  screenName: z.string(),
  location: z.string().nullable(),
  description: z.string().nullable(),
  url: z.string().nullable(),
  followerCount: z.number().int().nonnegative(),
  followingCount: z.number().int().nonnegative(),
  statusCount: z.number().int().nonnegative(),
  verified: z.boolean(),
});
export type RemoteAccount = z.infer<typeof RemoteAccountSchema>;

export const UserSnapshotSchema = RemoteAccountSchema.extend({
  snapshotTime: z.number().int(),
});
export type UserSnapshot = z.infer<typeof UserSnapshotSchema>;

export type DatabaseCommand =
  | { readonly type: "store_snapshot"; readonly snapshot: Readonly<UserSnapshot> }
  | { readonly type: "store_follower"; readonly accountId: string }
  | { readonly type: "store_following"; readonly accountId: string }
  | { readonly type: "failed_session"; readonly direction: FollowDirection; readonly error: FetchError };

export function edgeCommand(direction: FollowDirection, accountId: string): DatabaseCommand {
  return direction === "followers"
    ? { type: "store_follower", accountId }
    : { type: "store_following", accountId };
}
