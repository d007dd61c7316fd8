import { sqliteTable, text, integer, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const sessions = sqliteTable(
  "sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    targetScreenName: text("target_screen_name").notNull(),
    startedAt: integer("started_at").notNull(),
    finishedAt: integer("finished_at"),
    state: text("state", { enum: ["started", "finished", "failed"] }).notNull().default("started"),
    followerCount: integer("follower_count"),
    followingCount: integer("following_count"),
    errorCode: text("error_code"),
    errorDetail: text("error_detail"),
  },
  (table) => ({
    stateStartedIdx: index("sessions_state_started_idx").on(table.state, table.startedAt),
  })
);

export const snapshots = sqliteTable(
  "snapshots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id").notNull().references(() => sessions.id),
    accountId: text("account_id").notNull(),
    snapshotTime: integer("snapshot_time").notNull(),
    accountCreatedAt: integer("account_created_at").notNull(),
    screenName: text("screen_name").notNull(),
    location: text("location"),
    description: text("description"),
    url: text("url"),
    followerCount: integer("follower_count").notNull(),
    followingCount: integer("following_count").notNull(),
    statusCount: integer("status_count").notNull(),
    verified: integer("verified", { mode: "boolean" }).notNull(),
  },
  (table) => ({
    sessionAccountIdx: uniqueIndex("snapshots_session_account_idx").on(table.sessionId, table.accountId),
    accountTimeIdx: index("snapshots_account_time_idx").on(table.accountId, sql`snapshot_time DESC`),
  })
);

export const followEdges = sqliteTable(
  "follow_edges",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id").notNull().references(() => sessions.id),
    direction: text("direction", { enum: ["followers", "following"] }).notNull(),
    accountId: text("account_id").notNull(),
  },
  (table) => ({
    sessionDirectionAccountIdx: uniqueIndex("follow_edges_session_direction_account_idx").on(
      table.sessionId,
      table.direction,
      table.accountId
    ),
  })
);

export type Session = typeof sessions.$inferSelect;
export type NewSession = typeof sessions.$inferInsert;
export type Snapshot = typeof snapshots.$inferSelect;
export type NewSnapshot = typeof snapshots.$inferInsert;
export type FollowEdge = typeof followEdges.$inferSelect;
export type NewFollowEdge = typeof followEdges.$inferInsert;
