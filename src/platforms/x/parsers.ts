import { z } from "zod";
import type { RemoteAccount } from "../../domain/models";

const MONTHS: Record<string, string> = {
  Jan: "01",
  Feb: "02",
  Mar: "03",
  Apr: "04",
  May: "05",
  Jun: "06",
  Jul: "07",
  Aug: "08",
  Sep: "09",
  Oct: "10",
  Nov: "11",
  Dec: "12",
};

// e.g. "Wed Oct 10 20:19:24 +0000 2018"
const CREATED_AT_PATTERN = /^\w{3} (\w{3}) (\d{2}) (\d{2}:\d{2}:\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

/** Parses the v1.1 `created_at` format to unix seconds; null when the value does not match it. */
export function parseCreatedAt(value: string): number | null {
  const match = CREATED_AT_PATTERN.exec(value);
  if (!match) return null;

  const [, monthName, day, time, sign, offsetHours, offsetMinutes, year] = match;
  const month = monthName ? MONTHS[monthName] : undefined;
  if (!month) return null;

  const iso = `${year}-${month}-${day}T${time}${sign}${offsetHours}:${offsetMinutes}`;
  const millis = Date.parse(iso);
  return Number.isNaN(millis) ? null : Math.floor(millis / 1000);
}

export const XUserSchema = z.object({
  id_str: z.string().regex(/^\d+$/),
  screen_name: z.string(),
  created_at: z.string(),
  location: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  followers_count: z.number().int().nonnegative(),
  friends_count: z.number().int().nonnegative(),
  statuses_count: z.number().int().nonnegative(),
  verified: z.boolean().default(false),
});
export type XUser = z.infer<typeof XUserSchema>;

export const XUserListResponseSchema = z.object({
  users: z.array(XUserSchema),
  next_cursor_str: z.string(),
});
export type XUserListResponse = z.infer<typeof XUserListResponseSchema>;

function emptyToNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

export function parseRemoteAccount(user: XUser): RemoteAccount | null {
  const accountCreatedAt = parseCreatedAt(user.created_at);
  if (accountCreatedAt === null) return null;

  return {
    accountId: user.id_str,
    accountCreatedAt,
    screenName: user.screen_name,
    location: emptyToNull(user.location),
    description: emptyToNull(user.description),
    url: emptyToNull(user.url),
    followerCount: user.followers_count,
    followingCount: user.friends_count,
    statusCount: user.statuses_count,
    verified: user.verified,
  };
}
