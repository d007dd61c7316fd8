import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { ConfigError, RateLimitError, TransportError, errorMessage } from "../../core/errors";
import type { Page, PageFetcher } from "../../core/page-walker";
import type { RemoteAccount } from "../../domain/models";
import type { FollowGraphSource } from "../adapter";
import { XUserListResponseSchema, parseRemoteAccount } from "./parsers";

const DEFAULT_RATE_LIMIT_WINDOW_SECONDS = 15 * 60;
const EXHAUSTED_CURSOR = "0";

type FetchFn = typeof fetch;

export interface XApiClientOptions {
  bearerToken?: string;
  baseUrl?: string;
  fetchImpl?: FetchFn;
  now?: () => Date;
}

export class XApiClient implements FollowGraphSource {
  readonly platform = "x";

  private readonly bearerToken: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFn;
  private readonly now: () => Date;

  constructor(options: XApiClientOptions = {}) {
    const bearerToken = options.bearerToken ?? env.X_BEARER_TOKEN;
    if (!bearerToken) {
      throw new ConfigError("X_BEARER_TOKEN is required");
    }

    this.bearerToken = bearerToken;
    this.baseUrl = (options.baseUrl ?? env.X_API_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  followers(screenName: string): PageFetcher<RemoteAccount> {
    return (cursor, pageSize) => this.fetchUserList("followers/list.json", screenName, cursor, pageSize);
  }

  following(screenName: string): PageFetcher<RemoteAccount> {
    return (cursor, pageSize) => this.fetchUserList("friends/list.json", screenName, cursor, pageSize);
  }

  private async fetchUserList(
    endpoint: string,
    screenName: string,
    cursor: string,
    pageSize: number
  ): Promise<Page<RemoteAccount>> {
    // The remote marks the last page with next cursor "0"; asking for it again would restart the list.
    if (cursor === EXHAUSTED_CURSOR) {
      return { records: [], nextCursor: EXHAUSTED_CURSOR };
    }

    const url = new URL(`${this.baseUrl}/${endpoint}`);
    url.searchParams.set("screen_name", screenName);
    url.searchParams.set("count", String(pageSize));
    url.searchParams.set("skip_status", "true");
    url.searchParams.set("include_user_entities", "false");
    if (cursor) {
      url.searchParams.set("cursor", cursor);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${this.bearerToken}` },
      });
    } catch (error) {
      throw new TransportError(`Request to ${endpoint} failed: ${errorMessage(error)}`, "NETWORK_ERROR", {
        cause: error,
      });
    }

    if (response.status === 429) {
      const retryAt = this.parseRateLimitReset(response.headers.get("x-rate-limit-reset"));
      logger.warn({ endpoint, retryAt }, "X API rate limit reached");
      throw new RateLimitError(`Rate limited on ${endpoint} until ${retryAt}`, "RATE_LIMITED", retryAt);
    }

    if (!response.ok) {
      throw new TransportError(`X API responded ${response.status} on ${endpoint}`, `HTTP_${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(`X API returned a non-JSON body on ${endpoint}`, "INVALID_RESPONSE", { cause: error });
    }

    const parsed = XUserListResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        `X API returned an unexpected payload on ${endpoint}: ${parsed.error.message}`,
        "INVALID_RESPONSE",
        { cause: parsed.error }
      );
    }

    const records: RemoteAccount[] = [];
    for (const user of parsed.data.users) {
      const account = parseRemoteAccount(user);
      if (!account) {
        throw new TransportError(
          `X API returned an unreadable created_at "${user.created_at}" for account ${user.id_str}`,
          "INVALID_RESPONSE"
        );
      }
      records.push(account);
    }

    return { records, nextCursor: parsed.data.next_cursor_str };
  }

  private parseRateLimitReset(header: string | null): number {
    const reset = header ? Number.parseInt(header, 10) : Number.NaN;
    if (Number.isFinite(reset) && reset > 0) {
      return reset;
    }
    return Math.floor(this.now().getTime() / 1000) + DEFAULT_RATE_LIMIT_WINDOW_SECONDS;
  }
}
