import type { PageFetcher } from "../core/page-walker";
import type { RemoteAccount } from "../domain/models";

/** A remote social graph that exposes both follow directions as cursor-paginated lists. */
export interface FollowGraphSource {
  readonly platform: string;

  followers(screenName: string): PageFetcher<RemoteAccount>;

  following(screenName: string): PageFetcher<RemoteAccount>;
}
