export type ForumItemKind = "post" | "comment";

export type FetchStrategy = "hot" | "rising" | "top" | "new";

export type TopTimeFilter = "hour" | "day" | "week" | "month" | "year" | "all";

/**
 * A post or comment as harvested from a forum section.
 * Never mutated after the fetch stage produces it.
 */
export interface RawItem {
  /**
   * Source-unique identifier (the Reddit base36 id).
   */
  readonly id: string;
  readonly kind: ForumItemKind;
  /**
   * Post title. Comments carry their parent's title in `parentPostTitle`.
   */
  readonly title?: string;
  readonly body: string;
  readonly author: string;
  /**
   * Upvotes (score) at fetch time.
   */
  readonly score: number;
  /**
   * Comment count; only meaningful for posts.
   */
  readonly numComments: number;
  readonly createdAt: Date;
  readonly permalink: string;
  readonly subreddit: string;
  readonly parentPostId?: string;
  readonly parentPostTitle?: string;
}
