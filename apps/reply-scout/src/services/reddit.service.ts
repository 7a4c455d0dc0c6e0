import { errorMessage, errorStatus, FetchError } from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type { FetchStrategy, ForumClient, RawItem } from "@/types";
import {
  flattenComments,
  mapCommentToItem,
  mapSubmissionToItem,
} from "@/utils/mappers";
import { callWithRetry, withTimeout } from "@/utils/retry";
import type { TopTimeFilter } from "@reply-scout/types";
import Bottleneck from "bottleneck";
import type Snoowrap from "snoowrap";
import type { Submission } from "snoowrap";

export interface RedditServiceOptions {
  topTimeFilter: TopTimeFilter;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

const isTransient = (error: unknown): boolean => {
  const status = errorStatus(error);
  return status === undefined || status === 429 || status >= 500;
};

export class RedditService implements ForumClient {
  private apiLimiter = new Bottleneck({
    reservoir: 600,
    reservoirRefreshAmount: 600,
    reservoirRefreshInterval: 60 * 1000,
    maxConcurrent: 5,
    minTime: 100,
  });

  constructor(
    private readonly client: Snoowrap,
    private readonly options: RedditServiceOptions,
    private readonly logger: AppLogger
  ) {}

  /**
   * Fetches one listing of a subreddit.
   * @param strategy - hot, rising, top (over `topTimeFilter`) or new
   */
  async fetchPosts(
    subreddit: string,
    strategy: FetchStrategy,
    limit: number
  ): Promise<RawItem[]> {
    const source = `r/${subreddit}/${strategy}`;
    const submissions = await this.call(source, () =>
      this.listing(subreddit, strategy, limit)
    );

    this.logger.debug(`📥 Fetched ${submissions.length} posts`, {
      subreddit,
      strategy,
      count: submissions.length,
    });
    return submissions.map(mapSubmissionToItem);
  }

  /**
   * Fetches a post's comment tree and returns it flattened, capped at `limit`.
   */
  async fetchComments(post: RawItem, limit: number): Promise<RawItem[]> {
    const source = `r/${post.subreddit}/comments/${post.id}`;
    const comments = await this.call(source, async () =>
      Array.from(await this.client.getSubmission(post.id).comments)
    );

    return flattenComments(comments)
      .slice(0, limit)
      .map((comment) => mapCommentToItem(comment, post));
  }

  private listing(
    subreddit: string,
    strategy: FetchStrategy,
    limit: number
  ): Promise<Submission[]> {
    const sub = this.client.getSubreddit(subreddit);
    switch (strategy) {
      case "hot":
        return sub.getHot({ limit });
      case "rising":
        return sub.getRising({ limit });
      case "top":
        return sub.getTop({ time: this.options.topTimeFilter, limit });
      case "new":
        return sub.getNew({ limit });
    }
  }

  private async call<T>(source: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await this.apiLimiter.schedule(() =>
        callWithRetry(
          () => withTimeout(operation(), this.options.timeoutMs, source),
          {
            attempts: this.options.retryAttempts,
            delayMs: this.options.retryDelayMs,
            shouldRetry: isTransient,
            onRetry: (error, attempt) =>
              this.logger.warn(`Retrying ${source}`, { attempt, error }),
          }
        )
      );
    } catch (error) {
      throw new FetchError(source, errorMessage(error), { cause: error });
    }
  }
}
