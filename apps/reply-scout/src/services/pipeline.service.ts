import type { CandidateFilter } from "@/filters/candidateFilter";
import { errorMessage, FetchError } from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type {
  FetchStrategy,
  ForumClient,
  PipelineCounts,
  PipelineRunResult,
  PipelineStage,
  RawItem,
  RecordStore,
  ReportSink,
  RunDiagnostics,
  StageTiming,
  StoreStatistics,
} from "@/types";
import { deduplicateById } from "@/utils/deduplication";
import type { MetricsCollector } from "@/utils/metrics";
import { emptyDiagnostics, rank } from "./ranking.service";
import { formatReport } from "./report.service";
import type { RelevanceScorer } from "./scorer.service";

export interface PipelineOptions {
  subreddits: string[];
  strategies: FetchStrategy[];
  postsPerStrategy: number;
  commentPostLimit: number;
  commentsPerPost: number;
  topN: number;
  ttlMs: number;
  ttlDays: number;
  deliverEmptyReport: boolean;
  reportTitle: string;
}

export interface PipelineDeps {
  forum: ForumClient;
  filter: CandidateFilter;
  scorer: RelevanceScorer;
  sink: ReportSink;
  store: RecordStore;
  logger: AppLogger;
  metrics?: MetricsCollector;
  clock?: () => Date;
}

const STAGE_ORDER: PipelineStage[] = [
  "FETCHING",
  "FILTERING",
  "SCORING",
  "RANKING",
  "FORMATTING",
  "DELIVERING",
  "COMMITTING",
  "DONE",
];

const emptyCounts = (): PipelineCounts => ({
  pruned: 0,
  fetched: 0,
  candidates: 0,
  scored: 0,
  reportedPosts: 0,
  reportedComments: 0,
  committed: 0,
  deliveredChunks: 0,
});

/**
 * One pass of fetch, filter, score, rank, format, deliver and commit.
 * Stages only move forward; FAILED is reachable from any of them. Ids are
 * committed to the record store only after the report was delivered.
 */
export class PipelineService {
  private readonly logger: AppLogger;
  private readonly clock: () => Date;
  private stage: PipelineStage | null = null;

  constructor(
    private readonly options: PipelineOptions,
    private readonly deps: PipelineDeps
  ) {
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  get currentStage(): PipelineStage | null {
    return this.stage;
  }

  async run(): Promise<PipelineRunResult> {
    const { filter, scorer, sink, store, metrics } = this.deps;
    const startedAt = this.clock();
    const stages: StageTiming[] = [];
    const counts = emptyCounts();
    const diagnostics = emptyDiagnostics();
    this.stage = null;
    metrics?.reset();

    this.logger.info("🚀 Pipeline run started", {
      subreddits: this.options.subreddits.length,
      strategies: this.options.strategies.join(","),
    });

    counts.pruned = await this.pruneExpired(startedAt);

    try {
      const items = await this.timed(stages, "FETCHING", () =>
        this.fetchAll(diagnostics)
      );
      counts.fetched = items.length;

      const candidates = await this.timed(stages, "FILTERING", () =>
        filter.filter(items)
      );
      counts.candidates = candidates.length;

      const scored = await this.timed(stages, "SCORING", () =>
        scorer.scoreBatch(candidates)
      );
      diagnostics.scoreFailures.push(...scored.failures);
      diagnostics.belowThreshold = scored.belowThreshold;
      counts.scored = scored.items.length;

      const report = await this.timed(stages, "RANKING", async () =>
        rank(scored.items, this.options.topN, diagnostics)
      );
      counts.reportedPosts = report.posts.length;
      counts.reportedComments = report.comments.length;
      const reportedIds = [...report.posts, ...report.comments].map(
        (item) => item.id
      );

      const document = await this.timed(stages, "FORMATTING", async () =>
        formatReport(report, startedAt, { title: this.options.reportTitle })
      );

      await this.timed(stages, "DELIVERING", async () => {
        if (reportedIds.length === 0 && !this.options.deliverEmptyReport) {
          this.logger.info("Empty report, delivery skipped");
          return;
        }
        const receipt = await sink.deliver(document);
        counts.deliveredChunks = receipt.chunks;
      });

      await this.timed(stages, "COMMITTING", async () => {
        await store.markSeenMany(reportedIds, this.clock());
        counts.committed = reportedIds.length;
      });

      this.transition("DONE");
    } catch (error) {
      const failedStage = this.stage ?? "FETCHING";
      this.transition("FAILED");
      this.logger.error(`❌ Pipeline failed during ${failedStage}`, {
        stage: failedStage,
        error,
      });
      return {
        status: "FAILED",
        failedStage,
        error: error instanceof Error ? error : new Error(errorMessage(error)),
        stages,
        counts,
        diagnostics,
        storeStats: await this.statistics(),
      };
    }

    const storeStats = await this.statistics();
    this.logger.info("✅ Pipeline run finished", {
      ...counts,
      durationMs: this.clock().getTime() - startedAt.getTime(),
      scorer: metrics && {
        ...metrics.getMetrics(),
        averageLatencyMs: metrics.getAverageLatency(),
        errorRate: metrics.getErrorRate(),
      },
    });

    return { status: "DONE", stages, counts, diagnostics, storeStats };
  }

  private transition(next: PipelineStage): void {
    if (next !== "FAILED") {
      const from = this.stage === null ? -1 : STAGE_ORDER.indexOf(this.stage);
      if (STAGE_ORDER.indexOf(next) <= from) {
        throw new Error(`Illegal pipeline transition ${this.stage} -> ${next}`);
      }
    }
    this.stage = next;
  }

  private async timed<T>(
    stages: StageTiming[],
    stage: PipelineStage,
    work: () => Promise<T>
  ): Promise<T> {
    this.transition(stage);
    this.logger.debug(`➡️ ${stage}`, { stage });
    const start = Date.now();
    const result = await work();
    const durationMs = Date.now() - start;
    stages.push({ stage, durationMs });
    this.logger.info(`Stage ${stage} completed`, { stage, durationMs });
    return result;
  }

  private async pruneExpired(now: Date): Promise<number> {
    try {
      const removed = await this.deps.store.prune(now, this.options.ttlMs);
      if (removed > 0) {
        this.logger.info("🧹 Pruned expired records", { count: removed });
      }
      return removed;
    } catch (error) {
      this.logger.warn("Prune failed, continuing with existing records", {
        error,
      });
      return 0;
    }
  }

  private async fetchAll(diagnostics: RunDiagnostics): Promise<RawItem[]> {
    const { forum, filter } = this.deps;
    const sources = this.options.subreddits.flatMap((subreddit) =>
      this.options.strategies.map((strategy) => ({ subreddit, strategy }))
    );

    const postResults = await Promise.allSettled(
      sources.map(({ subreddit, strategy }) =>
        forum.fetchPosts(subreddit, strategy, this.options.postsPerStrategy)
      )
    );

    const fetched: RawItem[] = [];
    postResults.forEach((result, index) => {
      const source = sources[index];
      if (result.status === "fulfilled") {
        fetched.push(...result.value);
      } else if (source) {
        diagnostics.fetchFailures.push({
          source: `r/${source.subreddit}/${source.strategy}`,
          message: errorMessage(result.reason),
        });
        this.logger.warn("Post fetch failed", {
          subreddit: source.subreddit,
          strategy: source.strategy,
          error: result.reason,
        });
      }
    });

    if (sources.length > 0 && diagnostics.fetchFailures.length === sources.length) {
      throw new FetchError(
        "all sources",
        `${sources.length} post fetches failed`
      );
    }

    const posts = deduplicateById(fetched);
    const commentSources = posts
      .filter((post) => filter.matchesRules(post).passed)
      .sort((a, b) => b.numComments - a.numComments)
      .slice(0, this.options.commentPostLimit);

    const commentResults = await Promise.allSettled(
      commentSources.map((post) =>
        forum.fetchComments(post, this.options.commentsPerPost)
      )
    );

    const comments: RawItem[] = [];
    commentResults.forEach((result, index) => {
      const post = commentSources[index];
      if (result.status === "fulfilled") {
        comments.push(...result.value);
      } else if (post) {
        diagnostics.fetchFailures.push({
          source: `r/${post.subreddit}/comments/${post.id}`,
          message: errorMessage(result.reason),
        });
        this.logger.warn("Comment fetch failed", {
          id: post.id,
          error: result.reason,
        });
      }
    });

    this.logger.info("📥 Fetched forum items", {
      posts: posts.length,
      comments: comments.length,
      failedSources: diagnostics.fetchFailures.length,
    });

    return [...posts, ...comments];
  }

  private async statistics(): Promise<StoreStatistics | undefined> {
    try {
      return await this.deps.store.getStatistics(
        this.options.ttlDays,
        this.clock()
      );
    } catch (error) {
      this.logger.warn("Could not read record store statistics", { error });
      return undefined;
    }
  }
}
