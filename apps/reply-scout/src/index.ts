import { OpportunityAgent } from "./agents/opportunity.agent";
import { AppConfig, loadConfig } from "./config";
import { CandidateFilter } from "./filters/candidateFilter";
import { configureLogging, logger } from "./lib/logger";
import { createRedditClient } from "./lib/redditClient";
import { createRedisClient } from "./lib/redisClient";
import { scheduleRuns } from "./lib/scheduler";
import { RedisSeenRepository } from "./repositories/redisSeen.repository";
import { SqliteSeenRepository } from "./repositories/sqliteSeen.repository";
import { DiscordWebhookSink } from "./services/delivery.service";
import { PipelineService } from "./services/pipeline.service";
import { RedditService } from "./services/reddit.service";
import { RelevanceScorer } from "./services/scorer.service";
import type { RecordStore } from "./types";
import { LLMClient } from "./utils/llm";
import { MetricsCollector } from "./utils/metrics";

export function createRecordStore(config: AppConfig): RecordStore {
  if (config.store.backend === "redis") {
    return new RedisSeenRepository(
      createRedisClient(config.cache),
      logger.child("store")
    );
  }
  return new SqliteSeenRepository(config.store.path, logger.child("store"));
}

export function createPipeline(
  config: AppConfig,
  store: RecordStore
): PipelineService {
  const metrics = new MetricsCollector();

  const forum = new RedditService(
    createRedditClient(config.reddit),
    {
      topTimeFilter: config.fetch.topTimeFilter,
      timeoutMs: config.fetch.timeoutMs,
      retryAttempts: config.fetch.retryAttempts,
      retryDelayMs: config.fetch.retryDelayMs,
    },
    logger.child("reddit")
  );

  const model = new LLMClient(
    {
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      timeoutMs: config.scorer.timeoutMs,
      retryAttempts: config.scorer.retryAttempts,
      retryDelayMs: config.scorer.retryDelayMs,
      maxTokensPerMinute: config.limits.maxTokensPerMinute,
      maxRequestsPerMinute: config.limits.maxRequestsPerMinute,
    },
    logger.child("llm")
  );

  const agent = new OpportunityAgent(
    model,
    {
      audienceContext: config.scorer.audienceContext,
      maxTokens: config.scorer.maxTokens,
      temperature: config.scorer.temperature,
    },
    metrics,
    logger.child("agent")
  );

  return new PipelineService(
    {
      subreddits: config.fetch.subreddits,
      strategies: config.fetch.strategies,
      postsPerStrategy: config.fetch.postsPerStrategy,
      commentPostLimit: config.fetch.commentPostLimit,
      commentsPerPost: config.fetch.commentsPerPost,
      topN: config.report.topN,
      ttlMs: config.store.ttlMs,
      ttlDays: config.store.ttlDays,
      deliverEmptyReport: config.delivery.deliverEmptyReport,
      reportTitle: config.report.title,
    },
    {
      forum,
      filter: new CandidateFilter(config.filter, store, logger.child("filter")),
      scorer: new RelevanceScorer(
        agent,
        {
          concurrency: config.scorer.concurrency,
          minTimeMs: config.scorer.minTimeMs,
          minRelevance: config.scorer.minRelevance,
        },
        logger.child("scorer")
      ),
      sink: new DiscordWebhookSink(config.delivery, logger.child("delivery")),
      store,
      logger: logger.child("pipeline"),
      metrics,
    }
  );
}

async function runOnce(config: AppConfig): Promise<number> {
  const store = createRecordStore(config);
  try {
    const result = await createPipeline(config, store).run();
    return result.status === "DONE" ? 0 : 1;
  } finally {
    await store.close();
  }
}

async function runDaemon(config: AppConfig): Promise<void> {
  const store = createRecordStore(config);
  const pipeline = createPipeline(config, store);
  const runs = scheduleRuns(
    config.schedule.cronExpression,
    config.schedule.timezone,
    () => pipeline.run(),
    logger
  );

  const shutdown = (signal: string) => {
    logger.info(`🛑 Received ${signal}, shutting down`);
    runs
      .stop()
      .then(() => store.close())
      .catch((error: unknown) =>
        logger.error("Failed to shut down cleanly", { error })
      )
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  configureLogging(config.logging);
  if (argv.includes("--daemon")) {
    await runDaemon(config);
    return 0;
  }
  return runOnce(config);
}

if (process.env.NODE_ENV !== "test") {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("💥 Fatal error", { error });
      process.exitCode = 1;
    });
}
