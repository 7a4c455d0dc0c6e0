import { ConfigValidationError } from "@/lib/errors";
import type { FilterPolicy } from "@/types";
import type { FetchStrategy, TopTimeFilter } from "@reply-scout/types";
import * as Joi from "joi";

type INodeEnv = "development" | "production" | "staging" | "test";
type RecordStoreBackend = "sqlite" | "redis";

interface EnvVars {
  NODE_ENV: INodeEnv;
  LOG_DIR: string;

  SUBREDDITS: string;
  REDDIT_USER_AGENT: string;
  REDDIT_CLIENT_ID: string;
  REDDIT_CLIENT_SECRET: string;
  REDDIT_USERNAME: string;
  REDDIT_PASSWORD: string;
  FETCH_STRATEGIES: string;
  POSTS_PER_STRATEGY: number;
  TOP_TIME_FILTER: TopTimeFilter;
  COMMENT_POST_LIMIT: number;
  COMMENTS_PER_POST: number;
  FETCH_TIMEOUT_MS: number;

  FILTER_MIN_UPVOTES: number;
  FILTER_MIN_COMMENTS: number;
  FILTER_MIN_COMMENT_SCORE: number;
  FILTER_MIN_COMMENT_LENGTH: number;
  FILTER_KEYWORDS: string;
  FILTER_POLICY: FilterPolicy;

  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  SCORER_MAX_TOKENS: number;
  SCORER_TEMPERATURE: number;
  SCORER_CONCURRENCY: number;
  SCORER_MIN_TIME_MS: number;
  SCORER_TIMEOUT_MS: number;
  SCORER_MIN_RELEVANCE: number;
  AUDIENCE_CONTEXT: string;
  RETRY_ATTEMPTS: number;
  RETRY_DELAY_MS: number;
  MAX_TOKENS_PER_MINUTE: number;
  MAX_REQUESTS_PER_MINUTE: number;

  DISCORD_WEBHOOK_URL: string;
  DELIVERY_CHUNK_SIZE: number;
  DELIVERY_TIMEOUT_MS: number;
  DELIVER_EMPTY_REPORT: boolean;
  REPORT_TITLE: string;

  RECORD_STORE: RecordStoreBackend;
  RECORD_STORE_PATH: string;
  REDIS_HOST?: string;
  REDIS_PORT?: number;
  SEEN_TTL_DAYS: number;

  TOP_N: number;
  CRON_EXPRESSION: string;
  TIMEZONE: string;
}

const FETCH_STRATEGIES: readonly FetchStrategy[] = ["hot", "rising", "top", "new"];

const csv = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const isFetchStrategy = (value: string): value is FetchStrategy =>
  FETCH_STRATEGIES.some((strategy) => strategy === value);

// Define validation schema for environment variables
const envSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string()
      .valid("development", "production", "staging", "test")
      .default("development"),
    LOG_DIR: Joi.string().default("logs"),

    SUBREDDITS: Joi.string().required(),
    REDDIT_USER_AGENT: Joi.string().default("reply-scout/1.0"),
    REDDIT_CLIENT_ID: Joi.string().required(),
    REDDIT_CLIENT_SECRET: Joi.string().required(),
    REDDIT_USERNAME: Joi.string().required(),
    REDDIT_PASSWORD: Joi.string().required(),
    FETCH_STRATEGIES: Joi.string()
      .pattern(/^\s*(hot|rising|top|new)(\s*,\s*(hot|rising|top|new))*\s*$/)
      .default("hot,rising,top,new"),
    POSTS_PER_STRATEGY: Joi.number().integer().min(1).max(100).default(12),
    TOP_TIME_FILTER: Joi.string()
      .valid("hour", "day", "week", "month", "year", "all")
      .default("day"),
    COMMENT_POST_LIMIT: Joi.number().integer().min(0).default(10),
    COMMENTS_PER_POST: Joi.number().integer().min(1).default(50),
    FETCH_TIMEOUT_MS: Joi.number().integer().min(1).default(15000),

    FILTER_MIN_UPVOTES: Joi.number().integer().min(0).default(5),
    FILTER_MIN_COMMENTS: Joi.number().integer().min(0).default(2),
    FILTER_MIN_COMMENT_SCORE: Joi.number().integer().min(0).default(3),
    FILTER_MIN_COMMENT_LENGTH: Joi.number().integer().min(0).default(50),
    FILTER_KEYWORDS: Joi.string().allow("").default(""),
    FILTER_POLICY: Joi.string().valid("any", "all").default("any"),

    OPENAI_API_KEY: Joi.string().min(1).required(),
    OPENAI_MODEL: Joi.string().default("gpt-4o-mini"),
    SCORER_MAX_TOKENS: Joi.number().integer().min(64).default(1024),
    SCORER_TEMPERATURE: Joi.number().min(0).max(2).default(0.3),
    SCORER_CONCURRENCY: Joi.number().integer().min(1).max(10).default(3),
    SCORER_MIN_TIME_MS: Joi.number().integer().min(0).default(250),
    SCORER_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
    SCORER_MIN_RELEVANCE: Joi.number().min(0).max(10).default(5),
    AUDIENCE_CONTEXT: Joi.string()
      .allow("")
      .default(
        "We help members of this community with practical, honest advice."
      ),
    RETRY_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
    RETRY_DELAY_MS: Joi.number().integer().min(0).default(1000),
    MAX_TOKENS_PER_MINUTE: Joi.number().integer().min(1).default(100000),
    MAX_REQUESTS_PER_MINUTE: Joi.number().integer().min(1).default(100),

    DISCORD_WEBHOOK_URL: Joi.string().uri().required(),
    DELIVERY_CHUNK_SIZE: Joi.number().integer().min(200).max(2000).default(1900),
    DELIVERY_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
    DELIVER_EMPTY_REPORT: Joi.boolean().default(true),
    REPORT_TITLE: Joi.string().default("Reply Opportunity Report"),

    RECORD_STORE: Joi.string().valid("sqlite", "redis").default("sqlite"),
    RECORD_STORE_PATH: Joi.string().default("data/seen-records.db"),
    REDIS_HOST: Joi.string().when("RECORD_STORE", {
      is: "redis",
      then: Joi.required(),
    }),
    REDIS_PORT: Joi.number().port().when("RECORD_STORE", {
      is: "redis",
      then: Joi.required(),
    }),
    SEEN_TTL_DAYS: Joi.number().min(0).default(3),

    TOP_N: Joi.number().integer().min(1).max(50).default(10),
    CRON_EXPRESSION: Joi.string().default("0 9 * * *"),
    TIMEZONE: Joi.string().default("UTC"),
  })
  .unknown();

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Validates an environment map and builds the immutable configuration
 * threaded into every component.
 */
export function buildConfig(env: NodeJS.ProcessEnv) {
  const { value: validatedEnvVars, error: validationError } = envSchema
    .prefs({ errors: { label: "key" } })
    .validate(env);

  if (validationError || !validatedEnvVars) {
    throw new ConfigValidationError(
      validationError?.message ?? "environment could not be validated"
    );
  }

  const vars = validatedEnvVars;

  return Object.freeze({
    appEnvironment: vars.NODE_ENV,

    logging: Object.freeze({
      dir: vars.LOG_DIR,
    }),

    reddit: Object.freeze({
      userAgent: vars.REDDIT_USER_AGENT,
      clientId: vars.REDDIT_CLIENT_ID,
      clientSecret: vars.REDDIT_CLIENT_SECRET,
      userName: vars.REDDIT_USERNAME,
      password: vars.REDDIT_PASSWORD,
      requestTimeoutMs: vars.FETCH_TIMEOUT_MS,
    }),

    fetch: Object.freeze({
      subreddits: csv(vars.SUBREDDITS),
      strategies: csv(vars.FETCH_STRATEGIES).filter(isFetchStrategy),
      postsPerStrategy: vars.POSTS_PER_STRATEGY,
      topTimeFilter: vars.TOP_TIME_FILTER,
      commentPostLimit: vars.COMMENT_POST_LIMIT,
      commentsPerPost: vars.COMMENTS_PER_POST,
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      retryAttempts: vars.RETRY_ATTEMPTS,
      retryDelayMs: vars.RETRY_DELAY_MS,
    }),

    filter: Object.freeze({
      minUpvotes: vars.FILTER_MIN_UPVOTES,
      minComments: vars.FILTER_MIN_COMMENTS,
      minCommentScore: vars.FILTER_MIN_COMMENT_SCORE,
      minCommentLength: vars.FILTER_MIN_COMMENT_LENGTH,
      keywords: csv(vars.FILTER_KEYWORDS),
      policy: vars.FILTER_POLICY,
    }),

    openai: Object.freeze({
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
    }),

    scorer: Object.freeze({
      maxTokens: vars.SCORER_MAX_TOKENS,
      temperature: vars.SCORER_TEMPERATURE,
      concurrency: vars.SCORER_CONCURRENCY,
      minTimeMs: vars.SCORER_MIN_TIME_MS,
      timeoutMs: vars.SCORER_TIMEOUT_MS,
      minRelevance: vars.SCORER_MIN_RELEVANCE,
      audienceContext: vars.AUDIENCE_CONTEXT,
      retryAttempts: vars.RETRY_ATTEMPTS,
      retryDelayMs: vars.RETRY_DELAY_MS,
    }),

    limits: Object.freeze({
      maxTokensPerMinute: vars.MAX_TOKENS_PER_MINUTE,
      maxRequestsPerMinute: vars.MAX_REQUESTS_PER_MINUTE,
    }),

    delivery: Object.freeze({
      webhookUrl: vars.DISCORD_WEBHOOK_URL,
      chunkSize: vars.DELIVERY_CHUNK_SIZE,
      timeoutMs: vars.DELIVERY_TIMEOUT_MS,
      retryAttempts: vars.RETRY_ATTEMPTS,
      retryDelayMs: vars.RETRY_DELAY_MS,
      deliverEmptyReport: vars.DELIVER_EMPTY_REPORT,
    }),

    report: Object.freeze({
      title: vars.REPORT_TITLE,
      topN: vars.TOP_N,
    }),

    store: Object.freeze({
      backend: vars.RECORD_STORE,
      path: vars.RECORD_STORE_PATH,
      ttlMs: vars.SEEN_TTL_DAYS * DAY_MS,
      ttlDays: vars.SEEN_TTL_DAYS,
    }),

    cache: Object.freeze({
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
    }),

    schedule: Object.freeze({
      cronExpression: vars.CRON_EXPRESSION,
      timezone: vars.TIMEZONE,
    }),
  });
}

export type AppConfig = ReturnType<typeof buildConfig>;
