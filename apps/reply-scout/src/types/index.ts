import type { ScoutError } from "@/lib/errors";
import type {
  FetchStrategy,
  ForumItemKind,
  RawItem,
} from "@reply-scout/types";

export type { FetchStrategy, ForumItemKind, RawItem };

export type FilterPolicy = "any" | "all";

export interface FilterRules {
  minUpvotes: number;
  /** Posts only. */
  minComments: number;
  /** Comments only. */
  minCommentScore: number;
  /** Comments only. */
  minCommentLength: number;
  keywords: string[];
  policy: FilterPolicy;
}

export interface RuleMatch {
  passed: boolean;
  matchedKeywords: string[];
}

export interface Candidate extends RawItem {
  readonly passedFilter: true;
  readonly matchedKeywords: string[];
}

export type Fit = "high" | "medium" | "low";

export type OpportunityKind = "agree" | "supplement" | "correct" | "ignore";

export interface ScoredItem extends Candidate {
  /** 0 to 10 inclusive. */
  readonly relevanceScore: number;
  readonly fit: Fit;
  /** Always null for posts. */
  readonly opportunityKind: OpportunityKind | null;
  readonly replyPoints: string[];
  readonly rationale: string;
  readonly topic?: string;
}

export type ScoreFailureReason = "parse" | "quota" | "call";

export interface ScoreFailure {
  id: string;
  kind: ForumItemKind;
  reason: ScoreFailureReason;
  message: string;
}

export interface ScoreBatchResult {
  items: ScoredItem[];
  failures: ScoreFailure[];
  belowThreshold: number;
}

export interface FetchFailure {
  source: string;
  message: string;
}

export interface RunDiagnostics {
  fetchFailures: FetchFailure[];
  scoreFailures: ScoreFailure[];
  belowThreshold: number;
}

export interface RankedReport {
  posts: ScoredItem[];
  comments: ScoredItem[];
  topN: number;
  diagnostics: RunDiagnostics;
}

export interface AgentResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: ScoutError;
  tokensUsed?: number;
  latencyMs: number;
}

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface ModelCompletion {
  text: string;
  tokensUsed: number;
}

/**
 * A remote language model. Implementations raise `ScoreQuotaError` once
 * the provider keeps answering 429, `ScorerCallError` for anything else.
 */
export interface ScoringModel {
  complete(request: CompletionRequest): Promise<ModelCompletion>;
}

export interface ForumClient {
  fetchPosts(
    subreddit: string,
    strategy: FetchStrategy,
    limit: number
  ): Promise<RawItem[]>;
  fetchComments(post: RawItem, limit: number): Promise<RawItem[]>;
}

export interface DeliveryReceipt {
  chunks: number;
}

export interface ReportSink {
  deliver(document: string): Promise<DeliveryReceipt>;
}

export interface StoreStatistics {
  total: number;
  seenWithinDays: number;
  oldestSeenAt: Date | null;
  newestSeenAt: Date | null;
}

/**
 * Cross-run memory of delivered ids. Records are appended and pruned,
 * never updated.
 */
export interface RecordStore {
  exists(id: string): Promise<boolean>;
  markSeen(id: string, timestamp: Date): Promise<void>;
  markSeenMany(ids: string[], timestamp: Date): Promise<void>;
  /** Removes records whose age is strictly greater than `ttlMs`. */
  prune(now: Date, ttlMs: number): Promise<number>;
  getStatistics(days: number, now: Date): Promise<StoreStatistics>;
  close(): Promise<void>;
}

export type PipelineStage =
  | "FETCHING"
  | "FILTERING"
  | "SCORING"
  | "RANKING"
  | "FORMATTING"
  | "DELIVERING"
  | "COMMITTING"
  | "DONE"
  | "FAILED";

export interface StageTiming {
  stage: PipelineStage;
  durationMs: number;
}

export interface PipelineCounts {
  pruned: number;
  fetched: number;
  candidates: number;
  scored: number;
  reportedPosts: number;
  reportedComments: number;
  committed: number;
  deliveredChunks: number;
}

export interface PipelineRunResult {
  status: "DONE" | "FAILED";
  failedStage?: PipelineStage;
  error?: Error;
  stages: StageTiming[];
  counts: PipelineCounts;
  diagnostics: RunDiagnostics;
  storeStats?: StoreStatistics;
}
