import {
  errorMessage,
  ScoreParseError,
  ScorerCallError,
  ScoutError,
} from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type {
  AgentResult,
  Candidate,
  Fit,
  OpportunityKind,
  ScoringModel,
} from "@/types";
import { jsonParser } from "@/utils/jsonParser";
import type { MetricsCollector } from "@/utils/metrics";
import * as Joi from "joi";

const MAX_REPLY_POINTS = 5;
const EXCERPT_LENGTH = 500;

export interface Assessment {
  relevanceScore: number;
  fit: Fit;
  opportunityKind: OpportunityKind | null;
  replyPoints: string[];
  rationale: string;
  topic?: string;
}

export interface OpportunityAgentOptions {
  audienceContext: string;
  maxTokens: number;
  temperature: number;
}

interface OpportunityResponse {
  score: number;
  rationale: string;
  topic?: string;
  reply_points: string[];
  opportunity_kind?: OpportunityKind;
}

const postResponseSchema = Joi.object<OpportunityResponse>({
  score: Joi.number().min(0).max(10).required(),
  rationale: Joi.string().trim().min(1).required(),
  topic: Joi.string().trim().allow(""),
  reply_points: Joi.array()
    .items(Joi.string().trim().min(1))
    .min(1)
    .required(),
}).unknown();

const commentResponseSchema = postResponseSchema.keys({
  opportunity_kind: Joi.string()
    .valid("agree", "supplement", "correct", "ignore")
    .required(),
});

export const fitFor = (score: number): Fit =>
  score >= 8 ? "high" : score >= 5 ? "medium" : "low";

const hoursAgo = (date: Date, now: number): string =>
  ((now - date.getTime()) / 3_600_000).toFixed(1);

export class OpportunityAgent {
  private readonly agentName = "opportunity";

  constructor(
    private readonly model: ScoringModel,
    private readonly options: OpportunityAgentOptions,
    private readonly metrics: MetricsCollector,
    private readonly logger: AppLogger
  ) {}

  async assess(candidate: Candidate): Promise<AgentResult<Assessment>> {
    const startTime = Date.now();
    const prompt =
      candidate.kind === "post"
        ? this.buildPostPrompt(candidate, startTime)
        : this.buildCommentPrompt(candidate, startTime);

    let responseText: string;
    let tokensUsed = 0;
    try {
      const completion = await this.model.complete({
        prompt,
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
      });
      responseText = completion.text;
      tokensUsed = completion.tokensUsed;
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      this.metrics.recordAgentCall(this.agentName, latencyMs, 0, false);
      return {
        success: false,
        error:
          error instanceof ScoutError
            ? error
            : new ScorerCallError(errorMessage(error), { cause: error }),
        latencyMs,
      };
    }

    const latencyMs = Date.now() - startTime;
    try {
      const data = this.parse(candidate, responseText);
      this.metrics.recordAgentCall(this.agentName, latencyMs, tokensUsed, true);
      return { success: true, data, tokensUsed, latencyMs };
    } catch (error) {
      this.metrics.recordAgentCall(this.agentName, latencyMs, tokensUsed, false);
      const parseError =
        error instanceof ScoreParseError
          ? error
          : new ScoreParseError(candidate.id, errorMessage(error), responseText);
      this.logger.debug("Unusable scorer response", {
        id: candidate.id,
        response: responseText.slice(0, 200),
      });
      return { success: false, error: parseError, tokensUsed, latencyMs };
    }
  }

  private parse(candidate: Candidate, responseText: string): Assessment {
    const schema =
      candidate.kind === "post" ? postResponseSchema : commentResponseSchema;
    const { value, error } = schema.validate(jsonParser(responseText));
    if (error || !value) {
      throw new ScoreParseError(
        candidate.id,
        error?.message ?? "empty response",
        responseText
      );
    }

    return {
      relevanceScore: value.score,
      fit: fitFor(value.score),
      opportunityKind:
        candidate.kind === "comment" ? value.opportunity_kind ?? null : null,
      replyPoints: value.reply_points.slice(0, MAX_REPLY_POINTS),
      rationale: value.rationale,
      topic: value.topic || undefined,
    };
  }

  private buildPostPrompt(post: Candidate, now: number): string {
    return `Assess this Reddit post as an opportunity for us to reply.

Who we are: ${this.options.audienceContext}

**Post Title:** ${post.title ?? ""}
**Subreddit:** r/${post.subreddit}
**Content:** ${post.body.slice(0, EXCERPT_LENGTH)}
**Upvotes:** ${post.score}
**Comments:** ${post.numComments}
**Posted:** ${hoursAgo(post.createdAt, now)} hours ago

Score the reply opportunity from 0 to 10:
- Genuine, specific question or problem we can help with (0-4)
- Visibility: upvotes and comment activity (0-2)
- Recency: fresher posts are seen by more people (0-2)
- Fit: we can add something useful without being promotional (0-2)

Return ONLY valid JSON in this exact format:
{
  "score": 7.5,
  "rationale": "one or two sentences explaining the score",
  "topic": "short topic label",
  "reply_points": ["point a reply should make", "another point"]
}

Give between 1 and ${MAX_REPLY_POINTS} reply points, most important first.`;
  }

  private buildCommentPrompt(comment: Candidate, now: number): string {
    return `Assess this Reddit comment as an opportunity for us to reply to it.

Who we are: ${this.options.audienceContext}

**Original Post:** ${comment.parentPostTitle ?? ""}
**Comment by:** u/${comment.author}
**Comment:** ${comment.body.slice(0, EXCERPT_LENGTH)}
**Upvotes:** ${comment.score}
**Posted:** ${hoursAgo(comment.createdAt, now)} hours ago

Classify the opportunity:
- "agree": the comment is right, we can back it up with experience
- "supplement": the comment is incomplete, we can add what is missing
- "correct": the comment is misleading, we can politely correct it
- "ignore": nothing worth adding

Score the reply opportunity from 0 to 10:
- Gap we can fill: incomplete or inaccurate advice (0-4)
- Visibility: upvotes (0-2)
- Recency (0-2)
- Value we can add without being promotional (0-2)

Return ONLY valid JSON in this exact format:
{
  "score": 6.5,
  "opportunity_kind": "supplement",
  "rationale": "one or two sentences explaining the score",
  "topic": "short topic label",
  "reply_points": ["point a reply should make", "another point"]
}

Give between 1 and ${MAX_REPLY_POINTS} reply points, most important first.`;
  }
}
