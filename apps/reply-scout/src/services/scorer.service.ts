import type { OpportunityAgent } from "@/agents/opportunity.agent";
import {
  ScoreParseError,
  ScoreQuotaError,
  ScorerUnavailableError,
  ScoutError,
} from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type {
  Candidate,
  ScoreBatchResult,
  ScoreFailure,
  ScoreFailureReason,
  ScoredItem,
} from "@/types";
import Bottleneck from "bottleneck";

export interface ScorerOptions {
  concurrency: number;
  minTimeMs: number;
  minRelevance: number;
}

const reasonFor = (error: ScoutError): ScoreFailureReason => {
  if (error instanceof ScoreParseError) return "parse";
  if (error instanceof ScoreQuotaError) return "quota";
  return "call";
};

type Outcome =
  | { ok: true; item: ScoredItem }
  | { ok: false; failure: ScoreFailure };

/**
 * Scores candidates one model call each. Per-item failures are isolated;
 * the batch only fails when no candidate could be scored for transport
 * reasons.
 */
export class RelevanceScorer {
  private readonly limiter: Bottleneck;

  constructor(
    private readonly agent: OpportunityAgent,
    private readonly options: ScorerOptions,
    private readonly logger: AppLogger
  ) {
    this.limiter = new Bottleneck({
      maxConcurrent: options.concurrency,
      minTime: options.minTimeMs,
    });
  }

  async scoreBatch(candidates: Candidate[]): Promise<ScoreBatchResult> {
    // Promise.all keeps input order whatever the completion order
    const outcomes = await Promise.all(
      candidates.map((candidate) =>
        this.limiter.schedule(() => this.scoreOne(candidate))
      )
    );

    const items: ScoredItem[] = [];
    const failures: ScoreFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) items.push(outcome.item);
      else failures.push(outcome.failure);
    }

    this.escalate(candidates.length, failures);

    const scored = items.filter(
      (item) => item.relevanceScore >= this.options.minRelevance
    );
    const belowThreshold = items.length - scored.length;

    this.logger.info("🧠 Scored candidates", {
      count: scored.length,
      input: candidates.length,
      failed: failures.length,
      belowThreshold,
    });

    return { items: scored, failures, belowThreshold };
  }

  private async scoreOne(candidate: Candidate): Promise<Outcome> {
    const result = await this.agent.assess(candidate);

    if (result.success && result.data) {
      return { ok: true, item: { ...candidate, ...result.data } };
    }

    const error =
      result.error ??
      new ScoreParseError(candidate.id, "no assessment returned", "");
    const failure: ScoreFailure = {
      id: candidate.id,
      kind: candidate.kind,
      reason: reasonFor(error),
      message: error.message,
    };
    this.logger.warn("Dropped candidate after scoring failure", {
      id: candidate.id,
      kind: candidate.kind,
      reason: failure.reason,
      error,
    });
    return { ok: false, failure };
  }

  private escalate(total: number, failures: ScoreFailure[]): void {
    if (total === 0 || failures.length < total) return;

    if (failures.every((failure) => failure.reason === "quota")) {
      throw new ScoreQuotaError(
        `Model quota exhausted for all ${total} candidates`
      );
    }
    if (failures.every((failure) => failure.reason !== "parse")) {
      throw new ScorerUnavailableError(
        `Scorer unavailable: all ${total} candidates failed`
      );
    }
  }
}
