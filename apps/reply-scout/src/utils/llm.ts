import type { AppLogger } from "@/lib/logger";
import {
  errorCode,
  errorMessage,
  errorStatus,
  ScoreQuotaError,
  ScorerCallError,
} from "@/lib/errors";
import type {
  CompletionRequest,
  ModelCompletion,
  ScoringModel,
} from "@/types";
import { callWithRetry, sleep, TimeoutError, withTimeout } from "@/utils/retry";
import { ChatOpenAI } from "@langchain/openai";
import type { MessageContent } from "@langchain/core/messages";
import { get_encoding, Tiktoken } from "tiktoken";

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;

  /**
   * @param refillRate - tokens added per second
   */
  constructor(maxTokens: number, refillRate: number) {
    this.maxTokens = maxTokens;
    this.tokens = maxTokens;
    this.refillRate = refillRate;
    this.lastRefill = Date.now();
  }

  async waitForTokens(count: number): Promise<void> {
    const needed = Math.min(count, this.maxTokens);
    this.refill();

    while (this.tokens < needed) {
      await sleep(100);
      this.refill();
    }

    this.tokens -= needed;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    const timePassed = (now - this.lastRefill) / 1000;
    const tokensToAdd = timePassed * this.refillRate;
    this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }
}

let encoder: Tiktoken | undefined;

export function estimateTokens(text: string): number {
  encoder ??= get_encoding("cl100k_base");
  return encoder.encode(text).length;
}

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) =>
      "text" in part && typeof part.text === "string" ? part.text : ""
    )
    .join("");
}

export interface LLMClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  maxTokensPerMinute: number;
  maxRequestsPerMinute: number;
}

const isRetryable = (error: unknown): boolean => {
  if (errorCode(error) === "insufficient_quota") return false;
  if (error instanceof TimeoutError) return true;
  const status = errorStatus(error);
  if (status === undefined) return true; // network
  return status === 429 || status >= 500;
};

/**
 * OpenAI chat model behind the `ScoringModel` seam. Calls are throttled by
 * request and token buckets, time-boxed and retried with backoff.
 */
export class LLMClient implements ScoringModel {
  private readonly models = new Map<string, ChatOpenAI>();
  private readonly tokenBucket: TokenBucket;
  private readonly requestBucket: TokenBucket;

  constructor(
    private readonly options: LLMClientOptions,
    private readonly logger: AppLogger
  ) {
    this.tokenBucket = new TokenBucket(
      options.maxTokensPerMinute,
      options.maxTokensPerMinute / 60
    );
    this.requestBucket = new TokenBucket(
      options.maxRequestsPerMinute,
      options.maxRequestsPerMinute / 60
    );
  }

  async complete(request: CompletionRequest): Promise<ModelCompletion> {
    const llm = this.modelFor(request);
    const promptTokens = estimateTokens(request.prompt);
    const estimatedTokens = promptTokens + request.maxTokens;

    await this.requestBucket.waitForTokens(1);
    await this.tokenBucket.waitForTokens(estimatedTokens);

    try {
      const response = await callWithRetry(
        async () => {
          // Aborting on the way out cancels a timed-out request
          const controller = new AbortController();
          try {
            return await withTimeout(
              llm.invoke(request.prompt, { signal: controller.signal }),
              this.options.timeoutMs,
              "LLM call"
            );
          } finally {
            controller.abort();
          }
        },
        {
          attempts: this.options.retryAttempts,
          delayMs: this.options.retryDelayMs,
          shouldRetry: isRetryable,
          onRetry: (error, attempt, waitMs) =>
            this.logger.warn("LLM call failed, retrying", {
              attempt,
              waitMs,
              error,
            }),
        }
      );

      const text = contentToText(response.content);
      return { text, tokensUsed: promptTokens + estimateTokens(text) };
    } catch (error) {
      if (
        errorStatus(error) === 429 ||
        errorCode(error) === "insufficient_quota"
      ) {
        throw new ScoreQuotaError(
          `Model quota exhausted: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw new ScorerCallError(`Model call failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private modelFor(request: CompletionRequest): ChatOpenAI {
    const key = `${request.maxTokens}:${request.temperature}`;
    let llm = this.models.get(key);
    if (!llm) {
      llm = new ChatOpenAI({
        apiKey: this.options.apiKey,
        model: this.options.model,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        // retries are handled by callWithRetry
        maxRetries: 0,
      });
      this.models.set(key, llm);
    }
    return llm;
  }
}
