import { DeliveryError, errorMessage, errorStatus } from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type { DeliveryReceipt, ReportSink } from "@/types";
import { callWithRetry } from "@/utils/retry";

export const DISCORD_MESSAGE_LIMIT = 2000;

export interface DiscordWebhookOptions {
  webhookUrl: string;
  chunkSize: number;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export class WebhookResponseError extends Error {
  readonly status: number;
  readonly retryAfterMs?: number;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(`Webhook responded ${status}: ${body.slice(0, 200)}`);
    this.name = "WebhookResponseError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

const hardSplit = (line: string, maxLength: number): string[] => {
  const pieces: string[] = [];
  for (let start = 0; start < line.length; start += maxLength) {
    pieces.push(line.slice(start, start + maxLength));
  }
  return pieces;
};

/**
 * Splits a message into chunks of at most `maxLength` characters on line
 * boundaries. Lines longer than `maxLength` are cut into fixed-size pieces.
 */
export function splitMessage(message: string, maxLength: number): string[] {
  if (message.length <= maxLength) return [message];

  const chunks: string[] = [];
  // null until the first line; "" is a blank line that must survive
  let current: string | null = null;
  for (const line of message.split("\n")) {
    const pieces =
      line.length > maxLength ? hardSplit(line, maxLength) : [line];
    for (const piece of pieces) {
      const candidate: string = current === null ? piece : `${current}\n${piece}`;
      if (current !== null && candidate.length > maxLength) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

const parseRetryAfter = (body: string, header: string | null): number | undefined => {
  try {
    const parsed: unknown = JSON.parse(body);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "retry_after" in parsed &&
      typeof parsed.retry_after === "number"
    ) {
      return Math.ceil(parsed.retry_after * 1000);
    }
  } catch {
    // not JSON; fall through to the header
  }
  const seconds = header === null ? NaN : Number(header);
  return Number.isFinite(seconds) ? Math.ceil(seconds * 1000) : undefined;
};

const isRetryable = (error: unknown): boolean => {
  const status = errorStatus(error);
  return status === undefined || status === 429 || status >= 500;
};

/**
 * Posts a report to a Discord webhook, one message per chunk, in order.
 */
export class DiscordWebhookSink implements ReportSink {
  constructor(
    private readonly options: DiscordWebhookOptions,
    private readonly logger: AppLogger,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async deliver(document: string): Promise<DeliveryReceipt> {
    const chunks = splitMessage(
      document,
      Math.min(this.options.chunkSize, DISCORD_MESSAGE_LIMIT)
    );

    for (const [index, chunk] of chunks.entries()) {
      try {
        await callWithRetry(() => this.post(chunk), {
          attempts: this.options.retryAttempts,
          delayMs: this.options.retryDelayMs,
          shouldRetry: isRetryable,
          delayHint: (error) =>
            error instanceof WebhookResponseError
              ? error.retryAfterMs
              : undefined,
          onRetry: (error, attempt, waitMs) =>
            this.logger.warn("Webhook post failed, retrying", {
              chunk: index + 1,
              attempt,
              waitMs,
              error,
            }),
        });
      } catch (error) {
        throw new DeliveryError(
          `Delivery failed at chunk ${index + 1}/${chunks.length}: ${errorMessage(error)}`,
          index,
          chunks.length,
          { cause: error }
        );
      }
    }

    this.logger.info("📨 Report delivered", { count: chunks.length });
    return { chunks: chunks.length };
  }

  private async post(content: string): Promise<void> {
    const response = await this.fetchFn(this.options.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ content }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (response.ok) return;

    const body = await response.text();
    throw new WebhookResponseError(
      response.status,
      body,
      response.status === 429
        ? parseRetryAfter(body, response.headers.get("retry-after"))
        : undefined
    );
  }
}
