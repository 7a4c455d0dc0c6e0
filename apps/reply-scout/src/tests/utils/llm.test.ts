import { ScoreQuotaError, ScorerCallError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { LLMClient, TokenBucket } from "@/utils/llm";
import { ChatOpenAI } from "@langchain/openai";

const mockInvoke = jest.fn();

jest.mock("@langchain/openai", () => ({
  ChatOpenAI: jest.fn().mockImplementation(() => ({ invoke: mockInvoke })),
}));

// whitespace tokens keep the estimates easy to follow
jest.mock("tiktoken", () => ({
  get_encoding: () => ({
    encode: (text: string) => text.split(/\s+/).filter(Boolean),
  }),
}));

const httpError = (status: number, code?: string) =>
  Object.assign(new Error(`HTTP ${status}`), { status, code });

const request = { prompt: "rate this post", maxTokens: 256, temperature: 0.3 };

describe("LLMClient", () => {
  const buildClient = (timeoutMs = 1000) =>
    new LLMClient(
      {
        apiKey: "test-key",
        model: "gpt-test",
        timeoutMs,
        retryAttempts: 2,
        retryDelayMs: 1,
        maxTokensPerMinute: 100000,
        maxRequestsPerMinute: 100,
      },
      logger
    );

  beforeEach(() => {
    mockInvoke.mockReset();
  });

  it("returns the completion text with a token estimate", async () => {
    mockInvoke.mockResolvedValueOnce({ content: "hello world" });

    const completion = await buildClient().complete(request);

    expect(completion).toEqual({ text: "hello world", tokensUsed: 5 });
    expect(mockInvoke).toHaveBeenCalledWith("rate this post", {
      signal: expect.any(AbortSignal),
    });
    expect(ChatOpenAI).toHaveBeenCalledWith(
      expect.objectContaining({
        apiKey: "test-key",
        model: "gpt-test",
        maxTokens: 256,
        temperature: 0.3,
        maxRetries: 0,
      })
    );
  });

  it("joins text parts of structured content", async () => {
    mockInvoke.mockResolvedValueOnce({
      content: [
        { type: "text", text: "part one" },
        { type: "image_url", image_url: "https://example.test/x.png" },
        { type: "text", text: " two" },
      ],
    });

    const completion = await buildClient().complete(request);

    expect(completion.text).toBe("part one two");
  });

  it("retries server errors", async () => {
    mockInvoke
      .mockRejectedValueOnce(httpError(500))
      .mockResolvedValueOnce({ content: "{}" });

    await expect(buildClient().complete(request)).resolves.toMatchObject({
      text: "{}",
    });
    expect(mockInvoke).toHaveBeenCalledTimes(2);
  });

  it("raises a quota error once 429s outlast the retries", async () => {
    mockInvoke.mockRejectedValue(httpError(429));

    await expect(buildClient().complete(request)).rejects.toBeInstanceOf(
      ScoreQuotaError
    );
    expect(mockInvoke).toHaveBeenCalledTimes(2);
  });

  it("does not retry an exhausted account quota", async () => {
    mockInvoke.mockRejectedValue(httpError(429, "insufficient_quota"));

    await expect(buildClient().complete(request)).rejects.toBeInstanceOf(
      ScoreQuotaError
    );
    expect(mockInvoke).toHaveBeenCalledTimes(1);
  });

  it("does not retry other client errors", async () => {
    mockInvoke.mockRejectedValue(httpError(400));

    await expect(buildClient().complete(request)).rejects.toBeInstanceOf(
      ScorerCallError
    );
    expect(mockInvoke).toHaveBeenCalledTimes(1);
  });

  it("times out a hanging call and aborts every attempt", async () => {
    const signals: AbortSignal[] = [];
    mockInvoke.mockImplementation(
      (_prompt: string, options: { signal: AbortSignal }) => {
        signals.push(options.signal);
        return new Promise(() => undefined);
      }
    );

    await expect(buildClient(20).complete(request)).rejects.toThrow(
      "Model call failed: LLM call timed out after 20ms"
    );
    expect(signals).toHaveLength(2);
    expect(signals.map((signal) => signal.aborted)).toEqual([true, true]);
  });
});

describe("TokenBucket", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("waits for the bucket to refill", async () => {
    const bucket = new TokenBucket(10, 10);
    await bucket.waitForTokens(10);
    expect(bucket.available()).toBe(0);

    let done = false;
    const waiting = bucket.waitForTokens(5).then(() => {
      done = true;
    });

    await jest.advanceTimersByTimeAsync(300);
    expect(done).toBe(false);

    await jest.advanceTimersByTimeAsync(300);
    await waiting;
    expect(done).toBe(true);
  });

  it("caps a request at the bucket size", async () => {
    const bucket = new TokenBucket(10, 1);

    await bucket.waitForTokens(50);

    expect(bucket.available()).toBe(0);
  });
});
