import { DeliveryError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import {
  DiscordWebhookSink,
  splitMessage,
} from "@/services/delivery.service";

const WEBHOOK_URL = "https://discord.test/api/webhooks/1/test-token";

const respond = (status: number, body = "") =>
  new Response(status === 204 ? null : body, { status });

describe("splitMessage", () => {
  it("returns a short message unchanged", () => {
    expect(splitMessage("hello\nworld", 20)).toEqual(["hello\nworld"]);
  });

  it("splits on line boundaries", () => {
    expect(splitMessage("aaa\nbbb\nccc", 7)).toEqual(["aaa\nbbb", "ccc"]);
  });

  it("hard-splits a line longer than the limit", () => {
    expect(splitMessage(`ab\n${"x".repeat(10)}`, 4)).toEqual([
      "ab",
      "xxxx",
      "xxxx",
      "xx",
    ]);
  });

  it("never produces a chunk over the limit", () => {
    const message = Array.from({ length: 50 }, (_, i) => `line ${i}`).join("\n");

    const chunks = splitMessage(message, 30);

    expect(chunks.every((chunk) => chunk.length <= 30)).toBe(true);
    expect(chunks.join("\n")).toBe(message);
  });

  it("keeps a blank line that opens a chunk", () => {
    const chunks = splitMessage("aaaaa\n\nbbbb", 5);

    expect(chunks).toEqual(["aaaaa", "\nbbbb"]);
    expect(chunks.join("\n")).toBe("aaaaa\n\nbbbb");
  });
});

describe("DiscordWebhookSink", () => {
  const options = {
    webhookUrl: WEBHOOK_URL,
    chunkSize: 20,
    timeoutMs: 1000,
    retryAttempts: 3,
    retryDelayMs: 1,
  };
  const document = "line one\nline two\nline three";

  const postedContents = (fetchFn: jest.Mock) =>
    fetchFn.mock.calls.map(([, init]) => {
      const body: unknown = init?.body;
      return typeof body === "string" ? JSON.parse(body).content : undefined;
    });

  it("posts every chunk in order", async () => {
    const fetchFn = jest.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      respond(204)
    );
    const sink = new DiscordWebhookSink(options, logger, fetchFn);

    const receipt = await sink.deliver(document);

    expect(receipt).toEqual({ chunks: 2 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(WEBHOOK_URL);
    expect(postedContents(fetchFn)).toEqual([
      "line one\nline two",
      "line three",
    ]);
  });

  it("retries a rate-limited chunk after retry_after", async () => {
    const fetchFn = jest
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => respond(204))
      .mockImplementationOnce(async () =>
        respond(429, JSON.stringify({ retry_after: 0.01 }))
      );
    const sink = new DiscordWebhookSink(options, logger, fetchFn);

    await expect(sink.deliver("short")).resolves.toEqual({ chunks: 1 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("retries server errors", async () => {
    const fetchFn = jest
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => respond(204))
      .mockImplementationOnce(async () => respond(502, "bad gateway"));
    const sink = new DiscordWebhookSink(options, logger, fetchFn);

    await expect(sink.deliver("short")).resolves.toEqual({ chunks: 1 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    const fetchFn = jest.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      respond(400, "invalid payload")
    );
    const sink = new DiscordWebhookSink(options, logger, fetchFn);

    await expect(sink.deliver("short")).rejects.toBeInstanceOf(DeliveryError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("fails the whole delivery when a later chunk cannot be sent", async () => {
    const fetchFn = jest
      .fn(async (_url: string | URL | Request, _init?: RequestInit) =>
        respond(503, "unavailable")
      )
      .mockImplementationOnce(async () => respond(204));
    const sink = new DiscordWebhookSink(options, logger, fetchFn);

    const delivery = sink.deliver(document);

    await expect(delivery).rejects.toBeInstanceOf(DeliveryError);
    await expect(delivery).rejects.toMatchObject({
      deliveredChunks: 1,
      totalChunks: 2,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1 + options.retryAttempts);
  });
});
