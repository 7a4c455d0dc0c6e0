import type {
  Candidate,
  CompletionRequest,
  DeliveryReceipt,
  FetchStrategy,
  ForumClient,
  ModelCompletion,
  RawItem,
  ReportSink,
  ScoredItem,
  ScoringModel,
} from "@/types";

export const NOW = new Date("2026-03-10T12:00:00.000Z");
export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export const hoursBefore = (hours: number, from: Date = NOW): Date =>
  new Date(from.getTime() - hours * HOUR_MS);

export function makePost(overrides: Partial<RawItem> = {}): RawItem {
  return {
    id: "p1",
    kind: "post",
    title: "How do I invoice a client abroad?",
    body: "I just landed my first overseas client and have no idea how to bill them.",
    author: "asker",
    score: 10,
    numComments: 5,
    createdAt: hoursBefore(2),
    permalink: "https://www.reddit.com/r/freelance/comments/p1/",
    subreddit: "freelance",
    ...overrides,
  };
}

export function makeComment(overrides: Partial<RawItem> = {}): RawItem {
  return {
    id: "c1",
    kind: "comment",
    body: "You should always ask for a deposit up front, at least thirty percent of the total.",
    author: "helper",
    score: 8,
    numComments: 0,
    createdAt: hoursBefore(1),
    permalink: "https://www.reddit.com/r/freelance/comments/p1/_/c1/",
    subreddit: "freelance",
    parentPostId: "p1",
    parentPostTitle: "How do I invoice a client abroad?",
    ...overrides,
  };
}

export const toCandidate = (item: RawItem): Candidate => ({
  ...item,
  passedFilter: true,
  matchedKeywords: [],
});

export function makeScored(overrides: Partial<ScoredItem> = {}): ScoredItem {
  const base = toCandidate(
    overrides.kind === "comment" ? makeComment() : makePost()
  );
  return {
    ...base,
    relevanceScore: 7,
    fit: "medium",
    opportunityKind: base.kind === "comment" ? "supplement" : null,
    replyPoints: ["Mention invoicing in the client's currency"],
    rationale: "Clear question with an audience.",
    ...overrides,
  };
}

export const postResponse = (score: number, extra: object = {}): string =>
  JSON.stringify({
    score,
    rationale: "Specific question we can answer.",
    topic: "Invoicing",
    reply_points: ["Explain currency options", "Suggest a deposit"],
    ...extra,
  });

type Responder = (request: CompletionRequest) => string | Error;

/**
 * Scoring model stand-in; answers from a responder keyed on the prompt.
 */
export class FakeScoringModel implements ScoringModel {
  readonly prompts: string[] = [];

  constructor(private readonly responder: Responder) {}

  async complete(request: CompletionRequest): Promise<ModelCompletion> {
    this.prompts.push(request.prompt);
    const answer = this.responder(request);
    if (answer instanceof Error) throw answer;
    return { text: answer, tokensUsed: 10 };
  }
}

export class FakeForumClient implements ForumClient {
  readonly postCalls: string[] = [];
  readonly commentCalls: string[] = [];

  constructor(
    private readonly posts: Record<string, RawItem[]>,
    private readonly comments: Record<string, RawItem[]> = {},
    private readonly failing: Set<string> = new Set()
  ) {}

  async fetchPosts(
    subreddit: string,
    strategy: FetchStrategy,
    limit: number
  ): Promise<RawItem[]> {
    const source = `${subreddit}/${strategy}`;
    this.postCalls.push(source);
    if (this.failing.has(source)) throw new Error(`${source} unavailable`);
    return (this.posts[source] ?? []).slice(0, limit);
  }

  async fetchComments(post: RawItem, limit: number): Promise<RawItem[]> {
    this.commentCalls.push(post.id);
    if (this.failing.has(`comments/${post.id}`)) {
      throw new Error(`comments for ${post.id} unavailable`);
    }
    return (this.comments[post.id] ?? []).slice(0, limit);
  }
}

export class RecordingSink implements ReportSink {
  readonly documents: string[] = [];

  constructor(private readonly failWith?: Error) {}

  async deliver(document: string): Promise<DeliveryReceipt> {
    if (this.failWith) throw this.failWith;
    this.documents.push(document);
    return { chunks: 1 };
  }
}
