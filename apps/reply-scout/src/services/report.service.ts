import type {
  RankedReport,
  RunDiagnostics,
  ScoredItem,
  ScoreFailureReason,
} from "@/types";

export interface ReportOptions {
  title?: string;
}

const DEFAULT_TITLE = "Reply Opportunity Report";
const EXCERPT_LENGTH = 200;

// Report text never contains code fences, so line-based chunking is safe
const clean = (text: string): string =>
  text.replace(/`{3,}/g, "'''").replace(/\s+/g, " ").trim();

const truncate = (text: string, max: number): string =>
  text.length > max ? `${text.slice(0, max - 1).trimEnd()}…` : text;

export const formatAge = (createdAt: Date, now: Date): string => {
  const minutes = Math.max(
    0,
    Math.floor((now.getTime() - createdAt.getTime()) / 60_000)
  );
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 48) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
};

const badge = (item: ScoredItem): string => {
  const parts = [`${item.relevanceScore.toFixed(1)}/10`, item.fit.toUpperCase()];
  if (item.opportunityKind) parts.push(item.opportunityKind.toUpperCase());
  return `[${parts.join(" · ")}]`;
};

const details = (item: ScoredItem): string[] => {
  const lines = [`Why: ${clean(item.rationale)}`, "Reply points:"];
  for (const point of item.replyPoints) lines.push(`• ${clean(point)}`);
  lines.push(`<${item.permalink}>`);
  return lines;
};

const formatPost = (item: ScoredItem, rank: number, now: Date): string[] => [
  `**#${rank}** ${badge(item)} ${clean(item.title ?? "")}`,
  `r/${item.subreddit} · ⬆️ ${item.score} · 💬 ${item.numComments} · ${formatAge(item.createdAt, now)}`,
  ...details(item),
];

const formatComment = (item: ScoredItem, rank: number, now: Date): string[] => [
  `**#${rank}** ${badge(item)} u/${item.author} on "${clean(item.parentPostTitle ?? "")}"`,
  `> ${truncate(clean(item.body), EXCERPT_LENGTH)}`,
  `r/${item.subreddit} · ⬆️ ${item.score} · ${formatAge(item.createdAt, now)}`,
  ...details(item),
];

const formatSection = (
  heading: string,
  noun: "posts" | "comments",
  items: ScoredItem[],
  topN: number,
  now: Date,
  render: (item: ScoredItem, rank: number, now: Date) => string[]
): string[] => {
  const lines = [heading, ""];
  if (items.length === 0) {
    lines.push(`No qualifying ${noun} this run.`);
    return lines;
  }

  items.forEach((item, index) => {
    lines.push(...render(item, index + 1, now), "");
  });
  if (items.length < topN) {
    lines.push(
      `No more qualifying ${noun} (${items.length} of ${topN} slots filled).`
    );
  } else {
    lines.pop();
  }
  return lines;
};

const FAILURE_REASONS: ScoreFailureReason[] = ["parse", "quota", "call"];

const formatWarnings = (diagnostics: RunDiagnostics): string[] => {
  const lines: string[] = [];
  for (const failure of diagnostics.fetchFailures) {
    lines.push(`• Fetch failed for ${failure.source}: ${clean(failure.message)}`);
  }

  const failures = diagnostics.scoreFailures;
  if (failures.length > 0) {
    const breakdown = FAILURE_REASONS.map((reason) => ({
      reason,
      count: failures.filter((failure) => failure.reason === reason).length,
    }))
      .filter(({ count }) => count > 0)
      .map(({ reason, count }) => `${reason}: ${count}`)
      .join(", ");
    lines.push(
      `• ${failures.length} candidates dropped by the scorer (${breakdown})`
    );
  }

  return lines.length > 0 ? ["**⚠️ Run warnings**", ...lines] : [];
};

/**
 * Renders a ranked report as Discord markdown. Pure: `date` is the report
 * date and the reference point for item ages.
 */
export function formatReport(
  report: RankedReport,
  date: Date,
  options: ReportOptions = {}
): string {
  const title = options.title ?? DEFAULT_TITLE;
  const lines = [
    `**📊 ${title}** | ${date.toISOString().slice(0, 10)}`,
    `Posts: ${report.posts.length} | Comments: ${report.comments.length}`,
    "",
    ...formatSection(
      "**🔥 TOP Posts**",
      "posts",
      report.posts,
      report.topN,
      date,
      formatPost
    ),
    "",
    ...formatSection(
      "**💬 TOP Comments**",
      "comments",
      report.comments,
      report.topN,
      date,
      formatComment
    ),
  ];

  const warnings = formatWarnings(report.diagnostics);
  if (warnings.length > 0) lines.push("", ...warnings);

  return lines.join("\n");
}
