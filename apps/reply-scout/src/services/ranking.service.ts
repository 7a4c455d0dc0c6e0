import type { RankedReport, RunDiagnostics, ScoredItem } from "@/types";

export const emptyDiagnostics = (): RunDiagnostics => ({
  fetchFailures: [],
  scoreFailures: [],
  belowThreshold: 0,
});

/**
 * Relevance desc, upvotes desc, newest first, then id so full ties still
 * come out in one order.
 */
export const compareScored = (a: ScoredItem, b: ScoredItem): number =>
  b.relevanceScore - a.relevanceScore ||
  b.score - a.score ||
  b.createdAt.getTime() - a.createdAt.getTime() ||
  (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const topOf = (items: ScoredItem[], topN: number): ScoredItem[] =>
  [...items].sort(compareScored).slice(0, topN);

export function rank(
  items: ScoredItem[],
  topN: number,
  diagnostics: RunDiagnostics = emptyDiagnostics()
): RankedReport {
  return {
    posts: topOf(
      items.filter((item) => item.kind === "post"),
      topN
    ),
    comments: topOf(
      items.filter((item) => item.kind === "comment"),
      topN
    ),
    topN,
    diagnostics,
  };
}
