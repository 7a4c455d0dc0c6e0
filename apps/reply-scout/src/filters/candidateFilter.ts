import { FilterConfigError } from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type {
  Candidate,
  FilterRules,
  RawItem,
  RecordStore,
  RuleMatch,
} from "@/types";
import { deduplicateById } from "@/utils/deduplication";
import * as Joi from "joi";

const REMOVED_BODIES = new Set(["[deleted]", "[removed]"]);

const rulesSchema = Joi.object<FilterRules>({
  minUpvotes: Joi.number().integer().min(0).required(),
  minComments: Joi.number().integer().min(0).required(),
  minCommentScore: Joi.number().integer().min(0).required(),
  minCommentLength: Joi.number().integer().min(0).required(),
  keywords: Joi.array().items(Joi.string().trim().min(1)).required(),
  policy: Joi.string().valid("any", "all").required(),
});

export const isRemoved = (item: RawItem): boolean => {
  const body = item.body.trim();
  if (REMOVED_BODIES.has(body)) return true;
  // Title-only posts carry an empty body but are still live
  return body.length === 0 && (item.kind === "comment" || !item.title?.trim());
};

export class CandidateFilter {
  private readonly rules: FilterRules;
  private readonly keywords: string[];

  constructor(
    rules: FilterRules,
    private readonly store: RecordStore,
    private readonly logger: AppLogger
  ) {
    const { value, error } = rulesSchema.validate(rules);
    if (error || !value) {
      throw new FilterConfigError(error?.message ?? "rules missing");
    }
    this.rules = value;
    this.keywords = value.keywords.map((keyword) => keyword.toLowerCase());
  }

  /**
   * Static rule check, no store lookups.
   */
  matchesRules(item: RawItem): RuleMatch {
    if (isRemoved(item)) return { passed: false, matchedKeywords: [] };

    const matchedKeywords = this.matchKeywords(item);
    const thresholdPassed = this.passesThreshold(item);
    const keywordPassed = matchedKeywords.length > 0;

    const passed =
      this.rules.policy === "any"
        ? thresholdPassed || keywordPassed
        : thresholdPassed && (this.keywords.length === 0 || keywordPassed);

    return { passed, matchedKeywords };
  }

  /**
   * Applies the rules, drops in-batch duplicates (first wins) and ids the
   * record store already holds. Input order is preserved.
   */
  async filter(items: RawItem[]): Promise<Candidate[]> {
    const unique = deduplicateById(items);
    const candidates: Candidate[] = [];
    let rejected = 0;
    let alreadySeen = 0;

    for (const item of unique) {
      const match = this.matchesRules(item);
      if (!match.passed) {
        rejected++;
        continue;
      }
      if (await this.store.exists(item.id)) {
        alreadySeen++;
        continue;
      }
      candidates.push({
        ...item,
        passedFilter: true,
        matchedKeywords: match.matchedKeywords,
      });
    }

    this.logger.info("🔎 Filtered candidates", {
      count: candidates.length,
      input: items.length,
      duplicates: items.length - unique.length,
      rejected,
      alreadySeen,
    });

    return candidates;
  }

  private passesThreshold(item: RawItem): boolean {
    if (item.kind === "post") {
      return (
        item.score >= this.rules.minUpvotes &&
        item.numComments >= this.rules.minComments
      );
    }
    return (
      item.score >= this.rules.minCommentScore &&
      item.body.length >= this.rules.minCommentLength
    );
  }

  private matchKeywords(item: RawItem): string[] {
    if (this.keywords.length === 0) return [];
    const haystack = `${item.title ?? ""}\n${item.body}`.toLowerCase();
    return this.keywords.filter((keyword) => haystack.includes(keyword));
  }
}
