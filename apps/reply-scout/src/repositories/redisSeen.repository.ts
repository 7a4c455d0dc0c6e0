import type { AppLogger } from "@/lib/logger";
import type { RecordStore, StoreStatistics } from "@/types";
import type IORedis from "ioredis";

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_SEEN_KEY = "reply-scout:seen";

const scoreAt = (withScores: string[]): Date | null => {
  const raw = withScores[1];
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? new Date(value) : null;
};

/**
 * Redis-backed record store: a single sorted set of item ids scored by
 * their first-seen epoch ms.
 */
export class RedisSeenRepository implements RecordStore {
  constructor(
    private readonly redis: IORedis,
    private readonly logger: AppLogger,
    private readonly key: string = DEFAULT_SEEN_KEY
  ) {}

  async exists(id: string): Promise<boolean> {
    try {
      const score = await this.redis.zscore(this.key, id);
      return score !== null;
    } catch (error) {
      // Fail open: an unreadable store must not block the run
      this.logger.warn("⚠️ Seen lookup failed, treating as unseen", {
        id,
        error,
      });
      return false;
    }
  }

  async markSeen(id: string, timestamp: Date): Promise<void> {
    await this.redis.zadd(this.key, "NX", timestamp.getTime(), id);
  }

  async markSeenMany(ids: string[], timestamp: Date): Promise<void> {
    if (ids.length === 0) return;

    const seenAt = timestamp.getTime();
    const scoreMembers = ids.flatMap((id) => [seenAt, id]);
    await this.redis.zadd(this.key, "NX", ...scoreMembers);
  }

  async prune(now: Date, ttlMs: number): Promise<number> {
    const cutoff = now.getTime() - ttlMs;
    return this.redis.zremrangebyscore(this.key, "-inf", `(${cutoff}`);
  }

  async getStatistics(days: number, now: Date): Promise<StoreStatistics> {
    const since = now.getTime() - days * DAY_MS;
    const [total, recent, oldest, newest] = await Promise.all([
      this.redis.zcard(this.key),
      this.redis.zcount(this.key, since, "+inf"),
      this.redis.zrange(this.key, 0, 0, "WITHSCORES"),
      this.redis.zrange(this.key, -1, -1, "WITHSCORES"),
    ]);

    return {
      total,
      seenWithinDays: recent,
      oldestSeenAt: scoreAt(oldest),
      newestSeenAt: scoreAt(newest),
    };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
