import {
  errorCode,
  errorMessage,
  StoreCorruptionError,
} from "@/lib/errors";
import type { AppLogger } from "@/lib/logger";
import type { RecordStore, StoreStatistics } from "@/types";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";

const DAY_MS = 24 * 60 * 60 * 1000;
const IN_MEMORY = ":memory:";

const CORRUPTION_CODES = new Set([
  "SQLITE_CORRUPT",
  "SQLITE_NOTADB",
  "SQLITE_CORRUPT_VTAB",
  "SQLITE_CORRUPT_SEQUENCE",
]);

interface StatsRow {
  total: number;
  recent: number;
  oldest: number | null;
  newest: number | null;
}

const isCorruption = (error: unknown): boolean => {
  const code = errorCode(error);
  return code !== undefined && CORRUPTION_CODES.has(code);
};

type Migration = (db: Database.Database, now: number) => void;

// Index i migrates user_version i to i + 1
const MIGRATIONS: Migration[] = [
  (db, now) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS seen_records (
        id TEXT PRIMARY KEY,
        first_seen_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_seen_records_first_seen_at
        ON seen_records(first_seen_at);
    `);

    const legacy = db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'pushed_posts'"
      )
      .get();
    if (legacy === undefined) return;

    // Legacy timestamps are ISO-ish text; unparsable ones restart their TTL now
    db.prepare(
      `INSERT OR IGNORE INTO seen_records (id, first_seen_at)
       SELECT post_id,
              COALESCE(CAST(strftime('%s', pushed_at) AS INTEGER) * 1000, ?)
       FROM pushed_posts`
    ).run(now);
  },
];

/**
 * SQLite-backed record store. One row per delivered item id, keyed by id,
 * stamped with the epoch-ms time it was first delivered.
 */
export class SqliteSeenRepository implements RecordStore {
  private db: Database.Database;

  constructor(
    private readonly dbPath: string,
    private readonly logger: AppLogger
  ) {
    this.db = this.open();
  }

  /** Location actually in use; `:memory:` after a failed recovery. */
  get location(): string {
    return this.db.name;
  }

  async exists(id: string): Promise<boolean> {
    try {
      const row = this.db
        .prepare("SELECT 1 FROM seen_records WHERE id = ?")
        .get(id);
      return row !== undefined;
    } catch (error) {
      // Fail open: an unreadable store must not block the run
      this.logger.warn("⚠️ Seen lookup failed, treating as unseen", {
        id,
        error: new StoreCorruptionError(this.location, errorMessage(error), {
          cause: error,
        }),
      });
      this.reopen(error);
      return false;
    }
  }

  async markSeen(id: string, timestamp: Date): Promise<void> {
    this.db
      .prepare(
        "INSERT OR IGNORE INTO seen_records (id, first_seen_at) VALUES (?, ?)"
      )
      .run(id, timestamp.getTime());
  }

  async markSeenMany(ids: string[], timestamp: Date): Promise<void> {
    if (ids.length === 0) return;

    const stmt = this.db.prepare(
      "INSERT OR IGNORE INTO seen_records (id, first_seen_at) VALUES (?, ?)"
    );
    const seenAt = timestamp.getTime();
    const insertAll = this.db.transaction((batch: string[]) => {
      for (const id of batch) stmt.run(id, seenAt);
    });
    insertAll(ids);
  }

  async prune(now: Date, ttlMs: number): Promise<number> {
    const cutoff = now.getTime() - ttlMs;
    const result = this.db
      .prepare("DELETE FROM seen_records WHERE first_seen_at < ?")
      .run(cutoff);
    return result.changes;
  }

  async getStatistics(days: number, now: Date): Promise<StoreStatistics> {
    const since = now.getTime() - days * DAY_MS;
    const row = this.db
      .prepare<[number], StatsRow>(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(CASE WHEN first_seen_at >= ? THEN 1 ELSE 0 END), 0) AS recent,
                MIN(first_seen_at) AS oldest,
                MAX(first_seen_at) AS newest
         FROM seen_records`
      )
      .get(since);

    return {
      total: row?.total ?? 0,
      seenWithinDays: row?.recent ?? 0,
      oldestSeenAt: row?.oldest != null ? new Date(row.oldest) : null,
      newestSeenAt: row?.newest != null ? new Date(row.newest) : null,
    };
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private open(): Database.Database {
    if (this.dbPath === IN_MEMORY) return this.connect(IN_MEMORY);

    try {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      return this.connect(this.dbPath);
    } catch (error) {
      if (isCorruption(error)) return this.recover(error);
      this.logger.warn(
        "⚠️ Record store unavailable, falling back to in-memory store",
        { path: this.dbPath, error }
      );
      return this.connect(IN_MEMORY);
    }
  }

  /** Replaces the live connection after a failed read. */
  private reopen(cause: unknown): void {
    if (this.location === IN_MEMORY) return;

    if (this.db.open) this.db.close();
    this.db = isCorruption(cause) ? this.recover(cause) : this.open();
  }

  private recover(cause: unknown): Database.Database {
    this.logger.warn("⚠️ Record store corrupt, starting fresh", {
      path: this.dbPath,
      error: new StoreCorruptionError(this.dbPath, errorMessage(cause), {
        cause,
      }),
    });

    try {
      const asidePath = `${this.dbPath}.corrupt-${Date.now()}`;
      fs.renameSync(this.dbPath, asidePath);
      for (const suffix of ["-wal", "-shm"]) {
        fs.rmSync(`${this.dbPath}${suffix}`, { force: true });
      }
      this.logger.info("Corrupt record store moved aside", { asidePath });
      return this.connect(this.dbPath);
    } catch (error) {
      this.logger.warn(
        "⚠️ Could not recreate record store, falling back to in-memory store",
        { path: this.dbPath, error }
      );
      return this.connect(IN_MEMORY);
    }
  }

  private connect(location: string): Database.Database {
    const db = new Database(location);
    try {
      if (location !== IN_MEMORY) db.pragma("journal_mode = WAL");
      this.migrate(db);
      return db;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  private migrate(db: Database.Database): void {
    const current = db.pragma("user_version", { simple: true });
    const hasTable =
      db
        .prepare(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'seen_records'"
        )
        .get() !== undefined;
    // A missing table reruns every migration whatever user_version claims
    const startAt = hasTable && typeof current === "number" ? current : 0;
    const now = Date.now();

    for (let version = startAt; version < MIGRATIONS.length; version++) {
      const migration = MIGRATIONS[version];
      if (!migration) break;
      db.transaction(() => {
        migration(db, now);
        db.pragma(`user_version = ${version + 1}`);
      })();
      this.logger.debug("Record store migrated", { version: version + 1 });
    }
  }
}
