import { logger } from "@/lib/logger";
import { SqliteSeenRepository } from "@/repositories/sqliteSeen.repository";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DAY_MS, hoursBefore, NOW } from "../fixtures";

const TTL_MS = 3 * DAY_MS;

describe("SqliteSeenRepository", () => {
  let dir: string;
  let dbPath: string;
  let store: SqliteSeenRepository | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reply-scout-"));
    dbPath = path.join(dir, "nested", "seen.db");
  });

  afterEach(async () => {
    await store?.close();
    store = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and reports unseen ids", async () => {
    store = new SqliteSeenRepository(dbPath, logger);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(await store.exists("abc")).toBe(false);
  });

  it("marks ids idempotently without touching firstSeenAt", async () => {
    store = new SqliteSeenRepository(dbPath, logger);
    const first = hoursBefore(5);

    await store.markSeen("abc", first);
    await store.markSeen("abc", NOW);
    await store.markSeenMany(["abc"], NOW);

    const stats = await store.getStatistics(3, NOW);
    expect(await store.exists("abc")).toBe(true);
    expect(stats.total).toBe(1);
    expect(stats.oldestSeenAt).toEqual(first);
    expect(stats.newestSeenAt).toEqual(first);
  });

  it("marks a batch and ignores an empty one", async () => {
    store = new SqliteSeenRepository(dbPath, logger);

    await store.markSeenMany([], NOW);
    await store.markSeenMany(["a", "b", "c"], NOW);

    expect((await store.getStatistics(3, NOW)).total).toBe(3);
  });

  it("prunes only records strictly older than the TTL", async () => {
    store = new SqliteSeenRepository(dbPath, logger);
    await store.markSeen("expired", new Date(NOW.getTime() - 4 * DAY_MS));
    await store.markSeen("boundary", new Date(NOW.getTime() - TTL_MS));
    await store.markSeen("fresh", new Date(NOW.getTime() - 2 * DAY_MS));

    const removed = await store.prune(NOW, TTL_MS);

    expect(removed).toBe(1);
    expect(await store.exists("expired")).toBe(false);
    expect(await store.exists("boundary")).toBe(true);
    expect(await store.exists("fresh")).toBe(true);
  });

  it("reports statistics over a window", async () => {
    store = new SqliteSeenRepository(dbPath, logger);
    await store.markSeen("recent", hoursBefore(2));
    await store.markSeen("older", hoursBefore(48));

    const stats = await store.getStatistics(1, NOW);

    expect(stats).toEqual({
      total: 2,
      seenWithinDays: 1,
      oldestSeenAt: hoursBefore(48),
      newestSeenAt: hoursBefore(2),
    });
  });

  it("reports empty statistics for an empty store", async () => {
    store = new SqliteSeenRepository(dbPath, logger);

    expect(await store.getStatistics(3, NOW)).toEqual({
      total: 0,
      seenWithinDays: 0,
      oldestSeenAt: null,
      newestSeenAt: null,
    });
  });

  it("persists records across reopen", async () => {
    const writer = new SqliteSeenRepository(dbPath, logger);
    await writer.markSeen("kept", NOW);
    await writer.close();

    store = new SqliteSeenRepository(dbPath, logger);
    expect(await store.exists("kept")).toBe(true);
  });

  it("moves a corrupt file aside and starts fresh", async () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    fs.writeFileSync(dbPath, "this is not a sqlite database\n".repeat(200));

    store = new SqliteSeenRepository(dbPath, logger);

    const siblings = fs.readdirSync(path.dirname(dbPath));
    expect(siblings.some((name) => name.startsWith("seen.db.corrupt-"))).toBe(
      true
    );
    expect(store.location).toBe(dbPath);
    await store.markSeen("after-recovery", NOW);
    expect(await store.exists("after-recovery")).toBe(true);
  });

  it("falls back to memory when the location cannot be used", async () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");

    store = new SqliteSeenRepository(path.join(blocker, "seen.db"), logger);

    expect(store.location).toBe(":memory:");
    await store.markSeen("in-memory", NOW);
    expect(await store.exists("in-memory")).toBe(true);
  });

  it("recreates the table when user_version claims a migrated file", async () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const stale = new Database(dbPath);
    stale.pragma("user_version = 1");
    stale.close();

    store = new SqliteSeenRepository(dbPath, logger);

    expect(await store.exists("p1")).toBe(false);
    await store.markSeen("p1", NOW);
    expect(await store.exists("p1")).toBe(true);
  });

  it("treats an unreadable table as unseen and reconnects", async () => {
    store = new SqliteSeenRepository(dbPath, logger);
    await store.markSeen("p1", NOW);
    const other = new Database(dbPath);
    other.exec("DROP TABLE seen_records");
    other.close();

    expect(await store.exists("p1")).toBe(false);
    expect(store.location).toBe(dbPath);
    await store.markSeen("p2", NOW);
    expect(await store.exists("p2")).toBe(true);
  });

  it("imports a legacy pushed_posts table", async () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const legacy = new Database(dbPath);
    legacy.exec(
      "CREATE TABLE pushed_posts (post_id TEXT PRIMARY KEY, pushed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP)"
    );
    legacy
      .prepare("INSERT INTO pushed_posts (post_id, pushed_at) VALUES (?, ?)")
      .run("old1", "2026-03-08 12:00:00");
    legacy
      .prepare("INSERT INTO pushed_posts (post_id, pushed_at) VALUES (?, ?)")
      .run("garbled", "not a timestamp");
    legacy.close();

    const before = Date.now();
    store = new SqliteSeenRepository(dbPath, logger);
    const after = Date.now();

    expect(await store.exists("old1")).toBe(true);
    expect(await store.exists("garbled")).toBe(true);

    const stats = await store.getStatistics(3, NOW);
    expect(stats.total).toBe(2);
    expect(stats.oldestSeenAt).toEqual(new Date("2026-03-08T12:00:00.000Z"));
    const newest = stats.newestSeenAt?.getTime() ?? 0;
    expect(newest).toBeGreaterThanOrEqual(before);
    expect(newest).toBeLessThanOrEqual(after);
  });
});
