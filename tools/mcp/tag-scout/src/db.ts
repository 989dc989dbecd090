/**
 * Local SQLite store — the built tables between runs.
 *
 * Holds the normalized games, the monthly tag buckets, the tag summary and
 * one build_state row per stage. Each stage replaces its table wholesale in
 * a single transaction and clears the stages downstream of it, so a summary
 * is never read against buckets from a different ingest.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getDataHome } from "./config.js";
import { compareBuckets, compareText, type MonthlyTagBucket } from "./aggregate.js";
import type { YearMonth } from "./months.js";
import { parseTags, type GameRecord } from "./normalize.js";
import type { TagSummary } from "./summarize.js";

// ─── Database Singleton ─────────────────────────────────

let _db: Database.Database | null = null;
let _dbPath: string | null = null;

/** Directory holding state.db */
export function getStateDir(): string {
  return join(getDataHome(), ".tag-scout");
}

/** Get or create the database connection */
export function getDb(): Database.Database {
  if (_db) return _db;

  const stateDir = getStateDir();
  if (!existsSync(stateDir)) {
    mkdirSync(stateDir, { recursive: true });
  }

  _dbPath = join(stateDir, "state.db");
  _db = new Database(_dbPath);

  _db.pragma("journal_mode = WAL");
  _db.pragma("synchronous = NORMAL");

  migrate(_db);

  return _db;
}

/** Close the database connection */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    _dbPath = null;
  }
}

export function getDbPath(): string | null {
  return _dbPath;
}

// ─── Schema Migrations ──────────────────────────────────

const MIGRATIONS: Array<{ version: number; sql: string }> = [
  {
    version: 1,
    sql: `
      -- Normalized games, in source order
      CREATE TABLE IF NOT EXISTS games (
        position      INTEGER PRIMARY KEY,
        game_id       TEXT NOT NULL,
        name          TEXT,
        tags          TEXT NOT NULL DEFAULT '[]',      -- JSON array
        release_month TEXT,                            -- YYYY-MM, NULL if unparseable
        review_count  INTEGER NOT NULL DEFAULT 0,
        success       INTEGER NOT NULL DEFAULT 0       -- boolean
      );

      -- One row per (tag, month) with at least one release
      CREATE TABLE IF NOT EXISTS tag_month_stats (
        tag            TEXT NOT NULL,
        year_month     TEXT NOT NULL,
        released_count INTEGER NOT NULL CHECK (released_count > 0),
        success_count  INTEGER NOT NULL CHECK (success_count >= 0 AND success_count <= released_count),
        success_rate   REAL,
        PRIMARY KEY (tag, year_month)
      );

      CREATE TABLE IF NOT EXISTS tag_summary (
        tag                     TEXT PRIMARY KEY,
        recent_success_rate_24m REAL,                  -- NULL: no releases in window
        released_last_6m        INTEGER NOT NULL,
        trend_score             REAL NOT NULL,
        last_month              TEXT NOT NULL
      );

      -- Last successful run of each stage
      CREATE TABLE IF NOT EXISTS build_state (
        stage      TEXT PRIMARY KEY,                   -- records/months/summary
        built_at   TEXT NOT NULL,
        row_count  INTEGER NOT NULL,
        max_month  TEXT,
        source     TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_games_release_month ON games(release_month);

      CREATE TABLE IF NOT EXISTS schema_version (
        version       INTEGER PRIMARY KEY,
        applied_at    TEXT NOT NULL DEFAULT (datetime('now'))
      );

      INSERT OR IGNORE INTO schema_version (version) VALUES (1);
    `,
  },
];

/** Run pending migrations */
function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version       INTEGER PRIMARY KEY,
      applied_at    TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const currentVersion =
    db.prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version").get()
      ?.v ?? 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.exec(migration.sql);
    }
  }
}

export function getSchemaVersion(): number {
  return (
    getDb().prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version").get()
      ?.v ?? 0
  );
}

// ─── Build State ────────────────────────────────────────

export const BUILD_STAGES = ["records", "months", "summary"] as const;
export type BuildStage = (typeof BUILD_STAGES)[number];

export interface StageState {
  stage: BuildStage;
  builtAt: string;
  rowCount: number;
  maxMonth: YearMonth | null;
  source: string | null;
}

interface StageRow {
  stage: string;
  built_at: string;
  row_count: number;
  max_month: string | null;
  source: string | null;
}

function isBuildStage(value: string): value is BuildStage {
  return (BUILD_STAGES as readonly string[]).includes(value);
}

function toStageState(row: StageRow): StageState | null {
  if (!isBuildStage(row.stage)) return null;
  return {
    stage: row.stage,
    builtAt: row.built_at,
    rowCount: row.row_count,
    maxMonth: row.max_month,
    source: row.source,
  };
}

export function getStageState(stage: BuildStage): StageState | null {
  const row = getDb()
    .prepare<[string], StageRow>("SELECT * FROM build_state WHERE stage = ?")
    .get(stage);
  return row ? toStageState(row) : null;
}

export function getBuildState(): StageState[] {
  const rows = getDb().prepare<[], StageRow>("SELECT * FROM build_state").all();
  return rows
    .map(toStageState)
    .filter((s): s is StageState => s !== null)
    .sort((a, b) => BUILD_STAGES.indexOf(a.stage) - BUILD_STAGES.indexOf(b.stage));
}

/** Tables written by each stage, in pipeline order */
const STAGE_TABLES: Record<BuildStage, string> = {
  records: "games",
  months: "tag_month_stats",
  summary: "tag_summary",
};

function clearDownstream(db: Database.Database, stage: BuildStage): void {
  for (const later of BUILD_STAGES.slice(BUILD_STAGES.indexOf(stage) + 1)) {
    db.prepare(`DELETE FROM ${STAGE_TABLES[later]}`).run();
    db.prepare("DELETE FROM build_state WHERE stage = ?").run(later);
  }
}

function writeStage(db: Database.Database, state: StageState): void {
  db.prepare(`
    INSERT OR REPLACE INTO build_state (stage, built_at, row_count, max_month, source)
    VALUES (?, ?, ?, ?, ?)
  `).run(state.stage, state.builtAt, state.rowCount, state.maxMonth, state.source);
}

// ─── Games ──────────────────────────────────────────────

interface GameRow {
  position: number;
  game_id: string;
  name: string | null;
  tags: string;
  release_month: string | null;
  review_count: number;
  success: number;
}

export function replaceRecords(records: readonly GameRecord[], state: StageState): void {
  const db = getDb();
  const insert = db.prepare(`
    INSERT INTO games (position, game_id, name, tags, release_month, review_count, success)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  db.transaction(() => {
    db.prepare("DELETE FROM games").run();
    clearDownstream(db, "records");
    records.forEach((record, position) => {
      insert.run(
        position,
        record.id,
        record.name,
        JSON.stringify(record.tags),
        record.releaseMonth,
        record.reviewCount,
        record.success ? 1 : 0
      );
    });
    writeStage(db, state);
  })();
}

export function loadRecords(): GameRecord[] {
  const rows = getDb()
    .prepare<[], GameRow>("SELECT * FROM games ORDER BY position")
    .all();
  return rows.map((row) => ({
    id: row.game_id,
    name: row.name,
    tags: parseTags(JSON.parse(row.tags)),
    releaseMonth: row.release_month,
    reviewCount: row.review_count,
    success: row.success === 1,
  }));
}

// ─── Monthly Buckets ────────────────────────────────────

interface BucketRow {
  tag: string;
  year_month: string;
  released_count: number;
  success_count: number;
  success_rate: number | null;
}

export function replaceBuckets(buckets: readonly MonthlyTagBucket[], state: StageState): void {
  const db = getDb();
  const insert = db.prepare(`
    INSERT INTO tag_month_stats (tag, year_month, released_count, success_count, success_rate)
    VALUES (?, ?, ?, ?, ?)
  `);

  db.transaction(() => {
    db.prepare("DELETE FROM tag_month_stats").run();
    clearDownstream(db, "months");
    for (const b of buckets) {
      insert.run(b.tag, b.yearMonth, b.releasedCount, b.successCount, b.successRate);
    }
    writeStage(db, state);
  })();
}

export function loadBuckets(): MonthlyTagBucket[] {
  const rows = getDb()
    .prepare<[], BucketRow>("SELECT * FROM tag_month_stats ORDER BY tag, year_month")
    .all();
  return rows.map((row) => ({
    tag: row.tag,
    yearMonth: row.year_month,
    releasedCount: row.released_count,
    successCount: row.success_count,
    successRate: row.success_rate,
  })).sort(compareBuckets);
}

// ─── Summary ────────────────────────────────────────────

interface SummaryRow {
  tag: string;
  recent_success_rate_24m: number | null;
  released_last_6m: number;
  trend_score: number;
  last_month: string;
}

export function replaceSummaries(summaries: readonly TagSummary[], state: StageState): void {
  const db = getDb();
  const insert = db.prepare(`
    INSERT INTO tag_summary (tag, recent_success_rate_24m, released_last_6m, trend_score, last_month)
    VALUES (?, ?, ?, ?, ?)
  `);

  db.transaction(() => {
    db.prepare("DELETE FROM tag_summary").run();
    for (const s of summaries) {
      insert.run(s.tag, s.recentSuccessRate24m, s.releasedLast6m, s.trendScore, s.lastMonth);
    }
    writeStage(db, state);
  })();
}

export function loadSummaries(): TagSummary[] {
  const rows = getDb()
    .prepare<[], SummaryRow>("SELECT * FROM tag_summary ORDER BY tag")
    .all();
  return rows.map((row) => ({
    tag: row.tag,
    recentSuccessRate24m: row.recent_success_rate_24m,
    releasedLast6m: row.released_last_6m,
    trendScore: row.trend_score,
    lastMonth: row.last_month,
  })).sort((a, b) => compareText(a.tag, b.tag));
}
