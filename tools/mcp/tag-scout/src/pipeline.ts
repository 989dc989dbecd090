/**
 * Build pipeline: raw rows → games → monthly buckets → tag summary.
 *
 * `rebuild` is the pure, in-memory form. The staged functions persist each
 * step in the local store and refuse to run before the step they read from,
 * so `build-summary` on an empty store fails instead of summarizing nothing.
 * Publishing a snapshot happens only after the summary is written.
 */

import { buildMonthlyTagStats, type MonthlyTagBucket } from "./aggregate.js";
import { getSettings, getTagComplexity } from "./config.js";
import {
  getBuildState,
  getStageState,
  loadBuckets,
  loadRecords,
  loadSummaries,
  replaceBuckets,
  replaceRecords,
  replaceSummaries,
  type BuildStage,
  type StageState,
} from "./db.js";
import { DataNotReadyError } from "./errors.js";
import { withLogging } from "./logger.js";
import { maxYearMonth } from "./months.js";
import {
  normalizeRecords,
  type GameRecord,
  type NormalizeOptions,
  type RawGameRecord,
} from "./normalize.js";
import {
  createSnapshot,
  currentSnapshot,
  publishSnapshot,
  type TagSnapshot,
} from "./snapshot.js";
import type { RecordSource } from "./sources.js";
import { summarizeTags, type TagSummary } from "./summarize.js";

// ─── Pure Rebuild ───────────────────────────────────────

export interface RebuildResult {
  records: GameRecord[];
  buckets: MonthlyTagBucket[];
  summaries: TagSummary[];
}

/** Run all three stages in memory. Same input, same output. */
export function rebuild(
  raw: readonly RawGameRecord[],
  options: NormalizeOptions = {}
): RebuildResult {
  const records = normalizeRecords(raw, options);
  const buckets = buildMonthlyTagStats(records);
  const summaries = summarizeTags(buckets);
  return { records, buckets, summaries };
}

// ─── Staged Build ───────────────────────────────────────

const STAGE_COMMANDS: Record<BuildStage, string> = {
  records: "tag-scout ingest <file>",
  months: "tag-scout build-months",
  summary: "tag-scout build-summary",
};

function requireStage(stage: BuildStage, neededBy: string): StageState {
  const state = getStageState(stage);
  if (!state) {
    throw new DataNotReadyError(
      `${neededBy} needs the "${stage}" stage; run \`${STAGE_COMMANDS[stage]}\` first`
    );
  }
  return state;
}

/** Read, normalize and store raw rows */
export async function ingest(source: RecordSource): Promise<StageState> {
  return withLogging("ingest", async (log) => {
    const raw = await source.read();
    const { successThreshold } = await getSettings();
    const records = normalizeRecords(raw, { successThreshold });

    const state: StageState = {
      stage: "records",
      builtAt: new Date().toISOString(),
      rowCount: records.length,
      maxMonth: maxYearMonth(records.flatMap((r) => (r.releaseMonth ? [r.releaseMonth] : []))),
      source: source.describe(),
    };
    replaceRecords(records, state);

    const undated = records.filter((r) => r.releaseMonth === null).length;
    const untagged = records.filter((r) => r.tags.length === 0).length;
    log.info(`stored ${records.length} games`, {
      source: state.source,
      undated,
      untagged,
      successes: records.filter((r) => r.success).length,
    });
    return state;
  });
}

/** Aggregate stored games into monthly tag buckets */
export async function buildMonthStats(): Promise<StageState> {
  return withLogging("build_months", async (log) => {
    const records = requireStage("records", "build-months");
    const buckets = buildMonthlyTagStats(loadRecords());

    const state: StageState = {
      stage: "months",
      builtAt: new Date().toISOString(),
      rowCount: buckets.length,
      maxMonth: maxYearMonth(buckets.map((b) => b.yearMonth)),
      source: records.source,
    };
    replaceBuckets(buckets, state);

    log.info(`stored ${buckets.length} tag-month buckets`, {
      tags: new Set(buckets.map((b) => b.tag)).size,
      maxMonth: state.maxMonth,
    });
    return state;
  });
}

/** Summarize stored buckets and publish a fresh snapshot */
export async function buildSummary(): Promise<StageState> {
  return withLogging("build_summary", async (log) => {
    const months = requireStage("months", "build-summary");
    const buckets = loadBuckets();
    const summaries = summarizeTags(buckets);

    const state: StageState = {
      stage: "summary",
      builtAt: new Date().toISOString(),
      rowCount: summaries.length,
      maxMonth: months.maxMonth,
      source: months.source,
    };
    replaceSummaries(summaries, state);

    publishSnapshot(
      createSnapshot({
        buckets,
        summaries,
        complexity: await getTagComplexity(),
        builtAt: state.builtAt,
      })
    );
    log.info(`stored ${summaries.length} tag summaries`, {
      maxMonth: state.maxMonth,
    });
    return state;
  });
}

export interface BuildAllResult {
  stages: StageState[];
  snapshot: TagSnapshot;
}

/** ingest → build months → build summary */
export async function buildAll(source: RecordSource): Promise<BuildAllResult> {
  const stages = [await ingest(source), await buildMonthStats(), await buildSummary()];
  const snapshot = currentSnapshot();
  if (!snapshot) {
    throw new DataNotReadyError("Build finished without publishing a snapshot");
  }
  return { stages, snapshot };
}

// ─── Snapshot Access ────────────────────────────────────

/** Build a snapshot from the store. Needs a completed summary stage. */
export async function loadSnapshot(): Promise<TagSnapshot> {
  const summary = requireStage("summary", "Queries");
  return createSnapshot({
    buckets: loadBuckets(),
    summaries: loadSummaries(),
    complexity: await getTagComplexity(),
    builtAt: summary.builtAt,
  });
}

/** The published snapshot, loading it from the store on first use */
export async function getSnapshot(): Promise<TagSnapshot> {
  const existing = currentSnapshot();
  if (existing) return existing;

  const loaded = await loadSnapshot();
  // a build may have published while the store was read
  const raced = currentSnapshot();
  if (raced) return raced;
  publishSnapshot(loaded);
  return loaded;
}

// ─── Status ─────────────────────────────────────────────

export interface DataStatus {
  stages: StageState[];
  snapshot: {
    builtAt: string;
    maxMonth: string | null;
    tags: number;
    buckets: number;
  } | null;
}

export function getDataStatus(): DataStatus {
  const snapshot = currentSnapshot();
  return {
    stages: getBuildState(),
    snapshot: snapshot
      ? {
          builtAt: snapshot.builtAt,
          maxMonth: snapshot.maxMonth,
          tags: snapshot.summaries.length,
          buckets: snapshot.buckets.length,
        }
      : null,
  };
}
