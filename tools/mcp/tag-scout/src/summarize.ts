/**
 * Rolling tag summary — trailing-window statistics per tag.
 *
 * Every window ends at the latest month in the whole bucket table, not at
 * the tag's own last month, so tags that went quiet are judged on the same
 * calendar as active ones. Windows are half-open: (anchor - N, anchor].
 */

import { SUMMARY_WINDOWS } from "./config.js";
import { compareBuckets, compareText, type MonthlyTagBucket } from "./aggregate.js";
import { maxYearMonth, monthIndex, type YearMonth } from "./months.js";

// ─── Types ──────────────────────────────────────────────

export interface TagSummary {
  readonly tag: string;
  /** Mean monthly success rate over 24 months; null with no releases in that span */
  readonly recentSuccessRate24m: number | null;
  readonly releasedLast6m: number;
  /** Recent 6-month mean success rate minus the 12 months before it */
  readonly trendScore: number;
  readonly lastMonth: YearMonth;
}

// ─── Helpers ────────────────────────────────────────────

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

/** Success rates of buckets whose month index falls in (from, to] */
function ratesBetween(
  buckets: ReadonlyArray<{ index: number; bucket: MonthlyTagBucket }>,
  from: number,
  to: number
): number[] {
  const rates: number[] = [];
  for (const { index, bucket } of buckets) {
    if (index <= from || index > to) continue;
    if (bucket.releasedCount <= 0 || bucket.successRate === null) continue;
    rates.push(bucket.successRate);
  }
  return rates;
}

// ─── Summaries ──────────────────────────────────────────

/**
 * Summarize one tag against a fixed anchor month.
 * `tagBuckets` must all belong to `tag` and be non-empty.
 */
export function summarizeTag(
  tag: string,
  tagBuckets: readonly MonthlyTagBucket[],
  anchorMonth: YearMonth
): TagSummary {
  const anchor = monthIndex(anchorMonth);
  const indexed = [...tagBuckets]
    .sort(compareBuckets)
    .map((bucket) => ({ index: monthIndex(bucket.yearMonth), bucket }));

  const { successMonths, volumeMonths, trendRecentMonths, trendPriorMonths } = SUMMARY_WINDOWS;

  const recentSuccessRate24m = mean(ratesBetween(indexed, anchor - successMonths, anchor));

  let releasedLast6m = 0;
  for (const { index, bucket } of indexed) {
    if (index > anchor - volumeMonths && index <= anchor) {
      releasedLast6m += bucket.releasedCount;
    }
  }

  const recentStart = anchor - trendRecentMonths;
  const recentMean = mean(ratesBetween(indexed, recentStart, anchor)) ?? 0;
  const priorMean = mean(ratesBetween(indexed, recentStart - trendPriorMonths, recentStart)) ?? 0;

  const lastMonth = maxYearMonth(tagBuckets.map((b) => b.yearMonth));
  if (lastMonth === null) {
    throw new Error(`Cannot summarize tag "${tag}" without buckets`);
  }

  return Object.freeze({
    tag,
    recentSuccessRate24m,
    releasedLast6m,
    trendScore: recentMean - priorMean,
    lastMonth,
  });
}

/** Summarize every tag in the bucket table, sorted by tag */
export function summarizeTags(buckets: readonly MonthlyTagBucket[]): TagSummary[] {
  const anchorMonth = maxYearMonth(buckets.map((b) => b.yearMonth));
  if (anchorMonth === null) return [];

  const byTag = new Map<string, MonthlyTagBucket[]>();
  for (const bucket of buckets) {
    const list = byTag.get(bucket.tag) ?? [];
    list.push(bucket);
    byTag.set(bucket.tag, list);
  }

  return [...byTag.keys()]
    .sort(compareText)
    .map((tag) => summarizeTag(tag, byTag.get(tag) ?? [], anchorMonth));
}
