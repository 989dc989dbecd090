/**
 * Tag lookups over a built snapshot: name matching, listing, timeseries.
 */

import { compareText, type MonthlyTagBucket } from "./aggregate.js";
import type { YearMonth } from "./months.js";
import type { TagSummary } from "./summarize.js";

export interface TimeseriesPoint {
  yearMonth: YearMonth;
  releasedCount: number;
  successRate: number | null;
}

/** Tags match case-insensitively, ignoring surrounding whitespace */
export function tagKey(tag: string): string {
  return tag.trim().toLowerCase();
}

/** All tags in the summary table, sorted */
export function listTags(source: { readonly summaries: readonly TagSummary[] }): string[] {
  return [...new Set(source.summaries.map((s) => s.tag))].sort(compareText);
}

/**
 * Monthly points for one tag, oldest first; unknown tags give [].
 * An exact name match wins; otherwise the first tag equal under tagKey.
 */
export function getTagTimeseries(
  tag: string,
  buckets: readonly MonthlyTagBucket[]
): TimeseriesPoint[] {
  const name = tag.trim();
  const key = tagKey(tag);
  const resolved =
    buckets.find((b) => b.tag === name)?.tag ??
    [...new Set(buckets.filter((b) => tagKey(b.tag) === key).map((b) => b.tag))].sort(compareText)[0];
  if (resolved === undefined) return [];

  return buckets
    .filter((b) => b.tag === resolved)
    .sort((a, b) => compareText(a.yearMonth, b.yearMonth))
    .map((b) => ({
      yearMonth: b.yearMonth,
      releasedCount: b.releasedCount,
      successRate: b.successRate,
    }));
}
