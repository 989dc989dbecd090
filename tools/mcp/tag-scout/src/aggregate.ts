/**
 * Monthly tag statistics — one bucket per (tag, release month) observed.
 *
 * A record counts once toward each of its tags. Records without a release
 * month are left out. Months in which a tag had no releases have no bucket.
 */

import type { GameRecord } from "./normalize.js";
import type { YearMonth } from "./months.js";

// ─── Types ──────────────────────────────────────────────

export interface MonthlyTagBucket {
  readonly tag: string;
  readonly yearMonth: YearMonth;
  readonly releasedCount: number;
  readonly successCount: number;
  /** successCount / releasedCount; null only for an empty bucket */
  readonly successRate: number | null;
}

// ─── Helpers ────────────────────────────────────────────

export function successRate(successCount: number, releasedCount: number): number | null {
  return releasedCount > 0 ? successCount / releasedCount : null;
}

/** Code-unit ordering, independent of locale */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareBuckets(a: MonthlyTagBucket, b: MonthlyTagBucket): number {
  return compareText(a.tag, b.tag) || compareText(a.yearMonth, b.yearMonth);
}

// ─── Aggregation ────────────────────────────────────────

/** Build tag/month buckets, sorted by tag then month */
export function buildMonthlyTagStats(records: readonly GameRecord[]): MonthlyTagBucket[] {
  const counts = new Map<string, Map<YearMonth, { released: number; success: number }>>();

  for (const record of records) {
    if (record.releaseMonth === null) continue;

    for (const tag of record.tags) {
      let byMonth = counts.get(tag);
      if (!byMonth) {
        byMonth = new Map();
        counts.set(tag, byMonth);
      }
      const entry = byMonth.get(record.releaseMonth) ?? { released: 0, success: 0 };
      entry.released++;
      if (record.success) entry.success++;
      byMonth.set(record.releaseMonth, entry);
    }
  }

  const buckets: MonthlyTagBucket[] = [];
  for (const [tag, byMonth] of counts) {
    for (const [yearMonth, entry] of byMonth) {
      buckets.push(
        Object.freeze({
          tag,
          yearMonth,
          releasedCount: entry.released,
          successCount: entry.success,
          successRate: successRate(entry.success, entry.released),
        })
      );
    }
  }

  return buckets.sort(compareBuckets);
}
