/**
 * The snapshot queries read: buckets, summaries and complexity, frozen.
 *
 * A rebuild makes a new snapshot and swaps the module-level reference in a
 * single assignment. A query that already holds the old snapshot finishes
 * against it; new queries see the new one. Nothing mutates a published
 * snapshot.
 */

import { compareText, type MonthlyTagBucket } from "./aggregate.js";
import { maxYearMonth, type YearMonth } from "./months.js";
import type { TagSummary } from "./summarize.js";
import { tagKey } from "./tags.js";

// ─── Types ──────────────────────────────────────────────

export interface TagSnapshot {
  readonly builtAt: string;
  /** Latest month in the bucket table; null for an empty table */
  readonly maxMonth: YearMonth | null;
  readonly buckets: readonly MonthlyTagBucket[];
  readonly summaries: readonly TagSummary[];
  /** Complexity as configured, keyed by exact tag name */
  readonly complexity: Readonly<Record<string, number>>;
  /** The same values keyed by tagKey; used only when no exact entry exists */
  readonly complexityByKey: Readonly<Record<string, number>>;
}

export interface SnapshotInput {
  buckets: readonly MonthlyTagBucket[];
  summaries: readonly TagSummary[];
  complexity: Readonly<Record<string, number>>;
  builtAt?: string;
}

// ─── Construction ───────────────────────────────────────

export function createSnapshot(input: SnapshotInput): TagSnapshot {
  const complexity: Record<string, number> = { ...input.complexity };
  const complexityByKey: Record<string, number> = {};
  // spellings that fold together resolve to the first in code-unit order
  for (const tag of Object.keys(complexity).sort(compareText)) {
    const key = tagKey(tag);
    if (!(key in complexityByKey)) complexityByKey[key] = complexity[tag];
  }

  return Object.freeze({
    builtAt: input.builtAt ?? new Date().toISOString(),
    maxMonth: maxYearMonth(input.buckets.map((b) => b.yearMonth)),
    buckets: Object.freeze(input.buckets.map((b) => Object.freeze({ ...b }))),
    summaries: Object.freeze(input.summaries.map((s) => Object.freeze({ ...s }))),
    complexity: Object.freeze(complexity),
    complexityByKey: Object.freeze(complexityByKey),
  });
}

/** Exact spelling first, then a case-insensitive match, then the fallback */
export function complexityFor(
  snapshot: Pick<TagSnapshot, "complexity" | "complexityByKey">,
  tag: string,
  fallback: number
): number {
  if (Object.hasOwn(snapshot.complexity, tag)) return snapshot.complexity[tag];
  return snapshot.complexityByKey[tagKey(tag)] ?? fallback;
}

// ─── Current Snapshot ───────────────────────────────────

let _current: TagSnapshot | null = null;

/** Swap in a new snapshot, returning the one it replaced */
export function publishSnapshot(snapshot: TagSnapshot): TagSnapshot | null {
  const previous = _current;
  _current = snapshot;
  return previous;
}

export function currentSnapshot(): TagSnapshot | null {
  return _current;
}

export function clearSnapshot(): void {
  _current = null;
}
