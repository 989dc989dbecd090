import { describe, it, expect } from "vitest";
import type { MonthlyTagBucket } from "../aggregate.js";
import { summarizeTag, summarizeTags } from "../summarize.js";

function bucket(tag: string, yearMonth: string, released: number, wins: number): MonthlyTagBucket {
  return {
    tag,
    yearMonth,
    releasedCount: released,
    successCount: wins,
    successRate: wins / released,
  };
}

describe("summarizeTags", () => {
  it("returns [] for an empty bucket table", () => {
    expect(summarizeTags([])).toEqual([]);
  });

  it("summarizes a tag with two recent months", () => {
    const [summary] = summarizeTags([
      bucket("Roguelike", "2023-01", 12, 3),
      bucket("Roguelike", "2023-02", 15, 5),
    ]);

    expect(summary.tag).toBe("Roguelike");
    expect(summary.recentSuccessRate24m).toBeCloseTo((0.25 + 1 / 3) / 2, 10);
    expect(summary.releasedLast6m).toBe(27);
    // nothing in the prior window, so the trend is the recent mean
    expect(summary.trendScore).toBeCloseTo((0.25 + 1 / 3) / 2, 10);
    expect(summary.lastMonth).toBe("2023-02");
  });

  it("anchors every tag on the latest month of the whole table", () => {
    const summaries = summarizeTags([
      bucket("A", "2020-01", 1, 1),
      bucket("B", "2023-06", 2, 2),
    ]);

    expect(summaries).toEqual([
      { tag: "A", recentSuccessRate24m: null, releasedLast6m: 0, trendScore: 0, lastMonth: "2020-01" },
      { tag: "B", recentSuccessRate24m: 1, releasedLast6m: 2, trendScore: 1, lastMonth: "2023-06" },
    ]);
  });

  it("sorts summaries by tag", () => {
    const tags = summarizeTags([
      bucket("b", "2021-01", 1, 0),
      bucket("A", "2021-01", 1, 0),
      bucket("a", "2021-01", 1, 0),
    ]).map((s) => s.tag);
    expect(tags).toEqual(["A", "a", "b"]);
  });
});

describe("summarizeTag windows", () => {
  // anchor 2024-12: 24m window is (2022-12, 2024-12], 6m is (2024-06, 2024-12],
  // trend prior is (2023-06, 2024-06]
  const buckets = [
    bucket("T", "2022-12", 2, 2),
    bucket("T", "2023-06", 3, 3),
    bucket("T", "2023-07", 2, 0),
    bucket("T", "2024-06", 4, 1),
    bucket("T", "2024-07", 1, 1),
    bucket("T", "2024-12", 4, 2),
  ];
  const summary = summarizeTag("T", buckets, "2024-12");

  it("excludes the month exactly 24 months back from the success window", () => {
    // 2023-06 (1), 2023-07 (0), 2024-06 (0.25), 2024-07 (1), 2024-12 (0.5)
    expect(summary.recentSuccessRate24m).toBeCloseTo(2.75 / 5, 10);
  });

  it("sums releases over the last six months only", () => {
    expect(summary.releasedLast6m).toBe(5);
  });

  it("compares the last 6 months with the 12 before them", () => {
    // recent: 1, 0.5 → 0.75; prior: 0, 0.25 → 0.125
    expect(summary.trendScore).toBeCloseTo(0.625, 10);
  });

  it("reports the tag's own last month", () => {
    expect(summary.lastMonth).toBe("2024-12");
  });

  it("does not depend on bucket order", () => {
    expect(summarizeTag("T", [...buckets].reverse(), "2024-12")).toEqual(summary);
  });
});
