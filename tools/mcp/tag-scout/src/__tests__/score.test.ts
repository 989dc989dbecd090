import { describe, it, expect } from "vitest";
import {
  computeComplexityPenalty,
  computeScore,
  generateReasons,
  roundScore,
  scoreTag,
  type ReasonRule,
} from "../score.js";
import type { TagSummary } from "../summarize.js";

function summary(overrides: Partial<TagSummary> = {}): TagSummary {
  return {
    tag: "Roguelike",
    recentSuccessRate24m: 0.3,
    releasedLast6m: 10,
    trendScore: 0.1,
    lastMonth: "2024-06",
    ...overrides,
  };
}

describe("computeComplexityPenalty", () => {
  it.each([
    [1, 3, 0.35],
    [1, 5, 1.05],
    [2, 4, 0.22],
    [2, 5, 0.44],
    [3, 5, 0.44],
    [2, 2, 0],
    [4, 5, 0.12],
    [6, 5, 0],
    [100, 5, 0],
  ])("team %i, complexity %i → %f", (teamSize, complexity, expected) => {
    expect(computeComplexityPenalty(teamSize, complexity)).toBeCloseTo(expected, 10);
  });

  it("never goes negative below the tier threshold", () => {
    expect(computeComplexityPenalty(1, 1)).toBe(0);
  });
});

describe("computeScore", () => {
  it("combines success, trend and saturation", () => {
    const result = computeScore(summary(), 3, { teamSize: 10, preferTags: [] });
    expect(result.successTerm).toBeCloseTo(0.3, 10);
    expect(result.trendTerm).toBeCloseTo(0.07, 10);
    expect(result.saturationTerm).toBeCloseTo(-0.15 * Math.log(11), 10);
    expect(result.complexityPenalty).toBe(0);
    expect(result.score).toBeCloseTo(0.0103157, 6);
  });

  it("scores a tag with no recent releases as zero success", () => {
    const result = computeScore(summary({ recentSuccessRate24m: null, trendScore: 0, releasedLast6m: 0 }), 3, {
      teamSize: 10,
      preferTags: [],
    });
    expect(result.successTerm).toBe(0);
    expect(result.score).toBeCloseTo(0, 10);
  });

  it("adds the prefer bonus case-insensitively", () => {
    const plain = computeScore(summary(), 3, { teamSize: 10, preferTags: [] });
    const preferred = computeScore(summary(), 3, { teamSize: 10, preferTags: [" roguelike "] });
    expect(preferred.preferenceTerm).toBe(0.05);
    expect(preferred.score - plain.score).toBeCloseTo(0.05, 10);
  });

  it("uses the weights it is given", () => {
    const result = computeScore(summary({ releasedLast6m: 0 }), 3, { teamSize: 10, preferTags: [] }, {
      weights: { success: 2, trend: 0, saturation: 0.15 },
      preferBonus: 0.05,
      defaultComplexity: 3,
    });
    expect(result.score).toBeCloseTo(0.6, 10);
  });
});

describe("generateReasons", () => {
  it("reports success, trend, saturation and a complexity penalty", () => {
    expect(
      generateReasons({
        summary: summary({ recentSuccessRate24m: 0.35, trendScore: 0.15, releasedLast6m: 5 }),
        complexity: 4,
        complexityPenalty: 0.7,
        teamSize: 1,
        preferred: false,
      })
    ).toEqual([
      "High recent success rate",
      "Strong positive trend",
      "Low saturation",
      "Penalized for small team (size 1) vs high complexity (score 4)",
    ]);
  });

  it("omits the trend reason at exactly -0.1 and reports a preferred tag", () => {
    expect(
      generateReasons({
        summary: summary({ recentSuccessRate24m: 0.05, trendScore: -0.1, releasedLast6m: 100 }),
        complexity: 2,
        complexityPenalty: 0,
        teamSize: 10,
        preferred: true,
      })
    ).toEqual([
      "Low recent success rate",
      "High saturation (many recent releases)",
      "Good complexity match for team size",
      "Matches a preferred tag",
    ]);
  });

  it("picks the moderate rule of each group", () => {
    expect(
      generateReasons({
        summary: summary({ recentSuccessRate24m: 0.2, trendScore: 0.05, releasedLast6m: 20 }),
        complexity: 4,
        complexityPenalty: 0,
        teamSize: 4,
        preferred: false,
      })
    ).toEqual([
      "Moderate recent success rate",
      "Positive trend",
      "Moderate saturation",
      "Moderate complexity for team size",
    ]);
  });

  it("explains a tag with no recent releases", () => {
    const reasons = generateReasons({
      summary: summary({ recentSuccessRate24m: null, trendScore: -0.2, releasedLast6m: 0 }),
      complexity: 3,
      complexityPenalty: 0,
      teamSize: 10,
      preferred: false,
    });
    expect(reasons.slice(0, 2)).toEqual(["No releases in the last 24 months", "Negative trend"]);
  });

  it("accepts a custom rule table", () => {
    const rules: ReasonRule[] = [
      { group: "trend", when: () => true, message: () => "always" },
      { group: "trend", when: () => true, message: () => "never reached" },
    ];
    expect(
      generateReasons(
        { summary: summary(), complexity: 3, complexityPenalty: 0, teamSize: 10, preferred: false },
        rules
      )
    ).toEqual(["always"]);
  });
});

describe("roundScore", () => {
  it("rounds to four decimals and drops negative zero", () => {
    expect(roundScore(0.11031573)).toBe(0.1103);
    expect(roundScore(-0.00001)).toBe(0);
    expect(Object.is(roundScore(-0), 0)).toBe(true);
  });
});

describe("scoreTag", () => {
  it("returns rounded output with reasons", () => {
    const rec = scoreTag(summary({ recentSuccessRate24m: 0.4 }), 3, { teamSize: 10, preferTags: [] });
    expect(rec).toEqual({
      tag: "Roguelike",
      score: 0.1103,
      successTerm: 0.4,
      trendTerm: 0.07,
      saturationTerm: -0.3597,
      preferenceTerm: 0,
      complexity: 3,
      complexityPenalty: 0,
      recentSuccessRate24m: 0.4,
      trendScore: 0.1,
      releasedLast6m: 10,
      reasons: [
        "High recent success rate",
        "Positive trend",
        "Low saturation",
        "Good complexity match for team size",
      ],
    });
  });
});
