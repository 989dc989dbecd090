/**
 * Tag scoring — turns one summary row into a score, its parts, and reasons.
 *
 *   score = wSuccess * successRate24m
 *         + wTrend * trendScore
 *         - wSaturation * ln(1 + releasedLast6m)
 *         - complexityPenalty(teamSize, complexity)
 *         + preferBonus (if preferred)
 *
 * Reasons come from REASON_RULES, an ordered table. Groups are reported in
 * table order and the first matching rule of a group wins, so the reason
 * list for a given input is always the same list in the same order.
 */

import {
  COMPLEXITY_TIERS,
  DEFAULT_COMPLEXITY,
  DEFAULT_WEIGHTS,
  PREFER_BONUS,
  REASON_THRESHOLDS,
  SCORE_DECIMALS,
  type ComplexityTier,
  type ScoringWeights,
  type TagScoutSettings,
} from "./config.js";
import type { TagSummary } from "./summarize.js";
import { tagKey } from "./tags.js";

// ─── Types ──────────────────────────────────────────────

export interface ScoringOptions {
  weights: ScoringWeights;
  preferBonus: number;
  defaultComplexity: number;
}

export const DEFAULT_SCORING: ScoringOptions = {
  weights: DEFAULT_WEIGHTS,
  preferBonus: PREFER_BONUS,
  defaultComplexity: DEFAULT_COMPLEXITY,
};

/** The part of a recommendation request the scorer reads */
export interface ScoringProfile {
  teamSize: number;
  preferTags: readonly string[];
}

export interface ScoreBreakdown {
  successTerm: number;
  trendTerm: number;
  /** Zero or negative */
  saturationTerm: number;
  preferenceTerm: number;
  complexityPenalty: number;
  score: number;
}

export interface Recommendation {
  tag: string;
  score: number;
  successTerm: number;
  trendTerm: number;
  saturationTerm: number;
  preferenceTerm: number;
  complexity: number;
  complexityPenalty: number;
  recentSuccessRate24m: number | null;
  trendScore: number;
  releasedLast6m: number;
  reasons: string[];
}

export function scoringOptionsFrom(settings: TagScoutSettings): ScoringOptions {
  return {
    weights: settings.weights,
    preferBonus: settings.preferBonus,
    defaultComplexity: settings.defaultComplexity,
  };
}

// ─── Complexity ─────────────────────────────────────────

export function complexityTier(teamSize: number): ComplexityTier {
  return (
    COMPLEXITY_TIERS.find((tier) => teamSize <= tier.maxTeamSize) ??
    COMPLEXITY_TIERS[COMPLEXITY_TIERS.length - 1]
  );
}

export function computeComplexityPenalty(teamSize: number, complexity: number): number {
  const tier = complexityTier(teamSize);
  if (tier.coefficient === 0) return 0;
  return tier.coefficient * Math.max(0, complexity - tier.threshold);
}

// ─── Score ──────────────────────────────────────────────

export function isPreferred(tag: string, profile: ScoringProfile): boolean {
  const key = tagKey(tag);
  return profile.preferTags.some((t) => tagKey(t) === key);
}

export function computeScore(
  summary: TagSummary,
  complexity: number,
  profile: ScoringProfile,
  options: ScoringOptions = DEFAULT_SCORING
): ScoreBreakdown {
  const { weights } = options;
  const successTerm = weights.success * (summary.recentSuccessRate24m ?? 0);
  const trendTerm = weights.trend * summary.trendScore;
  const saturationTerm = -weights.saturation * Math.log(1 + summary.releasedLast6m);
  const complexityPenalty = computeComplexityPenalty(profile.teamSize, complexity);
  const preferenceTerm = isPreferred(summary.tag, profile) ? options.preferBonus : 0;

  return {
    successTerm,
    trendTerm,
    saturationTerm,
    preferenceTerm,
    complexityPenalty,
    score: successTerm + trendTerm + saturationTerm - complexityPenalty + preferenceTerm,
  };
}

// ─── Reasons ────────────────────────────────────────────

export interface ReasonContext {
  summary: TagSummary;
  complexity: number;
  complexityPenalty: number;
  teamSize: number;
  preferred: boolean;
}

export type ReasonGroup = "success" | "trend" | "saturation" | "complexity" | "preference";

export interface ReasonRule {
  group: ReasonGroup;
  when: (ctx: ReasonContext) => boolean;
  message: (ctx: ReasonContext) => string;
}

const T = REASON_THRESHOLDS;

export const REASON_RULES: readonly ReasonRule[] = [
  {
    group: "success",
    when: ({ summary }) => summary.recentSuccessRate24m === null,
    message: () => "No releases in the last 24 months",
  },
  {
    group: "success",
    when: ({ summary }) => (summary.recentSuccessRate24m ?? 0) >= T.highSuccessRate,
    message: () => "High recent success rate",
  },
  {
    group: "success",
    when: ({ summary }) => (summary.recentSuccessRate24m ?? 0) >= T.moderateSuccessRate,
    message: () => "Moderate recent success rate",
  },
  {
    group: "success",
    when: () => true,
    message: () => "Low recent success rate",
  },
  {
    group: "trend",
    when: ({ summary }) => summary.trendScore > T.strongTrend,
    message: () => "Strong positive trend",
  },
  {
    group: "trend",
    when: ({ summary }) => summary.trendScore > 0,
    message: () => "Positive trend",
  },
  {
    group: "trend",
    when: ({ summary }) => summary.trendScore < T.negativeTrend,
    message: () => "Negative trend",
  },
  {
    group: "saturation",
    when: ({ summary }) => summary.releasedLast6m >= T.highSaturation,
    message: () => "High saturation (many recent releases)",
  },
  {
    group: "saturation",
    when: ({ summary }) => summary.releasedLast6m >= T.moderateSaturation,
    message: () => "Moderate saturation",
  },
  {
    group: "saturation",
    when: () => true,
    message: () => "Low saturation",
  },
  {
    group: "complexity",
    when: ({ complexityPenalty }) => complexityPenalty > 0,
    message: ({ teamSize, complexity }) =>
      `Penalized for small team (size ${teamSize}) vs high complexity (score ${complexity})`,
  },
  {
    group: "complexity",
    when: ({ complexity, teamSize }) =>
      complexity >= T.highComplexity && teamSize < T.largeTeam,
    message: () => "Moderate complexity for team size",
  },
  {
    group: "complexity",
    when: () => true,
    message: () => "Good complexity match for team size",
  },
  {
    group: "preference",
    when: ({ preferred }) => preferred,
    message: () => "Matches a preferred tag",
  },
];

export function generateReasons(
  ctx: ReasonContext,
  rules: readonly ReasonRule[] = REASON_RULES
): string[] {
  const reasons: string[] = [];
  const reported = new Set<ReasonGroup>();
  for (const rule of rules) {
    if (reported.has(rule.group) || !rule.when(ctx)) continue;
    reported.add(rule.group);
    reasons.push(rule.message(ctx));
  }
  return reasons;
}

// ─── Recommendation ─────────────────────────────────────

export function roundScore(value: number, decimals = SCORE_DECIMALS): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/** Score one tag and package it for output, numbers rounded */
export function scoreTag(
  summary: TagSummary,
  complexity: number,
  profile: ScoringProfile,
  options: ScoringOptions = DEFAULT_SCORING
): Recommendation {
  const breakdown = computeScore(summary, complexity, profile, options);
  const reasons = generateReasons({
    summary,
    complexity,
    complexityPenalty: breakdown.complexityPenalty,
    teamSize: profile.teamSize,
    preferred: isPreferred(summary.tag, profile),
  });

  return {
    tag: summary.tag,
    score: roundScore(breakdown.score),
    successTerm: roundScore(breakdown.successTerm),
    trendTerm: roundScore(breakdown.trendTerm),
    saturationTerm: roundScore(breakdown.saturationTerm),
    preferenceTerm: roundScore(breakdown.preferenceTerm),
    complexity,
    complexityPenalty: roundScore(breakdown.complexityPenalty),
    recentSuccessRate24m:
      summary.recentSuccessRate24m === null ? null : roundScore(summary.recentSuccessRate24m),
    trendScore: roundScore(summary.trendScore),
    releasedLast6m: summary.releasedLast6m,
    reasons,
  };
}
