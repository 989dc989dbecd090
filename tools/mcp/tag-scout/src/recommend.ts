/**
 * Tag ranking — filter, score, sort, truncate.
 *
 * Candidates are the snapshot's tags, narrowed to allowTags when given,
 * minus avoidTags. Avoid beats prefer. Output is ordered by rounded score
 * descending, then tag name ascending, so equal inputs give equal lists.
 */

import { z } from "zod";
import { REQUEST_LIMITS } from "./config.js";
import { compareText } from "./aggregate.js";
import { InvalidRequestError } from "./errors.js";
import { maxYearMonth, type YearMonth } from "./months.js";
import { DEFAULT_SCORING, scoreTag, type Recommendation, type ScoringOptions } from "./score.js";
import { complexityFor, type TagSnapshot } from "./snapshot.js";
import { tagKey } from "./tags.js";

// ─── Request ────────────────────────────────────────────

const tagList = z.array(z.string().trim().min(1, "tag names must not be blank"));

export const RecommendationRequestSchema = z
  .object({
    teamSize: z.number().int().positive().max(REQUEST_LIMITS.maxTeamSize),
    topN: z.number().int().positive().max(REQUEST_LIMITS.maxTopN).default(REQUEST_LIMITS.defaultTopN),
    preferTags: tagList.default([]),
    avoidTags: tagList.default([]),
    allowTags: tagList.nullish(),
  })
  .superRefine((request, ctx) => {
    if (!request.allowTags || request.allowTags.length === 0) return;
    const avoided = new Set(request.avoidTags.map(tagKey));
    if (request.allowTags.every((tag) => avoided.has(tagKey(tag)))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["allowTags"],
        message: "every allowed tag is also avoided",
      });
    }
  });

/** What callers pass in: topN and the tag lists are optional */
export type RecommendationInput = z.input<typeof RecommendationRequestSchema>;
export type RecommendationRequest = z.output<typeof RecommendationRequestSchema>;

export function parseRecommendationRequest(input: unknown): RecommendationRequest {
  const parsed = RecommendationRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

// ─── Result ─────────────────────────────────────────────

export interface RecommendationMeta {
  /** Latest lastMonth among the candidates; null when there are none */
  dataLastMonth: YearMonth | null;
  uniqueTags: number;
}

export interface RecommendationResult {
  recommendations: Recommendation[];
  meta: RecommendationMeta;
}

export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  return b.score - a.score || compareText(a.tag, b.tag);
}

// ─── Ranking ────────────────────────────────────────────

/**
 * Rank tags for a team profile. Pure: reads the snapshot, never writes it.
 * Throws InvalidRequestError for a malformed request; an empty candidate
 * set is a normal, empty result.
 */
export function recommendTags(
  snapshot: TagSnapshot,
  input: RecommendationInput,
  options: ScoringOptions = DEFAULT_SCORING
): RecommendationResult {
  const request = parseRecommendationRequest(input);

  const allowed =
    request.allowTags && request.allowTags.length > 0
      ? new Set(request.allowTags.map(tagKey))
      : null;
  const avoided = new Set(request.avoidTags.map(tagKey));

  const candidates = snapshot.summaries.filter((summary) => {
    const key = tagKey(summary.tag);
    if (allowed && !allowed.has(key)) return false;
    return !avoided.has(key);
  });

  const ranked = candidates
    .map((summary) =>
      scoreTag(
        summary,
        complexityFor(snapshot, summary.tag, options.defaultComplexity),
        request,
        options
      )
    )
    .sort(compareRecommendations);

  return {
    recommendations: ranked.slice(0, request.topN),
    meta: {
      dataLastMonth: maxYearMonth(candidates.map((s) => s.lastMonth)),
      uniqueTags: candidates.length,
    },
  };
}
