/**
 * tag-scout configuration — constants plus local overrides.
 *
 * Scoring weights, the success threshold and the default complexity can be
 * overridden from .tag-scout.json in the data home, then from TAG_SCOUT_*
 * environment variables. The tag complexity map ships with the package and
 * can be replaced by pointing `complexityFile` at another JSON object.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import bundledComplexity from "./data/tag_complexity.json" with { type: "json" };

// ─── Scoring Defaults ────────────────────────────────────

export interface ScoringWeights {
  success: number;
  trend: number;
  saturation: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  success: 1.0,
  trend: 0.7,
  saturation: 0.15,
};

/** Added to the score of a tag the caller asked to prefer */
export const PREFER_BONUS = 0.05;

/** A game counts as a success once it has at least this many reviews */
export const SUCCESS_REVIEW_THRESHOLD = 100;

/** Complexity used for tags missing from the complexity map */
export const DEFAULT_COMPLEXITY = 3;

export const COMPLEXITY_RANGE = { min: 1, max: 5 } as const;

/** Decimal places kept on recommendation output */
export const SCORE_DECIMALS = 4;

// ─── Windows ─────────────────────────────────────────────
// All windows trail the latest month present in the bucket table.

export const SUMMARY_WINDOWS = {
  successMonths: 24,
  volumeMonths: 6,
  trendRecentMonths: 6,
  trendPriorMonths: 12,
} as const;

// ─── Complexity Tiers ────────────────────────────────────

export interface ComplexityTier {
  /** Inclusive upper bound on team size for this tier */
  maxTeamSize: number;
  coefficient: number;
  /** Complexity above this value is penalized */
  threshold: number;
}

/** Ordered by maxTeamSize; the first tier that fits the team applies */
export const COMPLEXITY_TIERS: readonly ComplexityTier[] = [
  { maxTeamSize: 1, coefficient: 0.35, threshold: 2 },
  { maxTeamSize: 3, coefficient: 0.22, threshold: 3 },
  { maxTeamSize: 5, coefficient: 0.12, threshold: 4 },
  { maxTeamSize: Number.POSITIVE_INFINITY, coefficient: 0, threshold: COMPLEXITY_RANGE.max },
];

// ─── Reason Thresholds ───────────────────────────────────

export const REASON_THRESHOLDS = {
  highSuccessRate: 0.3,
  moderateSuccessRate: 0.15,
  strongTrend: 0.1,
  negativeTrend: -0.1,
  highSaturation: 50,
  moderateSaturation: 20,
  highComplexity: 4,
  largeTeam: 6,
} as const;

// ─── Request Limits ──────────────────────────────────────

export const REQUEST_LIMITS = {
  maxTeamSize: 100,
  maxTopN: 50,
  defaultTopN: 10,
} as const;

// ─── Settings Loading ────────────────────────────────────

export interface TagScoutSettings {
  weights: ScoringWeights;
  preferBonus: number;
  successThreshold: number;
  defaultComplexity: number;
  /** Replacement complexity map, resolved against the data home */
  complexityFile: string | null;
}

export const SETTINGS_FILE = ".tag-scout.json";

const complexityValue = z
  .number()
  .int()
  .min(COMPLEXITY_RANGE.min)
  .max(COMPLEXITY_RANGE.max);

const SettingsFileSchema = z.object({
  weights: z
    .object({
      success: z.number(),
      trend: z.number(),
      saturation: z.number().nonnegative(),
    })
    .partial()
    .optional(),
  preferBonus: z.number().optional(),
  successThreshold: z.number().int().positive().optional(),
  defaultComplexity: complexityValue.optional(),
  complexityFile: z.string().min(1).optional(),
});

const EnvSchema = z.object({
  TAG_SCOUT_W_SUCCESS: z.coerce.number().optional(),
  TAG_SCOUT_W_TREND: z.coerce.number().optional(),
  TAG_SCOUT_W_SATURATION: z.coerce.number().nonnegative().optional(),
  TAG_SCOUT_PREFER_BONUS: z.coerce.number().optional(),
  TAG_SCOUT_SUCCESS_THRESHOLD: z.coerce.number().int().positive().optional(),
});

const ComplexityMapSchema = z.record(z.string(), complexityValue);

let _settings: TagScoutSettings | null = null;
let _complexity: Record<string, number> | null = null;

/** Directory holding .tag-scout.json and the .tag-scout/ state directory */
export function getDataHome(): string {
  return process.env.TAG_SCOUT_HOME || process.cwd();
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Read only the TAG_SCOUT_* variables that are set to something */
function readEnvOverrides(): z.infer<typeof EnvSchema> {
  const present = Object.fromEntries(
    Object.entries(process.env).filter(
      ([key, value]) => key.startsWith("TAG_SCOUT_") && value !== undefined && value.trim() !== ""
    )
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid TAG_SCOUT_* environment: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Load settings: defaults, then .tag-scout.json, then environment */
export async function getSettings(): Promise<TagScoutSettings> {
  if (_settings) return _settings;

  const settingsPath = join(getDataHome(), SETTINGS_FILE);
  let file: z.infer<typeof SettingsFileSchema> = {};

  if (existsSync(settingsPath)) {
    const content = await readFile(settingsPath, "utf-8");
    const parsed = SettingsFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid ${SETTINGS_FILE}: ${describeIssues(parsed.error)}`);
    }
    file = parsed.data;
  }

  const env = readEnvOverrides();

  _settings = {
    weights: {
      success: env.TAG_SCOUT_W_SUCCESS ?? file.weights?.success ?? DEFAULT_WEIGHTS.success,
      trend: env.TAG_SCOUT_W_TREND ?? file.weights?.trend ?? DEFAULT_WEIGHTS.trend,
      saturation:
        env.TAG_SCOUT_W_SATURATION ?? file.weights?.saturation ?? DEFAULT_WEIGHTS.saturation,
    },
    preferBonus: env.TAG_SCOUT_PREFER_BONUS ?? file.preferBonus ?? PREFER_BONUS,
    successThreshold:
      env.TAG_SCOUT_SUCCESS_THRESHOLD ?? file.successThreshold ?? SUCCESS_REVIEW_THRESHOLD,
    defaultComplexity: file.defaultComplexity ?? DEFAULT_COMPLEXITY,
    complexityFile: file.complexityFile ?? null,
  };
  return _settings;
}

/** Tag → complexity (1-5), from the configured file or the bundled map */
export async function getTagComplexity(): Promise<Record<string, number>> {
  if (_complexity) return _complexity;

  const settings = await getSettings();
  let source: unknown = bundledComplexity;
  let label = "bundled tag_complexity.json";

  if (settings.complexityFile) {
    const path = isAbsolute(settings.complexityFile)
      ? settings.complexityFile
      : join(getDataHome(), settings.complexityFile);
    source = JSON.parse(await readFile(path, "utf-8"));
    label = path;
  }

  const parsed = ComplexityMapSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid complexity map in ${label}: ${describeIssues(parsed.error)}`);
  }
  _complexity = parsed.data;
  return _complexity;
}

/** Forget cached settings (tests, or after editing .tag-scout.json) */
export function resetSettings(): void {
  _settings = null;
  _complexity = null;
}
