/**
 * Record normalization — raw game rows into one canonical shape.
 *
 * Raw rows come from scraped catalogs: tags as JSON strings, single-quoted
 * lists or comma lists, release dates in whatever format the store page
 * used, review counts as numbers or strings. A bad field degrades to its
 * empty value; it never drops the row or fails the batch.
 */

import { SUCCESS_REVIEW_THRESHOLD } from "./config.js";
import { formatYearMonth, type YearMonth } from "./months.js";

// ─── Types ──────────────────────────────────────────────

/** One row as read from a table source; every field may be missing */
export interface RawGameRecord {
  id?: string | number | null;
  steam_appid?: string | number | null;
  name?: string | null;
  tags?: string | readonly unknown[] | null;
  release_date?: string | null;
  total_reviews?: string | number | null;
}

export interface GameRecord {
  readonly id: string;
  readonly name: string | null;
  readonly tags: readonly string[];
  /** null when the release date could not be read */
  readonly releaseMonth: YearMonth | null;
  readonly reviewCount: number;
  readonly success: boolean;
}

export interface NormalizeOptions {
  successThreshold?: number;
}

// ─── Tags ───────────────────────────────────────────────

/** Trimmed, non-empty, first occurrence wins, case kept */
function dedupeTags(items: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const item of items) {
    if (typeof item !== "string" && typeof item !== "number") continue;
    const tag = String(item).trim();
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    tags.push(tag);
  }
  return tags;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const QUOTED_LIST = /^\[\s*(?:(?:'[^']*'|"[^"]*")\s*(?:,\s*(?:'[^']*'|"[^"]*")\s*)*)?\]$/;
const QUOTED_ITEM = /'([^']*)'|"([^"]*)"/g;

function parseBracketedTags(text: string): string[] {
  const parsed = tryParseJson(text);
  if (Array.isArray(parsed)) return dedupeTags(parsed);
  if (parsed !== undefined) return [];

  // ['Indie', "Beat 'em up"] with mixed quotes
  if (!QUOTED_LIST.test(text)) return [];
  const items = Array.from(text.matchAll(QUOTED_ITEM), (m) => m[1] ?? m[2]);
  return dedupeTags(items);
}

/** Parse a tag field; anything unreadable yields an empty list */
export function parseTags(value: unknown): string[] {
  if (Array.isArray(value)) return dedupeTags(value);
  if (typeof value !== "string") return [];

  const text = value.trim();
  if (!text) return [];
  if (text.startsWith("[")) return parseBracketedTags(text);
  return dedupeTags(text.split(","));
}

// ─── Release Dates ──────────────────────────────────────

const MONTH_ABBREVIATIONS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toYearMonth(year: number, month: number, day: number): YearMonth | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return formatYearMonth(year, month);
}

/** 1-12 for an English month name or abbreviation, else 0 */
function monthFromWord(word: string): number {
  const full = MONTH_NAMES.indexOf(word);
  if (full >= 0) return full + 1;
  if (word === "sept") return 9;
  return MONTH_ABBREVIATIONS.indexOf(word) + 1;
}

const ISO_DATE = /^(\d{4})[-/](\d{1,2})(?:[-/](\d{1,2}))?(?:[T\s].*)?$/;
const NUMERIC_DATE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const FOUR_DIGIT_YEAR = /\b(\d{4})\b/;
const DAY_OF_MONTH = /\b(\d{1,2})\b/;

/**
 * Parse a release date into its calendar month.
 *
 * Accepts ISO dates (with or without day and time), slash/dot numeric dates
 * (month first unless the first field cannot be a month), and any text with
 * an English month name and a four-digit year ("Oct 21, 2008", "21 Oct,
 * 2008", "October 2008"); a day next to the name must exist in that month.
 * A bare year has no month and yields null.
 */
export function parseReleaseMonth(value: unknown): YearMonth | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? null
      : formatYearMonth(value.getUTCFullYear(), value.getUTCMonth() + 1);
  }
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (!text) return null;

  const iso = text.match(ISO_DATE);
  if (iso) {
    return toYearMonth(Number(iso[1]), Number(iso[2]), iso[3] === undefined ? 1 : Number(iso[3]));
  }

  const numeric = text.match(NUMERIC_DATE);
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[2]);
    const [month, day] = first > 12 ? [second, first] : [first, second];
    return toYearMonth(Number(numeric[3]), month, day);
  }

  const year = text.match(FOUR_DIGIT_YEAR);
  if (!year) return null;
  const day = text.match(DAY_OF_MONTH);
  for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    const month = monthFromWord(word);
    if (month > 0) return toYearMonth(Number(year[1]), month, day ? Number(day[1]) : 1);
  }
  return null;
}

// ─── Review Counts ──────────────────────────────────────

/** Whole review count; missing, non-numeric or negative values become 0 */
export function coerceReviewCount(value: unknown): number {
  let count = Number.NaN;
  if (typeof value === "number") {
    count = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    count = Number(value.trim().replace(/,/g, ""));
  }
  if (!Number.isFinite(count) || count < 0) return 0;
  return Math.trunc(count);
}

// ─── Records ────────────────────────────────────────────

function recordId(raw: RawGameRecord, index: number): string {
  for (const candidate of [raw.steam_appid, raw.id, raw.name]) {
    if (candidate === null || candidate === undefined) continue;
    const text = String(candidate).trim();
    if (text) return text;
  }
  return `row-${index + 1}`;
}

export function normalizeRecord(
  raw: RawGameRecord,
  index: number,
  options: NormalizeOptions = {}
): GameRecord {
  const threshold = options.successThreshold ?? SUCCESS_REVIEW_THRESHOLD;
  const reviewCount = coerceReviewCount(raw.total_reviews);
  const name = typeof raw.name === "string" && raw.name.trim() ? raw.name.trim() : null;

  return Object.freeze({
    id: recordId(raw, index),
    name,
    tags: Object.freeze(parseTags(raw.tags)),
    releaseMonth: parseReleaseMonth(raw.release_date),
    reviewCount,
    success: reviewCount >= threshold,
  });
}

export function normalizeRecords(
  raws: readonly RawGameRecord[],
  options: NormalizeOptions = {}
): GameRecord[] {
  return raws.map((raw, index) => normalizeRecord(raw, index, options));
}
