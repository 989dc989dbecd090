/**
 * Calendar months as "YYYY-MM" strings. Strings sort chronologically, and
 * month indexes (year * 12 + month - 1) make window arithmetic exact.
 */

export type YearMonth = string;

const YEAR_MONTH = /^(\d{4})-(\d{2})$/;

export function formatYearMonth(year: number, month: number): YearMonth {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

export function isYearMonth(value: string): boolean {
  const match = value.match(YEAR_MONTH);
  if (!match) return false;
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
}

export function monthIndex(value: YearMonth): number {
  const match = value.match(YEAR_MONTH);
  if (!match || !isYearMonth(value)) {
    throw new Error(`Not a YYYY-MM month: ${value}`);
  }
  return Number(match[1]) * 12 + Number(match[2]) - 1;
}

/** Latest month in the list, or null when empty */
export function maxYearMonth(values: Iterable<YearMonth>): YearMonth | null {
  let max: YearMonth | null = null;
  for (const value of values) {
    if (max === null || value > max) max = value;
  }
  return max;
}
