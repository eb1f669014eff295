/**
 * Durations
 *
 * All durations in this package are plain millisecond counts, the same unit
 * `Date` arithmetic uses. Months and years are calendar approximations
 * (30 and 365 days).
 */

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;
export const MS_PER_WEEK = 7 * MS_PER_DAY;

/** Approximate days per month */
export const DAYS_PER_MONTH = 30;

/** Approximate days per year */
export const DAYS_PER_YEAR = 365;

export function seconds(count: number): number {
  return count * MS_PER_SECOND;
}

export function minutes(count: number): number {
  return count * MS_PER_MINUTE;
}

export function hours(count: number): number {
  return count * MS_PER_HOUR;
}

export function days(count: number): number {
  return count * MS_PER_DAY;
}

export function weeks(count: number): number {
  return count * MS_PER_WEEK;
}

export function months(count: number): number {
  return count * DAYS_PER_MONTH * MS_PER_DAY;
}

export function years(count: number): number {
  return count * DAYS_PER_YEAR * MS_PER_DAY;
}

/**
 * Convert a duration to fractional days
 */
export function toDays(durationMs: number): number {
  return durationMs / MS_PER_DAY;
}

/**
 * Time from `earlier` to `later`, saturating at zero when `later` comes first
 */
export function elapsedBetween(earlier: Date, later: Date): number {
  return Math.max(0, later.getTime() - earlier.getTime());
}

export function isZeroDuration(durationMs: number): boolean {
  return durationMs === 0;
}
