/**
 * Time Range Utilities
 *
 * Pure functions over UTC calendar dates (YYYY-MM-DD strings) and the
 * ISO 8601 windows sent to the GitHub API.
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface TimeRange {
  from: string;
  to: string;
}

export interface DateRange {
  start: string;
  end: string;
}

export type Period = 'daily' | 'weekly' | 'monthly';

/** Days to look back for each rolling period, ending today. */
const PERIOD_LOOKBACK_DAYS: Record<Period, number> = {
  daily: 0,
  weekly: 7,
  monthly: 30,
};

/**
 * Strict YYYY-MM-DD check, rejecting impossible dates like 2026-02-30.
 */
export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/** UTC calendar date of a Date. */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** UTC timestamp without milliseconds, e.g. 2026-03-01T08:30:00Z. */
export function isoTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function addDays(date: string, days: number): string {
  const base = new Date(`${date}T00:00:00Z`);
  return isoDate(new Date(base.getTime() + days * DAY_MS));
}

/** Whole days from start to end; negative when end is earlier. */
export function daysBetween(start: string, end: string): number {
  const from = new Date(`${start}T00:00:00Z`).getTime();
  const to = new Date(`${end}T00:00:00Z`).getTime();
  return Math.round((to - from) / DAY_MS);
}

/**
 * Full-day UTC window for one calendar date.
 * Used by: daily commit fetch
 */
export function dayWindow(date: string): TimeRange {
  return {
    from: `${date}T00:00:00Z`,
    to: `${date}T23:59:59Z`,
  };
}

/** Midnight UTC at the start of a date, as the API's `since` parameter. */
export function startOfDay(date: string): string {
  return `${date}T00:00:00Z`;
}

/**
 * Rolling period ending today.
 * daily = today only, weekly = last 7 days + today, monthly = last 30 days + today.
 */
export function periodRange(period: Period, now: Date = new Date()): DateRange {
  const end = isoDate(now);
  return { start: addDays(end, -PERIOD_LOOKBACK_DAYS[period]), end };
}

/**
 * Every date from start to end inclusive. Empty when start is after end.
 * Used by: backfill
 */
export function eachDay(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/**
 * Whether a timestamp's calendar date (its first 10 characters) equals a date.
 * Missing timestamps never match.
 */
export function onDate(timestamp: string | undefined, date: string): boolean {
  return timestamp !== undefined && timestamp.slice(0, 10) === date;
}

/** Hours between two ISO timestamps. */
export function hoursBetween(from: string, to: string): number {
  return (new Date(to).getTime() - new Date(from).getTime()) / (60 * 60 * 1000);
}
