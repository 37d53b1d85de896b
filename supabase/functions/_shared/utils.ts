/**
 * Shared Utility Functions
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Source of "now". Injected wherever time matters so tests can pin it.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** UTC calendar date, "YYYY-MM-DD" */
export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** UTC time of day, "HH:MM:SS" */
export function utcTimeOfDay(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/** Round half away from zero to `decimals` places */
export function round(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  return rounded === 0 ? 0 : rounded;
}

/** sum / count rounded to 2 decimals, 0 for an empty denominator */
export function average(sum: number, count: number): number {
  return count > 0 ? round(sum / count) : 0;
}

/** Length in Unicode code points */
export function codePointLength(text: string): number {
  let length = 0;
  for (const _char of text) {
    length++;
  }
  return length;
}

/**
 * Non-overlapping, case-insensitive occurrences of `needle` in `haystack`.
 */
export function countOccurrences(haystack: string, needle: string): number {
  const text = haystack.toLowerCase();
  const term = needle.toLowerCase();
  if (!term) return 0;

  let count = 0;
  let index = text.indexOf(term);
  while (index !== -1) {
    count++;
    index = text.indexOf(term, index + term.length);
  }
  return count;
}
