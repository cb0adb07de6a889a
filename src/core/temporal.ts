// src/core/temporal.ts
import type { RNG } from "../types/rng.js";
import { randomInt, randomPick } from "../util/rng.js";

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** Start hours 08 through 16 inclusive. */
const BUSINESS_HOURS = { start: 8, end: 17 } as const;

const QUARTER_HOURS = [0, 15, 30, 45] as const;

/**
 * Sample a business-hours date-time between `start` and `end`.
 *
 * The start is taken at its local midnight and a day offset is drawn from
 * the whole days between that midnight and `end`, or just the start day
 * when the span is shorter than a day. A trailing partial day is never
 * sampled. The hour lies in [8, 17) and the minute on a quarter hour.
 */
export function sampleBusinessHourDateTime(
  rng: RNG,
  start: Date,
  end: Date,
): Date {
  if (end.getTime() <= start.getTime()) {
    throw new RangeError(
      `Business-hour sampling needs an end after the start, got ${start.toISOString()} to ${end.toISOString()}`,
    );
  }

  const startDay = startOfDay(start);
  const wholeDays = Math.floor((end.getTime() - startDay.getTime()) / DAY_MS);

  const result = new Date(startDay);
  result.setDate(result.getDate() + randomInt(rng, 0, Math.max(1, wholeDays) - 1));
  result.setHours(
    randomInt(rng, BUSINESS_HOURS.start, BUSINESS_HOURS.end - 1),
    randomPick(rng, QUARTER_HOURS),
    0,
    0,
  );
  return result;
}

/**
 * Sample a whole-minute date-time uniformly in [start, end). The first
 * candidate is `start` rounded up to the next whole minute.
 */
export function sampleDateTime(rng: RNG, start: Date, end: Date): Date {
  const first = Math.ceil(start.getTime() / MINUTE_MS) * MINUTE_MS;
  const minutes = Math.ceil((end.getTime() - first) / MINUTE_MS);
  if (minutes < 1) {
    throw new RangeError(
      `No whole minute between ${start.toISOString()} and ${end.toISOString()}`,
    );
  }
  return new Date(first + randomInt(rng, 0, minutes - 1) * MINUTE_MS);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

export function addYears(date: Date, years: number): Date {
  const result = new Date(date);
  result.setFullYear(result.getFullYear() + years);
  return result;
}

function startOfDay(date: Date): Date {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
}

/**
 * Parse a `YYYY-MM-DD` calendar date as local midnight.
 */
export function parseCalendarDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new RangeError(`Expected a YYYY-MM-DD date, got "${value}"`);
  }
  const [, year, month, day] = match;
  return new Date(Number(year), Number(month) - 1, Number(day));
}
