import {
  addDays,
  addMonths,
  addWeeks,
  differenceInCalendarDays,
  endOfISOWeek,
  endOfMonth,
  format,
  isValid,
  parseISO,
  startOfDay,
  startOfISOWeek,
  startOfMonth,
} from 'date-fns';
import { Granularity, type AggregateBucket, type DateSpan } from '@tickwatch/shared';
import type { Deadline } from './deadline.js';

// All calendar arithmetic happens on local-midnight Date values and is
// serialised back to YYYY-MM-DD, so the host time zone never leaks into keys.

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function fromDateKey(key: string): Date {
  return parseISO(key);
}

export function isDateKey(value: string): boolean {
  if (!DATE_KEY_PATTERN.test(value)) return false;
  const parsed = parseISO(value);
  // parseISO rolls 2024-02-30 over; the round trip catches it
  return isValid(parsed) && toDateKey(parsed) === value;
}

export function todayKey(now: Date = new Date()): string {
  return toDateKey(now);
}

export function addDaysToKey(key: string, days: number): string {
  return toDateKey(addDays(fromDateKey(key), days));
}

/** Number of calendar days in an inclusive span */
export function spanLengthDays(span: DateSpan): number {
  return differenceInCalendarDays(fromDateKey(span.end), fromDateKey(span.start)) + 1;
}

/** Same-length window ending the day before `span.start` */
export function precedingSpan(span: DateSpan): DateSpan {
  const length = spanLengthDays(span);
  return {
    start: addDaysToKey(span.start, -length),
    end: addDaysToKey(span.start, -1),
  };
}

export function periodStart(date: Date, granularity: Granularity): Date {
  switch (granularity) {
    case Granularity.DAY:
      return startOfDay(date);
    case Granularity.WEEK:
      return startOfISOWeek(date);
    case Granularity.MONTH:
      return startOfMonth(date);
  }
}

export function periodEnd(date: Date, granularity: Granularity): Date {
  switch (granularity) {
    case Granularity.DAY:
      return startOfDay(date);
    case Granularity.WEEK:
      return startOfDay(endOfISOWeek(date));
    case Granularity.MONTH:
      return startOfDay(endOfMonth(date));
  }
}

export function addPeriods(date: Date, amount: number, granularity: Granularity): Date {
  switch (granularity) {
    case Granularity.DAY:
      return addDays(date, amount);
    case Granularity.WEEK:
      return addWeeks(date, amount);
    case Granularity.MONTH:
      return addMonths(date, amount);
  }
}

/** Period identifier: YYYY-MM-DD, ISO week YYYY-Www, or YYYY-MM */
export function periodKey(date: Date, granularity: Granularity): string {
  switch (granularity) {
    case Granularity.DAY:
      return format(date, 'yyyy-MM-dd');
    case Granularity.WEEK:
      return format(date, "RRRR-'W'II");
    case Granularity.MONTH:
      return format(date, 'yyyy-MM');
  }
}

// Periods built between compute-budget checks
const DEADLINE_STRIDE = 1024;

/**
 * Count dates into contiguous periods covering `span`, zero-filling empty
 * periods. Dates outside the span's periods are ignored. The span is caller
 * supplied and unbounded, so `deadline` is checked as periods are built.
 */
export function bucketize(
  dates: readonly string[],
  span: DateSpan,
  granularity: Granularity,
  deadline?: Deadline
): AggregateBucket[] {
  const counts = new Map<string, number>();
  for (const date of dates) {
    const key = periodKey(fromDateKey(date), granularity);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const buckets: AggregateBucket[] = [];
  const last = periodStart(fromDateKey(span.end), granularity);
  let cursor = periodStart(fromDateKey(span.start), granularity);
  let index = 0;

  while (cursor.getTime() <= last.getTime()) {
    if (index > 0 && index % DEADLINE_STRIDE === 0) {
      deadline?.check('aggregation');
    }
    const key = periodKey(cursor, granularity);
    buckets.push({
      period: key,
      start: toDateKey(cursor),
      end: toDateKey(periodEnd(cursor, granularity)),
      count: counts.get(key) ?? 0,
    });
    index += 1;
    // Step from the first period so month lengths never drift
    cursor = addPeriods(periodStart(fromDateKey(span.start), granularity), index, granularity);
  }

  return buckets;
}
