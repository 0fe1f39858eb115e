import { subDays } from 'date-fns';
import {
  Granularity,
  type CategoryCount,
  type DateSpan,
  type FilterCriteria,
  type PeriodComparison,
  type SightingRecord,
  type StatisticsSummary,
} from '@tickwatch/shared';
import { bucketize, fromDateKey, precedingSpan, toDateKey, todayKey } from '../dates.js';
import type { Deadline } from '../deadline.js';
import type { SpeciesIndex } from '../normalize.js';
import type { SightingRepository } from '../repositories/types.js';
import { assertHasData, toSightingQuery } from './sightings.js';

export interface StatisticsDeps {
  species: SpeciesIndex;
  deadline?: Deadline;
  now?: Date;
}

export interface PreviousWindow {
  span: DateSpan;
  count: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Covered span: the explicit range where given, otherwise the dates of the
 * first and last record. An empty record set has no span.
 */
export function resolveSpan(records: readonly SightingRecord[], criteria: FilterCriteria): DateSpan | null {
  const first = records[0];
  const last = records[records.length - 1];
  if (first === undefined || last === undefined) return null;
  return { start: criteria.startDate ?? first.date, end: criteria.endDate ?? last.date };
}

function countBy(records: readonly SightingRecord[], pick: (record: SightingRecord) => string): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const name = pick(record);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));
}

export function buildComparison(current: { span: DateSpan; count: number }, previous: PreviousWindow): PeriodComparison {
  const change = current.count - previous.count;
  return {
    currentStart: current.span.start,
    currentEnd: current.span.end,
    previousStart: previous.span.start,
    previousEnd: previous.span.end,
    currentCount: current.count,
    previousCount: previous.count,
    change,
    percentChange: previous.count === 0 ? null : round1((change / previous.count) * 100),
  };
}

/**
 * Aggregate an ordered record set over `span`. Pure; the preceding window is
 * supplied by the caller because it needs records outside the set.
 */
export function computeStatistics(
  records: readonly SightingRecord[],
  span: DateSpan | null,
  options: { today: string; previous?: PreviousWindow | null; deadline?: Deadline }
): StatisticsSummary {
  const pastYearFrom = toDateKey(subDays(fromDateKey(options.today), 365));
  const sightingsPastYear = records.filter((r) => r.date >= pastYearFrom && r.date <= options.today).length;

  if (span === null) {
    return {
      totalSightings: records.length,
      oldestSighting: null,
      newestSighting: null,
      span: null,
      weekly: [],
      monthly: [],
      averageWeeklySightings: 0,
      averageMonthlySightings: 0,
      sightingsPastYear,
      bySpecies: [],
      byLocation: [],
      comparison: null,
    };
  }

  const dates = records.map((r) => r.date);
  const weekly = bucketize(dates, span, Granularity.WEEK, options.deadline);
  const monthly = bucketize(dates, span, Granularity.MONTH, options.deadline);
  const total = records.length;

  return {
    totalSightings: total,
    oldestSighting: dates[0] ?? null,
    newestSighting: dates[dates.length - 1] ?? null,
    span,
    weekly,
    monthly,
    averageWeeklySightings: round1(total / weekly.length),
    averageMonthlySightings: round1(total / monthly.length),
    sightingsPastYear,
    bySpecies: countBy(records, (r) => r.species),
    byLocation: countBy(records, (r) => r.location),
    comparison: options.previous ? buildComparison({ span, count: total }, options.previous) : null,
  };
}

export async function getStatistics(
  repository: SightingRepository,
  criteria: FilterCriteria,
  deps: StatisticsDeps
): Promise<StatisticsSummary> {
  const { deadline } = deps;
  await assertHasData(repository, deadline);

  const query = toSightingQuery(criteria, deps.species);
  const records = await repository.query(query, { deadline });
  const span = resolveSpan(records, criteria);

  let previous: PreviousWindow | null = null;
  if (span !== null) {
    const previousSpan = precedingSpan(span);
    const { locationKey, speciesKey } = query;
    const earliest = await repository.earliestDate({ locationKey, speciesKey }, { deadline });
    // Only a fully covered preceding window is compared
    if (earliest !== null && earliest <= previousSpan.start) {
      const count = await repository.count(
        { ...query, startDate: previousSpan.start, endDate: previousSpan.end },
        { deadline }
      );
      previous = { span: previousSpan, count };
    }
  }

  deadline?.check('statistics');
  return computeStatistics(records, span, { today: todayKey(deps.now), previous, deadline });
}
