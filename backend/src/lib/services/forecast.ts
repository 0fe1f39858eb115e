import {
  Granularity,
  type AggregateBucket,
  type DateSpan,
  type FilterCriteria,
  type ForecastPoint,
  type ForecastResult,
  type SightingRecord,
} from '@tickwatch/shared';
import { addPeriods, bucketize, fromDateKey, periodKey, periodStart, toDateKey } from '../dates.js';
import type { Deadline } from '../deadline.js';
import { ForecastError } from '../errors.js';
import type { SpeciesIndex } from '../normalize.js';
import type { SightingRepository } from '../repositories/types.js';
import { assertHasData, toSightingQuery } from './sightings.js';
import { resolveSpan } from './statistics.js';

export interface LinearTrend {
  slope: number;
  intercept: number;
  rSquared: number;
}

export interface ForecastOptions {
  horizon: number;
  granularity?: Granularity;
  deadline?: Deadline;
}

export interface ForecastDeps {
  species: SpeciesIndex;
  deadline?: Deadline;
}

const MIN_ACTIVE_PERIODS = 2;

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** Ordinary least squares over (index, value) pairs */
export function fitLinearTrend(values: readonly number[]): LinearTrend {
  const n = values.length;
  if (n < 2) {
    throw new ForecastError('insufficient-data', 'At least two periods are needed to fit a trend', {
      observations: n,
    });
  }

  const xMean = (n - 1) / 2;
  const yMean = values.reduce((sum, v) => sum + v, 0) / n;

  let sxy = 0;
  let sxx = 0;
  values.forEach((y, x) => {
    sxy += (x - xMean) * (y - yMean);
    sxx += (x - xMean) ** 2;
  });

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  let ssRes = 0;
  let ssTot = 0;
  values.forEach((y, x) => {
    ssRes += (y - (intercept + slope * x)) ** 2;
    ssTot += (y - yMean) ** 2;
  });

  // A flat series is fitted exactly by a flat line
  const rSquared = ssTot === 0 ? 1 : 1 - ssRes / ssTot;
  return { slope, intercept, rSquared };
}

function projectPoints(
  series: readonly AggregateBucket[],
  trend: LinearTrend,
  horizon: number,
  granularity: Granularity
): ForecastPoint[] {
  const last = series[series.length - 1];
  if (last === undefined) return [];
  const lastStart = periodStart(fromDateKey(last.start), granularity);

  return Array.from({ length: horizon }, (_, i) => {
    const start = addPeriods(lastStart, i + 1, granularity);
    const x = series.length + i;
    return {
      period: periodKey(start, granularity),
      start: toDateKey(start),
      predicted: Math.max(0, Math.round(trend.intercept + trend.slope * x)),
    };
  });
}

/**
 * Project sighting counts `horizon` periods past the end of `span`. The
 * history is the zero-filled series of period counts across the span.
 */
export function forecast(
  records: readonly SightingRecord[],
  span: DateSpan | null,
  options: ForecastOptions
): ForecastResult {
  const granularity = options.granularity ?? Granularity.DAY;
  const series = span ? bucketize(records.map((r) => r.date), span, granularity, options.deadline) : [];
  const active = series.filter((bucket) => bucket.count > 0).length;

  if (span === null || active < MIN_ACTIVE_PERIODS) {
    throw new ForecastError(
      'insufficient-data',
      `Not enough data to forecast: sightings in at least ${MIN_ACTIVE_PERIODS} ${granularity} periods are required`,
      { granularity, activePeriods: active }
    );
  }

  const trend = fitLinearTrend(series.map((bucket) => bucket.count));
  const predictions = projectPoints(series, trend, options.horizon, granularity);
  const predictedTotal = predictions.reduce((sum, p) => sum + p.predicted, 0);

  return {
    granularity,
    horizon: options.horizon,
    predictions,
    predictedTotal,
    averagePerPeriod: predictions.length === 0 ? 0 : round(predictedTotal / predictions.length, 1),
    model: {
      slope: round(trend.slope, 4),
      intercept: round(trend.intercept, 4),
      rSquared: round(trend.rSquared, 4),
      observations: series.length,
      historyStart: span.start,
      historyEnd: span.end,
    },
  };
}

export async function getForecast(
  repository: SightingRepository,
  criteria: FilterCriteria,
  options: ForecastOptions,
  deps: ForecastDeps
): Promise<ForecastResult> {
  await assertHasData(repository, deps.deadline);
  const records = await repository.query(toSightingQuery(criteria, deps.species), { deadline: deps.deadline });
  deps.deadline?.check('forecast');
  return forecast(records, resolveSpan(records, criteria), { ...options, deadline: deps.deadline });
}
