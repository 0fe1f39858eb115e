import { describe, it, expect } from 'vitest';
import { Granularity, type SightingRecord } from '@tickwatch/shared';
import { addDaysToKey } from '../dates.js';
import { Deadline } from '../deadline.js';
import { EmptyStoreError, ForecastError, TimeoutError } from '../errors.js';
import { SpeciesIndex } from '../normalize.js';
import { InMemorySightingRepository } from '../repositories/memory.js';
import { fitLinearTrend, forecast, getForecast } from './forecast.js';

const species = new SpeciesIndex([{ name: 'Marsh tick', latinName: 'Dermacentor reticulatus', synonyms: [] }]);

let seq = 0;
function sightings(date: string, count: number, location = 'Leeds'): SightingRecord[] {
  return Array.from({ length: count }, () => {
    seq += 1;
    return { id: `F${String(seq).padStart(5, '0')}`, date, location, species: 'Marsh tick', importId: 'IMP0' };
  });
}

// Weekly counts 10, 12, 14, 16 in the ISO weeks starting 2024-05-06
const weeklyHistory = [
  ...sightings('2024-05-06', 10),
  ...sightings('2024-05-13', 12),
  ...sightings('2024-05-20', 14),
  ...sightings('2024-05-27', 16),
];

describe('fitLinearTrend', () => {
  it('fits a perfect line', () => {
    expect(fitLinearTrend([10, 12, 14, 16])).toEqual({ slope: 2, intercept: 10, rSquared: 1 });
  });

  it('treats a flat series as fully explained', () => {
    expect(fitLinearTrend([3, 3, 3])).toEqual({ slope: 0, intercept: 3, rSquared: 1 });
  });

  it('needs two observations', () => {
    expect(() => fitLinearTrend([5])).toThrow(ForecastError);
  });
});

describe('forecast', () => {
  it('extends a linear weekly trend', () => {
    const result = forecast(weeklyHistory, { start: '2024-05-06', end: '2024-05-27' }, {
      horizon: 2,
      granularity: Granularity.WEEK,
    });

    expect(result.predictions).toEqual([
      { period: '2024-W23', start: '2024-06-03', predicted: 18 },
      { period: '2024-W24', start: '2024-06-10', predicted: 20 },
    ]);
    expect(result.predictedTotal).toBe(38);
    expect(result.averagePerPeriod).toBe(19);
    expect(result.model).toEqual({
      slope: 2,
      intercept: 10,
      rSquared: 1,
      observations: 4,
      historyStart: '2024-05-06',
      historyEnd: '2024-05-27',
    });
  });

  it('never predicts negative counts', () => {
    const records = [...sightings('2024-05-01', 6), ...sightings('2024-05-02', 3)];
    const result = forecast(records, { start: '2024-05-01', end: '2024-05-02' }, { horizon: 4 });

    // slope -3, intercept 6: 0, -3, -6, -9
    expect(result.predictions.map((p) => p.predicted)).toEqual([0, 0, 0, 0]);
    expect(result.predictions.map((p) => p.start)).toEqual(['2024-05-03', '2024-05-04', '2024-05-05', '2024-05-06']);
  });

  it('returns exactly horizon predictions', () => {
    const records = [...sightings('2024-05-01', 1), ...sightings('2024-05-05', 1)];
    const result = forecast(records, { start: '2024-05-01', end: '2024-05-05' }, { horizon: 7 });

    expect(result.granularity).toBe(Granularity.DAY);
    expect(result.predictions).toHaveLength(7);
    expect(result.model.observations).toBe(5);
  });

  it('fails when sightings fall in a single period', () => {
    const records = sightings('2024-05-01', 5);

    try {
      forecast(records, { start: '2024-05-01', end: '2024-05-07' }, { horizon: 7 });
      expect.unreachable('forecast should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ForecastError);
      if (error instanceof ForecastError) {
        expect(error.reason).toBe('insufficient-data');
        expect(error.statusCode).toBe(422);
        expect(error.details).toEqual({ reason: 'insufficient-data', granularity: 'day', activePeriods: 1 });
      }
    }
  });

  it('fails without any records', () => {
    expect(() => forecast([], null, { horizon: 7 })).toThrow(ForecastError);
  });
});

describe('getForecast', () => {
  it('forecasts the filtered set only', async () => {
    const repository = new InMemorySightingRepository([
      ...weeklyHistory,
      ...sightings('2024-05-08', 40, 'York'),
    ]);

    const result = await getForecast(
      repository,
      { location: 'leeds' },
      { horizon: 2, granularity: Granularity.WEEK },
      { species }
    );

    expect(result.predictions.map((p) => p.predicted)).toEqual([18, 20]);
  });

  it('uses the explicit range as history', async () => {
    const start = '2024-05-01';
    const repository = new InMemorySightingRepository([
      ...sightings(start, 2),
      ...sightings(addDaysToKey(start, 1), 2),
    ]);

    const result = await getForecast(
      repository,
      { startDate: start, endDate: '2024-05-04' },
      { horizon: 1 },
      { species }
    );

    expect(result.model.historyEnd).toBe('2024-05-04');
    expect(result.model.observations).toBe(4);
    expect(result.predictions[0]?.start).toBe('2024-05-05');
  });

  it('stops building a long daily history once the budget runs out', async () => {
    const repository = new InMemorySightingRepository([...sightings('2024-05-01', 1), ...sightings('2024-05-02', 1)]);
    let tick = 0;
    const deadline = new Deadline(20, () => tick++);

    await expect(
      getForecast(
        repository,
        { startDate: '2000-01-01', endDate: '2099-12-31' },
        { horizon: 7, granularity: Granularity.DAY },
        { species, deadline }
      )
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it('rejects an empty store', async () => {
    await expect(
      getForecast(new InMemorySightingRepository(), {}, { horizon: 7 }, { species })
    ).rejects.toBeInstanceOf(EmptyStoreError);
  });
});
