import { describe, it, expect } from 'vitest';
import type { SightingRecord } from '@tickwatch/shared';
import { InMemorySightingRepository } from './memory.js';
import { StorageError } from '../errors.js';

function record(id: string, date: string, location = 'Leeds', species = 'Marsh tick'): SightingRecord {
  return { id, date, location, species, importId: 'IMP0' };
}

describe('InMemorySightingRepository', () => {
  it('returns records ordered by date then id', async () => {
    const repository = new InMemorySightingRepository([
      record('C', '2024-05-02'),
      record('B', '2024-05-01'),
      record('A', '2024-05-02'),
    ]);

    const records = await repository.query({});
    expect(records.map((r) => r.id)).toEqual(['B', 'A', 'C']);
  });

  it('applies every provided predicate', async () => {
    const repository = new InMemorySightingRepository([
      record('A', '2024-05-01', 'Leeds', 'Marsh tick'),
      record('B', '2024-05-02', 'York', 'Marsh tick'),
      record('C', '2024-05-03', 'Leeds', 'Passerine tick'),
      record('D', '2024-06-01', 'Leeds', 'Marsh tick'),
    ]);

    const records = await repository.query({
      startDate: '2024-05-01',
      endDate: '2024-05-31',
      locationKey: 'leeds',
      speciesKey: 'marshtick',
    });
    expect(records.map((r) => r.id)).toEqual(['A']);
  });

  it('finds the earliest date for non-date filters', async () => {
    const repository = new InMemorySightingRepository([
      record('A', '2024-05-01', 'York'),
      record('B', '2024-03-01', 'Leeds'),
    ]);
    expect(await repository.earliestDate({ locationKey: 'york' })).toBe('2024-05-01');
    expect(await repository.earliestDate({ locationKey: 'hull' })).toBeNull();
  });

  it('appends batches and reports a committed manifest', async () => {
    const repository = new InMemorySightingRepository();
    const manifest = await repository.insertBatch({
      importId: 'IMP1',
      source: 'ticks.csv',
      startedAt: '2024-06-01T00:00:00.000Z',
      records: [record('A', '2024-05-01'), record('B', '2024-05-02')],
    });

    expect(manifest.status).toBe('COMMITTED');
    expect(manifest.recordCount).toBe(2);
    expect(repository.size).toBe(2);
  });

  it('rejects a batch with an id already stored and keeps the store unchanged', async () => {
    const repository = new InMemorySightingRepository([record('A', '2024-05-01')]);

    await expect(
      repository.insertBatch({
        importId: 'IMP1',
        source: 'ticks.csv',
        startedAt: '2024-06-01T00:00:00.000Z',
        records: [record('B', '2024-05-02'), record('A', '2024-05-03')],
      })
    ).rejects.toThrow(StorageError);
    expect(repository.size).toBe(1);
  });

  it('returns copies so callers cannot mutate stored records', async () => {
    const repository = new InMemorySightingRepository([record('A', '2024-05-01')]);
    const [first] = await repository.query({});
    first.location = 'Changed';
    expect((await repository.getById('A'))?.location).toBe('Leeds');
  });

  it('replaces every earlier record with a replacing batch', async () => {
    const repository = new InMemorySightingRepository([record('A', '2024-05-01'), record('B', '2024-05-02')]);

    await repository.insertBatch({
      importId: 'IMP1',
      source: 'ticks.csv',
      startedAt: '2024-06-01T00:00:00.000Z',
      records: [record('A', '2024-05-03')],
      replace: true,
    });

    expect((await repository.query({})).map((r) => [r.id, r.date])).toEqual([['A', '2024-05-03']]);
  });

  it('keeps earlier records when a replacing batch is rejected', async () => {
    const repository = new InMemorySightingRepository([record('A', '2024-05-01')]);

    await expect(
      repository.insertBatch({
        importId: 'IMP1',
        source: 'ticks.csv',
        startedAt: '2024-06-01T00:00:00.000Z',
        records: [record('B', '2024-05-02'), record('B', '2024-05-03')],
        replace: true,
      })
    ).rejects.toThrow(StorageError);
    expect(repository.size).toBe(1);
  });
});
