import { describe, it, expect } from 'vitest';
import type { FilterCriteria, SightingRecord } from '@tickwatch/shared';
import { EmptyStoreError, NotFoundError } from '../errors.js';
import { SpeciesIndex } from '../normalize.js';
import { InMemorySightingRepository } from '../repositories/memory.js';
import { findSightings, getSighting, toSightingQuery } from './sightings.js';

const species = new SpeciesIndex([
  { name: 'Marsh tick', latinName: 'Dermacentor reticulatus', synonyms: [] },
  { name: 'Castor bean tick', latinName: 'Ixodes ricinus', synonyms: ['Sheep tick'] },
]);

const records: SightingRecord[] = [
  { id: 'A', date: '2024-04-30', location: 'Leeds', species: 'Marsh tick', importId: 'IMP0' },
  { id: 'B', date: '2024-05-01', location: 'Leeds', species: 'Castor bean tick', importId: 'IMP0' },
  { id: 'C', date: '2024-05-01', location: 'York', species: 'Castor bean tick', importId: 'IMP0' },
  { id: 'D', date: '2024-05-15', location: 'Newcastle Upon Tyne', species: 'Marsh tick', importId: 'IMP0' },
  { id: 'E', date: '2024-06-02', location: 'Leeds', species: 'Castor bean tick', importId: 'IMP0' },
];

const ids = async (criteria: FilterCriteria) =>
  (await findSightings(new InMemorySightingRepository(records), criteria, { species })).items.map((r) => r.id);

describe('toSightingQuery', () => {
  it('normalises location and species', () => {
    expect(toSightingQuery({ location: '  newcastle   upon tyne ', species: 'IXODES RICINUS' }, species)).toEqual({
      locationKey: 'newcastle upon tyne',
      speciesKey: 'castorbeantick',
    });
  });

  it('leaves empty criteria empty', () => {
    expect(toSightingQuery({}, species)).toEqual({});
  });
});

describe('findSightings', () => {
  it('returns the whole store for empty criteria', async () => {
    const result = await findSightings(new InMemorySightingRepository(records), {}, { species });

    expect(result.total).toBe(records.length);
    expect(result.items.map((r) => r.id)).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('treats date bounds as inclusive', async () => {
    expect(await ids({ startDate: '2024-05-01', endDate: '2024-05-15' })).toEqual(['B', 'C', 'D']);
  });

  it('intersects the results of individual filters', async () => {
    const byLocation = await ids({ location: 'leeds' });
    const bySpecies = await ids({ species: 'sheep tick' });
    const combined = await ids({ location: 'leeds', species: 'sheep tick' });

    expect(combined).toEqual(byLocation.filter((id) => bySpecies.includes(id)));
    expect(combined).toEqual(['B', 'E']);
  });

  it('returns an empty list when nothing matches', async () => {
    const result = await findSightings(new InMemorySightingRepository(records), { location: 'Bath' }, { species });

    expect(result).toEqual({ items: [], total: 0 });
  });

  it('keeps unrecognised species in other scripts apart', async () => {
    const store = new InMemorySightingRepository([
      { id: 'K', date: '2024-05-01', location: 'Leeds', species: 'Клещ', importId: 'IMP0' },
      { id: 'I', date: '2024-05-02', location: 'Leeds', species: 'Иксод', importId: 'IMP0' },
      { id: 'Q', date: '2024-05-03', location: 'Leeds', species: '???', importId: 'IMP0' },
    ]);

    const cyrillic = await findSightings(store, { species: 'клещ' }, { species });
    const punctuation = await findSightings(store, { species: '???' }, { species });

    expect(cyrillic.items.map((r) => r.id)).toEqual(['K']);
    expect(punctuation.items.map((r) => r.id)).toEqual(['Q']);
  });

  it('finds a location by the spelling the source used', async () => {
    // Ingestion stores the canonical spelling of "ßerlin"
    const store = new InMemorySightingRepository([
      { id: 'S', date: '2024-05-01', location: 'SSerlin', species: 'Marsh tick', importId: 'IMP0' },
    ]);

    const result = await findSightings(store, { location: 'ßerlin' }, { species });
    expect(result.total).toBe(1);
  });

  it('rejects an empty store', async () => {
    await expect(findSightings(new InMemorySightingRepository(), {}, { species })).rejects.toBeInstanceOf(
      EmptyStoreError
    );
  });
});

describe('getSighting', () => {
  it('returns the record by id', async () => {
    expect(await getSighting(new InMemorySightingRepository(records), 'D')).toEqual(records[3]);
  });

  it('reports an unknown id', async () => {
    await expect(getSighting(new InMemorySightingRepository(records), 'Z')).rejects.toBeInstanceOf(NotFoundError);
  });
});
