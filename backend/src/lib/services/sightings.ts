import type { FilterCriteria, SightingListResult, SightingRecord } from '@tickwatch/shared';
import type { Deadline } from '../deadline.js';
import { EmptyStoreError, NotFoundError } from '../errors.js';
import { locationKey, type SpeciesIndex } from '../normalize.js';
import type { SightingQuery, SightingRepository } from '../repositories/types.js';

export interface QueryDeps {
  species: SpeciesIndex;
  deadline?: Deadline;
}

/** Reduce user-facing criteria to the keys ingestion stored */
export function toSightingQuery(criteria: FilterCriteria, species: SpeciesIndex): SightingQuery {
  const query: SightingQuery = {};
  if (criteria.startDate !== undefined) query.startDate = criteria.startDate;
  if (criteria.endDate !== undefined) query.endDate = criteria.endDate;
  if (criteria.location !== undefined) query.locationKey = locationKey(criteria.location);
  if (criteria.species !== undefined) query.speciesKey = species.speciesKey(criteria.species);
  return query;
}

export async function assertHasData(repository: SightingRepository, deadline?: Deadline): Promise<void> {
  if ((await repository.earliestDate({}, { deadline })) === null) {
    throw new EmptyStoreError();
  }
}

export async function querySightings(
  repository: SightingRepository,
  criteria: FilterCriteria,
  deps: QueryDeps
): Promise<SightingRecord[]> {
  return repository.query(toSightingQuery(criteria, deps.species), { deadline: deps.deadline });
}

export async function findSightings(
  repository: SightingRepository,
  criteria: FilterCriteria,
  deps: QueryDeps
): Promise<SightingListResult> {
  await assertHasData(repository, deps.deadline);
  const items = await querySightings(repository, criteria, deps);
  return { items, total: items.length };
}

export async function getSighting(repository: SightingRepository, id: string): Promise<SightingRecord> {
  const record = await repository.getById(id);
  if (!record) {
    throw new NotFoundError('Sighting', id);
  }
  return record;
}
