import type { ImportManifest, SightingRecord } from '@tickwatch/shared';
import type { Deadline } from '../deadline.js';
import { locationKey, matchKey } from '../normalize.js';

/**
 * Filter criteria reduced to the keys storage compares against. Produced by
 * the query service, which owns normalization.
 */
export interface SightingQuery {
  startDate?: string;
  endDate?: string;
  locationKey?: string;
  speciesKey?: string;
}

export interface QueryOptions {
  deadline?: Deadline;
}

// Records of one ingestion run, committed together
export interface ImportBatch {
  importId: string;
  source: string;
  startedAt: string;
  records: SightingRecord[];
  /** Hide every earlier import in the same step that commits this one */
  replace?: boolean;
}

export interface SightingRepository {
  /** Matching records of committed imports, ordered by date then id */
  query(query: SightingQuery, options?: QueryOptions): Promise<SightingRecord[]>;
  count(query?: SightingQuery, options?: QueryOptions): Promise<number>;
  getById(id: string): Promise<SightingRecord | null>;
  /** Earliest committed date matching the non-date part of `query` */
  earliestDate(query: Omit<SightingQuery, 'startDate' | 'endDate'>, options?: QueryOptions): Promise<string | null>;
  /**
   * All-or-nothing: readers see either none or all of the batch. A replacing
   * batch that fails leaves the earlier imports visible.
   */
  insertBatch(batch: ImportBatch): Promise<ImportManifest>;
}

// Comparison keys stored alongside each record
export function recordKeys(record: SightingRecord): { locationKey: string; speciesKey: string } {
  return {
    locationKey: locationKey(record.location),
    speciesKey: matchKey(record.species),
  };
}

export function matchesQuery(record: SightingRecord, query: SightingQuery): boolean {
  const keys = recordKeys(record);
  return (
    (query.startDate === undefined || record.date >= query.startDate) &&
    (query.endDate === undefined || record.date <= query.endDate) &&
    (query.locationKey === undefined || keys.locationKey === query.locationKey) &&
    (query.speciesKey === undefined || keys.speciesKey === query.speciesKey)
  );
}

export function compareRecords(a: SightingRecord, b: SightingRecord): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}
