import { ImportStatus, type ImportManifest, type SightingRecord } from '@tickwatch/shared';
import { StorageError } from '../errors.js';
import {
  compareRecords,
  matchesQuery,
  type ImportBatch,
  type QueryOptions,
  type SightingQuery,
  type SightingRepository,
} from './types.js';

/**
 * In-process repository. A batch is validated and staged before a single
 * synchronous swap, so no reader can observe part of it.
 */
export class InMemorySightingRepository implements SightingRepository {
  private records: SightingRecord[] = [];
  private readonly manifests = new Map<string, ImportManifest>();

  constructor(seed: SightingRecord[] = []) {
    this.records = [...seed].sort(compareRecords);
  }

  async query(query: SightingQuery, options: QueryOptions = {}): Promise<SightingRecord[]> {
    options.deadline?.check('storage');
    return this.records.filter((record) => matchesQuery(record, query)).map((record) => ({ ...record }));
  }

  async count(query: SightingQuery = {}, options: QueryOptions = {}): Promise<number> {
    return (await this.query(query, options)).length;
  }

  async getById(id: string): Promise<SightingRecord | null> {
    const record = this.records.find((r) => r.id === id);
    return record ? { ...record } : null;
  }

  async earliestDate(
    query: Omit<SightingQuery, 'startDate' | 'endDate'>,
    options: QueryOptions = {}
  ): Promise<string | null> {
    options.deadline?.check('storage');
    return this.records.find((record) => matchesQuery(record, query))?.date ?? null;
  }

  async insertBatch(batch: ImportBatch): Promise<ImportManifest> {
    if (this.manifests.has(batch.importId)) {
      throw new StorageError('insertBatch', new Error(`Import already exists: ${batch.importId}`));
    }
    const kept = batch.replace ? [] : this.records;
    const existingIds = new Set(kept.map((r) => r.id));
    for (const record of batch.records) {
      if (existingIds.has(record.id)) {
        throw new StorageError('insertBatch', new Error(`Duplicate sighting id: ${record.id}`));
      }
      existingIds.add(record.id);
    }

    const staged = [...kept, ...batch.records.map((r) => ({ ...r }))].sort(compareRecords);
    const manifest: ImportManifest = {
      importId: batch.importId,
      source: batch.source,
      status: ImportStatus.COMMITTED,
      recordCount: batch.records.length,
      startedAt: batch.startedAt,
      committedAt: new Date().toISOString(),
    };

    this.records = staged;
    if (batch.replace) this.manifests.clear();
    this.manifests.set(batch.importId, manifest);
    return { ...manifest };
  }

  get size(): number {
    return this.records.length;
  }
}
