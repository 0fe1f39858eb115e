import { ImportStatus, type ImportManifest, type SightingRecord } from '@tickwatch/shared';
import { config } from '../config.js';
import {
  batchWriteAll,
  getItem,
  putItem,
  queryItems,
  transactWrite,
  updateItem,
  type WriteRequest,
} from '../dynamodb.js';
import { AppError, StorageError } from '../errors.js';
import { logger } from '../logger.js';
import {
  recordKeys,
  type ImportBatch,
  type QueryOptions,
  type SightingQuery,
  type SightingRepository,
} from './types.js';

// Single-table layout:
//   SIGHTING#<id> / META   GSI1: SIGHTINGS / DATE#<date>#<id>
//   IMPORT#<id>   / META   GSI1: IMPORTS   / TS#<startedAt>#<id>
//   STORE         / FLOOR  GSI1: IMPORTS   / FLOOR
// A sighting is visible only while its import manifest is COMMITTED and
// sorts at or above the floor. A replacing import raises the floor to itself
// in the transaction that commits it.

const SIGHTINGS_PARTITION = 'SIGHTINGS';
const IMPORTS_PARTITION = 'IMPORTS';
const FLOOR_KEY = { PK: 'STORE', SK: 'FLOOR' };
// Sorts after every ULID character
const SORT_KEY_CEILING = '~';

type StoredSighting = SightingRecord & {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
  locationKey: string;
  speciesKey: string;
};

type StoredManifest = ImportManifest & { PK: string; SK: string; GSI1SK: string };

type StoredFloor = { PK: string; SK: string; kind: 'floor'; floor: string };

function isVisible(manifest: StoredManifest, floor: string | undefined): boolean {
  return manifest.status === ImportStatus.COMMITTED && (floor === undefined || manifest.GSI1SK >= floor);
}

function toRecord(item: StoredSighting): SightingRecord {
  return {
    id: item.id,
    date: item.date,
    location: item.location,
    species: item.species,
    ...(item.latinName && { latinName: item.latinName }),
    ...(item.habitat && { habitat: item.habitat }),
    ...(item.host && { host: item.host }),
    ...(item.sourceId && { sourceId: item.sourceId }),
    importId: item.importId,
  };
}

function sightingKey(id: string): { PK: string; SK: string } {
  return { PK: `SIGHTING#${id}`, SK: 'META' };
}

function importKey(importId: string): { PK: string; SK: string } {
  return { PK: `IMPORT#${importId}`, SK: 'META' };
}

function importSortKey(batch: ImportBatch): string {
  return `TS#${batch.startedAt}#${batch.importId}`;
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) throw error;
    logger.error({ error, operation }, 'DynamoDB operation failed');
    throw new StorageError(operation, error);
  }
}

export class DynamoSightingRepository implements SightingRepository {
  constructor(private readonly table: string = config.tables.sightings) {}

  async query(query: SightingQuery, options: QueryOptions = {}): Promise<SightingRecord[]> {
    return guard('query', async () => {
      const committed = await this.committedImportIds(options);
      const items = await this.queryPartition(query, options);
      return items.filter((item) => committed.has(item.importId)).map(toRecord);
    });
  }

  async count(query: SightingQuery = {}, options: QueryOptions = {}): Promise<number> {
    return (await this.query(query, options)).length;
  }

  async getById(id: string): Promise<SightingRecord | null> {
    return guard('getById', async () => {
      const item = await getItem<StoredSighting>({ TableName: this.table, Key: sightingKey(id) });
      if (!item) return null;
      const manifest = await getItem<StoredManifest>({ TableName: this.table, Key: importKey(item.importId) });
      if (manifest?.status !== ImportStatus.COMMITTED) return null;
      const floor = await getItem<StoredFloor>({ TableName: this.table, Key: FLOOR_KEY });
      return isVisible(manifest, floor?.floor) ? toRecord(item) : null;
    });
  }

  async earliestDate(
    query: Omit<SightingQuery, 'startDate' | 'endDate'>,
    options: QueryOptions = {}
  ): Promise<string | null> {
    return guard('earliestDate', async () => {
      const committed = await this.committedImportIds(options);
      let exclusiveStartKey: Record<string, unknown> | undefined;

      do {
        options.deadline?.check('storage');
        const { items, lastEvaluatedKey } = await queryItems<StoredSighting>({
          TableName: this.table,
          IndexName: 'GSI1',
          ...this.conditions(query),
          ScanIndexForward: true,
          Limit: 100,
          ExclusiveStartKey: exclusiveStartKey,
        });
        const first = items.find((item) => committed.has(item.importId));
        if (first) return first.date;
        exclusiveStartKey = lastEvaluatedKey;
      } while (exclusiveStartKey);

      return null;
    });
  }

  async insertBatch(batch: ImportBatch): Promise<ImportManifest> {
    const manifest: ImportManifest = {
      importId: batch.importId,
      source: batch.source,
      status: ImportStatus.PENDING,
      recordCount: batch.records.length,
      startedAt: batch.startedAt,
    };

    await guard('insertBatch', () =>
      putItem({
        TableName: this.table,
        Item: {
          ...importKey(batch.importId),
          GSI1PK: IMPORTS_PARTITION,
          GSI1SK: importSortKey(batch),
          ...manifest,
        },
        ConditionExpression: 'attribute_not_exists(PK)',
      })
    );

    const puts: WriteRequest[] = batch.records.map((record) => ({
      PutRequest: {
        Item: {
          ...sightingKey(record.id),
          GSI1PK: SIGHTINGS_PARTITION,
          GSI1SK: `DATE#${record.date}#${record.id}`,
          ...record,
          ...recordKeys(record),
        },
      },
    }));

    const floor = importSortKey(batch);
    let committedAt = '';
    try {
      await batchWriteAll(this.table, puts);
      committedAt = new Date().toISOString();
      const commit = {
        TableName: this.table,
        Key: importKey(batch.importId),
        UpdateExpression: 'SET #status = :committed, committedAt = :committedAt',
        ConditionExpression: '#status = :pending',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':committed': ImportStatus.COMMITTED,
          ':pending': ImportStatus.PENDING,
          ':committedAt': committedAt,
        },
      };

      if (batch.replace) {
        await transactWrite({
          TransactItems: [
            { Update: commit },
            {
              Put: {
                TableName: this.table,
                Item: { ...FLOOR_KEY, GSI1PK: IMPORTS_PARTITION, GSI1SK: 'FLOOR', kind: 'floor', floor },
              },
            },
          ],
        });
      } else {
        await updateItem(commit);
      }
    } catch (error) {
      logger.error({ error, importId: batch.importId }, 'Import write failed, aborting');
      await this.abort(batch);
      throw new StorageError('insertBatch', error);
    }

    if (batch.replace) await this.pruneBelow(floor);
    return { ...manifest, status: ImportStatus.COMMITTED, committedAt };
  }

  // Imports below the floor are already hidden, so a failed prune leaves
  // orphans but never changes what readers see
  private async pruneBelow(floor: string): Promise<void> {
    try {
      const superseded = new Set<string>();
      const manifestKeys: Array<{ PK: string; SK: string }> = [];
      for (const item of await this.partitionItems<StoredManifest | StoredFloor>(IMPORTS_PARTITION)) {
        if ('floor' in item || item.GSI1SK >= floor) continue;
        superseded.add(item.importId);
        manifestKeys.push({ PK: item.PK, SK: item.SK });
      }
      if (superseded.size === 0) return;

      const sightingKeys = (await this.partitionItems<StoredSighting>(SIGHTINGS_PARTITION))
        .filter((item) => superseded.has(item.importId))
        .map(({ PK, SK }) => ({ PK, SK }));
      await batchWriteAll(
        this.table,
        [...sightingKeys, ...manifestKeys].map((Key) => ({ DeleteRequest: { Key } }))
      );
      logger.info({ imports: superseded.size, sightings: sightingKeys.length }, 'Pruned superseded imports');
    } catch (pruneError) {
      logger.error({ error: pruneError, floor }, 'Failed to prune superseded imports');
    }
  }

  // Staged records are invisible while the manifest is not COMMITTED, so a
  // failed cleanup leaves orphans but never partial data
  private async abort(batch: ImportBatch): Promise<void> {
    try {
      await updateItem({
        TableName: this.table,
        Key: importKey(batch.importId),
        UpdateExpression: 'SET #status = :aborted',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: { ':aborted': ImportStatus.ABORTED },
      });
      await batchWriteAll(
        this.table,
        batch.records.map((record) => ({ DeleteRequest: { Key: sightingKey(record.id) } }))
      );
    } catch (cleanupError) {
      logger.error({ error: cleanupError, importId: batch.importId }, 'Failed to clean up aborted import');
    }
  }

  private conditions(query: SightingQuery): {
    KeyConditionExpression: string;
    FilterExpression?: string;
    ExpressionAttributeValues: Record<string, unknown>;
  } {
    const values: Record<string, unknown> = { ':pk': SIGHTINGS_PARTITION };
    let keyCondition = 'GSI1PK = :pk';

    if (query.startDate && query.endDate) {
      keyCondition += ' AND GSI1SK BETWEEN :from AND :to';
      values[':from'] = `DATE#${query.startDate}`;
      values[':to'] = `DATE#${query.endDate}#${SORT_KEY_CEILING}`;
    } else if (query.startDate) {
      keyCondition += ' AND GSI1SK >= :from';
      values[':from'] = `DATE#${query.startDate}`;
    } else if (query.endDate) {
      keyCondition += ' AND GSI1SK <= :to';
      values[':to'] = `DATE#${query.endDate}#${SORT_KEY_CEILING}`;
    }

    const filters: string[] = [];
    if (query.locationKey !== undefined) {
      filters.push('locationKey = :locationKey');
      values[':locationKey'] = query.locationKey;
    }
    if (query.speciesKey !== undefined) {
      filters.push('speciesKey = :speciesKey');
      values[':speciesKey'] = query.speciesKey;
    }

    return {
      KeyConditionExpression: keyCondition,
      ...(filters.length > 0 && { FilterExpression: filters.join(' AND ') }),
      ExpressionAttributeValues: values,
    };
  }

  private async queryPartition(query: SightingQuery, options: QueryOptions): Promise<StoredSighting[]> {
    const results: StoredSighting[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      options.deadline?.check('storage');
      const { items, lastEvaluatedKey } = await queryItems<StoredSighting>({
        TableName: this.table,
        IndexName: 'GSI1',
        ...this.conditions(query),
        ScanIndexForward: true,
        ExclusiveStartKey: exclusiveStartKey,
      });
      results.push(...items);
      exclusiveStartKey = lastEvaluatedKey;
    } while (exclusiveStartKey);

    return results;
  }

  private async committedImportIds(options: QueryOptions): Promise<Set<string>> {
    const manifests: StoredManifest[] = [];
    let floor: string | undefined;
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      options.deadline?.check('storage');
      const { items, lastEvaluatedKey } = await queryItems<StoredManifest | StoredFloor>({
        TableName: this.table,
        IndexName: 'GSI1',
        KeyConditionExpression: 'GSI1PK = :pk',
        FilterExpression: '#status = :committed OR #kind = :floor',
        ExpressionAttributeNames: { '#status': 'status', '#kind': 'kind' },
        ExpressionAttributeValues: {
          ':pk': IMPORTS_PARTITION,
          ':committed': ImportStatus.COMMITTED,
          ':floor': 'floor',
        },
        ExclusiveStartKey: exclusiveStartKey,
      });
      for (const item of items) {
        if ('floor' in item) floor = item.floor;
        else manifests.push(item);
      }
      exclusiveStartKey = lastEvaluatedKey;
    } while (exclusiveStartKey);

    return new Set(manifests.filter((m) => isVisible(m, floor)).map((m) => m.importId));
  }

  private async partitionItems<T>(partition: string): Promise<T[]> {
    const results: T[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const { items, lastEvaluatedKey } = await queryItems<T>({
        TableName: this.table,
        IndexName: 'GSI1',
        KeyConditionExpression: 'GSI1PK = :pk',
        ExpressionAttributeValues: { ':pk': partition },
        ExclusiveStartKey: exclusiveStartKey,
      });
      results.push(...items);
      exclusiveStartKey = lastEvaluatedKey;
    } while (exclusiveStartKey);

    return results;
  }
}
