import { basename } from 'node:path';
import { isValid, parse } from 'date-fns';
import { monotonicFactory } from 'ulid';
import {
  RejectionReason,
  WarningKind,
  type IngestionSummary,
  type IngestionWarning,
  type RowRejection,
  type SightingRecord,
} from '@tickwatch/shared';
import { isDateKey, toDateKey, todayKey } from '../dates.js';
import { IngestionError } from '../errors.js';
import { createRunLogger, type Logger } from '../logger.js';
import { canonicalLocation, matchKey } from '../normalize.js';
import type { SightingRepository } from '../repositories/types.js';
import type { AnalyticsSettings } from '../settings.js';
import { readSheet, type RawCell, type SheetRow } from '../tabular.js';

export type SightingField = 'date' | 'location' | 'species' | 'latinName' | 'sourceId' | 'habitat' | 'host';

const REQUIRED_FIELDS = ['date', 'location', 'species'] as const satisfies readonly SightingField[];

// Header spellings per field, compared after matchKey
const COLUMN_ALIASES: Record<SightingField, readonly string[]> = {
  date: ['date', 'sightingdate', 'dateofsighting'],
  location: ['location', 'region', 'city', 'area'],
  species: ['species', 'speciesname', 'commonname'],
  latinName: ['latinname', 'scientificname'],
  sourceId: ['id', 'sightingid', 'recordid'],
  habitat: ['habitat'],
  host: ['host', 'hostanimal'],
};

export type ColumnMap = Partial<Record<SightingField, number>>;

// Day-first numeric formats; month names in English
const TEXT_DATE_FORMATS = [
  'yyyy/M/d',
  'd/M/yyyy',
  'd-M-yyyy',
  'd.M.yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
] as const;

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ]\d{2}:\d{2}.*)?$/;
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 86_400_000;
// 9999-12-31 as an Excel serial
const MAX_EXCEL_SERIAL = 2_958_465;

export interface IngestDeps {
  repository: SightingRepository;
  settings: AnalyticsSettings;
  // Earlier imports stay visible until this one commits
  reset?: boolean;
  dryRun?: boolean;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

/**
 * Locate each known field's column. Unknown headers are ignored; the first
 * column matching a field wins.
 */
export function mapColumns(header: readonly string[]): ColumnMap {
  const columns: ColumnMap = {};
  header.forEach((name, index) => {
    const key = matchKey(name);
    for (const [field, aliases] of Object.entries(COLUMN_ALIASES)) {
      if (isSightingField(field) && columns[field] === undefined && aliases.includes(key)) {
        columns[field] = index;
      }
    }
  });

  const missingColumns = REQUIRED_FIELDS.filter((field) => columns[field] === undefined);
  if (missingColumns.length > 0) {
    throw new IngestionError('unreadable-source', `Missing required columns: ${missingColumns.join(', ')}`, {
      missingColumns,
    });
  }
  return columns;
}

function isSightingField(value: string): value is SightingField {
  return Object.hasOwn(COLUMN_ALIASES, value);
}

function utcDateKey(date: Date): string | null {
  const key = [
    String(date.getUTCFullYear()).padStart(4, '0'),
    String(date.getUTCMonth() + 1).padStart(2, '0'),
    String(date.getUTCDate()).padStart(2, '0'),
  ].join('-');
  return isDateKey(key) ? key : null;
}

/** Calendar date of a spreadsheet cell as YYYY-MM-DD, or null if unparseable */
export function parseSightingDate(cell: RawCell): string | null {
  if (cell === null) return null;

  // Spreadsheet dates arrive as UTC midnight
  if (cell instanceof Date) return utcDateKey(cell);

  if (typeof cell === 'number') {
    if (cell < 1 || cell > MAX_EXCEL_SERIAL) return null;
    return utcDateKey(new Date(EXCEL_EPOCH_MS + Math.floor(cell) * MS_PER_DAY));
  }

  const iso = ISO_DATE_PREFIX.exec(cell);
  if (iso?.[1] !== undefined) {
    return isDateKey(iso[1]) ? iso[1] : null;
  }

  const reference = new Date(2000, 0, 1);
  for (const pattern of TEXT_DATE_FORMATS) {
    const parsed = parse(cell, pattern, reference);
    if (isValid(parsed)) return toDateKey(parsed);
  }
  return null;
}

function cellText(cell: RawCell | undefined): string | null {
  if (cell === null || cell === undefined) return null;
  if (cell instanceof Date) return utcDateKey(cell);
  const text = String(cell).trim();
  return text === '' ? null : text;
}

export interface ParsedRows {
  records: SightingRecord[];
  rejections: RowRejection[];
  warnings: IngestionWarning[];
}

/**
 * Validate and normalise data rows into sighting records. Pure apart from
 * id generation; nothing is written.
 */
export function parseRows(
  rows: readonly SheetRow[],
  columns: ColumnMap,
  context: {
    settings: AnalyticsSettings;
    importId: string;
    today: string;
    generateId: () => string;
  }
): ParsedRows {
  const { settings, importId, today, generateId } = context;
  const records: SightingRecord[] = [];
  const rejections: RowRejection[] = [];
  const warnings: IngestionWarning[] = [];
  const acceptedSourceIds = new Set<string>();

  const read = (row: SheetRow, field: SightingField): RawCell => {
    const index = columns[field];
    return index === undefined ? null : row.cells[index] ?? null;
  };

  for (const row of rows) {
    const reject = (reason: RejectionReason, field?: SightingField, value?: RawCell): void => {
      rejections.push({
        row: row.rowNumber,
        reason,
        ...(field && { field }),
        ...(value !== undefined && value !== null && { value: cellText(value) ?? String(value) }),
      });
    };

    const missing = REQUIRED_FIELDS.find((field) => cellText(read(row, field)) === null);
    if (missing) {
      reject(RejectionReason.MISSING_FIELD, missing);
      continue;
    }

    const rawDate = read(row, 'date');
    const date = parseSightingDate(rawDate);
    if (date === null) {
      reject(RejectionReason.UNPARSEABLE_DATE, 'date', rawDate);
      continue;
    }
    if (date > today) {
      reject(RejectionReason.FUTURE_DATE, 'date', date);
      continue;
    }
    if (date < settings.earliestSightingDate) {
      reject(RejectionReason.IMPLAUSIBLE_DATE, 'date', date);
      continue;
    }

    const sourceId = cellText(read(row, 'sourceId'));
    if (sourceId !== null && acceptedSourceIds.has(sourceId)) {
      reject(RejectionReason.DUPLICATE_ID, 'sourceId', sourceId);
      continue;
    }

    const rawSpecies = cellText(read(row, 'species')) ?? '';
    const species = settings.species.resolve(rawSpecies);
    if (!species.recognized) {
      warnings.push({ row: row.rowNumber, kind: WarningKind.UNRECOGNIZED_SPECIES, value: rawSpecies });
    }

    const latinName = cellText(read(row, 'latinName')) ?? species.latinName;
    const habitat = cellText(read(row, 'habitat'));
    const host = cellText(read(row, 'host'));

    if (sourceId !== null) acceptedSourceIds.add(sourceId);
    records.push({
      id: generateId(),
      date,
      location: canonicalLocation(cellText(read(row, 'location')) ?? ''),
      species: species.species,
      ...(latinName && { latinName }),
      ...(habitat && { habitat }),
      ...(host && { host }),
      ...(sourceId && { sourceId }),
      importId,
    });
  }

  return { records, rejections, warnings };
}

function countReasons(rejections: readonly RowRejection[]): IngestionSummary['rejectionCounts'] {
  const counts: IngestionSummary['rejectionCounts'] = {};
  for (const { reason } of rejections) {
    counts[reason] = (counts[reason] ?? 0) + 1;
  }
  return counts;
}

/**
 * Read a spreadsheet of sightings, validate every row and commit the
 * accepted ones as one import. Rejected rows are reported, not fatal; a file
 * with no acceptable row fails with `no-valid-rows`.
 */
export async function ingestFile(path: string, deps: IngestDeps): Promise<IngestionSummary> {
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? monotonicFactory();
  const dryRun = deps.dryRun ?? false;

  const startedAt = now().toISOString();
  const importId = generateId();
  const source = basename(path);
  const log = deps.logger ?? createRunLogger(importId, source);

  log.info({ path, dryRun, reset: deps.reset ?? false }, 'Ingestion started');

  const sheet = await readSheet(path);
  const columns = mapColumns(sheet.header);
  const { records, rejections, warnings } = parseRows(sheet.rows, columns, {
    settings: deps.settings,
    importId,
    today: todayKey(now()),
    generateId,
  });
  const rejectionCounts = countReasons(rejections);

  if (records.length === 0) {
    log.warn({ totalRows: sheet.rows.length, rejectionCounts }, 'No valid rows');
    throw new IngestionError('no-valid-rows', `No valid rows in ${source}`, {
      totalRows: sheet.rows.length,
      rejectionCounts,
    });
  }

  if (!dryRun) {
    const replace = deps.reset ?? false;
    await deps.repository.insertBatch({ importId, source, startedAt, records, replace });
    if (replace) log.info('Earlier imports replaced');
  }

  const summary: IngestionSummary = {
    importId,
    source,
    startedAt,
    completedAt: now().toISOString(),
    totalRows: sheet.rows.length,
    accepted: records.length,
    rejected: rejections.length,
    rejections,
    rejectionCounts,
    warnings,
    dryRun,
  };

  log.info(
    { accepted: summary.accepted, rejected: summary.rejected, warnings: warnings.length },
    dryRun ? 'Dry run complete' : 'Ingestion committed'
  );
  return summary;
}
