import { stat } from 'node:fs/promises';
import { extname } from 'node:path';
import ExcelJS, { type Worksheet } from 'exceljs';
import { IngestionError } from './errors.js';

/** A cell reduced to what row parsing needs; blank cells are null */
export type RawCell = string | number | Date | null;

export interface SheetRow {
  /** 1-based row number as shown in a spreadsheet; the header is row 1 */
  rowNumber: number;
  cells: RawCell[];
}

export interface Sheet {
  header: string[];
  rows: SheetRow[];
}

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.csv'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupported(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

export function toRawCell(value: unknown): RawCell {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'object') {
    if ('richText' in value && Array.isArray(value.richText)) {
      const parts: unknown[] = value.richText;
      return toRawCell(
        parts.map((part) => (typeof part === 'object' && part !== null && 'text' in part ? String(part.text) : '')).join('')
      );
    }
    // Hyperlink cells carry their display text
    if ('text' in value) return toRawCell(value.text);
    // Formula cells carry their cached result
    if ('result' in value) return toRawCell(value.result);
  }
  // Error values (#N/A, #REF!) and anything else read as blank
  return null;
}

async function loadWorksheet(path: string, extension: SupportedExtension): Promise<Worksheet | undefined> {
  const workbook = new ExcelJS.Workbook();
  if (extension === '.csv') {
    // Keep every CSV value as text; date and number parsing happens per row
    return workbook.csv.readFile(path, { map: (value: unknown) => value });
  }
  await workbook.xlsx.readFile(path);
  return workbook.worksheets[0];
}

/**
 * Read the first worksheet of an .xlsx file, or a .csv file, into a header
 * and data rows. Rows with no non-blank cell are dropped.
 */
export async function readSheet(path: string): Promise<Sheet> {
  const extension = extname(path).toLowerCase();
  if (!isSupported(extension)) {
    throw new IngestionError('unsupported-format', `Unsupported file format: ${extension || '(none)'}`, {
      extension,
      supported: [...SUPPORTED_EXTENSIONS],
    });
  }

  const info = await stat(path).catch(() => null);
  if (!info?.isFile()) {
    throw new IngestionError('source-not-found', `Source file not found: ${path}`, { path });
  }

  let worksheet: Worksheet | undefined;
  try {
    worksheet = await loadWorksheet(path, extension);
  } catch (error) {
    throw new IngestionError('unreadable-source', `Could not read ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (!worksheet) {
    throw new IngestionError('unreadable-source', `No worksheet found in ${path}`, { path });
  }

  const columnCount = worksheet.columnCount;
  const header: string[] = [];
  const rows: SheetRow[] = [];

  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    const cells: RawCell[] = [];
    for (let col = 1; col <= columnCount; col++) {
      cells.push(toRawCell(row.getCell(col).value));
    }
    if (rowNumber === 1) {
      header.push(...cells.map((cell) => (cell === null ? '' : String(cell))));
      return;
    }
    if (cells.some((cell) => cell !== null)) {
      rows.push({ rowNumber, cells });
    }
  });

  if (header.every((name) => name === '')) {
    throw new IngestionError('unreadable-source', `No header row found in ${path}`, { path });
  }

  return { header, rows };
}
