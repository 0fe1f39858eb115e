import type { ImportStatus, RejectionReason, WarningKind } from './enums.js';

export interface RowRejection {
  row: number;          // 1-based spreadsheet row, header is row 1
  reason: RejectionReason;
  field?: string;
  value?: string;
}

export interface IngestionWarning {
  row: number;
  kind: WarningKind;
  value: string;
}

export interface IngestionSummary {
  importId: string;
  source: string;
  startedAt: string;
  completedAt: string;
  totalRows: number;
  accepted: number;
  rejected: number;
  rejections: RowRejection[];
  rejectionCounts: Partial<Record<RejectionReason, number>>;
  warnings: IngestionWarning[];
  dryRun: boolean;
}

// Visibility gate for an ingestion run's records
export interface ImportManifest {
  importId: string;
  source: string;
  status: ImportStatus;
  recordCount: number;
  startedAt: string;
  committedAt?: string;
}
