export type DiffType = 'MISSING_TABLE' | 'EXTRA_TABLE' | 'MISSING_COLUMN' | 'EXTRA_COLUMN' | 'COLUMN_MISMATCH';

export interface SchemaDiff {
  type: DiffType;
  table: string;
  /** Empty for table-level differences. */
  column: string;
  details: string;
  db1: string;
  db2: string;
}

export interface PairSummary {
  db1: string;
  db2: string;
  count: number;
}

export type ReportFormat = 'csv' | 'xlsx';
