/**
 * Row of a delimited file as read, without any schema
 */
export type RawRow = string[];

/**
 * Rows of a delimited file; rows may have different lengths
 */
export type RawTable = RawRow[];

/**
 * The six accounting columns the converter understands
 */
export enum CanonicalColumn {
  NAME = 'NAME',
  DEBIT_ACCOUNT = 'DEBIT_ACCOUNT',
  CREDIT_ACCOUNT = 'CREDIT_ACCOUNT',
  COST_CENTER = 'COST_CENTER',
  ORDER = 'ORDER',
  ACTIVITY = 'ACTIVITY',
}

/**
 * Source column kept by the projector
 */
export interface KeptColumn {
  sourceIndex: number;
  label: string;
  column: CanonicalColumn;
}

/**
 * Cleaned table: header labels plus data rows, ready for document assembly
 */
export interface NormalizedTable {
  header: string[];
  rows: string[][];
}

/**
 * Counts collected while normalizing a table (reporting only)
 */
export interface NormalizationReport {
  rowsBeforeHeader: number;
  projectionApplied: boolean;
  keptColumns: KeptColumn[];
  blankRowsRemoved: number;
  trailerRowIndex: number | null;
  filledNames: number;
  removedSummaryRows: number;
  removedTrailingSummary: boolean;
  excludedRows: number;
  rowCount: number;
}

export interface NormalizationResult {
  table: NormalizedTable;
  report: NormalizationReport;
}
