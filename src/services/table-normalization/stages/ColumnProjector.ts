import { KeptColumn, RawTable } from '../../../types/accountingTable';
import { classifyHeaderCell } from '../../../constants/canonicalColumns';

export interface ProjectionResult {
  table: RawTable;
  keptColumns: KeptColumn[];
  /** False when no header cell matched and the table was returned as is */
  applied: boolean;
}

/**
 * Reduces a table (header at row 0) to the canonical accounting columns
 */
export class ColumnProjector {
  /**
   * Keeps every source column whose header matches a canonical column, in source order
   * A canonical column may claim several source columns; nothing is deduplicated.
   */
  static project(rows: RawTable): ProjectionResult {
    if (rows.length === 0) {
      return { table: rows, keptColumns: [], applied: false };
    }

    const keptColumns: KeptColumn[] = [];
    rows[0].forEach((label, sourceIndex) => {
      const column = classifyHeaderCell(label);
      if (column) {
        keptColumns.push({ sourceIndex, label, column });
      }
    });

    // No recognizable column: leave the table untouched
    if (keptColumns.length === 0) {
      return { table: rows, keptColumns, applied: false };
    }

    const table = rows.map((row) =>
      keptColumns.map(({ sourceIndex }) => (sourceIndex < row.length ? row[sourceIndex] : ''))
    );

    return { table, keptColumns, applied: true };
  }
}
