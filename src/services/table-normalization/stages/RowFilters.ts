import { RawRow, RawTable } from '../../../types/accountingTable';
import { EXCLUDED_ITEM_NAME, TRAILER_PREFIX } from '../../../constants/canonicalColumns';
import { StringUtils } from '../../../utils/stringUtils';

export interface TruncationResult {
  table: RawTable;
  /** Index of the trailer row, null when the table has no trailer */
  trailerRowIndex: number | null;
}

export interface ExclusionResult {
  table: RawTable;
  excluded: number;
}

/**
 * Row-level filters applied while normalizing a table
 */
export class RowFilters {
  static isBlankRow(row: RawRow): boolean {
    return row.every((cell) => StringUtils.isBlank(cell));
  }

  /**
   * Drops rows whose cells are all empty
   */
  static removeBlankRows(rows: RawTable): RawTable {
    return rows.filter((row) => !this.isBlankRow(row));
  }

  /**
   * Drops the "Vypracoval:" row and everything after it
   */
  static truncateTrailer(rows: RawTable): TruncationResult {
    const index = rows.findIndex((row) => StringUtils.clean(row[0]).startsWith(TRAILER_PREFIX));
    if (index === -1) {
      return { table: rows, trailerRowIndex: null };
    }
    return { table: rows.slice(0, index), trailerRowIndex: index };
  }

  /**
   * Drops rows whose item name is the excluded label (case-insensitive)
   */
  static excludeNamedRows(rows: RawTable, name = EXCLUDED_ITEM_NAME): ExclusionResult {
    const target = name.toLowerCase();
    const table = rows.filter((row) => StringUtils.clean(row[0]).toLowerCase() !== target);
    return { table, excluded: rows.length - table.length };
  }
}
