import { logger } from '../../config/logger';
import {
  NormalizationReport,
  NormalizationResult,
  NormalizedTable,
  RawTable,
} from '../../types/accountingTable';
import { HeaderLocator } from './stages/HeaderLocator';
import { ColumnProjector } from './stages/ColumnProjector';
import { NumericNormalizer } from './stages/NumericNormalizer';
import { RowFilters } from './stages/RowFilters';
import { SummaryFolder } from './stages/SummaryFolder';

export interface NormalizeOptions {
  /** Separator used when header detection joins a row's cells */
  separator?: string;
}

/**
 * Turns a raw accounting export into a normalized table
 * Orchestrates the cleaning pipeline; every stage returns a new table
 */
export class TableNormalizer {
  static normalize(rows: RawTable, options: NormalizeOptions = {}): NormalizationResult {
    // Step 1: Locate the header and drop the preamble
    const headerIndex = HeaderLocator.locate(rows, options.separator);
    let table = rows.slice(headerIndex);
    logger.info(`Header found at row ${headerIndex + 1}`);

    // Step 2: Keep only the canonical columns
    const projection = ColumnProjector.project(table);
    table = projection.table;
    if (projection.applied) {
      logger.info(`Kept columns: ${projection.keptColumns.map((c) => c.label).join(', ')}`);
    } else {
      logger.warn('No canonical column recognized in the header, columns left unchanged');
    }

    // Step 3: Strip spaces from account and code columns
    table = NumericNormalizer.normalize(table);

    // Step 4: Drop blank rows
    const beforeBlank = table.length;
    table = RowFilters.removeBlankRows(table);
    const blankRowsRemoved = beforeBlank - table.length;

    // Step 5: Cut the trailer
    const truncation = RowFilters.truncateTrailer(table);
    table = truncation.table;
    if (truncation.trailerRowIndex !== null) {
      logger.info(`Trailer removed from row ${truncation.trailerRowIndex + 1}`);
    }

    // Step 6: Fold summary rows
    const folded = SummaryFolder.fold(table);
    table = folded.table;
    logger.info(
      `Summary rows removed: ${folded.removedSummaryRows}, names filled: ${folded.filledNames}`
    );

    // Step 7: Drop excluded items
    const exclusion = RowFilters.excludeNamedRows(table);
    table = exclusion.table;
    if (exclusion.excluded > 0) {
      logger.info(`Excluded rows: ${exclusion.excluded}`);
    }

    const normalized = this.toNormalizedTable(table);

    const report: NormalizationReport = {
      rowsBeforeHeader: headerIndex,
      projectionApplied: projection.applied,
      keptColumns: projection.keptColumns,
      blankRowsRemoved,
      trailerRowIndex: truncation.trailerRowIndex,
      filledNames: folded.filledNames,
      removedSummaryRows: folded.removedSummaryRows,
      removedTrailingSummary: folded.removedTrailingSummary,
      excludedRows: exclusion.excluded,
      rowCount: normalized.rows.length,
    };

    logger.info(`Normalization completed: ${report.rowCount} data rows`);

    return { table: normalized, report };
  }

  /**
   * Splits header and data rows
   */
  static toNormalizedTable(rows: RawTable): NormalizedTable {
    if (rows.length === 0) {
      return { header: [], rows: [] };
    }
    const [header, ...data] = rows;
    return { header, rows: data };
  }
}
