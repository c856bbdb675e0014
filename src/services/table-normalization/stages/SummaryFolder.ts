import { CanonicalColumn, RawRow, RawTable } from '../../../types/accountingTable';
import { headerMatchesColumn } from '../../../constants/canonicalColumns';
import { StringUtils } from '../../../utils/stringUtils';

/**
 * Summary row shapes found in the exports
 * - GROUP_TOTAL: only the name and the activity cell are filled; the name labels the
 *   rows that follow
 * - TOTAL: only the activity cell is filled
 */
export type SummaryKind = 'GROUP_TOTAL' | 'TOTAL';

/**
 * State carried through one folding pass
 */
export interface FoldState {
  pendingGroupName: string | null;
}

export interface FoldResult {
  table: RawTable;
  filledNames: number;
  removedSummaryRows: number;
  removedTrailingSummary: boolean;
}

type RowStep =
  | { kind: 'drop'; state: FoldState }
  | { kind: 'emit'; row: RawRow; filled: boolean; state: FoldState };

export const INITIAL_FOLD_STATE: FoldState = { pendingGroupName: null };

/**
 * Removes subtotal rows and forward-fills group names into rows with a blank name
 */
export class SummaryFolder {
  /**
   * Activity column index; falls back to the last column when no header matches
   */
  static findActivityColumn(header: string[]): number {
    const index = header.findIndex((cell) => headerMatchesColumn(cell, CanonicalColumn.ACTIVITY));
    if (index !== -1) {
      return index;
    }
    return header.length > 0 ? header.length - 1 : 0;
  }

  static classify(row: RawRow, activityIndex: number): SummaryKind | null {
    const filled = new Set<number>();
    row.forEach((cell, index) => {
      if (!StringUtils.isBlank(cell)) {
        filled.add(index);
      }
    });
    if (filled.size === 0) {
      return null;
    }

    const groupTotal = new Set([0, activityIndex]);
    if (this.sameIndexes(filled, groupTotal)) {
      return 'GROUP_TOTAL';
    }
    if (this.sameIndexes(filled, new Set([activityIndex]))) {
      return 'TOTAL';
    }
    return null;
  }

  /**
   * Folds a single data row into the state
   */
  static step(state: FoldState, row: RawRow, activityIndex: number): RowStep {
    const kind = this.classify(row, activityIndex);

    if (kind === 'GROUP_TOTAL') {
      return { kind: 'drop', state: { pendingGroupName: StringUtils.clean(row[0]) } };
    }
    if (kind === 'TOTAL') {
      // A bare total keeps the group open
      return { kind: 'drop', state };
    }

    const name = StringUtils.clean(row[0]);
    if (name === '') {
      if (state.pendingGroupName) {
        const filledRow = [...row];
        filledRow[0] = state.pendingGroupName;
        return { kind: 'emit', row: filledRow, filled: true, state };
      }
      return { kind: 'emit', row, filled: false, state };
    }

    return { kind: 'emit', row, filled: false, state: INITIAL_FOLD_STATE };
  }

  /**
   * Runs the fold over a table whose first row is the header
   */
  static fold(rows: RawTable): FoldResult {
    if (rows.length === 0) {
      return { table: rows, filledNames: 0, removedSummaryRows: 0, removedTrailingSummary: false };
    }

    const [header, ...dataRows] = rows;
    const activityIndex = this.findActivityColumn(header);

    const out: RawTable = [header];
    let state = INITIAL_FOLD_STATE;
    let filledNames = 0;
    let removedSummaryRows = 0;

    for (const row of dataRows) {
      const result = this.step(state, row, activityIndex);
      state = result.state;
      if (result.kind === 'drop') {
        removedSummaryRows++;
        continue;
      }
      if (result.filled) {
        filledNames++;
      }
      out.push(result.row);
    }

    // A summary row at the very end has nothing left to label
    let removedTrailingSummary = false;
    if (out.length > 1 && this.classify(out[out.length - 1], activityIndex) !== null) {
      out.pop();
      removedTrailingSummary = true;
      removedSummaryRows++;
    }

    return { table: out, filledNames, removedSummaryRows, removedTrailingSummary };
  }

  private static sameIndexes(a: Set<number>, b: Set<number>): boolean {
    return a.size === b.size && [...a].every((index) => b.has(index));
  }
}
