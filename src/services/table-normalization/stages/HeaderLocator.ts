import { CanonicalColumn, RawTable } from '../../../types/accountingTable';
import { getColumnLabel } from '../../../constants/canonicalColumns';
import { HeaderNotFoundError } from '../../../errors';
import { StringUtils } from '../../../utils/stringUtils';

/**
 * Finds the row holding the accounting header inside an export with a preamble
 */
export class HeaderLocator {
  /**
   * Returns the index of the header row
   *
   * Strict pass: first cell is exactly "Názov" and the row mentions both account columns.
   * Loose pass (only when the strict pass finds nothing): the row mentions all three
   * labels anywhere.
   */
  static locate(rows: RawTable, separator = ';'): number {
    const nameLabel = getColumnLabel(CanonicalColumn.NAME);
    const debitLabel = getColumnLabel(CanonicalColumn.DEBIT_ACCOUNT);
    const creditLabel = getColumnLabel(CanonicalColumn.CREDIT_ACCOUNT);

    const strict = rows.findIndex((row) => {
      const joined = row.join(separator);
      return (
        row.length > 0 &&
        StringUtils.clean(row[0]) === nameLabel &&
        joined.includes(debitLabel) &&
        joined.includes(creditLabel)
      );
    });
    if (strict !== -1) {
      return strict;
    }

    const loose = rows.findIndex((row) => {
      const joined = row.join(separator);
      return joined.includes(nameLabel) && joined.includes(debitLabel) && joined.includes(creditLabel);
    });
    if (loose !== -1) {
      return loose;
    }

    throw new HeaderNotFoundError();
  }
}
