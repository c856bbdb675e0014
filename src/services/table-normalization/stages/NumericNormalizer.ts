import { RawTable } from '../../../types/accountingTable';
import { NUMERIC_HEADER_PATTERNS } from '../../../constants/canonicalColumns';
import { StringUtils } from '../../../utils/stringUtils';

/**
 * Strips spaces out of account and code columns ("1 234 567" -> "1234567")
 */
export class NumericNormalizer {
  /**
   * Indexes of header cells that belong to a numeric column
   */
  static findNumericColumns(header: string[]): number[] {
    const indexes: number[] = [];
    header.forEach((cell, index) => {
      if (StringUtils.containsAny(StringUtils.fold(cell), NUMERIC_HEADER_PATTERNS)) {
        indexes.push(index);
      }
    });
    return indexes;
  }

  static normalize(rows: RawTable): RawTable {
    if (rows.length === 0) {
      return rows;
    }

    const [header, ...dataRows] = rows;
    const numericIndexes = this.findNumericColumns(header);

    const cleaned = dataRows.map((row) => {
      const copy = [...row];
      for (const index of numericIndexes) {
        if (index < copy.length) {
          copy[index] = StringUtils.removeSpaces(copy[index]);
        }
      }
      return copy;
    });

    return [header, ...cleaned];
  }
}
