import { logger } from '../../config/logger';
import { CanonicalColumn, NormalizedTable } from '../../types/accountingTable';
import {
  AccountingDocument,
  DocumentAttributes,
  LineItem,
  LineItemSide,
} from '../../types/accountingDocument';
import { CANONICAL_COLUMNS, classifyHeaderCell, getColumnLabel } from '../../constants/canonicalColumns';
import { MissingRequiredColumnsError } from '../../errors';
import { NumberUtils } from '../../utils/numberUtils';

type ColumnIndexes = Record<CanonicalColumn, number>;

/**
 * Builds an accounting document from a normalized table
 *
 * Each row yields a debit item (account from "Účet MD") and a credit item
 * (account from "Účet Dal"). All debit items come first, then all credit items,
 * both in row order.
 */
export class DocumentAssembler {
  /**
   * Resolves the index of every canonical column in the header
   */
  static resolveColumns(header: string[]): ColumnIndexes {
    const found = new Map<CanonicalColumn, number>();
    header.forEach((cell, index) => {
      const column = classifyHeaderCell(cell);
      if (column && !found.has(column)) {
        found.set(column, index);
      }
    });

    const missing = CANONICAL_COLUMNS.filter((definition) => !found.has(definition.column));
    if (missing.length > 0) {
      throw new MissingRequiredColumnsError(
        missing.map((definition) => definition.label),
        header
      );
    }

    const indexOf = (column: CanonicalColumn): number => {
      const index = found.get(column);
      if (index === undefined) {
        throw new MissingRequiredColumnsError([getColumnLabel(column)], header);
      }
      return index;
    };

    return {
      [CanonicalColumn.NAME]: indexOf(CanonicalColumn.NAME),
      [CanonicalColumn.DEBIT_ACCOUNT]: indexOf(CanonicalColumn.DEBIT_ACCOUNT),
      [CanonicalColumn.CREDIT_ACCOUNT]: indexOf(CanonicalColumn.CREDIT_ACCOUNT),
      [CanonicalColumn.COST_CENTER]: indexOf(CanonicalColumn.COST_CENTER),
      [CanonicalColumn.ORDER]: indexOf(CanonicalColumn.ORDER),
      [CanonicalColumn.ACTIVITY]: indexOf(CanonicalColumn.ACTIVITY),
    };
  }

  static assemble(table: NormalizedTable, attributes: DocumentAttributes): AccountingDocument {
    const columns = this.resolveColumns(table.header);

    const debitItems: LineItem[] = [];
    const creditItems: LineItem[] = [];

    for (const row of table.rows) {
      const cell = (column: CanonicalColumn): string => (row[columns[column]] ?? '').trim();

      const shared = {
        amount: NumberUtils.normalizeAmount(row[columns[CanonicalColumn.ACTIVITY]]),
        costCenter: cell(CanonicalColumn.COST_CENTER),
        order: cell(CanonicalColumn.ORDER),
        itemText: cell(CanonicalColumn.NAME),
      };

      debitItems.push({
        ...shared,
        account: cell(CanonicalColumn.DEBIT_ACCOUNT),
        side: LineItemSide.DEBIT,
      });
      creditItems.push({
        ...shared,
        account: cell(CanonicalColumn.CREDIT_ACCOUNT),
        side: LineItemSide.CREDIT,
      });
    }

    logger.info(
      `Assembled document ${attributes.documentNumber || '(no number)'} with ${table.rows.length * 2} items`
    );

    return {
      attributes: {
        documentNumber: attributes.documentNumber.trim(),
        documentDate: attributes.documentDate.trim(),
        mandateId: attributes.mandateId.trim(),
        documentKind: attributes.documentKind.trim(),
        documentType: attributes.documentType.trim(),
        documentText: attributes.documentText.trim(),
      },
      items: [...debitItems, ...creditItems],
    };
  }
}
