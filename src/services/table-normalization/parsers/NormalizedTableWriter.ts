import Papa from 'papaparse';
import { config } from '../../../config/env';
import { NormalizedTable } from '../../../types/accountingTable';

/**
 * Writes a normalized table back to delimited text (header first, CRLF line endings)
 */
export class NormalizedTableWriter {
  static write(table: NormalizedTable, delimiter: string = config.conversion.outputDelimiter): string {
    const rows = table.header.length > 0 ? [table.header, ...table.rows] : table.rows;
    if (rows.length === 0) {
      return '';
    }

    const body = Papa.unparse(rows, {
      delimiter,
      newline: '\r\n',
      quotes: false,
      header: false,
    });
    return `${body}\r\n`;
  }
}
