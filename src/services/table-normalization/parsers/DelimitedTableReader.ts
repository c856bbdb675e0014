import Papa from 'papaparse';
import { logger } from '../../../config/logger';
import { CanonicalColumn, RawTable } from '../../../types/accountingTable';
import { getColumnDefinition } from '../../../constants/canonicalColumns';
import { StringUtils } from '../../../utils/stringUtils';

export interface ReadTableResult {
  rows: RawTable;
  delimiter: string;
}

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Reads a delimited export into raw rows without interpreting any header
 */
export class DelimitedTableReader {
  static readonly DELIMITERS_TO_GUESS = [',', ';', '\t', '|'];

  /**
   * Guesses the delimiter from the first line naming the "Názov" column onward
   * The preamble above it is free text and may hold any punctuation
   */
  static guessDelimiter(text: string): string {
    const namePatterns = getColumnDefinition(CanonicalColumn.NAME).patterns;
    const lines = text.split(LINE_BREAK);
    const headerLine = lines.findIndex((line) =>
      StringUtils.containsAny(StringUtils.fold(line), namePatterns)
    );
    const sample = headerLine > 0 ? lines.slice(headerLine).join('\n') : text;

    const result = Papa.parse<string[]>(sample, {
      delimiter: '',
      delimitersToGuess: this.DELIMITERS_TO_GUESS,
      preview: 20,
    });
    if (result.errors.some((error) => error.code === 'UndetectableDelimiter')) {
      logger.warn(`Could not detect the delimiter, using ${JSON.stringify(result.meta.delimiter)}`);
    }
    return result.meta.delimiter;
  }

  /**
   * Parses text into rows; the delimiter is guessed unless one is forced
   */
  static read(text: string, forcedDelimiter?: string): ReadTableResult {
    const delimiter = forcedDelimiter ?? this.guessDelimiter(text);

    const result = Papa.parse<string[]>(text, {
      header: false,
      dynamicTyping: false,
      skipEmptyLines: false,
      delimiter,
    });

    for (const error of result.errors) {
      logger.warn(`CSV read warning (row ${error.row ?? '?'}): ${error.code} ${error.message}`);
    }

    logger.info(`Read ${result.data.length} rows with delimiter ${JSON.stringify(delimiter)}`);

    return { rows: result.data, delimiter };
  }
}
