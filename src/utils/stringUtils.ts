/**
 * String utility functions for cleaning and matching table cells
 */

const NBSP = /\u00a0/g;
const COMBINING_MARKS = /[\u0300-\u036f]/g;

export class StringUtils {
  /**
   * Cleans a cell (replaces non-breaking spaces, trims)
   */
  static clean(value: string | null | undefined): string {
    if (value === null || value === undefined) {
      return '';
    }

    return value.replace(NBSP, ' ').trim();
  }

  /**
   * Checks if a cell is empty once cleaned
   */
  static isBlank(value: string | null | undefined): boolean {
    return this.clean(value) === '';
  }

  /**
   * Folds a cell for tolerant matching (cleaned, lower-cased, diacritics removed)
   */
  static fold(value: string | null | undefined): string {
    return this.clean(value).toLowerCase().normalize('NFKD').replace(COMBINING_MARKS, '');
  }

  /**
   * Checks if any of the patterns occurs in the already folded text
   */
  static containsAny(folded: string, patterns: readonly string[]): boolean {
    return patterns.some((pattern) => folded.includes(pattern));
  }

  /**
   * Removes every space, including non-breaking ones
   */
  static removeSpaces(value: string): string {
    return value.replace(NBSP, ' ').replace(/ /g, '');
  }
}
