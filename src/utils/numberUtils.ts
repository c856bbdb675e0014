/**
 * Number utility functions for amount cells
 */

export class NumberUtils {
  /**
   * Normalizes an amount cell without parsing it
   * "1 234,56" -> "1234.56"; a single comma with no period becomes the decimal point,
   * any other punctuation is passed through unchanged
   */
  static normalizeAmount(value: string | null | undefined): string {
    let str = (value ?? '').trim().replace(/ /g, '');

    const commas = str.split(',').length - 1;
    if (commas === 1 && !str.includes('.')) {
      str = str.replace(',', '.');
    }

    return str;
  }
}
