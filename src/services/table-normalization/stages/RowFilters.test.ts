import { describe, expect, it } from 'vitest';

import { RowFilters } from './RowFilters';
import { CANONICAL_HEADER } from '../../../test/fixtures';

describe('RowFilters', () => {
  describe('removeBlankRows', () => {
    it('drops rows with only empty or whitespace cells', () => {
      const rows = [CANONICAL_HEADER, ['', ' ', '\u00a0'], [], ['Mzdy']];

      expect(RowFilters.removeBlankRows(rows)).toEqual([CANONICAL_HEADER, ['Mzdy']]);
    });
  });

  describe('truncateTrailer', () => {
    it('drops the trailer row and everything after it', () => {
      const rows = [CANONICAL_HEADER, ['Mzdy'], ['  Vypracoval: J. Nováková'], ['Schválil']];

      const result = RowFilters.truncateTrailer(rows);

      expect(result.table).toEqual([CANONICAL_HEADER, ['Mzdy']]);
      expect(result.trailerRowIndex).toBe(2);
    });

    it('leaves a table without trailer unchanged', () => {
      const rows = [CANONICAL_HEADER, ['Mzdy', 'Vypracoval:']];

      const result = RowFilters.truncateTrailer(rows);

      expect(result.table).toEqual(rows);
      expect(result.trailerRowIndex).toBeNull();
    });
  });

  describe('excludeNamedRows', () => {
    it('drops cash payout rows regardless of case and padding', () => {
      const rows = [
        CANONICAL_HEADER,
        ['Výplata v hotovosti', '335'],
        ['  VÝPLATA V HOTOVOSTI '],
        ['Výplata v hotovosti 2', '335'],
      ];

      const result = RowFilters.excludeNamedRows(rows);

      expect(result.excluded).toBe(2);
      expect(result.table).toEqual([CANONICAL_HEADER, ['Výplata v hotovosti 2', '335']]);
    });
  });
});
