import { describe, expect, it } from 'vitest';

import { ConversionService } from './ConversionService';
import { LineItemSide } from '../../types/accountingDocument';
import { EncodingUndetectableError, HeaderNotFoundError } from '../../errors';
import {
  CANONICAL_HEADER,
  EXPECTED_NORMALIZED_CSV,
  EXPECTED_XML,
  EXPORT_CSV,
  SAMPLE_ATTRIBUTES,
} from '../../test/fixtures';

const utf8 = (text: string) => Buffer.from(text, 'utf8');

describe('ConversionService', () => {
  describe('normalizeFile', () => {
    it('cleans a payroll export into the canonical table', () => {
      const result = ConversionService.normalizeFile(utf8(EXPORT_CSV));

      expect(result.encoding).toBe('utf-8');
      expect(result.delimiter).toBe(';');
      expect(result.csv).toBe(EXPECTED_NORMALIZED_CSV);
      expect(result.report.rowCount).toBe(3);
    });

    it('falls back to windows-1250 for legacy exports', () => {
      // latin1 keeps one byte per character, which matches windows-1250 for these letters
      const text =
        'Názov;Úèet MD;Úèet Dal;Stred.;Zák.;Èinn.\r\n' + 'Mzdy;221;521;10;20;100,50';

      const result = ConversionService.normalizeFile(Buffer.from(text, 'latin1'));

      expect(result.encoding).toBe('windows-1250');
      expect(result.table.header).toEqual(CANONICAL_HEADER);
      expect(result.table.rows).toEqual([['Mzdy', '221', '521', '10', '20', '100,50']]);
    });

    it('honours a forced delimiter', () => {
      const text = 'Názov|Účet MD|Účet Dal|Stred.|Zák.|Činn.\nMzdy|221|521|10|20|5';

      const result = ConversionService.normalizeFile(utf8(text), { delimiter: '|' });

      expect(result.delimiter).toBe('|');
      expect(result.table.rows).toEqual([['Mzdy', '221', '521', '10', '20', '5']]);
    });

    it('fails when no candidate encoding accepts the bytes', () => {
      expect(() =>
        ConversionService.normalizeFile(Uint8Array.from([0x4e, 0xff]), { encodingCandidates: ['utf-8'] })
      ).toThrow(EncodingUndetectableError);
    });

    it('fails when the export has no header row', () => {
      expect(() => ConversionService.normalizeFile(utf8('a;b\n1;2'))).toThrow(HeaderNotFoundError);
    });
  });

  describe('convertToDocument', () => {
    it('renders the payroll export as document XML', () => {
      const result = ConversionService.convertToDocument(utf8(EXPORT_CSV), SAMPLE_ATTRIBUTES, {
        keepEmpty: false,
      });

      expect(result.xml).toBe(EXPECTED_XML);
      expect(result.document.items).toHaveLength(6);
    });

    it('converts an export whose preamble is full of commas', () => {
      const text = [
        'Zamestnávateľ: Firma, s.r.o., Hlavná 1, Bratislava',
        'IČO: 123, DIČ: 456, obdobie 09, 2025',
        CANONICAL_HEADER.join(';'),
        'Mzdy;221;521;10;20;100,50',
        'Odvody;336;524;11;;30',
      ].join('\r\n');

      const result = ConversionService.convertToDocument(utf8(text), SAMPLE_ATTRIBUTES, { keepEmpty: false });

      expect(result.delimiter).toBe(';');
      expect(result.report.rowsBeforeHeader).toBe(2);
      expect(result.document.items.map((item) => [item.side, item.account, item.amount])).toEqual([
        [LineItemSide.DEBIT, '221', '100.50'],
        [LineItemSide.DEBIT, '336', '30'],
        [LineItemSide.CREDIT, '521', '100.50'],
        [LineItemSide.CREDIT, '524', '30'],
      ]);
    });

    it('drops the cash payout row and emits one debit and one credit item', () => {
      const text = [
        CANONICAL_HEADER.join(';'),
        'Mzdy;221;521;10;20;100,50',
        'Výplata v hotovosti;;;;;',
        '',
      ].join('\n');

      const result = ConversionService.convertToDocument(utf8(text), SAMPLE_ATTRIBUTES, { keepEmpty: false });

      expect(result.report.excludedRows).toBe(1);
      expect(result.report.rowCount).toBe(1);
      expect(result.document.items.map((item) => [item.side, item.account, item.amount])).toEqual([
        [LineItemSide.DEBIT, '221', '100.50'],
        [LineItemSide.CREDIT, '521', '100.50'],
      ]);
    });
  });
});
