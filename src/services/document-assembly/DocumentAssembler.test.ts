import { describe, expect, it } from 'vitest';

import { DocumentAssembler } from './DocumentAssembler';
import { LineItemSide } from '../../types/accountingDocument';
import { MissingRequiredColumnsError } from '../../errors';
import { CANONICAL_HEADER, SAMPLE_ATTRIBUTES } from '../../test/fixtures';

describe('DocumentAssembler', () => {
  it('emits all debit items before all credit items', () => {
    const table = {
      header: CANONICAL_HEADER,
      rows: [
        ['Mzdy', '221', '521', '10', '20', '100,50'],
        ['Odvody', '336', '524', '11', '', '30'],
      ],
    };

    const document = DocumentAssembler.assemble(table, SAMPLE_ATTRIBUTES);

    expect(document.items.map((item) => [item.itemText, item.side, item.account])).toEqual([
      ['Mzdy', LineItemSide.DEBIT, '221'],
      ['Odvody', LineItemSide.DEBIT, '336'],
      ['Mzdy', LineItemSide.CREDIT, '521'],
      ['Odvody', LineItemSide.CREDIT, '524'],
    ]);
  });

  it('shares the non-account fields between both items of a row', () => {
    const table = { header: CANONICAL_HEADER, rows: [['Mzdy', '221', '521', '10', '20', '1 234,56']] };

    const [debit, credit] = DocumentAssembler.assemble(table, SAMPLE_ATTRIBUTES).items;

    expect(debit).toEqual({
      amount: '1234.56',
      account: '221',
      side: LineItemSide.DEBIT,
      costCenter: '10',
      order: '20',
      itemText: 'Mzdy',
    });
    expect(credit).toEqual({ ...debit, account: '521', side: LineItemSide.CREDIT });
  });

  it('finds columns by header rather than position', () => {
    const table = {
      header: ['Činn.', 'Účet Dal', 'Názov', 'Zák.', 'Stred.', 'Účet MD'],
      rows: [['5', '521', 'Mzdy', '20', '10', '221']],
    };

    const [debit, credit] = DocumentAssembler.assemble(table, SAMPLE_ATTRIBUTES).items;

    expect(debit.account).toBe('221');
    expect(credit.account).toBe('521');
    expect(debit.amount).toBe('5');
    expect(debit.costCenter).toBe('10');
    expect(debit.order).toBe('20');
  });

  it('reads missing cells of short rows as empty', () => {
    const table = { header: CANONICAL_HEADER, rows: [['Mzdy', '221']] };

    const [, credit] = DocumentAssembler.assemble(table, SAMPLE_ATTRIBUTES).items;

    expect(credit.account).toBe('');
    expect(credit.amount).toBe('');
  });

  it('throws MissingRequiredColumnsError naming the absent columns', () => {
    const table = { header: ['Názov', 'Účet MD', 'Účet Dal'], rows: [] };

    try {
      DocumentAssembler.assemble(table, SAMPLE_ATTRIBUTES);
      expect.fail('expected MissingRequiredColumnsError');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredColumnsError);
      if (error instanceof MissingRequiredColumnsError) {
        expect(error.missing).toEqual(['Stred.', 'Zák.', 'Činn.']);
        expect(error.statusCode).toBe(422);
      }
    }
  });

  it('builds an empty document from an empty table', () => {
    const document = DocumentAssembler.assemble({ header: CANONICAL_HEADER, rows: [] }, SAMPLE_ATTRIBUTES);

    expect(document.items).toEqual([]);
  });

  it('trims document attributes', () => {
    const document = DocumentAssembler.assemble(
      { header: CANONICAL_HEADER, rows: [] },
      { ...SAMPLE_ATTRIBUTES, documentText: '  Mzdy 09/2025 ' }
    );

    expect(document.attributes.documentText).toBe('Mzdy 09/2025');
  });
});
