import { describe, expect, it } from 'vitest';

import { NormalizedTableWriter } from './NormalizedTableWriter';

describe('NormalizedTableWriter', () => {
  it('writes header and rows with CRLF endings', () => {
    const csv = NormalizedTableWriter.write(
      { header: ['Názov', 'Účet MD'], rows: [['Mzdy', '221'], ['Mzdy; odvody', '336']] },
      ';'
    );

    expect(csv).toBe('Názov;Účet MD\r\nMzdy;221\r\n"Mzdy; odvody";336\r\n');
  });

  it('writes nothing for an empty table', () => {
    expect(NormalizedTableWriter.write({ header: [], rows: [] }, ';')).toBe('');
  });
});
