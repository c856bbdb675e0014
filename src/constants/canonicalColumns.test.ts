import { describe, expect, it } from 'vitest';

import { classifyHeaderCell, getColumnLabel, headerMatchesColumn } from './canonicalColumns';
import { CanonicalColumn } from '../types/accountingTable';

describe('canonical columns', () => {
  it('classifies header variants regardless of case and diacritics', () => {
    expect(classifyHeaderCell('Názov')).toBe(CanonicalColumn.NAME);
    expect(classifyHeaderCell('NAZOV POLOZKY')).toBe(CanonicalColumn.NAME);
    expect(classifyHeaderCell('Ucet MD')).toBe(CanonicalColumn.DEBIT_ACCOUNT);
    expect(classifyHeaderCell('účet dal')).toBe(CanonicalColumn.CREDIT_ACCOUNT);
    expect(classifyHeaderCell('Stred')).toBe(CanonicalColumn.COST_CENTER);
    expect(classifyHeaderCell('Zák.')).toBe(CanonicalColumn.ORDER);
    expect(classifyHeaderCell('Cinn.')).toBe(CanonicalColumn.ACTIVITY);
  });

  it('returns null for unrelated headers', () => {
    expect(classifyHeaderCell('Dátum')).toBeNull();
    expect(classifyHeaderCell('Poznámka')).toBeNull();
  });

  it('uses priority order when several columns could match', () => {
    // "md" is checked before "dal"
    expect(classifyHeaderCell('MD / Dal')).toBe(CanonicalColumn.DEBIT_ACCOUNT);
  });

  it('matches one specific column', () => {
    expect(headerMatchesColumn('Činnosť', CanonicalColumn.ACTIVITY)).toBe(true);
    expect(headerMatchesColumn('Názov', CanonicalColumn.ACTIVITY)).toBe(false);
  });

  it('exposes export labels', () => {
    expect(getColumnLabel(CanonicalColumn.CREDIT_ACCOUNT)).toBe('Účet Dal');
  });
});
