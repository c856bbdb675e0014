import { CanonicalColumn } from '../types/accountingTable';
import { StringUtils } from '../utils/stringUtils';

export interface CanonicalColumnDefinition {
  column: CanonicalColumn;
  /** Label used in exports (header detection and error messages) */
  label: string;
  /** Folded substrings, in priority order */
  patterns: readonly string[];
}

/**
 * Canonical columns in matching priority order
 * Note: patterns are compared against folded header cells (see StringUtils.fold)
 */
export const CANONICAL_COLUMNS: readonly CanonicalColumnDefinition[] = [
  { column: CanonicalColumn.NAME, label: 'Názov', patterns: ['nazov'] },
  { column: CanonicalColumn.DEBIT_ACCOUNT, label: 'Účet MD', patterns: ['ucet md', 'md'] },
  { column: CanonicalColumn.CREDIT_ACCOUNT, label: 'Účet Dal', patterns: ['ucet dal', 'dal'] },
  { column: CanonicalColumn.COST_CENTER, label: 'Stred.', patterns: ['stred'] },
  { column: CanonicalColumn.ORDER, label: 'Zák.', patterns: ['zak'] },
  { column: CanonicalColumn.ACTIVITY, label: 'Činn.', patterns: ['cinn'] },
] as const;

/**
 * Folded header substrings of columns whose cells are account numbers or codes
 * A bare "md" or "dal" is not enough here, unlike in column projection
 */
export const NUMERIC_HEADER_PATTERNS: readonly string[] = ['ucet md', 'ucet dal', 'stred', 'zak', 'cinn'];

/** First cell of rows that start the free-text trailer */
export const TRAILER_PREFIX = 'Vypracoval:';

/** Item name (lower-cased) of rows dropped from the output */
export const EXCLUDED_ITEM_NAME = 'výplata v hotovosti';

export function getColumnDefinition(column: CanonicalColumn): CanonicalColumnDefinition {
  const definition = CANONICAL_COLUMNS.find((candidate) => candidate.column === column);
  if (!definition) {
    throw new Error(`Unknown canonical column: ${column}`);
  }
  return definition;
}

export function getColumnLabel(column: CanonicalColumn): string {
  return getColumnDefinition(column).label;
}

/**
 * Classifies a header cell as the first canonical column whose patterns occur in it
 */
export function classifyHeaderCell(cell: string): CanonicalColumn | null {
  const folded = StringUtils.fold(cell);
  const match = CANONICAL_COLUMNS.find((definition) =>
    StringUtils.containsAny(folded, definition.patterns)
  );
  return match ? match.column : null;
}

/**
 * Checks if a header cell matches the patterns of one specific column
 */
export function headerMatchesColumn(cell: string, column: CanonicalColumn): boolean {
  return StringUtils.containsAny(StringUtils.fold(cell), getColumnDefinition(column).patterns);
}
