/**
 * Header values of an accounting document (<uctovny_doklad>)
 */
export interface DocumentAttributes {
  documentNumber: string;
  documentDate: string;
  mandateId: string;
  documentKind: string;
  documentType: string;
  documentText: string;
}

export type DocumentAttributeKey = keyof DocumentAttributes;

export enum LineItemSide {
  DEBIT = 'DEBIT',
  CREDIT = 'CREDIT',
}

/**
 * One leg of a source row (<polozka_ud>)
 */
export interface LineItem {
  amount: string;
  account: string;
  side: LineItemSide;
  costCenter: string;
  order: string;
  itemText: string;
}

/**
 * Assembled document: every debit item precedes every credit item
 */
export interface AccountingDocument {
  attributes: DocumentAttributes;
  items: LineItem[];
}

export interface SerializeOptions {
  keepEmpty?: boolean;
}
