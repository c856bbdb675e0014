import { config } from '../../config/env';
import {
  AccountingDocument,
  LineItem,
  LineItemSide,
  SerializeOptions,
} from '../../types/accountingDocument';
import { DOCUMENT_ATTRIBUTES } from './DocumentAttributesValidator';

export const XML_DECLARATION = '<?xml version="1.0"?>';

const ROOT_ELEMENT = 'uctovne_doklady';
const DOCUMENT_ELEMENT = 'uctovny_doklad';
const ITEM_ELEMENT = 'polozka_ud';
const INDENT = '  ';

/** M = "má dať" (debit), D = "dal" (credit) */
const SIDE_CODES: Record<LineItemSide, string> = {
  [LineItemSide.DEBIT]: 'M',
  [LineItemSide.CREDIT]: 'D',
};

/**
 * Item attributes in output order, with their XML names
 */
const ITEM_ATTRIBUTES: ReadonlyArray<{ xmlName: string; value: (item: LineItem) => string }> = [
  { xmlName: 'suma', value: (item) => item.amount },
  { xmlName: 'ucet', value: (item) => item.account },
  { xmlName: 'strana', value: (item) => SIDE_CODES[item.side] },
  { xmlName: 'os', value: (item) => item.costCenter },
  { xmlName: 'eo', value: (item) => item.order },
  { xmlName: 'text_pud', value: (item) => item.itemText },
];

type Attribute = [name: string, value: string];

/**
 * Renders an accounting document as indented XML
 */
export class AccountingDocumentSerializer {
  static serialize(
    document: AccountingDocument,
    options: SerializeOptions = {}
  ): string {
    const keepEmpty = options.keepEmpty ?? config.conversion.keepEmptyAttributes;

    const documentAttributes: Attribute[] = DOCUMENT_ATTRIBUTES.map(({ key, xmlName }) => [
      xmlName,
      document.attributes[key],
    ]);

    const lines: string[] = [XML_DECLARATION, `<${ROOT_ELEMENT}>`];
    const documentTag = this.openTag(DOCUMENT_ELEMENT, documentAttributes, keepEmpty);

    if (document.items.length === 0) {
      lines.push(`${INDENT}${documentTag}/>`);
    } else {
      lines.push(`${INDENT}${documentTag}>`);
      for (const item of document.items) {
        const itemAttributes: Attribute[] = ITEM_ATTRIBUTES.map(({ xmlName, value }) => [
          xmlName,
          value(item),
        ]);
        lines.push(`${INDENT}${INDENT}${this.openTag(ITEM_ELEMENT, itemAttributes, keepEmpty)}/>`);
      }
      lines.push(`${INDENT}</${DOCUMENT_ELEMENT}>`);
    }

    lines.push(`</${ROOT_ELEMENT}>`);
    return `${lines.join('\n')}\n`;
  }

  /**
   * Builds "<name a="1" b="2"" without the closing bracket
   */
  private static openTag(name: string, attributes: Attribute[], keepEmpty: boolean): string {
    const rendered = attributes
      .map(([attrName, raw]): Attribute => [attrName, raw.trim()])
      .filter(([, value]) => keepEmpty || value !== '')
      .map(([attrName, value]) => ` ${attrName}="${this.escapeAttribute(value)}"`)
      .join('');
    return `<${name}${rendered}`;
  }

  static escapeAttribute(value: string): string {
    return value
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/"/g, '&quot;')
      .replace(/>/g, '&gt;')
      .replace(/\t/g, '&#9;')
      .replace(/\n/g, '&#10;')
      .replace(/\r/g, '&#13;');
  }
}
