import { DocumentAttributeKey, DocumentAttributes } from '../../types/accountingDocument';
import { ValidationError } from '../../errors';

/**
 * Document attributes in output order, with their XML names
 */
export const DOCUMENT_ATTRIBUTES: ReadonlyArray<{ key: DocumentAttributeKey; xmlName: string }> = [
  { key: 'documentNumber', xmlName: 'cislo_ud' },
  { key: 'documentDate', xmlName: 'datum_ud' },
  { key: 'mandateId', xmlName: 'mandant_id' },
  { key: 'documentKind', xmlName: 'druh_ud' },
  { key: 'documentType', xmlName: 'typ_ud' },
  { key: 'documentText', xmlName: 'text_ud' },
];

export type DocumentAttributesInput = Partial<Record<DocumentAttributeKey, unknown>>;

/**
 * Validates user-supplied document attributes
 */
export class DocumentAttributesValidator {
  /**
   * Returns the trimmed attributes; every attribute must be a non-blank string
   */
  static validate(input: DocumentAttributesInput): DocumentAttributes {
    const missing: string[] = [];
    const values: Record<DocumentAttributeKey, string> = {
      documentNumber: '',
      documentDate: '',
      mandateId: '',
      documentKind: '',
      documentType: '',
      documentText: '',
    };

    for (const { key, xmlName } of DOCUMENT_ATTRIBUTES) {
      const raw = input[key];
      const value = typeof raw === 'string' ? raw.trim() : '';
      if (value === '') {
        missing.push(xmlName);
      }
      values[key] = value;
    }

    if (missing.length > 0) {
      throw new ValidationError(`Missing required document attributes: ${missing.join(', ')}`, {
        missing,
      });
    }

    return values;
  }
}
