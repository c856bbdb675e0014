import { config } from '../../config/env';
import { logger } from '../../config/logger';
import { NormalizationReport, NormalizedTable } from '../../types/accountingTable';
import { AccountingDocument, DocumentAttributes } from '../../types/accountingDocument';
import { EncodingResolver } from '../table-normalization/parsers/EncodingResolver';
import { DelimitedTableReader } from '../table-normalization/parsers/DelimitedTableReader';
import { NormalizedTableWriter } from '../table-normalization/parsers/NormalizedTableWriter';
import { TableNormalizer } from '../table-normalization/TableNormalizer';
import { DocumentAssembler } from '../document-assembly/DocumentAssembler';
import { AccountingDocumentSerializer } from '../document-assembly/AccountingDocumentSerializer';

export interface ConversionOptions {
  /** Forces the input delimiter instead of guessing it */
  delimiter?: string;
  /** Emits empty XML attributes instead of omitting them */
  keepEmpty?: boolean;
  encodingCandidates?: string[];
}

export interface NormalizeFileResult {
  encoding: string;
  delimiter: string;
  table: NormalizedTable;
  report: NormalizationReport;
  csv: string;
}

export interface DocumentFileResult {
  encoding: string;
  delimiter: string;
  report: NormalizationReport;
  document: AccountingDocument;
  xml: string;
}

/**
 * Runs a whole conversion on an uploaded file
 * Nothing is returned until every stage succeeded
 */
export class ConversionService {
  /**
   * Cleans an export and renders the normalized table as delimited text
   */
  static normalizeFile(buffer: Uint8Array, options: ConversionOptions = {}): NormalizeFileResult {
    const { encoding, delimiter, table, report } = this.readAndNormalize(buffer, options);
    const csv = NormalizedTableWriter.write(table);

    return { encoding, delimiter, table, report, csv };
  }

  /**
   * Cleans an export and converts it into accounting-document XML
   */
  static convertToDocument(
    buffer: Uint8Array,
    attributes: DocumentAttributes,
    options: ConversionOptions = {}
  ): DocumentFileResult {
    const { encoding, delimiter, table, report } = this.readAndNormalize(buffer, options);

    const document = DocumentAssembler.assemble(table, attributes);
    const xml = AccountingDocumentSerializer.serialize(document, { keepEmpty: options.keepEmpty });

    logger.info(`Document XML ready: ${document.items.length} items, ${xml.length} characters`);

    return { encoding, delimiter, report, document, xml };
  }

  private static readAndNormalize(buffer: Uint8Array, options: ConversionOptions) {
    const { text, encoding } = EncodingResolver.decode(
      buffer,
      options.encodingCandidates ?? config.conversion.encodingCandidates
    );
    const { rows, delimiter } = DelimitedTableReader.read(
      text,
      options.delimiter ?? config.conversion.inputDelimiter
    );
    const { table, report } = TableNormalizer.normalize(rows, { separator: delimiter });

    return { encoding, delimiter, table, report };
  }
}
