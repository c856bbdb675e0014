import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { ConversionService } from '../services/conversion/ConversionService';
import {
  DocumentAttributesInput,
  DocumentAttributesValidator,
} from '../services/document-assembly/DocumentAttributesValidator';
import { NormalizationReport } from '../types/accountingTable';

/**
 * Converts accounting CSV exports from the command line
 *
 *   accounting-convert normalize input.csv [output.csv] [--delimiter ';']
 *   accounting-convert document input.csv output.xml [--delimiter ';'] [--keep-empty]
 *     --cislo_ud 250901 --datum_ud 30.09.2025 --mandant_id 1 --druh_ud "ID UCTO" \
 *     --typ_ud I --text_ud "Zaúčtovanie"
 */

export const USAGE = [
  'Usage:',
  '  accounting-convert normalize <input.csv> [output.csv] [--delimiter <char>]',
  '  accounting-convert document <input.csv> <output.xml> [--delimiter <char>] [--keep-empty]',
  '      --cislo_ud <v> --datum_ud <v> --mandant_id <v> --druh_ud <v> --typ_ud <v> --text_ud <v>',
].join('\n');

export type CliCommand =
  | { command: 'normalize'; input: string; output: string; delimiter?: string }
  | {
      command: 'document';
      input: string;
      output: string;
      delimiter?: string;
      keepEmpty: boolean;
      attributes: DocumentAttributesInput;
    };

/**
 * Parses command line arguments (without the node and script entries)
 */
export function parseCommand(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      delimiter: { type: 'string' },
      'keep-empty': { type: 'boolean', default: false },
      cislo_ud: { type: 'string' },
      datum_ud: { type: 'string' },
      mandant_id: { type: 'string' },
      druh_ud: { type: 'string' },
      typ_ud: { type: 'string' },
      text_ud: { type: 'string' },
    },
  });

  const [command, input, output] = positionals;
  if (!input) {
    throw new Error(USAGE);
  }

  if (command === 'normalize') {
    return {
      command,
      input,
      output: output ?? path.join(path.dirname(input), `cleaned__${path.basename(input)}`),
      delimiter: values.delimiter,
    };
  }

  if (command === 'document') {
    if (!output) {
      throw new Error(USAGE);
    }
    return {
      command,
      input,
      output,
      delimiter: values.delimiter,
      keepEmpty: values['keep-empty'] ?? false,
      attributes: {
        documentNumber: values.cislo_ud,
        documentDate: values.datum_ud,
        mandateId: values.mandant_id,
        documentKind: values.druh_ud,
        documentType: values.typ_ud,
        documentText: values.text_ud,
      },
    };
  }

  throw new Error(USAGE);
}

export function formatReport(encoding: string, report: NormalizationReport): string[] {
  const lines = [
    `- Encoding: ${encoding}`,
    `- Rows removed before header: ${report.rowsBeforeHeader}`,
    report.projectionApplied
      ? `- Kept columns: ${report.keptColumns.map((column) => column.label).join(', ')}`
      : '- Kept columns: all (no canonical column recognized)',
  ];
  if (report.trailerRowIndex !== null) {
    lines.push(`- Removed from 'Vypracoval:' to the end (row ${report.trailerRowIndex + 1})`);
  }
  lines.push(`- Filled names: ${report.filledNames}`);
  lines.push(
    `- Removed summary rows: ${report.removedSummaryRows}` +
      (report.removedTrailingSummary ? ' (including the last one)' : '')
  );
  if (report.excludedRows > 0) {
    lines.push(`- Removed 'Výplata v hotovosti' rows: ${report.excludedRows}`);
  }
  lines.push(`- Resulting data rows: ${report.rowCount}`);
  return lines;
}

export function run(argv: string[]): number {
  try {
    const cli = parseCommand(argv);
    const buffer = fs.readFileSync(cli.input);

    if (cli.command === 'normalize') {
      const result = ConversionService.normalizeFile(buffer, { delimiter: cli.delimiter });
      fs.writeFileSync(cli.output, result.csv, 'utf8');
      console.log(`✅ Cleaned CSV saved: ${cli.output}`);
      formatReport(result.encoding, result.report).forEach((line) => console.log(line));
      return 0;
    }

    const attributes = DocumentAttributesValidator.validate(cli.attributes);
    const result = ConversionService.convertToDocument(buffer, attributes, {
      delimiter: cli.delimiter,
      keepEmpty: cli.keepEmpty,
    });
    fs.writeFileSync(cli.output, result.xml, 'utf8');
    console.log(`Wrote ${cli.output} (${Buffer.byteLength(result.xml, 'utf8')} bytes)`);
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
