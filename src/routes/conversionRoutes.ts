import { Router, Request, Response, NextFunction } from 'express';
import path from 'path';
import { upload, handleUploadErrors } from '../middleware/upload';
import { ConversionService } from '../services/conversion/ConversionService';
import { DocumentAttributesValidator } from '../services/document-assembly/DocumentAttributesValidator';
import { NormalizationReport } from '../types/accountingTable';
import { BadRequestError } from '../errors';
import { logger } from '../config/logger';

const router = Router();

function readField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}

function readDelimiter(body: unknown): string | undefined {
  const delimiter = readField(body, 'delimiter');
  if (delimiter === undefined || delimiter === '') {
    return undefined;
  }
  if (delimiter.length !== 1) {
    throw new BadRequestError('Delimiter must be a single character');
  }
  return delimiter;
}

function readFlag(body: unknown, field: string): boolean | undefined {
  const value = readField(body, field);
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Counts-only view of the report, safe for an HTTP header
 */
function summarizeReport(report: NormalizationReport) {
  return {
    rowsBeforeHeader: report.rowsBeforeHeader,
    blankRowsRemoved: report.blankRowsRemoved,
    trailerRowIndex: report.trailerRowIndex,
    filledNames: report.filledNames,
    removedSummaryRows: report.removedSummaryRows,
    excludedRows: report.excludedRows,
    rowCount: report.rowCount,
  };
}

/**
 * POST /api/conversions/normalize
 * Clean an accounting export and return the normalized CSV
 */
router.post(
  '/normalize',
  upload.single('file'),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new BadRequestError('No file uploaded');
      }

      logger.info(`Normalizing upload: ${req.file.originalname} (${req.file.size} bytes)`);

      const result = ConversionService.normalizeFile(req.file.buffer, {
        delimiter: readDelimiter(req.body),
      });

      res.json({
        success: true,
        encoding: result.encoding,
        delimiter: result.delimiter,
        report: result.report,
        csv: result.csv,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /api/conversions/document
 * Clean an accounting export and return it as accounting-document XML
 */
router.post(
  '/document',
  upload.single('file'),
  (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new BadRequestError('No file uploaded');
      }

      const attributes = DocumentAttributesValidator.validate({
        documentNumber: readField(req.body, 'documentNumber'),
        documentDate: readField(req.body, 'documentDate'),
        mandateId: readField(req.body, 'mandateId'),
        documentKind: readField(req.body, 'documentKind'),
        documentType: readField(req.body, 'documentType'),
        documentText: readField(req.body, 'documentText'),
      });

      logger.info(`Converting upload to document XML: ${req.file.originalname}`);

      const result = ConversionService.convertToDocument(req.file.buffer, attributes, {
        delimiter: readDelimiter(req.body),
        keepEmpty: readFlag(req.body, 'keepEmpty'),
      });

      const baseName = path.parse(req.file.originalname).name || 'document';

      res
        .status(200)
        .type('application/xml')
        .attachment(`${baseName}.xml`)
        .set('X-Conversion-Report', JSON.stringify(summarizeReport(result.report)))
        .send(result.xml);
    } catch (error) {
      next(error);
    }
  }
);

router.use(handleUploadErrors);

export default router;
