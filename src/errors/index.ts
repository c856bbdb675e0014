/**
 * Standardized Error Classes
 *
 * All application errors should use these classes for consistent
 * error handling, logging, and API responses.
 */

/**
 * Error codes for programmatic handling
 */
export enum ErrorCode {
  // Client errors (4xx)
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNPROCESSABLE_ENTITY = 'UNPROCESSABLE_ENTITY',

  // Server errors (5xx)
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Conversion errors
  HEADER_NOT_FOUND = 'HEADER_NOT_FOUND',
  MISSING_REQUIRED_COLUMNS = 'MISSING_REQUIRED_COLUMNS',
  ENCODING_UNDETECTABLE = 'ENCODING_UNDETECTABLE',
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    public isOperational = true,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 400 Bad Request - Invalid request syntax or parameters
 */
export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, ErrorCode.BAD_REQUEST, true, details);
    this.name = 'BadRequestError';
  }
}

/**
 * 400 Validation Error - Request data failed validation
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, ErrorCode.VALIDATION_ERROR, true, details);
    this.name = 'ValidationError';
  }
}

/**
 * 422 Header Not Found - No row of the table looks like the accounting header
 */
export class HeaderNotFoundError extends AppError {
  constructor(message = 'Could not find the header row (Názov, Účet MD, Účet Dal)') {
    super(422, message, ErrorCode.HEADER_NOT_FOUND, true);
    this.name = 'HeaderNotFoundError';
  }
}

/**
 * 422 Missing Required Columns - The normalized table lacks canonical columns
 */
export class MissingRequiredColumnsError extends AppError {
  constructor(
    public readonly missing: string[],
    public readonly present: string[]
  ) {
    super(
      422,
      `Missing required columns: ${missing.join(', ')}. Present headers: ${present.join(', ') || '(none)'}`,
      ErrorCode.MISSING_REQUIRED_COLUMNS,
      true,
      { missing, present }
    );
    this.name = 'MissingRequiredColumnsError';
  }
}

/**
 * 422 Encoding Undetectable - None of the candidate encodings decodes the input
 */
export class EncodingUndetectableError extends AppError {
  constructor(candidates: string[]) {
    super(
      422,
      `Could not detect the file encoding (tried: ${candidates.join(', ')})`,
      ErrorCode.ENCODING_UNDETECTABLE,
      true,
      { candidates }
    );
    this.name = 'EncodingUndetectableError';
  }
}
