import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { AppError, ErrorCode } from '../errors';

/**
 * Standardized error response format.
 * All errors include requestId for tracing and code for programmatic handling.
 */
export interface ErrorResponse {
  error: string;
  message: string;
  code: ErrorCode;
  statusCode: number;
  requestId: string;
  details?: unknown;
}

/**
 * Central error handler middleware
 * Catches all errors and returns standardized responses
 */
export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = req.requestId || 'unknown';

  // Handle AppError and subclasses
  if (err instanceof AppError) {
    const log = err.isOperational ? logger.warn.bind(logger) : logger.error.bind(logger);
    log(`${err.name}: ${err.message}`, { path: req.path, method: req.method, code: err.code });

    const response: ErrorResponse = {
      error: err.name,
      message: err.message,
      code: err.code,
      statusCode: err.statusCode,
      requestId,
      details: err.details,
    };
    return res.status(err.statusCode).json(response);
  }

  // Log unexpected errors with full context
  logger.error('Error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Handle SyntaxError (e.g., invalid JSON)
  if (err instanceof SyntaxError && 'body' in err) {
    const response: ErrorResponse = {
      error: 'BadRequest',
      message: 'Invalid JSON in request body',
      code: ErrorCode.BAD_REQUEST,
      statusCode: 400,
      requestId,
    };
    return res.status(400).json(response);
  }

  // Default error response (unknown errors)
  const response: ErrorResponse = {
    error: 'InternalError',
    message: 'An unexpected error occurred',
    code: ErrorCode.INTERNAL_ERROR,
    statusCode: 500,
    requestId,
  };
  return res.status(500).json(response);
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response) => {
  const requestId = req.requestId || 'unknown';
  const response: ErrorResponse = {
    error: 'NotFound',
    message: `Route ${req.method} ${req.path} not found`,
    code: ErrorCode.NOT_FOUND,
    statusCode: 404,
    requestId,
  };
  res.status(404).json(response);
};
