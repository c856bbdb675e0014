import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

// AsyncLocalStorage to maintain request context across the conversion pipeline
export const requestContext = new AsyncLocalStorage<{ requestId: string }>();

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

/**
 * Middleware to attach a unique request ID to each request.
 *
 * - Accepts a client-provided X-Request-ID or generates a UUID v4
 * - Sets the X-Request-ID response header for client-side correlation
 * - Runs the rest of the request inside AsyncLocalStorage so the logger
 *   can tag entries without the ID being passed around
 */
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-request-id'];
  const requestId = (typeof header === 'string' && header.trim()) || randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  requestContext.run({ requestId }, () => {
    next();
  });
};

/**
 * Get the current request ID from async context.
 * Returns 'no-context' if called outside a request (CLI runs, tests).
 */
export function getRequestId(): string {
  const context = requestContext.getStore();
  return context?.requestId || 'no-context';
}
