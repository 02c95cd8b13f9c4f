/**
 * Request ID Middleware
 *
 * Generates or extracts request ID and adds it to request/response context.
 * Request ID is used for tracing requests across the system.
 */

import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { loggers, type Logger } from '../lib/logger';

/**
 * Extract or generate request ID from headers
 */
export function getRequestId(req: Request): string {
  const header = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value || randomUUID();
}

/**
 * Middleware to add request ID to all requests
 *
 * Adds request ID to:
 * - req.id (for use in route handlers)
 * - res.locals.requestId (for use in response helpers)
 * - Response header X-Request-ID
 * - req.logger, a child of the api logger
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  req.logger = loggers.api.child({ requestId });

  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
      logger?: Logger;
    }
  }
}
