/**
 * Centralized Error Handling Middleware
 *
 * Provides consistent error responses across all API routes.
 * Core errors (lib/errors) already carry statusCode/code and map directly.
 */

import type { Request, Response, NextFunction } from 'express';
import type { ApiError } from '../lib/errors';
import { createLogger, logError } from '../lib/logger';
import type { ErrorResponse } from './responseHelpers';

export type { ApiError } from '../lib/errors';

const log = createLogger({ module: 'error-handler' });

/**
 * Create an API error with proper typing
 */
export function createApiError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

/**
 * Common error factory functions
 */
export const errors = {
  badRequest: (message: string, details?: Record<string, unknown>) =>
    createApiError(message, 400, 'BAD_REQUEST', details),

  notFound: (resource: string = 'Resource') =>
    createApiError(`${resource} not found`, 404, 'NOT_FOUND'),
};

/**
 * Centralized error handling middleware
 *
 * Must be registered AFTER all route handlers.
 */
export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = req.id;
  const statusCode = err.statusCode || 500;

  logError(req.logger ?? log, err, 'Request error', {
    requestId,
    path: req.path,
    method: req.method,
    statusCode,
    isOperational: err.isOperational,
  });

  const isProduction = process.env.NODE_ENV === 'production';

  const response: ErrorResponse & { stack?: string } = {
    success: false,
    message: isProduction && statusCode === 500
      ? 'An unexpected error occurred'
      : err.message,
    code: err.code || 'INTERNAL_ERROR',
    requestId,
  };

  if (!isProduction || err.isOperational) {
    response.details = err.details;
  }

  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Not found handler for undefined routes
 * Register after all route definitions but before the error handler.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: 'Route not found',
    code: 'NOT_FOUND',
    path: req.path,
    method: req.method,
  });
}
