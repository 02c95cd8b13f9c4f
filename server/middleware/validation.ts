/**
 * Request Validation
 *
 * Zod-based validation for Express route handlers. Failures become a 400
 * VALIDATION_ERROR carrying one entry per issue, rendered by the error handler.
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import { createApiError, type ApiError } from './errorHandler';

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

function validationError(message: string, error: ZodError): ApiError {
  return createApiError(message, 400, 'VALIDATION_ERROR', { errors: formatZodIssues(error) });
}

/**
 * Parse the request body inside a handler. Throws a validation error.
 * For multipart routes the upload middleware must run first so req.body is populated.
 */
export function parseBody<T extends ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw validationError('Validation failed', result.error);
  }
  return result.data;
}

/**
 * Parse query parameters inside a handler. Throws a validation error.
 */
export function parseQuery<T extends ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw validationError('Query parameter validation failed', result.error);
  }
  return result.data;
}

/**
 * Parse route parameters inside a handler. Throws a validation error.
 */
export function parseParams<T extends ZodTypeAny>(schema: T, params: unknown): z.output<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw validationError('Parameter validation failed', result.error);
  }
  return result.data;
}
