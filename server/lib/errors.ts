/**
 * Error types raised by the core and the HTTP shell.
 *
 * Every error carries the fields the centralized error handler reads, so core
 * failures map to consistent API responses without per-route translation.
 */

import Database from 'better-sqlite3';

/**
 * Extended Error interface for API errors
 */
export interface ApiError extends Error {
  /** HTTP status code */
  statusCode?: number;
  /** Error code for client-side handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Whether the error is operational (expected) vs programming error */
  isOperational?: boolean;
}

export abstract class RncError extends Error implements ApiError {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  readonly isOperational = true;
  details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options?.details;
  }
}

/** Requested record does not exist. */
export class RecordNotFoundError extends RncError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';

  constructor(readonly recordId: number) {
    super(`Record #${recordId} not found`, { details: { recordId } });
  }
}

/** An additive migration failed for a reason other than the column already existing. */
export class SchemaMigrationError extends RncError {
  readonly statusCode = 500;
  readonly code = 'SCHEMA_MIGRATION_CONFLICT';

  constructor(readonly table: string, readonly column: string, cause: unknown) {
    super(`Could not add column ${table}.${column}: ${describeCause(cause)}`, {
      cause,
      details: { table, column },
    });
  }
}

/** The storage engine rejected a read or write. */
export class StorageError extends RncError {
  readonly statusCode = 500;
  readonly code = 'STORAGE_FAILURE';

  constructor(operation: string, cause: unknown) {
    const sqliteCode = cause instanceof Database.SqliteError ? cause.code : undefined;
    super(`Storage failure during ${operation}: ${describeCause(cause)}`, {
      cause,
      details: sqliteCode ? { operation, sqliteCode } : { operation },
    });
  }
}

/** A lifecycle transition requested from a state that does not allow it. */
export class InvalidTransitionError extends RncError {
  readonly statusCode = 409;
  readonly code = 'INVALID_TRANSITION';

  constructor(recordId: number, transition: string, status: string) {
    super(`Cannot ${transition} record #${recordId} while it is ${status}`, {
      details: { recordId, transition, status },
    });
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Wrap anything that is not already one of ours as a StorageError.
 */
export function toStorageError(operation: string, error: unknown): RncError {
  return error instanceof RncError ? error : new StorageError(operation, error);
}
