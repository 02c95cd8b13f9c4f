/**
 * Database Transaction Utilities
 *
 * better-sqlite3 is synchronous, so a drizzle transaction callback runs to
 * completion before the call returns: either every statement in it commits or
 * none does. Failures are re-thrown as StorageError unless they are already
 * one of our error types.
 */

import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { DatabaseHandle } from '../db';
import { toStorageError } from './errors';

/**
 * An open transaction, as handed to the callback of runInTransaction.
 */
export type DbExecutor = Parameters<Parameters<BetterSQLite3Database['transaction']>[0]>[0];

export type TransactionBehavior = 'deferred' | 'immediate' | 'exclusive';

/**
 * Run `work` inside one transaction.
 *
 * Writers use 'immediate' so the write lock is taken up front and a second
 * process waits on BEGIN rather than failing half-way through.
 *
 * @param operation Short label used in the StorageError message
 */
export function runInTransaction<T>(
  handle: DatabaseHandle,
  operation: string,
  work: (tx: DbExecutor) => T,
  behavior: TransactionBehavior = 'immediate'
): T {
  try {
    return handle.db.transaction((tx) => work(tx), { behavior });
  } catch (error) {
    throw toStorageError(operation, error);
  }
}

/**
 * Run a single read outside an explicit transaction, with the same error
 * translation as runInTransaction.
 */
export function runQuery<T>(operation: string, query: () => T): T {
  try {
    return query();
  } catch (error) {
    throw toStorageError(operation, error);
  }
}
