import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { loggers } from './lib/logger';
import { StorageError } from './lib/errors';

/**
 * Database Connection
 *
 * One SQLite file holds both inspection records and their photos. The handle
 * is created once by the process and passed to every component that needs it;
 * nothing in the codebase opens a connection on its own.
 *
 * Pass ':memory:' for a throwaway database (tests).
 */

const log = loggers.db;

export const IN_MEMORY = ':memory:';

export interface DatabaseHandle {
  /** Raw better-sqlite3 connection (DDL, pragmas). */
  readonly sqlite: Database.Database;
  /** Drizzle query builder over the same connection. */
  readonly db: BetterSQLite3Database;
  readonly path: string;
  close(): void;
}

export function openDatabase(path: string): DatabaseHandle {
  let sqlite: Database.Database;
  try {
    sqlite = new Database(path);
  } catch (error) {
    throw new StorageError(`open ${path}`, error);
  }

  sqlite.pragma('foreign_keys = ON');
  if (path !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }

  log.info({ path }, 'Database opened');

  return {
    sqlite,
    db: drizzle(sqlite),
    path,
    close() {
      if (sqlite.open) {
        sqlite.close();
        log.info({ path }, 'Database closed');
      }
    },
  };
}
