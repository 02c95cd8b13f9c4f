/**
 * Schema Manager
 *
 * Creates the RNC tables on a fresh database and brings databases written by
 * older releases up to date by adding the columns they lack. Migrations are
 * additive only; nothing is dropped or rewritten. Safe to run on every start.
 *
 * Instead of a version table, each table's current columns are read with
 * pragma_table_info and only the missing ones are added. A "duplicate column"
 * failure means another process added the column in the meantime and is
 * ignored; any other failure aborts the run with SchemaMigrationError.
 */

import type { DatabaseHandle } from '../db';
import { SchemaMigrationError, toStorageError } from '../lib/errors';
import { loggers } from '../lib/logger';

const log = loggers.schema;

const TABLE_DDL: ReadonlyArray<{ table: string; ddl: string }> = [
  {
    table: 'inspection_records',
    ddl: `
      CREATE TABLE IF NOT EXISTS inspection_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        date TEXT,
        area TEXT,
        title TEXT,
        inspector TEXT,
        description TEXT,
        severity TEXT,
        category TEXT,
        immediate_actions TEXT,
        status TEXT NOT NULL DEFAULT 'Open',
        closed_at TEXT,
        closed_by TEXT,
        closing_notes TEXT,
        effectiveness TEXT,
        corrective_action_owner TEXT,
        reopened_at TEXT,
        reopened_by TEXT,
        reopening_reason TEXT
      )`,
  },
  {
    table: 'evidence',
    ddl: `
      CREATE TABLE IF NOT EXISTS evidence (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        record_id INTEGER NOT NULL REFERENCES inspection_records(id) ON DELETE CASCADE,
        payload BLOB NOT NULL,
        filename TEXT,
        mime_type TEXT,
        phase TEXT NOT NULL DEFAULT 'opening' CHECK (phase IN ('opening', 'closing', 'reopening'))
      )`,
  },
];

export interface ColumnMigration {
  table: string;
  column: string;
  definition: string;
}

/**
 * Columns added after the first release, in the order they are applied.
 * NOT NULL columns carry a default so existing rows stay valid.
 */
export const COLUMN_MIGRATIONS: readonly ColumnMigration[] = [
  { table: 'inspection_records', column: 'corrective_action_owner', definition: 'TEXT' },
  { table: 'inspection_records', column: 'reopened_at', definition: 'TEXT' },
  { table: 'inspection_records', column: 'reopened_by', definition: 'TEXT' },
  { table: 'inspection_records', column: 'reopening_reason', definition: 'TEXT' },
  { table: 'inspection_records', column: 'status', definition: "TEXT NOT NULL DEFAULT 'Open'" },
  { table: 'evidence', column: 'filename', definition: 'TEXT' },
  { table: 'evidence', column: 'mime_type', definition: 'TEXT' },
  { table: 'evidence', column: 'payload', definition: "BLOB NOT NULL DEFAULT x''" },
  {
    table: 'evidence',
    column: 'phase',
    definition: "TEXT NOT NULL DEFAULT 'opening' CHECK (phase IN ('opening', 'closing', 'reopening'))",
  },
];

// Created last: they reference migrated columns.
const INDEX_DDL: readonly string[] = [
  'CREATE INDEX IF NOT EXISTS inspection_records_status_idx ON inspection_records (status)',
  'CREATE INDEX IF NOT EXISTS evidence_record_phase_idx ON evidence (record_id, phase)',
];

export interface SchemaReport {
  /** Tables that did not exist before this run. */
  createdTables: string[];
  /** Columns added by this run, as `table.column`. */
  addedColumns: string[];
}

function tableExists(handle: DatabaseHandle, table: string): boolean {
  const row = handle.sqlite
    .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function listColumns(handle: DatabaseHandle, table: string): Set<string> {
  const names = handle.sqlite
    .prepare('SELECT name FROM pragma_table_info(?)')
    .pluck()
    .all(table);
  return new Set(names.filter((name): name is string => typeof name === 'string'));
}

function isDuplicateColumnError(error: unknown): boolean {
  return error instanceof Error && /duplicate column name/i.test(error.message);
}

function addColumn(handle: DatabaseHandle, migration: ColumnMigration): boolean {
  const { table, column, definition } = migration;
  try {
    handle.sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    return true;
  } catch (error) {
    if (isDuplicateColumnError(error)) {
      log.debug({ table, column }, 'Column added concurrently, skipping');
      return false;
    }
    throw new SchemaMigrationError(table, column, error);
  }
}

/**
 * Ensure both tables, every migrated column and the indexes exist.
 * Runs as a single transaction: a failed run leaves the file untouched.
 */
export function ensureSchema(handle: DatabaseHandle): SchemaReport {
  const report: SchemaReport = { createdTables: [], addedColumns: [] };

  const migrate = handle.sqlite.transaction(() => {
    for (const { table, ddl } of TABLE_DDL) {
      if (!tableExists(handle, table)) {
        handle.sqlite.exec(ddl);
        report.createdTables.push(table);
      }
    }

    const columnsByTable = new Map<string, Set<string>>();
    for (const migration of COLUMN_MIGRATIONS) {
      let existing = columnsByTable.get(migration.table);
      if (!existing) {
        existing = listColumns(handle, migration.table);
        columnsByTable.set(migration.table, existing);
      }
      if (existing.has(migration.column)) continue;

      if (addColumn(handle, migration)) {
        existing.add(migration.column);
        report.addedColumns.push(`${migration.table}.${migration.column}`);
      }
    }

    for (const ddl of INDEX_DDL) {
      handle.sqlite.exec(ddl);
    }
  });

  try {
    migrate.immediate();
  } catch (error) {
    throw toStorageError('schema migration', error);
  }

  if (report.createdTables.length > 0 || report.addedColumns.length > 0) {
    log.info(report, 'Schema updated');
  } else {
    log.debug('Schema up to date');
  }

  return report;
}
