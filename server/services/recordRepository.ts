/**
 * Record Repository
 *
 * Owns inspection records: creation, the close/reopen transitions and the
 * query surface used by the list screen and the CSV export.
 *
 * Transaction units:
 * - create: insert record, take its id, insert opening photos (one unit)
 * - close/reopen: status fields (one unit), then photos (a second unit)
 *
 * The second unit of close/reopen may fail after the first committed. The
 * status change is kept; the caller can re-send the photos through
 * EvidenceStore.add.
 */

import { and, desc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { DatabaseHandle } from '../db';
import {
  INITIAL_STATUS,
  inspectionRecords,
  type CloseRecordInput,
  type EvidencePhase,
  type EvidenceUpload,
  type InspectionRecord,
  type NewInspectionRecord,
  type RecordFilter,
  type RecordStatus,
  type ReopenRecordInput,
} from '@shared/schema';
import { TRANSITION_PHASE, TRANSITION_TARGET } from '@shared/recordLifecycle';
import { RecordNotFoundError } from '../lib/errors';
import { loggers, logError } from '../lib/logger';
import { runInTransaction, runQuery } from '../lib/transactions';
import { EvidenceStore } from './evidenceStore';

const log = loggers.records;

export interface RecordRepositoryOptions {
  /** Source of closed_at/reopened_at stamps. */
  clock?: () => Date;
}

export class RecordRepository {
  private readonly clock: () => Date;

  constructor(
    private readonly handle: DatabaseHandle,
    private readonly evidenceStore: EvidenceStore,
    options: RecordRepositoryOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Insert a new record with status Open and its opening photos.
   *
   * @returns the assigned id
   */
  create(fields: NewInspectionRecord, items: readonly EvidenceUpload[] = []): number {
    const id = runInTransaction(this.handle, 'record insert', (tx) => {
      const [row] = tx
        .insert(inspectionRecords)
        .values({ ...fields, status: INITIAL_STATUS })
        .returning({ id: inspectionRecords.id })
        .all();
      this.evidenceStore.insertWithin(tx, row.id, items, 'opening');
      return row.id;
    });

    log.info({ recordId: id, photos: items.length }, 'Record created');
    return id;
  }

  /**
   * Close a record. The prior status is not checked: closing again overwrites
   * all four closure fields.
   */
  close(id: number, input: CloseRecordInput, items: readonly EvidenceUpload[] = []): InspectionRecord {
    this.updateLifecycle(id, 'record close', {
      status: TRANSITION_TARGET.close,
      closedAt: this.clock().toISOString(),
      closedBy: input.closedBy,
      closingNotes: input.notes,
      effectiveness: input.effectiveness,
    });
    log.info({ recordId: id, effectiveness: input.effectiveness }, 'Record closed');

    this.attachTransitionEvidence(id, items, TRANSITION_PHASE.close);
    return this.require(id);
  }

  /**
   * Reopen a record into In Action. The prior status is not checked here;
   * callers facing users should gate on canReopen. Closure fields are kept.
   */
  reopen(id: number, input: ReopenRecordInput, items: readonly EvidenceUpload[] = []): InspectionRecord {
    this.updateLifecycle(id, 'record reopen', {
      status: TRANSITION_TARGET.reopen,
      reopenedAt: this.clock().toISOString(),
      reopenedBy: input.reopenedBy,
      reopeningReason: input.reason,
    });
    log.info({ recordId: id }, 'Record reopened');

    this.attachTransitionEvidence(id, items, TRANSITION_PHASE.reopen);
    return this.require(id);
  }

  /**
   * Records matching the filter, most recent first.
   */
  list(filter: RecordFilter = {}): InspectionRecord[] {
    const conditions: SQL[] = [];
    if (filter.statuses && filter.statuses.length > 0) {
      conditions.push(inArray(inspectionRecords.status, filter.statuses));
    }
    if (filter.severities && filter.severities.length > 0) {
      conditions.push(inArray(inspectionRecords.severity, filter.severities));
    }

    const rows = runQuery('record list', () =>
      this.handle.db
        .select()
        .from(inspectionRecords)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(inspectionRecords.id))
        .all()
    );

    // Substring matching is done here rather than with LIKE: SQLite folds case
    // for ASCII only, and area names carry accented characters.
    return rows.filter(
      (row) =>
        containsIgnoringCase(row.area, filter.area) && containsIgnoringCase(row.inspector, filter.inspector)
    );
  }

  getById(id: number): InspectionRecord | undefined {
    return runQuery('record read', () =>
      this.handle.db
        .select()
        .from(inspectionRecords)
        .where(eq(inspectionRecords.id, id))
        .get()
    );
  }

  countByStatus(): Record<RecordStatus, number> {
    const rows = runQuery('record count', () =>
      this.handle.db
        .select({ status: inspectionRecords.status, count: sql<number>`count(*)` })
        .from(inspectionRecords)
        .groupBy(inspectionRecords.status)
        .all()
    );

    const counts: Record<RecordStatus, number> = {
      'Open': 0,
      'Under Review': 0,
      'In Action': 0,
      'Blocked': 0,
      'Closed': 0,
    };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }

  private updateLifecycle(
    id: number,
    operation: string,
    changes: Partial<typeof inspectionRecords.$inferInsert>
  ): void {
    runInTransaction(this.handle, operation, (tx) => {
      const result = tx
        .update(inspectionRecords)
        .set(changes)
        .where(eq(inspectionRecords.id, id))
        .run();
      if (result.changes === 0) {
        throw new RecordNotFoundError(id);
      }
    });
  }

  private attachTransitionEvidence(
    id: number,
    items: readonly EvidenceUpload[],
    phase: EvidencePhase
  ): void {
    if (items.length === 0) return;
    try {
      this.evidenceStore.add(id, items, phase);
    } catch (error) {
      logError(log, error, 'Status committed but evidence was not attached', {
        recordId: id,
        phase,
        photos: items.length,
      });
      throw error;
    }
  }

  private require(id: number): InspectionRecord {
    const record = this.getById(id);
    if (!record) {
      throw new RecordNotFoundError(id);
    }
    return record;
  }
}

function containsIgnoringCase(value: string | null, needle: string | undefined): boolean {
  if (!needle) return true;
  if (!value) return false;
  return value.toLocaleLowerCase().includes(needle.toLocaleLowerCase());
}
