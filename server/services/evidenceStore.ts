/**
 * Evidence Store
 *
 * Photos are kept as BLOBs next to the record they document, each tagged with
 * the lifecycle phase that produced it. Bytes are stored exactly as received:
 * size and format checks belong to the caller.
 */

import { and, asc, eq, sql } from 'drizzle-orm';
import type { DatabaseHandle } from '../db';
import {
  evidence,
  inspectionRecords,
  type Evidence,
  type EvidencePhase,
  type EvidenceUpload,
} from '@shared/schema';
import { RecordNotFoundError } from '../lib/errors';
import { loggers } from '../lib/logger';
import { runInTransaction, runQuery, type DbExecutor } from '../lib/transactions';

const log = loggers.evidence;

export class EvidenceStore {
  constructor(private readonly handle: DatabaseHandle) {}

  /**
   * Attach photos to a record in their own transaction.
   * This is also the retry path when a close/reopen committed but its photos did not.
   *
   * @returns ids of the inserted rows, in input order
   */
  add(recordId: number, items: readonly EvidenceUpload[], phase: EvidencePhase): number[] {
    if (items.length === 0) return [];

    const ids = runInTransaction(this.handle, 'evidence insert', (tx) =>
      this.insertWithin(tx, recordId, items, phase)
    );
    log.info({ recordId, phase, count: ids.length }, 'Evidence attached');
    return ids;
  }

  /**
   * Insert photos using an executor the caller already holds, so record
   * creation can add its opening photos inside the same transaction.
   */
  insertWithin(
    tx: DbExecutor,
    recordId: number,
    items: readonly EvidenceUpload[],
    phase: EvidencePhase
  ): number[] {
    if (items.length === 0) return [];

    const owner = tx
      .select({ id: inspectionRecords.id })
      .from(inspectionRecords)
      .where(eq(inspectionRecords.id, recordId))
      .get();
    if (!owner) {
      throw new RecordNotFoundError(recordId);
    }

    const ids: number[] = [];
    for (const item of items) {
      const [row] = tx
        .insert(evidence)
        .values({
          recordId,
          payload: item.payload,
          filename: item.filename,
          mimeType: item.mimeType,
          phase,
        })
        .returning({ id: evidence.id })
        .all();
      ids.push(row.id);
    }
    return ids;
  }

  /**
   * Photos of one record and phase in insertion order. Empty when there are none.
   */
  list(recordId: number, phase: EvidencePhase): Evidence[] {
    return runQuery('evidence list', () =>
      this.handle.db
        .select()
        .from(evidence)
        .where(and(eq(evidence.recordId, recordId), eq(evidence.phase, phase)))
        .orderBy(asc(evidence.id))
        .all()
    );
  }

  get(recordId: number, evidenceId: number): Evidence | undefined {
    return runQuery('evidence read', () =>
      this.handle.db
        .select()
        .from(evidence)
        .where(and(eq(evidence.recordId, recordId), eq(evidence.id, evidenceId)))
        .get()
    );
  }

  countByPhase(recordId: number): Record<EvidencePhase, number> {
    const rows = runQuery('evidence count', () =>
      this.handle.db
        .select({ phase: evidence.phase, count: sql<number>`count(*)` })
        .from(evidence)
        .where(eq(evidence.recordId, recordId))
        .groupBy(evidence.phase)
        .all()
    );

    const counts: Record<EvidencePhase, number> = { opening: 0, closing: 0, reopening: 0 };
    for (const row of rows) {
      counts[row.phase] = Number(row.count);
    }
    return counts;
  }
}
