/**
 * Storage Facade Tests
 *
 * End-to-end lifecycle through SqliteStorage, in memory and on disk.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IN_MEMORY } from '../db';
import { RecordNotFoundError } from '../lib/errors';
import { SqliteStorage } from '../storage';
import { manualClock, samplePhoto, sampleRecord } from '../test-helpers';

describe('SqliteStorage', () => {
  describe('record lifecycle', () => {
    let storage: SqliteStorage;
    let clock: ReturnType<typeof manualClock>;

    beforeEach(() => {
      clock = manualClock('2024-05-03T08:00:00.000Z');
      storage = SqliteStorage.open(IN_MEMORY, { clock: clock.now });
    });

    afterEach(() => {
      storage.close();
    });

    it('creates, closes and reopens a record', () => {
      const id = storage.createRecord(sampleRecord({ title: 'Bolt torque issue', severity: 'High' }));
      expect(id).toBe(1);
      expect(storage.getRecord(1)?.status).toBe('Open');

      const closed = storage.closeRecord(1, { closedBy: 'Carla', notes: 'Re-torqued', effectiveness: 'To verify' }, [
        samplePhoto('after.jpg'),
      ]);
      expect(closed.status).toBe('Closed');
      expect(storage.listEvidence(1, 'closing')).toHaveLength(1);

      clock.set('2024-05-20T10:00:00.000Z');
      const reopened = storage.reopenRecord(1, { reopenedBy: 'Eva', reason: 'Ineffective fix' });
      expect(reopened).toMatchObject({
        status: 'In Action',
        reopeningReason: 'Ineffective fix',
        reopenedAt: '2024-05-20T10:00:00.000Z',
        closedBy: 'Carla',
        closedAt: '2024-05-03T08:00:00.000Z',
        closingNotes: 'Re-torqued',
        effectiveness: 'To verify',
      });
      expect(storage.listEvidence(1, 'reopening')).toEqual([]);
      expect(storage.countEvidence(1)).toEqual({ opening: 0, closing: 1, reopening: 0 });
    });

    it('summarises records per status', () => {
      storage.createRecord(sampleRecord());
      const second = storage.createRecord(sampleRecord());
      storage.closeRecord(second, { closedBy: 'Carla', notes: '', effectiveness: 'To verify' });

      expect(storage.getSummary()).toEqual({
        total: 2,
        byStatus: { 'Open': 1, 'Under Review': 0, 'In Action': 0, 'Blocked': 0, 'Closed': 1 },
      });
    });

    it('adds evidence to an existing record in its own call', () => {
      const id = storage.createRecord(sampleRecord());

      const ids = storage.addEvidence(id, [samplePhoto('late.jpg')], 'opening');

      expect(storage.getEvidence(id, ids[0])?.filename).toBe('late.jpg');
    });

    it('reports a missing record on close', () => {
      expect(() =>
        storage.closeRecord(3, { closedBy: 'Carla', notes: '', effectiveness: 'To verify' })
      ).toThrow(RecordNotFoundError);
    });

    it('reports the schema as current after open', () => {
      expect(storage.ensureSchema()).toEqual({ createdTables: [], addedColumns: [] });
    });
  });

  describe('file-backed database', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'rnc-storage-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('keeps records and photos across reopening the file', () => {
      const path = join(dir, 'rnc.db');
      const bytes = [0xff, 0xd8, 0x00, 0x10, 0xff, 0xd9];

      const first = SqliteStorage.open(path);
      const id = first.createRecord(sampleRecord({ area: 'Pump House' }), [samplePhoto('pump.jpg', bytes)]);
      first.close();

      const second = SqliteStorage.open(path);
      try {
        expect(second.getRecord(id)?.area).toBe('Pump House');
        const [photo] = second.listEvidence(id, 'opening');
        expect(photo.filename).toBe('pump.jpg');
        expect(photo.payload.equals(Buffer.from(bytes))).toBe(true);
      } finally {
        second.close();
      }
    });

    it('closing twice is harmless', () => {
      const storage = SqliteStorage.open(join(dir, 'rnc.db'));
      storage.close();

      expect(() => storage.close()).not.toThrow();
    });
  });
});
