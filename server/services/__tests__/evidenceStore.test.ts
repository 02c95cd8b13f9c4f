/**
 * Evidence Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseHandle } from '../../db';
import { RecordNotFoundError } from '../../lib/errors';
import { openTestDatabase, samplePhoto, sampleRecord } from '../../test-helpers';
import { EvidenceStore } from '../evidenceStore';
import { RecordRepository } from '../recordRepository';

describe('EvidenceStore', () => {
  let handle: DatabaseHandle;
  let store: EvidenceStore;
  let recordId: number;

  beforeEach(() => {
    handle = openTestDatabase();
    store = new EvidenceStore(handle);
    recordId = new RecordRepository(handle, store).create(sampleRecord());
  });

  afterEach(() => {
    handle.close();
  });

  describe('add', () => {
    it('stores bytes, filename and mime type unchanged', () => {
      const bytes = [0x89, 0x50, 0x4e, 0x47, 0x00, 0xff];
      const [id] = store.add(recordId, [samplePhoto('valve.png', bytes, 'image/png')], 'opening');

      const stored = store.get(recordId, id);
      expect(stored).toBeDefined();
      expect(stored?.filename).toBe('valve.png');
      expect(stored?.mimeType).toBe('image/png');
      expect(stored?.phase).toBe('opening');
      expect(stored?.payload.equals(Buffer.from(bytes))).toBe(true);
    });

    it('returns ids in input order', () => {
      const ids = store.add(
        recordId,
        [samplePhoto('a.jpg'), samplePhoto('b.jpg'), samplePhoto('c.jpg')],
        'closing'
      );

      expect(ids).toHaveLength(3);
      expect(ids[0]).toBeLessThan(ids[1]);
      expect(ids[1]).toBeLessThan(ids[2]);
    });

    it('does nothing for an empty batch', () => {
      expect(store.add(recordId, [], 'opening')).toEqual([]);
      expect(store.add(999, [], 'opening')).toEqual([]);
    });

    it('keeps a missing filename as null', () => {
      const [id] = store.add(recordId, [{ payload: Buffer.from([1]), filename: null, mimeType: null }], 'opening');

      expect(store.get(recordId, id)).toMatchObject({ filename: null, mimeType: null });
    });

    it('rejects photos for a record that does not exist', () => {
      expect(() => store.add(999, [samplePhoto()], 'opening')).toThrow(RecordNotFoundError);
      expect(handle.sqlite.prepare('SELECT count(*) AS n FROM evidence').get()).toEqual({ n: 0 });
    });
  });

  describe('list', () => {
    it('returns only the requested phase in insertion order', () => {
      store.add(recordId, [samplePhoto('open-1.jpg'), samplePhoto('open-2.jpg')], 'opening');
      store.add(recordId, [samplePhoto('close-1.jpg')], 'closing');

      expect(store.list(recordId, 'opening').map((e) => e.filename)).toEqual(['open-1.jpg', 'open-2.jpg']);
      expect(store.list(recordId, 'closing').map((e) => e.filename)).toEqual(['close-1.jpg']);
      expect(store.list(recordId, 'reopening')).toEqual([]);
    });

    it('does not mix photos of different records', () => {
      const other = new RecordRepository(handle, store).create(sampleRecord({ title: 'Other' }));
      store.add(other, [samplePhoto('other.jpg')], 'opening');

      expect(store.list(recordId, 'opening')).toEqual([]);
    });

    it('returns an empty list for an unknown record', () => {
      expect(store.list(424242, 'opening')).toEqual([]);
    });
  });

  describe('get', () => {
    it('does not return evidence through another record id', () => {
      const [id] = store.add(recordId, [samplePhoto()], 'opening');

      expect(store.get(recordId + 1, id)).toBeUndefined();
    });
  });

  describe('countByPhase', () => {
    it('reports zero for phases without photos', () => {
      store.add(recordId, [samplePhoto(), samplePhoto()], 'opening');
      store.add(recordId, [samplePhoto()], 'reopening');

      expect(store.countByPhase(recordId)).toEqual({ opening: 2, closing: 0, reopening: 1 });
    });
  });
});
