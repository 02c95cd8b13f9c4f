/**
 * Shared fixtures for the server test suites.
 */

import type { EvidenceUpload, NewInspectionRecord } from '@shared/schema';
import { IN_MEMORY, openDatabase, type DatabaseHandle } from './db';
import { ensureSchema } from './services/schemaManager';

/** Fresh in-memory database with the current schema. */
export function openTestDatabase(): DatabaseHandle {
  const handle = openDatabase(IN_MEMORY);
  ensureSchema(handle);
  return handle;
}

export function sampleRecord(overrides: Partial<NewInspectionRecord> = {}): NewInspectionRecord {
  return {
    date: '2024-05-02',
    area: 'Conveyor TR-07',
    title: 'Bolt torque issue',
    inspector: 'Ana Souza',
    description: 'Flange bolts found without torque marking',
    severity: 'High',
    category: 'Maintenance',
    immediateActions: 'Area isolated',
    correctiveActionOwner: 'Bruno Lima',
    ...overrides,
  };
}

/** A few bytes that start like a JPEG; enough for storage round trips. */
export function samplePhoto(
  filename: string = 'photo.jpg',
  bytes: number[] = [0xff, 0xd8, 0xff, 0xe0],
  mimeType: string = 'image/jpeg'
): EvidenceUpload {
  return { payload: Buffer.from(bytes), filename, mimeType };
}

/**
 * Clock whose current time is set by the test.
 */
export function manualClock(start: string) {
  let now = new Date(start);
  return {
    now: () => now,
    set(iso: string) {
      now = new Date(iso);
    },
  };
}
