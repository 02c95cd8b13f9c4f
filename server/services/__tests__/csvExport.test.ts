/**
 * CSV Export Tests
 */

import { describe, it, expect } from 'vitest';
import type { InspectionRecord } from '@shared/schema';
import { CSV_COLUMNS, CSV_FILENAME, escapeCsv, generateCsvExport } from '../csvExport';

const HEADER =
  'id;date;area;title;inspector;severity;category;status;description;immediate_actions;' +
  'closed_at;closed_by;closing_notes;effectiveness;corrective_action_owner;' +
  'reopened_at;reopened_by;reopening_reason';

function record(overrides: Partial<InspectionRecord> = {}): InspectionRecord {
  return {
    id: 1,
    date: '2024-05-02',
    area: 'Conveyor TR-07',
    title: 'Bolt torque issue',
    inspector: 'Ana',
    description: 'Loose bolts',
    severity: 'High',
    category: 'Maintenance',
    immediateActions: 'Area isolated',
    correctiveActionOwner: 'Bruno',
    status: 'Open',
    closedAt: null,
    closedBy: null,
    closingNotes: null,
    effectiveness: null,
    reopenedAt: null,
    reopenedBy: null,
    reopeningReason: null,
    ...overrides,
  };
}

describe('escapeCsv', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsv('Pump House')).toBe('Pump House');
    expect(escapeCsv(42)).toBe('42');
  });

  it('renders null as an empty field', () => {
    expect(escapeCsv(null)).toBe('');
  });

  it('quotes values containing the delimiter', () => {
    expect(escapeCsv('a;b')).toBe('"a;b"');
  });

  it('doubles embedded quotes', () => {
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
  });

  it('quotes values containing line breaks', () => {
    expect(escapeCsv('one\ntwo')).toBe('"one\ntwo"');
    expect(escapeCsv('one\rtwo')).toBe('"one\rtwo"');
  });

  it('follows the configured delimiter', () => {
    expect(escapeCsv('a,b', ',')).toBe('"a,b"');
    expect(escapeCsv('a;b', ',')).toBe('a;b');
  });
});

describe('generateCsvExport', () => {
  it('writes only the header for an empty result', () => {
    expect(generateCsvExport([])).toBe(HEADER);
  });

  it('has one header per column', () => {
    expect(CSV_COLUMNS).toHaveLength(18);
    expect(HEADER.split(';')).toHaveLength(18);
  });

  it('escapes fields and keeps the column order', () => {
    const csv = generateCsvExport([
      record({
        description: 'Bolts; loose',
        immediateActions: 'Area "isolated"',
        status: 'Closed',
        closedAt: '2024-05-03T08:00:00.000Z',
        closedBy: 'Carla',
        closingNotes: 'Line1\nLine2',
        effectiveness: 'To verify',
      }),
    ]);

    expect(csv).toBe(
      HEADER +
        '\r\n' +
        '1;2024-05-02;Conveyor TR-07;Bolt torque issue;Ana;High;Maintenance;Closed;"Bolts; loose";' +
        '"Area ""isolated""";2024-05-03T08:00:00.000Z;Carla;"Line1\nLine2";To verify;Bruno;;;'
    );
  });

  it('writes records in the order given, separated by CRLF', () => {
    const csv = generateCsvExport([record({ id: 9 }), record({ id: 3 })]);
    const lines = csv.split('\r\n');

    expect(lines).toHaveLength(3);
    expect(lines[1].startsWith('9;')).toBe(true);
    expect(lines[2].startsWith('3;')).toBe(true);
  });

  it('prefixes a byte order mark when asked', () => {
    const csv = generateCsvExport([], { withBom: true });

    expect(csv.charCodeAt(0)).toBe(0xfeff);
    expect(csv.slice(1)).toBe(HEADER);
  });

  it('supports another delimiter', () => {
    const csv = generateCsvExport([record({ area: 'A, B' })], { delimiter: ',' });

    expect(csv.split('\r\n')[0]).toBe(HEADER.replace(/;/g, ','));
    expect(csv.split('\r\n')[1]).toBe(
      '1,2024-05-02,"A, B",Bolt torque issue,Ana,High,Maintenance,Open,Loose bolts,Area isolated,,,,,Bruno,,,'
    );
  });

  it('exports to a fixed file name', () => {
    expect(CSV_FILENAME).toBe('rnc_export.csv');
  });
});
