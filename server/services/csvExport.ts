/**
 * CSV Export
 *
 * Flat rendering of inspection records for spreadsheets. Photos never leave the
 * database through this channel: the column list below has no evidence field.
 */

import type { InspectionRecord } from '@shared/schema';

export const CSV_FILENAME = 'rnc_export.csv';
export const DEFAULT_DELIMITER = ';';
const UTF8_BOM = '\uFEFF';

type CsvValue = string | number | null;

/** Header name and the record value rendered under it, in column order. */
export const CSV_COLUMNS: ReadonlyArray<readonly [string, (record: InspectionRecord) => CsvValue]> = [
  ['id', (r) => r.id],
  ['date', (r) => r.date],
  ['area', (r) => r.area],
  ['title', (r) => r.title],
  ['inspector', (r) => r.inspector],
  ['severity', (r) => r.severity],
  ['category', (r) => r.category],
  ['status', (r) => r.status],
  ['description', (r) => r.description],
  ['immediate_actions', (r) => r.immediateActions],
  ['closed_at', (r) => r.closedAt],
  ['closed_by', (r) => r.closedBy],
  ['closing_notes', (r) => r.closingNotes],
  ['effectiveness', (r) => r.effectiveness],
  ['corrective_action_owner', (r) => r.correctiveActionOwner],
  ['reopened_at', (r) => r.reopenedAt],
  ['reopened_by', (r) => r.reopenedBy],
  ['reopening_reason', (r) => r.reopeningReason],
];

export interface CsvExportOptions {
  delimiter?: string;
  /** Prefix a UTF-8 byte order mark so spreadsheet tools pick the right encoding. */
  withBom?: boolean;
}

export function escapeCsv(value: CsvValue, delimiter: string = DEFAULT_DELIMITER): string {
  if (value === null) return '';
  const str = String(value);
  if (str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * One header line plus one line per record, joined with CRLF and no trailing
 * line break. Quoted fields may themselves contain line breaks.
 */
export function generateCsvExport(
  records: readonly InspectionRecord[],
  options: CsvExportOptions = {}
): string {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;

  const lines = [CSV_COLUMNS.map(([header]) => header).join(delimiter)];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map(([, pick]) => escapeCsv(pick(record), delimiter)).join(delimiter));
  }

  const csv = lines.join('\r\n');
  return options.withBom ? UTF8_BOM + csv : csv;
}
