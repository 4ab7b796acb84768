import type { BatchResult } from './batch';
import type { ResolutionRecord } from './record';

export const REPORT_HEADER = [
  'FQDN',
  'PTR',
  'IP Address',
  'FLU Exists',
  'FLU Existing Value',
  'FLU Needs Update',
  'RLU Exists',
  'RLU Existing Value',
  'RLU Needs Update',
] as const;

export type ReportRow = [string, string, string, string, string, string, string, string, string];

function flag(value: boolean): string {
  return value ? 'True' : 'False';
}

export function recordToReportRow(record: ResolutionRecord): ReportRow {
  return [
    record.fullName,
    record.ptrRecord,
    record.ipAddress,
    flag(record.forward.exists),
    record.forward.existingValue ?? '',
    flag(record.forward.needsUpdate),
    flag(record.reverse.exists),
    record.reverse.existingValue ?? '',
    flag(record.reverse.needsUpdate),
  ];
}

export function escapeCsvField(value: string): string {
  // RFC 4180: quote fields with comma, quote or newline; double embedded quotes.
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function toCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/** Header plus one line per record, newline-terminated. */
export function toCsv(records: readonly ResolutionRecord[]): string {
  const lines = [toCsvLine(REPORT_HEADER), ...records.map((r) => toCsvLine(recordToReportRow(r)))];
  return `${lines.join('\n')}\n`;
}

export function summarize(result: BatchResult): string {
  return [
    `Finished successfully: ${flag(result.status)}`,
    `Records built: ${result.records.length}`,
    `Rows skipped: ${result.failures.length}`,
  ].join('\n');
}
