import Papa from 'papaparse';
import type { Resident, Violation } from '@domain/types';

export const VIOLATION_CSV_COLUMNS = [
  'resident_id',
  'resident_name',
  'code',
  'severity',
  'span_start',
  'span_end',
  'message',
] as const;

type ViolationCsvRow = Record<(typeof VIOLATION_CSV_COLUMNS)[number], string>;

/**
 * Renders violations as CSV, one row per violation in input order. Resident names are looked up
 * in `residentsById` and left blank when absent.
 */
export function formatViolationsCsv(
  violations: readonly Violation[],
  residentsById: ReadonlyMap<string, Resident> = new Map(),
): string {
  const rows: ViolationCsvRow[] = violations.map((violation) => ({
    resident_id: violation.residentId,
    resident_name: residentsById.get(violation.residentId)?.name ?? '',
    code: violation.code,
    severity: violation.severity,
    span_start: violation.spanStartISO,
    span_end: violation.spanEndISO,
    message: violation.message,
  }));

  // Header as the first data row so an empty report still renders it.
  return Papa.unparse(
    [
      [...VIOLATION_CSV_COLUMNS],
      ...rows.map((row) => VIOLATION_CSV_COLUMNS.map((column) => row[column])),
    ],
    { newline: '\n' },
  );
}
