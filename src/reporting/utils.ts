// Reporting Utility Functions
// Row identity, deduplication and display formatting shared by the reporting modules

import { INVALID_FILE_NAME_CHARS, MS_PER_DAY } from '../constants';
import type { ExpandedRow } from '../types';

/** Composite row identity: one row per raw record and geography */
export function rowId(recordId: string, geography: string): string {
  return `${recordId}|${geography}`;
}

/**
 * Drop rows whose id was already seen. First occurrence wins and input order is kept.
 * Only the id is compared.
 */
export function dedupRows<T extends Pick<ExpandedRow, 'id'>>(rows: Iterable<T>): T[] {
  const byId = new Map<string, T>();
  for (const row of rows) {
    if (!byId.has(row.id)) byId.set(row.id, row);
  }
  return [...byId.values()];
}

/** Rows of `base` followed by rows of `addition` not already in `base`, by id */
export function unionRows<T extends Pick<ExpandedRow, 'id'>>(base: readonly T[], addition: readonly T[]): T[] {
  return dedupRows([...base, ...addition]);
}

/**
 * Round to the nearest integer, ties to even.
 *
 * @example
 * roundHalfEven(2.5)  // => 2
 * roundHalfEven(3.5)  // => 4
 * roundHalfEven(-1.5) // => -2
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const floor = Math.floor(value);
  const diff = value - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  // avoid "-0"
  return rounded === 0 ? 0 : rounded;
}

/** Monetary amount as whole-number display text */
export function formatAmount(value: number): string {
  return String(roundHalfEven(value));
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** yyyy-MM-dd in UTC */
export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/** yyyyMMddHHmmss in local time, used to make report file names unique */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

/** Whole days elapsed from `from` to `now`, truncated toward zero */
export function ageInDays(from: Date, now: Date): number {
  const days = Math.trunc((now.getTime() - from.getTime()) / MS_PER_DAY);
  return days === 0 ? 0 : days;
}

/** Replace every character that is not allowed in a file name with "_" */
export function sanitizeFileName(name: string): string {
  return name.split(INVALID_FILE_NAME_CHARS).join('_');
}

/** Report title for a user's cumulative report */
export function teamReportName(fullName: string): string {
  return `${fullName}'s Team`;
}
