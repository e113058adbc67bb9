// Report Workbook — renders expanded rows into an ExcelJS workbook

import ExcelJS from 'exceljs';
import { HEADER_FILL_ARGB, REPORT_HEADERS, WORKSHEET_NAME } from './constants';
import { ageInDays, formatDate } from './reporting/utils';
import type { ExpandedRow } from './types';

type CellValue = string | number;

const MIN_COLUMN_WIDTH = 8;
const MAX_COLUMN_WIDTH = 60;

/** Worksheet cells for one row, in REPORT_HEADERS order */
export function reportRowValues(row: ExpandedRow, serial: number, now: Date): CellValue[] {
  return [
    serial,
    row.preLead,
    row.lead,
    row.lob,
    row.opportunity,
    row.project,
    row.createdBy,
    formatDate(row.createdOn),
    row.product,
    row.potential,
    row.contractor,
    row.poNumber,
    row.soNumber,
    row.geography,
    ageInDays(row.createdOn, now),
    row.status
  ];
}

/** Approximate "fit to contents": widest cell text plus padding, clamped */
function fitColumns(worksheet: ExcelJS.Worksheet, table: CellValue[][]): void {
  REPORT_HEADERS.forEach((_, colIndex) => {
    const widest = table.reduce((max, values) => Math.max(max, String(values[colIndex] ?? '').length), 0);
    worksheet.getColumn(colIndex + 1).width = Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, widest + 2));
  });
}

/**
 * Build the report workbook: one header row, then one row per ExpandedRow in input order.
 */
export function buildReportWorkbook(rows: readonly ExpandedRow[], now: Date): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = now;
  const worksheet = workbook.addWorksheet(WORKSHEET_NAME);

  const header = worksheet.addRow([...REPORT_HEADERS]);
  header.eachCell((cell) => {
    cell.font = { bold: true };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
  });

  const table: CellValue[][] = [[...REPORT_HEADERS]];
  rows.forEach((row, i) => {
    const values = reportRowValues(row, i + 1, now);
    worksheet.addRow(values);
    table.push(values);
  });

  fitColumns(worksheet, table);
  return workbook;
}
