/**
 * Table Export
 *
 * Result rows to the clipboard (tab-separated) and to an .xlsx workbook.
 * Columns always come from the keys of the first row.
 */

import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import clipboard from 'clipboardy';
import type { ResultRow } from '../types/index.js';

export function columnsOf(rows: readonly ResultRow[]): string[] {
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Header line plus one line per row, each newline-terminated
 */
export function toTsv(rows: readonly ResultRow[]): string {
  const columns = columnsOf(rows);
  if (columns.length === 0) {
    return '';
  }

  let tsv = `${columns.join('\t')}\n`;
  for (const row of rows) {
    tsv += `${columns.map(column => cellText(row[column])).join('\t')}\n`;
  }
  return tsv;
}

/**
 * Copy rows as TSV. Returns the number of rows copied.
 */
export async function copyRowsToClipboard(
  rows: readonly ResultRow[],
  write: (text: string) => Promise<void> = text => clipboard.write(text)
): Promise<number> {
  if (rows.length === 0) {
    return 0;
  }
  await write(toTsv(rows));
  return rows.length;
}

export function exportFileName(now: Date = new Date()): string {
  return `query_results_${now.getTime()}.xlsx`;
}

export function buildWorkbook(rows: readonly ResultRow[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Sheet1');
  const columns = columnsOf(rows);

  sheet.addRow(columns);
  for (const row of rows) {
    sheet.addRow(columns.map(column => cellText(row[column])));
  }

  return workbook;
}

/**
 * Write rows to <dir>/query_results_<ms>.xlsx and return the path
 */
export async function writeWorkbook(
  rows: readonly ResultRow[],
  dir: string,
  now: Date = new Date()
): Promise<string> {
  if (rows.length === 0) {
    throw new Error('There are no result rows to export');
  }

  const filePath = path.join(dir, exportFileName(now));
  const buffer = await buildWorkbook(rows).xlsx.writeBuffer();

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, Buffer.from(buffer));
  return filePath;
}
