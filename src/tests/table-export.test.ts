/**
 * Table Export Tests
 *
 * TSV for the clipboard and .xlsx workbooks.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  buildWorkbook,
  cellText,
  copyRowsToClipboard,
  exportFileName,
  toTsv,
  writeWorkbook,
} from '../export/table-export.js';

const rows = [
  { id: 1, name: 'Ann', signed_up: null },
  { id: 2, name: 'Bo', signed_up: '2026-02-01' },
];

describe('cellText', () => {
  it('should render empty values as blank cells', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(undefined)).toBe('');
  });

  it('should render dates and objects readably', () => {
    expect(cellText(new Date('2026-02-01T00:00:00Z'))).toBe('2026-02-01T00:00:00.000Z');
    expect(cellText({ a: 1 })).toBe('{"a":1}');
    expect(cellText(true)).toBe('true');
  });
});

describe('toTsv', () => {
  it('should write a header line and one line per row', () => {
    expect(toTsv(rows)).toBe('id\tname\tsigned_up\n1\tAnn\t\n2\tBo\t2026-02-01\n');
  });

  it('should take the columns from the first row', () => {
    expect(toTsv([{ a: 1 }, { a: 2, b: 3 }])).toBe('a\n1\n2\n');
  });

  it('should be empty without rows', () => {
    expect(toTsv([])).toBe('');
  });
});

describe('copyRowsToClipboard', () => {
  it('should write the TSV and report the row count', async () => {
    const write = vi.fn(async (_text: string) => undefined);

    await expect(copyRowsToClipboard(rows, write)).resolves.toBe(2);
    expect(write).toHaveBeenCalledWith('id\tname\tsigned_up\n1\tAnn\t\n2\tBo\t2026-02-01\n');
  });

  it('should not touch the clipboard without rows', async () => {
    const write = vi.fn(async (_text: string) => undefined);

    await expect(copyRowsToClipboard([], write)).resolves.toBe(0);
    expect(write).not.toHaveBeenCalled();
  });
});

describe('workbooks', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'querylens-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should name exports after the time', () => {
    expect(exportFileName(new Date(1767225600000))).toBe('query_results_1767225600000.xlsx');
  });

  it('should put the header and rows on one sheet', () => {
    const sheet = buildWorkbook(rows).getWorksheet('Sheet1');

    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(2).value).toBe('name');
    expect(sheet?.getRow(3).getCell(3).value).toBe('2026-02-01');
  });

  it('should write the workbook into a new directory', async () => {
    const target = path.join(dir, 'nested');

    const filePath = await writeWorkbook(rows, target, new Date(1767225600000));

    expect(filePath).toBe(path.join(target, 'query_results_1767225600000.xlsx'));
    expect(fs.statSync(filePath).size).toBeGreaterThan(0);
  });

  it('should refuse to export nothing', async () => {
    await expect(writeWorkbook([], dir)).rejects.toThrow('There are no result rows to export');
  });
});
