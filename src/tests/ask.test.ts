/**
 * Ask Command Tests
 *
 * Saving result rows to a workbook from the command line.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';
import { saveRows } from '../cli/commands/ask.js';

const rows = [{ id: 1, name: 'Kim' }];

describe('saveRows', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the saved path', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const write = vi.fn(async () => '/exports/query_result.xlsx');

    await expect(saveRows(rows, '/exports', write)).resolves.toBe(true);

    expect(write).toHaveBeenCalledWith(rows, '/exports');
    expect(log).toHaveBeenCalledWith(chalk.green('  ✓ saved /exports/query_result.xlsx'));
  });

  it('should report a failed write instead of throwing', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const write = vi.fn(async (): Promise<string> => {
      throw new Error("EACCES: permission denied, mkdir '/exports'");
    });

    await expect(saveRows(rows, '/exports', write)).resolves.toBe(false);

    expect(log).toHaveBeenCalledWith(chalk.red("  ✗ export failed: EACCES: permission denied, mkdir '/exports'"));
  });
});
