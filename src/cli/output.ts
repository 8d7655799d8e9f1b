/**
 * Shared terminal output for the CLI commands
 */

import chalk from 'chalk';
import type { QueryOutcome, ResultRow, TranscriptEntry, TranscriptEntryKind } from '../types/index.js';
import type { PollerLogger } from '../session/poller.js';
import { QueryServiceClient } from '../clients/query-service/client.js';
import { getConfig, type ServiceConfig } from '../config.js';
import { cellText, columnsOf } from '../export/table-export.js';

export const RULE = chalk.gray('  ─────────────────────────────────');

const KIND_PAINT: Record<TranscriptEntryKind, (text: string) => string> = {
  user: chalk.blue,
  agent: chalk.green,
  error: chalk.red,
  success: chalk.green,
};

export function serviceConfig(apiUrl?: string): ServiceConfig {
  const config = getConfig();
  return apiUrl ? { ...config, apiUrl: apiUrl.replace(/\/+$/, '') } : config;
}

export function createClient(config: ServiceConfig): QueryServiceClient {
  return new QueryServiceClient({
    baseUrl: config.apiUrl,
    retry: { timeoutMs: config.requestTimeoutMs },
    queryTimeoutMs: config.queryTimeoutMs,
  });
}

export function createCliLogger(debug: boolean): PollerLogger {
  return {
    debug: (message) => {
      if (debug) {
        console.error(chalk.gray(`  [debug] ${message}`));
      }
    },
    warn: (message, error) => {
      const reason = error instanceof Error ? chalk.gray(` (${error.message})`) : '';
      console.error(chalk.yellow(`  ⚠ ${message}`) + reason);
    },
  };
}

export function formatEntry(entry: TranscriptEntry): string {
  const time = chalk.gray(entry.producedAt.toLocaleTimeString('en-GB', { hour12: false }));
  const label = KIND_PAINT[entry.kind](entry.label);
  const text = entry.text.split('\n').join('\n    ');
  return `  ${time} ${label}\n    ${text}`;
}

/**
 * Prints transcript entries as they arrive. A shorter transcript than last
 * time means a new round started.
 */
export function createEntryPrinter(write: (line: string) => void = line => console.log(line)) {
  let printed = 0;
  return (entries: readonly TranscriptEntry[]): void => {
    if (entries.length < printed) {
      printed = 0;
    }
    for (const entry of entries.slice(printed)) {
      write(formatEntry(entry));
    }
    printed = entries.length;
  };
}

export function printRows(rows: readonly ResultRow[], maxRows: number): void {
  const columns = columnsOf(rows);
  const shown = rows.slice(0, maxRows);
  const widths = columns.map(column =>
    Math.min(30, shown.reduce((max, row) => Math.max(max, cellText(row[column]).length), column.length))
  );
  const line = (cells: string[]) =>
    '  ' + cells.map((cell, i) => cell.slice(0, widths[i]).padEnd(widths[i])).join('  ');

  console.log(chalk.cyan(line(columns)));
  for (const row of shown) {
    console.log(line(columns.map(column => cellText(row[column]))));
  }
  if (rows.length > shown.length) {
    console.log(chalk.gray(`  … ${rows.length - shown.length} more rows`));
  }
}

export function printOutcome(outcome: QueryOutcome, options: { showSql: boolean; maxRows: number }): void {
  console.log('\n');

  if (!outcome.ok) {
    console.log(chalk.red(`  ✗ ${outcome.message}`));
    console.log('\n');
    for (const line of outcome.hint.split('\n')) {
      console.log(chalk.gray(`  ${line}`));
    }
    if (outcome.failure === 'application' && outcome.details) {
      console.log('\n' + chalk.gray('  technical details'));
      console.log(RULE);
      console.log(chalk.gray(`  ${outcome.details}`));
    }
    console.log('\n');
    return;
  }

  console.log(chalk.green(`  ✓ ${outcome.message}`));

  if (options.showSql && outcome.formattedSql) {
    console.log('\n' + chalk.gray('  sql'));
    console.log(RULE);
    for (const line of outcome.formattedSql.split('\n')) {
      console.log(chalk.magenta(`  ${line}`));
    }
  }

  console.log('\n' + chalk.gray(`  ${outcome.rows.length} rows`));
  console.log(RULE);
  if (outcome.rows.length > 0) {
    printRows(outcome.rows, options.maxRows);
  }
  console.log('\n');
}
