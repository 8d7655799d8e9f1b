/**
 * Ask Command - Submit a question and follow its processing
 *
 * Prints processing steps as the session reports them, then the answer,
 * the generated SQL and the result rows.
 */

import chalk from 'chalk';
import ora from 'ora';
import { QueryController } from '../../query/controller.js';
import type { QueryViewState } from '../../query/controller.js';
import type { ResultRow } from '../../types/index.js';
import { copyRowsToClipboard, writeWorkbook } from '../../export/table-export.js';
import {
  createCliLogger,
  createClient,
  createEntryPrinter,
  printOutcome,
  serviceConfig,
} from '../output.js';

export interface AskOptions {
  apiUrl?: string;
  sql: boolean;
  rows: string;
  copy?: boolean;
  xlsx?: string | boolean;
  settle: string;
}

/**
 * Resolve once the session has ended or the grace period ran out
 */
function waitForSession(controller: QueryController, graceMs: number): Promise<void> {
  const settled = (state: QueryViewState) =>
    state.pollerState !== 'discovering' && state.pollerState !== 'polling';

  if (settled(controller.state)) {
    return Promise.resolve();
  }

  return new Promise(resolve => {
    const timer = setTimeout(finish, graceMs);
    const unsubscribe = controller.subscribe(state => {
      if (settled(state)) {
        finish();
      }
    });

    function finish() {
      clearTimeout(timer);
      unsubscribe();
      resolve();
    }
  });
}

/**
 * Write the rows to a workbook in dir. Returns false when the export failed.
 */
export async function saveRows(
  rows: ResultRow[],
  dir: string,
  write: (rows: ResultRow[], dir: string) => Promise<string> = writeWorkbook
): Promise<boolean> {
  try {
    const filePath = await write(rows, dir);
    console.log(chalk.green(`  ✓ saved ${filePath}`));
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.log(chalk.red(`  ✗ export failed: ${message}`));
    return false;
  }
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  const config = serviceConfig(options.apiUrl);
  const client = createClient(config);
  const controller = new QueryController({
    client,
    pollIntervalMs: config.pollIntervalMs,
    logger: createCliLogger(config.debug),
  });

  const spinner = ora({ text: 'converting question to sql', prefixText: ' ' });
  const printEntries = createEntryPrinter(line => {
    const spinning = spinner.isSpinning;
    if (spinning) spinner.stop();
    console.log(line);
    if (spinning) spinner.start();
  });
  controller.subscribe(state => printEntries(state.transcript));

  const onInterrupt = () => {
    spinner.stop();
    controller.dispose();
    console.log(chalk.gray('\n  cancelled\n'));
    process.exit(130);
  };
  process.once('SIGINT', onInterrupt);

  console.log('\n');
  console.log(chalk.cyan('  ─── querylens ───'));
  console.log(chalk.gray(`  ${config.apiUrl}`));
  console.log('\n');

  spinner.start();

  try {
    const outcome = await controller.submit(question);
    spinner.text = 'waiting for the session to finish';
    await waitForSession(controller, parseInt(options.settle, 10) || 0);
    spinner.stop();

    if (!outcome) {
      console.log(chalk.yellow('  nothing to ask: the question is empty\n'));
      process.exitCode = 1;
      return;
    }

    printOutcome(outcome, { showSql: options.sql, maxRows: parseInt(options.rows, 10) || 20 });

    if (!outcome.ok) {
      process.exitCode = 1;
      return;
    }

    if (options.copy) {
      try {
        const copied = await copyRowsToClipboard(outcome.rows);
        console.log(chalk.green(`  ✓ copied ${copied} rows to the clipboard`));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.log(chalk.red(`  ✗ copy failed: ${message}`));
        process.exitCode = 1;
      }
    }

    if (options.xlsx && outcome.rows.length > 0) {
      const dir = typeof options.xlsx === 'string' ? options.xlsx : config.exportDir;
      if (!(await saveRows(outcome.rows, dir))) {
        process.exitCode = 1;
      }
    } else if (options.xlsx) {
      console.log(chalk.yellow('  no result rows to export'));
    }

    if (options.copy || options.xlsx) {
      console.log('\n');
    }
  } finally {
    spinner.stop();
    process.off('SIGINT', onInterrupt);
    controller.dispose();
  }
}
