#!/usr/bin/env node
/**
 * querylens CLI
 *
 * Ask a database questions in plain language and follow the agents that
 * answer them.
 *
 * Commands:
 *   ask       - Submit a question and print the answer
 *   watch     - Follow a session's processing steps
 *   db-check  - Test the service's database connection
 *   doctor    - Diagnose issues
 *   format    - Pretty-print a SQL statement
 *   config    - View/edit dashboard preferences
 *   tui       - Interactive dashboard (default)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import type { AskOptions } from './commands/ask.js';
import type { WatchOptions } from './commands/watch.js';
import type { DbCheckOptions } from './commands/db-check.js';
import type { DoctorOptions } from './commands/doctor.js';

const VERSION = '0.1.0';

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n  ✗ unhandled error'));
  console.error(chalk.gray(`  ${reason instanceof Error ? reason.message : String(reason)}\n`));
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error(chalk.red('\n  ✗ unexpected error'));
  console.error(chalk.gray(`  ${error.message}\n`));
  process.exit(1);
});

const program = new Command();

program
  .name('querylens')
  .description('ask your database questions in plain language')
  .version(VERSION);

program
  .command('ask')
  .description('submit a question and follow its processing')
  .argument('<question...>', 'the question, in plain language')
  .option('-u, --api-url <url>', 'query service url')
  .option('--no-sql', 'hide the generated sql')
  .option('-r, --rows <n>', 'result rows to print', '20')
  .option('-c, --copy', 'copy the result rows to the clipboard')
  .option('-x, --xlsx [dir]', 'save the result rows as an excel workbook')
  .option('--settle <ms>', 'how long to wait for the session to finish after the answer', '5000')
  .action(async (words: string[], options: AskOptions) => {
    const { askCommand } = await import('./commands/ask.js');
    await askCommand(words.join(' '), options);
  });

program
  .command('watch')
  .description('follow the processing steps of a session')
  .argument('[sessionId]', 'session to follow (default: the latest)')
  .option('-u, --api-url <url>', 'query service url')
  .action(async (sessionId: string | undefined, options: WatchOptions) => {
    const { watchCommand } = await import('./commands/watch.js');
    await watchCommand(sessionId, options);
  });

program
  .command('db-check')
  .description('check the database connection behind the query service')
  .option('-u, --api-url <url>', 'query service url')
  .action(async (options: DbCheckOptions) => {
    const { dbCheckCommand } = await import('./commands/db-check.js');
    await dbCheckCommand(options);
  });

// Doctor command - diagnose issues
program
  .command('doctor')
  .description('diagnose common issues')
  .option('-u, --api-url <url>', 'query service url')
  .action(async (options: DoctorOptions) => {
    const { doctorCommand } = await import('./commands/doctor.js');
    await doctorCommand(options);
  });

program
  .command('format')
  .description('pretty-print a sql statement')
  .argument('[sql]', 'statement to format (default: read stdin)')
  .action(async (sql: string | undefined) => {
    const { formatCommand } = await import('./commands/format.js');
    await formatCommand(sql);
  });

// Config command - view/edit preferences
program
  .command('config')
  .description('view or edit dashboard preferences')
  .argument('[key]', 'config key to get/set')
  .argument('[value]', 'value to set')
  .action(async (key: string | undefined, value: string | undefined) => {
    const { configCommand } = await import('./commands/config.js');
    await configCommand(key, value);
  });

program
  .command('tui', { isDefault: true })
  .description('open the interactive dashboard')
  .option('-u, --api-url <url>', 'query service url')
  .action(async (options: { apiUrl?: string }) => {
    const { launchTui } = await import('../tui/index.js');
    await launchTui({ apiUrl: options.apiUrl, version: VERSION });
    process.exit(0);
  });

// Version command with runtime info
program
  .command('version')
  .description('show version and runtime info')
  .action(() => {
    console.log(chalk.cyan('\n  querylens') + chalk.gray(` v${VERSION}`));
    console.log(chalk.gray(`  runtime: node ${process.version}\n`));
  });

await program.parseAsync();
