/**
 * DB Check Command - Ask the query service to test its database connection
 */

import chalk from 'chalk';
import ora from 'ora';
import { createClient, RULE, serviceConfig } from '../output.js';

export interface DbCheckOptions {
  apiUrl?: string;
}

export async function dbCheckCommand(options: DbCheckOptions): Promise<void> {
  const config = serviceConfig(options.apiUrl);
  const client = createClient(config);

  console.log('\n');
  const spinner = ora({ text: 'checking database connection', prefixText: ' ' }).start();

  try {
    const check = await client.checkDatabase();

    if (!check.success) {
      spinner.fail(chalk.red(check.message));
      process.exitCode = 1;
      console.log('\n');
      return;
    }

    spinner.succeed(chalk.green(check.message));
    console.log('\n');
    console.log(chalk.gray('  database'));
    console.log(RULE);
    if (check.connectionTime !== null) {
      console.log(`  connection time:  ${chalk.white(`${check.connectionTime}s`)}`);
    }
    if (check.databaseInfo) {
      const { database, host, port } = check.databaseInfo;
      console.log(`  database:         ${chalk.white(database)}`);
      console.log(`  host:             ${chalk.white(`${host}:${port}`)}`);
    }
    console.log('\n');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.fail(chalk.red('could not reach the query service'));
    console.log(chalk.gray(`\n  ${message}`));
    console.log(chalk.gray(`  check that the query service is running (${config.apiUrl})\n`));
    process.exitCode = 1;
  }
}
