/**
 * Doctor Command - Diagnose common issues
 *
 * Checks:
 * - Environment configuration
 * - Query service reachability
 * - Database connection behind the service
 * - Export directory
 */

import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs/promises';
import { validateConfig, type ServiceConfig } from '../../config.js';
import type { QueryServiceClient } from '../../clients/query-service/client.js';
import { createClient, serviceConfig } from '../output.js';

interface CheckResult {
  ok: boolean;
  message: string;
}

interface Check {
  name: string;
  check: () => Promise<CheckResult>;
}

export interface DoctorOptions {
  apiUrl?: string;
}

export async function doctorCommand(options: DoctorOptions): Promise<void> {
  const config = serviceConfig(options.apiUrl);
  const client = createClient(config);

  console.log('\n');
  console.log(chalk.cyan('  ─── querylens doctor ───'));
  console.log(chalk.gray(`  runtime: node ${process.version}`));
  console.log('\n');

  const checks: Check[] = [
    {
      name: 'configuration',
      check: async () => checkConfiguration(config),
    },
    {
      name: 'query service',
      check: () => checkService(client),
    },
    {
      name: 'database',
      check: () => checkDatabase(client),
    },
    {
      name: 'export directory',
      check: () => checkExportDir(config.exportDir),
    },
  ];

  let allPassed = true;

  for (const { name, check } of checks) {
    const spinner = ora({ text: name, prefixText: '  ' }).start();

    try {
      const result = await check();
      if (result.ok) {
        spinner.succeed(chalk.green(name) + chalk.gray(` - ${result.message}`));
      } else {
        spinner.fail(chalk.red(name) + chalk.gray(` - ${result.message}`));
        allPassed = false;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      spinner.fail(chalk.red(name) + chalk.gray(` - ${message}`));
      allPassed = false;
    }
  }

  console.log('\n');

  if (allPassed) {
    console.log(chalk.green('  ✓ all checks passed\n'));
    console.log(chalk.gray('  ready to run: querylens ask "<question>"\n'));
  } else {
    console.log(chalk.yellow('  ⚠ some checks failed\n'));
    process.exitCode = 1;
  }
}

export function checkConfiguration(config: ServiceConfig): CheckResult {
  const { valid, warnings, errors } = validateConfig(config);
  if (!valid) {
    return { ok: false, message: errors.join('; ') };
  }
  if (warnings.length > 0) {
    return { ok: true, message: `${config.apiUrl} (${warnings.join('; ')})` };
  }
  return { ok: true, message: config.apiUrl };
}

async function checkService(client: QueryServiceClient): Promise<CheckResult> {
  const health = await client.checkHealth();
  const ok = health.status.toLowerCase() === 'healthy' || health.status.toLowerCase() === 'ok';
  return { ok, message: `status ${health.status}` };
}

async function checkDatabase(client: QueryServiceClient): Promise<CheckResult> {
  const check = await client.checkDatabase();
  return { ok: check.success, message: check.message };
}

async function checkExportDir(dir: string): Promise<CheckResult> {
  try {
    const stat = await fs.stat(dir);
    return stat.isDirectory()
      ? { ok: true, message: dir }
      : { ok: false, message: `${dir} is not a directory` };
  } catch {
    return { ok: true, message: `${dir} will be created on first export` };
  }
}
