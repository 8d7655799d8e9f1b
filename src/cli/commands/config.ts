/**
 * Config Command - View/edit dashboard preferences
 *
 * Usage:
 *   querylens config              - Show all preferences
 *   querylens config <key>        - Get specific key
 *   querylens config <key> <val>  - Set specific key
 */

import chalk from 'chalk';
import {
  CONFIG_FILE,
  isConfigKey,
  loadConfig,
  saveConfig,
  setConfigValue,
} from '../../tui/utils/config.js';

export async function configCommand(key?: string, value?: string): Promise<void> {
  console.log('\n');
  console.log(chalk.cyan('  ─── querylens config ───'));
  console.log(chalk.gray(`  ${CONFIG_FILE}`));
  console.log('\n');

  const config = loadConfig();

  if (!key) {
    for (const [k, v] of Object.entries(config)) {
      console.log(chalk.gray(`  ${k}=`) + chalk.white(String(v)));
    }
    console.log('\n');
    return;
  }

  if (!isConfigKey(key)) {
    console.log(chalk.yellow(`  ${key} not found`));
    console.log(chalk.gray('  keys: apiUrl, exportDir, showSql, transcriptLines\n'));
    process.exitCode = 1;
    return;
  }

  if (value === undefined) {
    console.log(chalk.gray(`  ${key}=`) + chalk.white(String(config[key])));
    console.log('\n');
    return;
  }

  try {
    const updated = setConfigValue(config, key, value);
    saveConfig(updated);
    console.log(chalk.green(`  ✓ ${key}=${String(updated[key])}\n`));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.log(chalk.red(`  ✗ ${message}\n`));
    process.exitCode = 1;
  }
}
