/**
 * TUI Entry Point
 *
 * Renders the querylens dashboard using Ink.
 */

import React from 'react';
import { render } from 'ink';
import { App } from './App.js';
import { loadConfig, TuiConfig } from './utils/config.js';

export interface LaunchOptions {
  apiUrl?: string;
  version?: string;
}

export async function launchTui(options: LaunchOptions = {}): Promise<void> {
  const saved = loadConfig();
  const config: TuiConfig = options.apiUrl
    ? { ...saved, apiUrl: options.apiUrl.replace(/\/+$/, '') }
    : saved;

  // Clear screen before rendering
  process.stdout.write('\x1B[2J\x1B[0f');

  const { waitUntilExit } = render(<App config={config} version={options.version} />);
  await waitUntilExit();
  console.log('\nGoodbye!');
}
