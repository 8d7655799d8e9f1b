/**
 * Watch Command - Follow a session's processing steps
 *
 * With an id the session is pinned; without one the newest session is
 * followed, switching over when a newer one appears.
 */

import chalk from 'chalk';
import { QueryController } from '../../query/controller.js';
import { createCliLogger, createClient, createEntryPrinter, serviceConfig } from '../output.js';

export interface WatchOptions {
  apiUrl?: string;
}

export async function watchCommand(sessionId: string | undefined, options: WatchOptions): Promise<void> {
  const config = serviceConfig(options.apiUrl);
  const controller = new QueryController({
    client: createClient(config),
    pollIntervalMs: config.pollIntervalMs,
    logger: createCliLogger(config.debug),
  });

  console.log('\n');
  console.log(chalk.cyan('  ─── querylens watch ───'));
  console.log(chalk.gray(sessionId ? `  session ${sessionId}` : '  following the latest session'));
  console.log(chalk.gray('  press ctrl+c to stop'));
  console.log('\n');

  const printEntries = createEntryPrinter();

  await new Promise<void>(resolve => {
    const unsubscribe = controller.subscribe(state => {
      printEntries(state.transcript);
      if (state.pollerState === 'completed' || state.pollerState === 'cancelled') {
        finish();
      }
    });

    const onInterrupt = () => {
      controller.cancel();
    };
    process.once('SIGINT', onInterrupt);

    function finish() {
      unsubscribe();
      process.off('SIGINT', onInterrupt);
      resolve();
    }

    controller.watch(sessionId);
  });

  const finalState = controller.state.pollerState;
  controller.dispose();

  console.log('\n');
  if (finalState === 'completed') {
    console.log(chalk.green('  ✓ session finished\n'));
  } else {
    console.log(chalk.gray('  stopped\n'));
  }
}
