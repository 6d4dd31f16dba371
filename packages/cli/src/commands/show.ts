import { Command } from 'commander';
import chalk from 'chalk';
import { SnapshotStore } from '@hostpulse/core';
import { errorMessage, initRuntime } from '../utils/runtime.js';
import { renderSnapshot } from '../ui/Table.js';

export const showCommand = new Command('show')
  .alias('status')
  .option('--json', 'Output as JSON')
  .description('Show the last collected snapshot')
  .action(async (options: { json?: boolean }) => {
    try {
      const { config, logger } = initRuntime();
      const snapshot = await new SnapshotStore(config.metricsFile, logger).read();

      if (options.json) {
        console.log(JSON.stringify(snapshot, null, 2));
        return;
      }

      console.log(renderSnapshot(snapshot));
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
