import { Command } from 'commander';
import ora from 'ora';
import { SnapshotStore, writeDashboard } from '@hostpulse/core';
import { errorMessage, initRuntime } from '../utils/runtime.js';

export const reportCommand = new Command('report')
  .option('-o, --output <file>', 'Dashboard file to write')
  .description('Render the HTML dashboard from the last snapshot')
  .action(async (options: { output?: string }) => {
    const spinner = ora('Rendering dashboard...').start();

    try {
      const { config, logger } = initRuntime({ dashboardFile: options.output });
      const store = new SnapshotStore(config.metricsFile, logger);
      const file = await writeDashboard(store, config.dashboardFile);
      spinner.succeed(`Dashboard written to ${file}`);
    } catch (err) {
      spinner.fail(errorMessage(err));
      process.exitCode = 1;
    }
  });
