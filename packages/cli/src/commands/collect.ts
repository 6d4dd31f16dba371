import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { Monitor, createAssembler, writeDashboard } from '@hostpulse/core';
import type { AlertThresholds } from '@hostpulse/shared';
import { errorMessage, initRuntime, parseAlertThresholds } from '../utils/runtime.js';
import { formatAlert } from '../utils/format.js';
import { runContinuously } from './watch.js';
import { renderSnapshot } from '../ui/Table.js';

interface CollectOptions {
  json?: boolean;
  report?: boolean;
  alert?: Partial<AlertThresholds>;
}

export const collectCommand = new Command('collect')
  .option('--json', 'Print the snapshot as JSON')
  .option('--report', 'Also render the HTML dashboard')
  .option('-a, --alert <cpu,mem,disk>', 'Alert thresholds in percent', parseAlertThresholds)
  .description('Collect a metrics snapshot and check alert thresholds')
  .action(async (options: CollectOptions) => {
    const spinner = options.json ? null : ora('Collecting metrics...').start();

    try {
      const runtime = initRuntime({ thresholds: options.alert });
      const { config, logger } = runtime;
      const setup = await createAssembler(config, { logger });
      const { assembler, store, platform } = setup;

      // CONTINUOUS_MODE=true turns the default action into a watch loop.
      if (config.continuous) {
        spinner?.stop();
        await runContinuously(runtime, setup, options);
        return;
      }

      const monitor = new Monitor({ assembler, config, logger, handleSignals: false });

      const { snapshot, alerts } = await monitor.runOnce();
      if (options.report) await writeDashboard(store, config.dashboardFile);

      if (options.json) {
        console.log(JSON.stringify(snapshot, null, 2));
        return;
      }

      spinner?.succeed(`Snapshot written to ${config.metricsFile} ${chalk.gray(`(${platform})`)}`);
      console.log(renderSnapshot(snapshot));
      for (const alert of alerts) console.log(formatAlert(alert));
      if (options.report) console.log(chalk.green(`  ✓ Dashboard: ${config.dashboardFile}\n`));
    } catch (err) {
      if (spinner) spinner.fail(errorMessage(err));
      else console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
