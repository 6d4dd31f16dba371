import { Command } from 'commander';
import chalk from 'chalk';
import { Monitor, createAssembler, writeDashboard } from '@hostpulse/core';
import type { AssemblerSetup, CycleResult } from '@hostpulse/core';
import type { AlertThresholds } from '@hostpulse/shared';
import { errorMessage, initRuntime, parseAlertThresholds, type CliRuntime } from '../utils/runtime.js';
import { colorPercent, formatAlert, formatCpuDisplay } from '../utils/format.js';

interface WatchOptions {
  interval?: string;
  report?: boolean;
  alert?: Partial<AlertThresholds>;
}

/** One status line per cycle. */
export function formatCycle({ cycle, snapshot }: CycleResult): string {
  const disk = snapshot.disk[0];
  return (
    chalk.gray(`  [${cycle}] ${snapshot.timestamp}`) +
    `  cpu ${formatCpuDisplay(snapshot.cpu.cpu_usage_percent)}` +
    `  mem ${colorPercent(snapshot.memory.memory_usage_percent)}` +
    (disk ? `  disk ${colorPercent(disk.use_percent)}` : '') +
    `  load ${snapshot.system_load.load_1min}`
  );
}

export interface LoopOptions {
  /** Print each snapshot as one line of JSON instead of a status line. */
  json?: boolean;
  report?: boolean;
}

/** Run cycles until SIGINT or SIGTERM stops the monitor. */
export async function runContinuously(
  { config, logger }: CliRuntime,
  { assembler, store }: AssemblerSetup,
  options: LoopOptions,
): Promise<void> {
  const monitor = new Monitor({
    assembler,
    config,
    logger,
    onCycle: async (result) => {
      if (options.json) {
        console.log(JSON.stringify(result.snapshot));
      } else {
        console.log(formatCycle(result));
        for (const alert of result.alerts) console.log(formatAlert(alert));
      }
      if (options.report) await writeDashboard(store, config.dashboardFile);
    },
  });

  if (!options.json) {
    console.log(chalk.bold('\n  hostpulse watch'));
    console.log(chalk.gray(`  Writing ${config.metricsFile}. Press Ctrl+C to stop.\n`));
  }
  await monitor.runContinuous();
}

export const watchCommand = new Command('watch')
  .option('-i, --interval <duration>', 'Time between cycles: seconds, or a duration such as 5s or 1m (default: 5s)')
  .option('--report', 'Regenerate the HTML dashboard after every cycle')
  .option('-a, --alert <cpu,mem,disk>', 'Alert thresholds in percent', parseAlertThresholds)
  .description('Collect snapshots continuously until interrupted')
  .action(async (options: WatchOptions) => {
    try {
      const runtime = initRuntime({
        continuous: true,
        interval: options.interval,
        thresholds: options.alert,
      });
      const setup = await createAssembler(runtime.config, { logger: runtime.logger });
      await runContinuously(runtime, setup, { report: options.report });
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
