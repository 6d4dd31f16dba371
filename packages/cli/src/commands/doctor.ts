import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import type { Platform } from '@hostpulse/shared';
import { NodeHostShell, detectPlatform, findPowerShell } from '@hostpulse/core';
import { errorMessage, initRuntime } from '../utils/runtime.js';
import { checkMark } from '../utils/format.js';

const POSIX_TOOLS = ['top', 'uptime', 'df', 'smartctl'];

/** Data-source tools each platform's collectors look for. */
export const DOCTOR_TOOLS: Record<Platform, string[]> = {
  linux: [...POSIX_TOOLS, 'nproc', 'sensors', 'free', 'ip', 'ifconfig', 'nvidia-smi', 'rocm-smi'],
  macos: [
    ...POSIX_TOOLS,
    'sysctl',
    'vm_stat',
    'netstat',
    'ifconfig',
    'system_profiler',
    'osx-cpu-temp',
    'istats',
  ],
  windows: ['pwsh', 'powershell.exe', 'netstat', 'ipconfig', 'systeminfo', 'df'],
  unknown: [...POSIX_TOOLS, 'nproc', 'free', 'ip', 'ifconfig'],
};

export const doctorCommand = new Command('doctor')
  .description('Diagnose the host: platform, privileges and available data sources')
  .action(async () => {
    try {
      const { config } = initRuntime();
      const shell = new NodeHostShell();
      let issues = 0;

      console.log(chalk.bold('\n  hostpulse doctor\n'));

      const nodeVersion = process.versions.node;
      if (parseInt(nodeVersion.split('.')[0], 10) >= 20) {
        console.log(chalk.green(`  ✓ Node.js version: ${nodeVersion}`));
      } else {
        console.log(chalk.red(`  ✗ Node.js version: ${nodeVersion} (requires >= 20)`));
        issues++;
      }

      const platform = await detectPlatform(shell);
      if (platform === 'unknown') {
        console.log(chalk.yellow('  ⚠ Platform: unknown (Linux sources are tried)'));
      } else {
        console.log(chalk.green(`  ✓ Platform: ${platform}`));
      }

      if (platform === 'windows' && !(await findPowerShell(shell))) {
        console.log(chalk.red('  ✗ PowerShell not found on PATH'));
        issues++;
      }

      if (config.privileged) {
        console.log(chalk.green('  ✓ Privileged: SMART health is collected'));
      } else {
        console.log(chalk.gray('  - Unprivileged: SMART health is skipped'));
      }

      if (existsSync(config.metricsFile)) {
        console.log(chalk.green(`  ✓ Snapshot: ${config.metricsFile}`));
      } else {
        console.log(chalk.gray(`  - Snapshot: not collected yet (${config.metricsFile})`));
      }

      console.log(chalk.bold('\n  Data sources'));
      for (const tool of DOCTOR_TOOLS[platform]) {
        console.log(`  ${checkMark(await shell.hasCommand(tool))} ${tool}`);
      }

      console.log('');
      if (issues > 0) {
        console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
        process.exitCode = 1;
      } else {
        console.log(chalk.green('  No issues found. Missing tools only leave their fields at N/A.\n'));
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
