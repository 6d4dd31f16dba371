#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTPULSE_VERSION } from '@hostpulse/shared';
import { collectCommand } from './commands/collect.js';
import { watchCommand } from './commands/watch.js';
import { reportCommand } from './commands/report.js';
import { showCommand } from './commands/show.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('hostpulse')
  .version(HOSTPULSE_VERSION, '-v, --version')
  .description(chalk.bold('hostpulse') + ' - cross-platform host metrics snapshots')
  .addCommand(collectCommand)
  .addCommand(watchCommand)
  .addCommand(reportCommand)
  .addCommand(showCommand)
  .addCommand(doctorCommand);

// Default to 'collect' when no command given
program.action(async () => {
  await collectCommand.parseAsync([], { from: 'user' });
});

await program.parseAsync(process.argv);
