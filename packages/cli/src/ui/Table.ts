import Table from 'cli-table3';
import chalk from 'chalk';
import type { DiskEntry, NetworkEntry, Snapshot } from '@hostpulse/shared';
import {
  colorPercent,
  formatBytes,
  formatCpuDisplay,
  formatMegabytes,
  formatText,
} from '../utils/format.js';

const TABLE_STYLE = {
  head: [],
  border: ['gray'],
};

export function renderDiskTable(disks: readonly DiskEntry[]): string {
  const table = new Table({
    head: ['filesystem', 'size', 'used', 'avail', 'use', 'mount', 'smart'].map((h) => chalk.bold(h)),
    style: TABLE_STYLE,
  });

  for (const disk of disks) {
    table.push([
      disk.filesystem,
      disk.size,
      disk.used,
      disk.available,
      colorPercent(disk.use_percent),
      disk.mount_point,
      formatText(disk.smart_status),
    ]);
  }

  return table.toString();
}

export function renderNetworkTable(interfaces: readonly NetworkEntry[]): string {
  const table = new Table({
    head: ['interface', 'ip', 'rx', 'tx', 'rx pkts', 'tx pkts', 'errors'].map((h) => chalk.bold(h)),
    style: TABLE_STYLE,
  });

  for (const n of interfaces) {
    const errors = n.rx_errors + n.tx_errors;
    table.push([
      n.interface,
      formatText(n.ip_address),
      formatBytes(n.rx_bytes),
      formatBytes(n.tx_bytes),
      String(n.rx_packets),
      String(n.tx_packets),
      errors > 0 ? chalk.yellow(String(errors)) : String(errors),
    ]);
  }

  return table.toString();
}

export function renderSnapshot(snapshot: Snapshot): string {
  const { cpu, gpu, memory, system_load: load } = snapshot;
  const lines: string[] = [];

  lines.push(chalk.bold(`\n  ${snapshot.hostname}`) + chalk.gray(`  ${snapshot.timestamp}`));
  lines.push(`  Uptime:      ${load.uptime}`);
  lines.push('');
  lines.push(chalk.bold('  CPU'));
  lines.push(`  Usage:       ${formatCpuDisplay(cpu.cpu_usage_percent)}`);
  lines.push(`  Cores:       ${cpu.cpu_cores}`);
  lines.push(`  Model:       ${formatText(cpu.cpu_model)}`);
  lines.push(`  Temperature: ${formatText(cpu.cpu_temperature)}`);
  lines.push(`  Load:        ${load.load_1min} ${load.load_5min} ${load.load_15min}`);
  lines.push('');
  lines.push(chalk.bold('  Memory'));
  lines.push(
    `  Used:        ${formatMegabytes(memory.memory_used_mb)} / ${formatMegabytes(memory.memory_total_mb)}` +
      ` (${colorPercent(memory.memory_usage_percent)})`,
  );
  lines.push(`  Available:   ${formatMegabytes(memory.memory_available_mb)}`);
  if (memory.swap_total_mb > 0) {
    lines.push(
      `  Swap:        ${formatMegabytes(memory.swap_used_mb)} / ${formatMegabytes(memory.swap_total_mb)}` +
        ` (${colorPercent(memory.swap_usage_percent)})`,
    );
  }
  lines.push('');
  lines.push(chalk.bold('  GPU'));
  lines.push(`  Usage:       ${formatText(gpu.gpu_usage_percent)}`);
  lines.push(`  Temperature: ${formatText(gpu.gpu_temperature)}`);
  lines.push(`  Memory:      ${formatText(gpu.gpu_memory)}`);
  lines.push('');

  lines.push(chalk.bold('  Disks'));
  lines.push(snapshot.disk.length > 0 ? renderDiskTable(snapshot.disk) : chalk.gray('  No disks reported'));
  lines.push('');
  lines.push(chalk.bold('  Network'));
  lines.push(
    snapshot.network.length > 0
      ? renderNetworkTable(snapshot.network)
      : chalk.gray('  No interfaces reported'),
  );
  lines.push('');

  return lines.join('\n');
}
