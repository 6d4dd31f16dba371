import chalk from 'chalk';
import { NOT_AVAILABLE, UNKNOWN, formatBytes, formatCpu, formatUptime } from '@hostpulse/shared';
import type { Alert } from '@hostpulse/shared';

export { formatBytes, formatUptime, formatCpu };

const BYTES_PER_MB = 1024 * 1024;

/** Red above 80%, yellow above 50%, green otherwise. */
export function colorPercent(value: number, text: string = `${value}%`): string {
  if (value > 80) return chalk.red(text);
  if (value > 50) return chalk.yellow(text);
  return chalk.green(text);
}

export function formatCpuDisplay(cpu: number): string {
  return colorPercent(cpu, formatCpu(cpu));
}

export function formatMegabytes(mb: number): string {
  if (mb <= 0) return chalk.gray('-');
  return formatBytes(mb * BYTES_PER_MB);
}

/** Sentinel values are dimmed. */
export function formatText(value: string): string {
  return value === NOT_AVAILABLE || value === UNKNOWN ? chalk.gray(value) : value;
}

export function formatAlert(alert: Alert): string {
  return chalk.red(`  ⚠ ${alert.message}`);
}

export function checkMark(ok: boolean): string {
  return ok ? chalk.green('✓') : chalk.gray('-');
}
