import { createLogger, setDefaultLogger } from '@hostpulse/shared';
import type { AlertThresholds, Logger, MonitorConfig } from '@hostpulse/shared';
import { loadMonitorConfig, type MonitorConfigOverrides } from '@hostpulse/core';

export interface CliRuntime {
  config: MonitorConfig;
  logger: Logger;
}

/**
 * Parse `--alert 80,85,90` (cpu, memory, disk). Empty positions keep the
 * configured threshold, so `--alert ,,95` only changes the disk threshold.
 */
export function parseAlertThresholds(value: string): Partial<AlertThresholds> {
  const [cpu, memory, disk] = value.split(',').map((part) => part.trim());
  const thresholds: Partial<AlertThresholds> = {};
  if (cpu) thresholds.cpu = Number(cpu);
  if (memory) thresholds.memory = Number(memory);
  if (disk) thresholds.disk = Number(disk);
  return thresholds;
}

/**
 * Load the configuration and install the process-wide logger, which writes
 * to stderr and to the monitor log file.
 */
export function initRuntime(overrides: MonitorConfigOverrides = {}): CliRuntime {
  const config = loadMonitorConfig({ overrides });
  const logger = createLogger({
    level: config.logLevel,
    destination: config.logFile,
    pretty: process.stderr.isTTY === true,
  });
  setDefaultLogger(logger);
  return { config, logger };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
