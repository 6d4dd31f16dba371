import type { LogLevel } from '../utils/logger.js';

export interface AlertThresholds {
  cpu: number;
  memory: number;
  disk: number;
}

export interface MonitorConfig {
  /** Sleep between cycles, in milliseconds. */
  interval: number;
  continuous: boolean;
  thresholds: AlertThresholds;
  reportDir: string;
  logDir: string;
  metricsFile: string;
  dashboardFile: string;
  logFile: string;
  /** Whether privilege-gated sources (SMART) may be queried. */
  privileged: boolean;
  /** When false, derived percentages and unit conversions stay at their defaults. */
  precision: boolean;
  logLevel: LogLevel;
}

export type AlertMetric = 'cpu' | 'memory' | 'disk';

export interface Alert {
  metric: AlertMetric;
  value: number;
  threshold: number;
  message: string;
}
