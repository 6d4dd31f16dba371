import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigValidationError,
  DASHBOARD_FILE_NAME,
  DECIMAL_PATTERN,
  DEFAULT_ALERT_CPU,
  DEFAULT_ALERT_DISK,
  DEFAULT_ALERT_MEMORY,
  DEFAULT_INTERVAL,
  HOME_DIR_NAME,
  LOG_DIR_NAME,
  LOG_FILE_NAME,
  METRICS_FILE_NAME,
  REPORT_DIR_NAME,
  monitorConfigSchema,
  parseDuration,
} from '@hostpulse/shared';
import type { AlertThresholds, MonitorConfig } from '@hostpulse/shared';

export type MonitorConfigOverrides = Partial<Omit<MonitorConfig, 'thresholds' | 'interval'>> & {
  thresholds?: Partial<AlertThresholds>;
  /** Milliseconds as a number; as text, seconds (`10`) or a duration such as `10s`. */
  interval?: number | string;
};

export interface LoadMonitorConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: MonitorConfigOverrides;
  /** Defaults to whether the process runs as root. */
  privileged?: boolean;
}

function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

/**
 * A bare number in text (`MONITOR_INTERVAL=10`, `--interval 10`) is in
 * seconds; other text is a duration string. Numeric overrides are milliseconds.
 */
function parseInterval(raw: string | number, label: string, errors: string[]): number {
  if (typeof raw === 'string' && DECIMAL_PATTERN.test(raw.trim())) {
    return Math.round(Number(raw.trim()) * 1000);
  }
  return durationOrError(raw, label, errors);
}

function durationOrError(raw: string | number, label: string, errors: string[]): number {
  try {
    return parseDuration(raw);
  } catch (err) {
    errors.push(`${label}: ${err instanceof Error ? err.message : String(err)}`);
    return DEFAULT_INTERVAL;
  }
}

function numberFromEnv(raw: string | undefined, fallback: number): number {
  return raw === undefined || raw === '' ? fallback : Number(raw);
}

/**
 * Build the monitor configuration from defaults, the environment and CLI
 * overrides (in increasing precedence), then validate it.
 */
export function loadMonitorConfig(options: LoadMonitorConfigOptions = {}): MonitorConfig {
  const { env = process.env, overrides = {} } = options;
  const errors: string[] = [];

  const home = env.HOSTPULSE_HOME || join(homedir(), HOME_DIR_NAME);
  const reportDir = overrides.reportDir ?? join(home, REPORT_DIR_NAME);
  const logDir = overrides.logDir ?? join(home, LOG_DIR_NAME);

  let interval = DEFAULT_INTERVAL;
  if (overrides.interval !== undefined) {
    interval = parseInterval(overrides.interval, 'interval', errors);
  } else if (env.MONITOR_INTERVAL) {
    interval = parseInterval(env.MONITOR_INTERVAL, 'MONITOR_INTERVAL', errors);
  }

  const candidate = {
    interval,
    continuous: overrides.continuous ?? env.CONTINUOUS_MODE === 'true',
    thresholds: {
      cpu: overrides.thresholds?.cpu ?? numberFromEnv(env.ALERT_CPU, DEFAULT_ALERT_CPU),
      memory: overrides.thresholds?.memory ?? numberFromEnv(env.ALERT_MEM, DEFAULT_ALERT_MEMORY),
      disk: overrides.thresholds?.disk ?? numberFromEnv(env.ALERT_DISK, DEFAULT_ALERT_DISK),
    },
    reportDir,
    logDir,
    metricsFile: overrides.metricsFile ?? join(reportDir, METRICS_FILE_NAME),
    dashboardFile: overrides.dashboardFile ?? join(reportDir, DASHBOARD_FILE_NAME),
    logFile: overrides.logFile ?? join(logDir, LOG_FILE_NAME),
    privileged: overrides.privileged ?? options.privileged ?? isRoot(),
    precision: overrides.precision ?? env.HOSTPULSE_PRECISION !== 'false',
    logLevel: overrides.logLevel ?? env.HOSTPULSE_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info',
  };

  const result = monitorConfigSchema.safeParse(candidate);
  if (!result.success) {
    errors.push(...result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  if (errors.length > 0 || !result.success) {
    throw new ConfigValidationError(errors);
  }

  return result.data;
}
