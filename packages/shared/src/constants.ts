// Under the home directory, which HOSTPULSE_HOME overrides.
export const HOME_DIR_NAME = '.hostpulse';
export const REPORT_DIR_NAME = 'reports';
export const LOG_DIR_NAME = 'logs';
export const METRICS_FILE_NAME = 'metrics.json';
export const DASHBOARD_FILE_NAME = 'dashboard.html';
export const LOG_FILE_NAME = 'monitor.log';

export const HOSTPULSE_VERSION = '1.0.0';

export const DEFAULT_INTERVAL = 5000;
export const DEFAULT_ALERT_CPU = 80;
export const DEFAULT_ALERT_MEMORY = 85;
export const DEFAULT_ALERT_DISK = 90;
export const DEFAULT_COMMAND_TIMEOUT = 15000;

export const NOT_AVAILABLE = 'N/A';
export const UNKNOWN = 'Unknown';
export const ZERO_LOAD = '0.00';
export const ZERO_UPTIME = '0d 0h 0m 0s';
