// Types
export type {
  Platform,
  MetricDomain,
  CpuMetrics,
  GpuMetrics,
  DiskEntry,
  MemoryMetrics,
  NetworkEntry,
  LoadMetrics,
  Snapshot,
  DomainResults,
  MonitorConfig,
  AlertThresholds,
  AlertMetric,
  Alert,
} from './types/index.js';

// Constants
export {
  HOME_DIR_NAME,
  REPORT_DIR_NAME,
  LOG_DIR_NAME,
  METRICS_FILE_NAME,
  DASHBOARD_FILE_NAME,
  LOG_FILE_NAME,
  HOSTPULSE_VERSION,
  DEFAULT_INTERVAL,
  DEFAULT_ALERT_CPU,
  DEFAULT_ALERT_MEMORY,
  DEFAULT_ALERT_DISK,
  DEFAULT_COMMAND_TIMEOUT,
  NOT_AVAILABLE,
  UNKNOWN,
  ZERO_LOAD,
  ZERO_UPTIME,
} from './constants.js';

export {
  emptyCpuMetrics,
  emptyGpuMetrics,
  emptyMemoryMetrics,
  emptyNetworkEntry,
  emptyLoadMetrics,
  emptyDomainResults,
} from './defaults.js';

// Schemas
export { monitorConfigSchema, alertThresholdsSchema } from './schemas/config.schema.js';
export type { ValidatedMonitorConfig } from './schemas/config.schema.js';

export {
  snapshotSchema,
  cpuMetricsSchema,
  gpuMetricsSchema,
  diskEntrySchema,
  memoryMetricsSchema,
  networkEntrySchema,
  loadMetricsSchema,
} from './schemas/snapshot.schema.js';
export type { ValidatedSnapshot } from './schemas/snapshot.schema.js';

// Utilities
export {
  DECIMAL_PATTERN,
  INTEGER_PATTERN,
  parseNumericOrDefault,
  parseIntegerOrDefault,
  decimalTextOrDefault,
  truncatedPercent,
  roundTo,
  truncateTo,
  millidegreesToCelsius,
  columns,
  firstLine,
  parseDuration,
  formatDuration,
  formatBytes,
  formatCpu,
  formatUptime,
} from './utils/parser.js';

export {
  createLogger,
  getLogger,
  setDefaultLogger,
  isLogLevel,
  LOG_LEVELS,
} from './utils/logger.js';
export type { LogLevel, Logger, CreateLoggerOptions } from './utils/logger.js';

export {
  HostPulseError,
  SourceUnavailableError,
  ConfigValidationError,
  SnapshotNotFoundError,
  InvalidSnapshotError,
  SnapshotWriteError,
} from './utils/errors.js';
