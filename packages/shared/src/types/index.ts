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
} from './snapshot.js';

export type { MonitorConfig, AlertThresholds, AlertMetric, Alert } from './config.js';
