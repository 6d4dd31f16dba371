import { truncatedPercent } from '@hostpulse/shared';
import type { MemoryMetrics } from '@hostpulse/shared';
import type { MetricCollector } from '../BaseCollector.js';

export interface MemoryCollector extends MetricCollector<MemoryMetrics> {
  readonly domain: 'memory';
}

export const BYTES_PER_MB = 1024 * 1024;

/** Fill in usage percentages; they stay 0 without a total or without precision. */
export function withPercentages(metrics: MemoryMetrics, precision: boolean): MemoryMetrics {
  if (!precision) return metrics;
  if (metrics.memory_total_mb > 0) {
    metrics.memory_usage_percent = truncatedPercent(metrics.memory_used_mb, metrics.memory_total_mb);
  }
  if (metrics.swap_total_mb > 0) {
    metrics.swap_usage_percent = truncatedPercent(metrics.swap_used_mb, metrics.swap_total_mb);
  }
  return metrics;
}
