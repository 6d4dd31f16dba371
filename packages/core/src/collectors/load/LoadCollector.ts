import { ZERO_LOAD, decimalTextOrDefault, formatUptime } from '@hostpulse/shared';
import type { LoadMetrics } from '@hostpulse/shared';
import type { MetricCollector } from '../BaseCollector.js';
import { loadAverageText } from '../cpu/CpuCollector.js';

export interface LoadCollector extends MetricCollector<LoadMetrics> {
  readonly domain: 'system_load';
}

/** The three figures after `marker`, comma or space separated. */
export function parseLoadFigures(
  uptimeOutput: string | null,
  marker: string,
): Pick<LoadMetrics, 'load_1min' | 'load_5min' | 'load_15min'> {
  const figures = (loadAverageText(uptimeOutput, marker) ?? '').split(/[,\s]+/).filter(Boolean);
  return {
    load_1min: decimalTextOrDefault(figures[0], ZERO_LOAD),
    load_5min: decimalTextOrDefault(figures[1], ZERO_LOAD),
    load_15min: decimalTextOrDefault(figures[2], ZERO_LOAD),
  };
}

export function withUptime(metrics: LoadMetrics, seconds: number): LoadMetrics {
  metrics.uptime_seconds = Math.max(0, Math.floor(seconds));
  metrics.uptime = formatUptime(metrics.uptime_seconds);
  return metrics;
}
