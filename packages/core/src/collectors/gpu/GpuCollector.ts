import type { GpuMetrics } from '@hostpulse/shared';
import type { MetricCollector } from '../BaseCollector.js';

export interface GpuCollector extends MetricCollector<GpuMetrics> {
  readonly domain: 'gpu';
}

/** Integrated adapters expose no usage figure, only their name. */
export function availableAdapter(name: string): string {
  return `Available (${name})`;
}
