import type { CpuMetrics } from '@hostpulse/shared';
import type { MetricCollector } from '../BaseCollector.js';

export interface CpuCollector extends MetricCollector<CpuMetrics> {
  readonly domain: 'cpu';
}

/** Text after `marker` in `uptime` output, e.g. `0.52, 0.58, 0.59`. */
export function loadAverageText(uptimeOutput: string | null, marker: string): string | null {
  if (!uptimeOutput) return null;
  const index = uptimeOutput.indexOf(marker);
  if (index < 0) return null;
  const text = uptimeOutput.slice(index + marker.length).trim();
  return text.length > 0 ? text : null;
}

/** First `+45.0°C`-style reading on a line, sign dropped. */
export function celsiusReading(line: string): string | null {
  const match = /\+?(\d+(?:\.\d+)?)\s*°C/.exec(line);
  return match ? `${match[1]}°C` : null;
}
