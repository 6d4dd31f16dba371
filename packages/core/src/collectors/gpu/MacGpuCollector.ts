import { emptyGpuMetrics } from '@hostpulse/shared';
import type { GpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { availableAdapter, type GpuCollector } from './GpuCollector.js';

function fieldValue(text: string, label: string): string | null {
  const line = text.split('\n').find((l) => l.trim().startsWith(label));
  if (!line) return null;
  const value = line.slice(line.indexOf(':') + 1).trim();
  return value.length > 0 ? value : null;
}

export class MacGpuCollector extends BaseCollector<GpuMetrics> implements GpuCollector {
  readonly domain = 'gpu';

  async collect(): Promise<GpuMetrics> {
    const metrics = emptyGpuMetrics();

    const displays = await this.optionalOutput('system_profiler', ['SPDisplaysDataType']);
    if (!displays) return metrics;

    const name = fieldValue(displays, 'Chipset Model:');
    if (name) metrics.gpu_usage_percent = availableAdapter(name);
    metrics.gpu_memory = fieldValue(displays, 'VRAM') ?? metrics.gpu_memory;

    const istats = await this.optionalOutput('istats', ['gpu', 'temp']);
    const reading = istats ? /(\d+(?:\.\d+)?)/.exec(istats)?.[1] : undefined;
    if (reading) metrics.gpu_temperature = `${reading}°C`;

    return metrics;
  }
}
