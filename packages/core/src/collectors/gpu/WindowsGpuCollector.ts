import { emptyGpuMetrics, parseIntegerOrDefault, truncateTo } from '@hostpulse/shared';
import type { GpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { availableAdapter, type GpuCollector } from './GpuCollector.js';

const BYTES_PER_GB = 1073741824;

export class WindowsGpuCollector extends BaseCollector<GpuMetrics> implements GpuCollector {
  readonly domain = 'gpu';

  async collect(): Promise<GpuMetrics> {
    const metrics = emptyGpuMetrics();

    const name = await this.management(
      'Win32_VideoController',
      'Select-Object -First 1 -ExpandProperty Name',
    );
    if (name) metrics.gpu_usage_percent = availableAdapter(name);

    const adapterRam = parseIntegerOrDefault(
      await this.management('Win32_VideoController', 'Select-Object -First 1 -ExpandProperty AdapterRAM'),
      -1,
    );
    if (adapterRam >= 0) {
      metrics.gpu_memory = this.context.precision
        ? `${truncateTo(adapterRam / BYTES_PER_GB, 2).toFixed(2)} GB`
        : `${adapterRam} bytes`;
    }

    return metrics;
  }
}
