import { emptyCpuMetrics } from '@hostpulse/shared';
import type { CpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { windowsCpuUsage, windowsLogicalCores } from '../windowsProcessor.js';
import type { CpuCollector } from './CpuCollector.js';

export class WindowsCpuCollector extends BaseCollector<CpuMetrics> implements CpuCollector {
  readonly domain = 'cpu';

  async collect(): Promise<CpuMetrics> {
    const metrics = emptyCpuMetrics();

    metrics.cpu_usage_percent = await windowsCpuUsage(this.shell);
    metrics.cpu_cores = await windowsLogicalCores(this.shell);
    metrics.cpu_model =
      (await this.management('Win32_Processor', 'Select-Object -First 1 -ExpandProperty Name')) ??
      metrics.cpu_model;
    // No load average on Windows; report the current usage in its place.
    metrics.load_average = `${metrics.cpu_usage_percent} 0.00 0.00`;

    return metrics;
  }
}
