import { emptyMemoryMetrics, parseIntegerOrDefault } from '@hostpulse/shared';
import type { MemoryMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { BYTES_PER_MB, withPercentages, type MemoryCollector } from './MemoryCollector.js';

export class WindowsMemoryCollector extends BaseCollector<MemoryMetrics> implements MemoryCollector {
  readonly domain = 'memory';

  async collect(): Promise<MemoryMetrics> {
    const metrics = emptyMemoryMetrics();

    const totalBytes = parseIntegerOrDefault(
      await this.management('Win32_ComputerSystem', 'Select-Object -ExpandProperty TotalPhysicalMemory'),
    );
    metrics.memory_total_mb = Math.floor(totalBytes / BYTES_PER_MB);

    const freeKb = parseIntegerOrDefault(
      await this.management('Win32_OperatingSystem', 'Select-Object -ExpandProperty FreePhysicalMemory'),
      -1,
    );
    if (freeKb >= 0) {
      metrics.memory_available_mb = Math.floor(freeKb / 1024);
      metrics.memory_free_mb = metrics.memory_available_mb;
      metrics.memory_used_mb = Math.max(0, metrics.memory_total_mb - metrics.memory_available_mb);
    }

    // Page file sizes are already in MB.
    metrics.swap_total_mb = parseIntegerOrDefault(await this.pageFileSum('AllocatedBaseSize'));
    metrics.swap_used_mb = parseIntegerOrDefault(await this.pageFileSum('CurrentUsage'));
    metrics.swap_free_mb = metrics.swap_total_mb - metrics.swap_used_mb;

    return withPercentages(metrics, this.context.precision);
  }

  private pageFileSum(property: string): Promise<string | null> {
    return this.management(
      'Win32_PageFileUsage',
      `Measure-Object -Property ${property} -Sum | Select-Object -ExpandProperty Sum`,
    );
  }
}
