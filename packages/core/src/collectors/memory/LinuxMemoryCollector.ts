import { columns, emptyMemoryMetrics, parseIntegerOrDefault } from '@hostpulse/shared';
import type { MemoryMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { withPercentages, type MemoryCollector } from './MemoryCollector.js';

export class LinuxMemoryCollector extends BaseCollector<MemoryMetrics> implements MemoryCollector {
  readonly domain = 'memory';

  async collect(): Promise<MemoryMetrics> {
    const metrics = emptyMemoryMetrics();
    const free = await this.output('free', ['-m']);
    if (!free) return metrics;

    const rows = free.split('\n').map(columns);
    const mem = rows.find((row) => row[0] === 'Mem:');
    const swap = rows.find((row) => row[0] === 'Swap:');

    if (mem) {
      metrics.memory_total_mb = parseIntegerOrDefault(mem[1]);
      metrics.memory_used_mb = parseIntegerOrDefault(mem[2]);
      metrics.memory_free_mb = parseIntegerOrDefault(mem[3]);
      metrics.memory_available_mb = parseIntegerOrDefault(mem[6]);
    }
    if (swap) {
      metrics.swap_total_mb = parseIntegerOrDefault(swap[1]);
      metrics.swap_used_mb = parseIntegerOrDefault(swap[2]);
      metrics.swap_free_mb = parseIntegerOrDefault(swap[3]);
    }

    return withPercentages(metrics, this.context.precision);
  }
}
