import { columns, emptyMemoryMetrics, firstLine, parseIntegerOrDefault } from '@hostpulse/shared';
import type { MemoryMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { BYTES_PER_MB, withPercentages, type MemoryCollector } from './MemoryCollector.js';

const DEFAULT_PAGE_SIZE = 4096;

// Every category vm_stat may report, counted towards the page-sum total.
const TOTAL_CATEGORIES = [
  'Pages free',
  'Pages active',
  'Pages inactive',
  'Pages wired down',
  'Pages speculative',
  'Pages throttled',
  'Pages occupied by compressor',
];

/** Page counts keyed by label, e.g. `Pages free: 12345.` → `Pages free` → 12345. */
export function parseVmStat(output: string): Map<string, number> {
  const pages = new Map<string, number>();
  for (const line of output.split('\n')) {
    const separator = line.indexOf(':');
    if (separator < 0) continue;
    const value = line.slice(separator + 1).trim().replace(/\.$/, '');
    if (/^\d+$/.test(value)) pages.set(line.slice(0, separator).trim(), Number(value));
  }
  return pages;
}

/** `vm.swapusage: total = 2048.00M  used = 1024.50M  free = 1023.50M  (encrypted)` */
export function parseSwapUsage(output: string): { total: number; used: number } {
  const row = columns(output);
  const megabytes = (field: string | undefined): number =>
    parseIntegerOrDefault(field?.replace(/M$/, '').split('.')[0]);
  return { total: megabytes(row[3]), used: megabytes(row[6]) };
}

export class MacMemoryCollector extends BaseCollector<MemoryMetrics> implements MemoryCollector {
  readonly domain = 'memory';

  async collect(): Promise<MemoryMetrics> {
    const metrics = emptyMemoryMetrics();

    const pageSize = parseIntegerOrDefault(
      firstLine(await this.output('sysctl', ['-n', 'hw.pagesize'])),
      DEFAULT_PAGE_SIZE,
    );
    const memsize = parseIntegerOrDefault(firstLine(await this.output('sysctl', ['-n', 'hw.memsize'])));
    const vmStat = await this.output('vm_stat');
    const toMb = (pages: number): number => Math.floor((pages * pageSize) / BYTES_PER_MB);

    let pageTotal = 0;
    if (vmStat) {
      const pages = parseVmStat(vmStat);
      const count = (label: string): number => pages.get(label) ?? 0;
      const inactive = count('Pages inactive');

      metrics.memory_used_mb = toMb(count('Pages active') + inactive + count('Pages wired down'));
      metrics.memory_free_mb = toMb(count('Pages free'));
      metrics.memory_available_mb = metrics.memory_free_mb + toMb(inactive);

      if (pages.has('Pages free') && pages.has('Pages active')) {
        pageTotal = toMb(TOTAL_CATEGORIES.reduce((sum, label) => sum + count(label), 0));
      }
    }

    metrics.memory_total_mb = this.total(memsize, pageTotal, metrics);

    const swap = await this.output('sysctl', ['vm.swapusage']);
    if (swap) {
      const { total, used } = parseSwapUsage(swap);
      metrics.swap_total_mb = total;
      metrics.swap_used_mb = used;
      metrics.swap_free_mb = total - used;
    }

    return withPercentages(metrics, this.context.precision);
  }

  private total(memsizeBytes: number, pageTotalMb: number, metrics: MemoryMetrics): number {
    if (memsizeBytes > 0) return Math.floor(memsizeBytes / BYTES_PER_MB);

    const used = metrics.memory_used_mb;
    if (pageTotalMb > 0 && pageTotalMb >= used) return pageTotalMb;

    this.unavailable('hw.memsize', 'estimating total from used and available');
    if (used > 0 && metrics.memory_available_mb > 0) return used + metrics.memory_available_mb;
    if (used > 0) return Math.floor((used * 120) / 100);
    return pageTotalMb;
  }
}
