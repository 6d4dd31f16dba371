import { emptyLoadMetrics, parseIntegerOrDefault } from '@hostpulse/shared';
import type { LoadMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { parseLoadFigures, withUptime, type LoadCollector } from './LoadCollector.js';

export class MacLoadCollector extends BaseCollector<LoadMetrics> implements LoadCollector {
  readonly domain = 'system_load';

  async collect(): Promise<LoadMetrics> {
    const metrics: LoadMetrics = {
      ...emptyLoadMetrics(),
      ...parseLoadFigures(await this.output('uptime'), 'load averages:'),
    };

    // "{ sec = 1760860800, usec = 0 } Sun Oct 19 08:00:00 2026"
    const boottime = await this.output('sysctl', ['-n', 'kern.boottime']);
    const bootSeconds = parseIntegerOrDefault(/sec = (\d+)/.exec(boottime ?? '')?.[1]);
    if (bootSeconds === 0) return metrics;

    const nowSeconds = Math.floor(this.context.now().getTime() / 1000);
    return withUptime(metrics, nowSeconds - bootSeconds);
  }
}
