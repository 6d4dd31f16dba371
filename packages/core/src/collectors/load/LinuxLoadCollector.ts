import { columns, emptyLoadMetrics, parseIntegerOrDefault } from '@hostpulse/shared';
import type { LoadMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { parseLoadFigures, withUptime, type LoadCollector } from './LoadCollector.js';

export class LinuxLoadCollector extends BaseCollector<LoadMetrics> implements LoadCollector {
  readonly domain = 'system_load';

  async collect(): Promise<LoadMetrics> {
    const metrics: LoadMetrics = {
      ...emptyLoadMetrics(),
      ...parseLoadFigures(await this.output('uptime'), 'load average:'),
    };

    // "35119.84 130023.12": seconds since boot, then idle time
    const procUptime = await this.shell.readFile('/proc/uptime');
    const seconds = parseIntegerOrDefault(columns(procUptime ?? '')[0]?.split('.')[0]);
    return withUptime(metrics, seconds);
  }
}
