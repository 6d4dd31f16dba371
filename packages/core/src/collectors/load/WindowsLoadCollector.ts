import {
  ZERO_LOAD,
  decimalTextOrDefault,
  emptyLoadMetrics,
  firstLine,
  parseIntegerOrDefault,
  truncateTo,
} from '@hostpulse/shared';
import type { LoadMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { windowsCpuUsage, windowsLogicalCores } from '../windowsProcessor.js';
import { withUptime, type LoadCollector } from './LoadCollector.js';

export const SYSTEMINFO_FALLBACK = 'N/A (check systeminfo)';

/**
 * Windows has no load average; approximate it as the share of logical cores
 * kept busy. All three figures are the same value.
 */
export function approximateLoad(usage: number, cores: number, precision: boolean): string {
  const figure = precision ? (truncateTo(usage / 100, 2) * cores).toFixed(2) : String(usage);
  return decimalTextOrDefault(figure, ZERO_LOAD);
}

export class WindowsLoadCollector extends BaseCollector<LoadMetrics> implements LoadCollector {
  readonly domain = 'system_load';

  async collect(): Promise<LoadMetrics> {
    const metrics = emptyLoadMetrics();

    const usage = await windowsCpuUsage(this.shell);
    const cores = (await windowsLogicalCores(this.shell)) || 1;
    const load = approximateLoad(usage, cores, this.context.precision);
    metrics.load_1min = load;
    metrics.load_5min = load;
    metrics.load_15min = load;

    const bootSeconds = await this.bootTimestamp();
    if (bootSeconds > 0) {
      const nowSeconds = Math.floor(this.context.now().getTime() / 1000);
      return withUptime(metrics, nowSeconds - bootSeconds);
    }

    if (await this.systeminfoReportsBoot()) metrics.uptime = SYSTEMINFO_FALLBACK;
    return metrics;
  }

  // LastBootUpTime is a WMI datetime such as "20261019083000.500000+120".
  private async bootTimestamp(): Promise<number> {
    const lastBoot = firstLine(
      await this.powershell('(Get-WmiObject Win32_OperatingSystem).LastBootUpTime'),
    );
    if (!lastBoot || !/^[\d.+-]+$/.test(lastBoot)) return 0;

    const converted = await this.powershell(
      `[System.Management.ManagementDateTimeConverter]::ToDateTime('${lastBoot}').ToUniversalTime()` +
        ' | ForEach-Object { [DateTimeOffset]::new($_).ToUnixTimeSeconds() }',
    );
    return parseIntegerOrDefault(firstLine(converted));
  }

  private async systeminfoReportsBoot(): Promise<boolean> {
    const systeminfo = await this.optionalOutput('systeminfo');
    const line = systeminfo?.split(/\r?\n/).find((l) => l.includes('System Boot Time'));
    return Boolean(line && line.slice(line.indexOf(':') + 1).trim());
  }
}
