import {
  columns,
  emptyCpuMetrics,
  firstLine,
  parseIntegerOrDefault,
  parseNumericOrDefault,
  roundTo,
} from '@hostpulse/shared';
import type { CpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { celsiusReading, loadAverageText, type CpuCollector } from './CpuCollector.js';

export class MacCpuCollector extends BaseCollector<CpuMetrics> implements CpuCollector {
  readonly domain = 'cpu';

  async collect(): Promise<CpuMetrics> {
    const metrics = emptyCpuMetrics();

    metrics.cpu_usage_percent = await this.usage();
    metrics.cpu_cores = await this.cores();
    metrics.cpu_model =
      firstLine(await this.output('sysctl', ['-n', 'machdep.cpu.brand_string'])) ?? metrics.cpu_model;
    metrics.load_average =
      loadAverageText(await this.output('uptime'), 'load averages:') ?? metrics.load_average;
    metrics.cpu_temperature = (await this.temperature()) ?? metrics.cpu_temperature;

    return metrics;
  }

  // "CPU usage: 5.26% user, 10.52% sys, 84.21% idle"
  private async usage(): Promise<number> {
    const top = await this.output('top', ['-l', '1', '-n', '0']);
    const line = top?.split('\n').find((l) => l.includes('CPU usage'));
    if (!line) return 0;

    const idle = parseNumericOrDefault(/([\d.]+)%\s*idle/.exec(line)?.[1], -1);
    if (idle >= 0 && idle <= 100) return roundTo(100 - idle, 2);

    const user = parseNumericOrDefault(columns(line)[2]?.replace('%', ''), 0);
    return Math.min(100, user);
  }

  private async cores(): Promise<number> {
    const ncpu = parseIntegerOrDefault(firstLine(await this.output('sysctl', ['-n', 'hw.ncpu'])), 0);
    if (ncpu > 0) return ncpu;
    return parseIntegerOrDefault(firstLine(await this.output('getconf', ['_NPROCESSORS_ONLN'])), 0);
  }

  private async temperature(): Promise<string | null> {
    const osxCpuTemp = await this.optionalOutput('osx-cpu-temp');
    if (osxCpuTemp) return celsiusReading(osxCpuTemp) ?? firstLine(osxCpuTemp);

    const istats = await this.optionalOutput('istats', ['cpu', 'temp']);
    const reading = istats ? /(\d+(?:\.\d+)?)/.exec(istats)?.[1] : undefined;
    return reading ? `${reading}°C` : null;
  }
}
