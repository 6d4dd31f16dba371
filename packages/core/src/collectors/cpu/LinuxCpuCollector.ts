import {
  emptyCpuMetrics,
  firstLine,
  millidegreesToCelsius,
  parseIntegerOrDefault,
  parseNumericOrDefault,
  roundTo,
} from '@hostpulse/shared';
import type { CpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { celsiusReading, loadAverageText, type CpuCollector } from './CpuCollector.js';

const THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp';

export class LinuxCpuCollector extends BaseCollector<CpuMetrics> implements CpuCollector {
  readonly domain = 'cpu';

  async collect(): Promise<CpuMetrics> {
    const metrics = emptyCpuMetrics();
    const cpuinfo = await this.shell.readFile('/proc/cpuinfo');

    metrics.cpu_usage_percent = await this.usage();
    metrics.cpu_cores = await this.cores(cpuinfo);
    metrics.cpu_model = this.model(cpuinfo) ?? metrics.cpu_model;
    metrics.load_average =
      loadAverageText(await this.output('uptime'), 'load average:') ?? metrics.load_average;
    metrics.cpu_temperature = (await this.temperature()) ?? metrics.cpu_temperature;

    return metrics;
  }

  private async usage(): Promise<number> {
    const top = await this.output('top', ['-bn1']);
    const line = top?.split('\n').find((l) => l.includes('Cpu(s)'));
    if (!line) return 0;

    const idle = parseNumericOrDefault(/,\s*([\d.]+)\s*%?\s*id/.exec(line)?.[1], -1);
    if (idle < 0 || idle > 100) return 0;
    return roundTo(100 - idle, 1);
  }

  private async cores(cpuinfo: string | null): Promise<number> {
    const nproc = parseIntegerOrDefault(firstLine(await this.optionalOutput('nproc')), 0);
    if (nproc > 0) return nproc;
    if (!cpuinfo) return 0;
    return cpuinfo.split('\n').filter((line) => /^processor\s*:/.test(line)).length;
  }

  private model(cpuinfo: string | null): string | null {
    const line = cpuinfo?.split('\n').find((l) => l.startsWith('model name'));
    if (!line) return null;
    const name = line.slice(line.indexOf(':') + 1).trim();
    return name.length > 0 ? name : null;
  }

  private async temperature(): Promise<string | null> {
    const sensors = await this.optionalOutput('sensors');
    if (sensors) {
      const line = sensors.split('\n').find((l) => /cpu/i.test(l) && /temp/i.test(l));
      const reading = line ? celsiusReading(line) : null;
      if (reading) return reading;
    }
    return millidegreesToCelsius(await this.shell.readFile(THERMAL_ZONE));
  }
}
