import {
  DECIMAL_PATTERN,
  NOT_AVAILABLE,
  columns,
  emptyGpuMetrics,
  firstLine,
  millidegreesToCelsius,
} from '@hostpulse/shared';
import type { GpuMetrics } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import type { GpuCollector } from './GpuCollector.js';

const DRM_DIR = '/sys/class/drm';

export class LinuxGpuCollector extends BaseCollector<GpuMetrics> implements GpuCollector {
  readonly domain = 'gpu';

  async collect(): Promise<GpuMetrics> {
    if (await this.shell.hasCommand('nvidia-smi')) return this.fromNvidia();
    if (await this.shell.hasCommand('rocm-smi')) return this.fromRocm();
    return this.fromDrm();
  }

  private async fromNvidia(): Promise<GpuMetrics> {
    const metrics = emptyGpuMetrics();
    const output = await this.output('nvidia-smi', [
      '--query-gpu=utilization.gpu,temperature.gpu,memory.used,memory.total',
      '--format=csv,noheader,nounits',
    ]);
    const line = firstLine(output);
    if (!line) return metrics;

    const [usage, temperature, used, total] = line.split(',').map((field) => field.trim());
    if (usage !== undefined && DECIMAL_PATTERN.test(usage)) metrics.gpu_usage_percent = usage;
    if (temperature !== undefined && DECIMAL_PATTERN.test(temperature)) {
      metrics.gpu_temperature = `${temperature}°C`;
    }
    if (used && total) metrics.gpu_memory = `${used}/${total}`;
    return metrics;
  }

  // rocm-smi prints the value as the last column, e.g. "GPU[0] : GPU use (%): 12".
  private async fromRocm(): Promise<GpuMetrics> {
    const metrics = emptyGpuMetrics();

    const use = await this.output('rocm-smi', ['--showuse']);
    const useLine = use?.split('\n').find((l) => /gpu use/i.test(l));
    metrics.gpu_usage_percent = (useLine && columns(useLine).at(-1)) || NOT_AVAILABLE;

    const temp = await this.output('rocm-smi', ['--showtemp']);
    const tempLine = temp?.split('\n').find((l) => /temp/i.test(l));
    const reading = tempLine ? columns(tempLine).at(-1) : undefined;
    if (reading) {
      metrics.gpu_temperature = DECIMAL_PATTERN.test(reading) ? `${reading}°C` : reading;
    }

    return metrics;
  }

  private async fromDrm(): Promise<GpuMetrics> {
    const metrics = emptyGpuMetrics();
    const sensor = await this.findDrmSensor();
    if (!sensor) return metrics;

    metrics.gpu_temperature =
      millidegreesToCelsius(await this.shell.readFile(sensor)) ?? metrics.gpu_temperature;
    return metrics;
  }

  private async findDrmSensor(): Promise<string | null> {
    const cards = (await this.shell.listDir(DRM_DIR)) ?? [];
    for (const card of cards.filter((name) => /^card\d+$/.test(name)).sort()) {
      const hwmonDir = `${DRM_DIR}/${card}/device/hwmon`;
      const monitors = (await this.shell.listDir(hwmonDir)) ?? [];
      for (const monitor of monitors.filter((name) => name.startsWith('hwmon')).sort()) {
        const sensor = `${hwmonDir}/${monitor}/temp1_input`;
        if (await this.shell.pathExists(sensor)) return sensor;
      }
    }
    this.unavailable(DRM_DIR, 'no temperature sensor');
    return null;
  }
}
