import { NOT_AVAILABLE, columns } from '@hostpulse/shared';
import type { DiskEntry } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { DF_ARGS, parseDfOutput, type DiskCollector } from './DiskCollector.js';

/** Linux and macOS share the df layout. */
export class PosixDiskCollector extends BaseCollector<DiskEntry[]> implements DiskCollector {
  readonly domain = 'disk';

  async collect(): Promise<DiskEntry[]> {
    const df = await this.output('df', DF_ARGS);
    if (!df) return [];

    const entries = parseDfOutput(df);
    if (!this.context.privileged || !(await this.shell.hasCommand('smartctl'))) return entries;

    for (const entry of entries) {
      entry.smart_status = await this.smartStatus(entry.filesystem);
    }
    return entries;
  }

  // "SMART overall-health self-assessment test result: PASSED"
  private async smartStatus(filesystem: string): Promise<string> {
    const device = filesystem.replace(/\d+$/, '');
    if (!device.startsWith('/dev/') || !(await this.shell.pathExists(device))) return NOT_AVAILABLE;

    const report = await this.output('smartctl', ['-H', device]);
    const line = report?.split('\n').find((l) => /SMART overall-health/i.test(l));
    return (line && columns(line)[5]) || NOT_AVAILABLE;
  }
}
