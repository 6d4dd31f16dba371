import { z } from 'zod';
import { NOT_AVAILABLE, roundTo } from '@hostpulse/shared';
import type { DiskEntry } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { DF_ARGS, parseDfOutput, type DiskCollector } from './DiskCollector.js';

const DRIVES_SCRIPT =
  'Get-PSDrive -PSProvider FileSystem | Where-Object { $_.Used -ne $null } | ForEach-Object { ' +
  '[PSCustomObject]@{ Name=$_.Name; Used=[math]::Round($_.Used/1GB, 2); ' +
  'Free=[math]::Round($_.Free/1GB, 2); ' +
  'UsedPercent=[math]::Round(($_.Used/($_.Used+$_.Free))*100, 2) } } | ConvertTo-Json -Compress';

const driveSchema = z.object({
  Name: z.string().min(1),
  Used: z.number().nonnegative(),
  Free: z.number().nonnegative(),
  UsedPercent: z.number().nonnegative(),
});

export type PSDrive = z.infer<typeof driveSchema>;

export function driveToEntry(drive: PSDrive): DiskEntry {
  return {
    filesystem: `${drive.Name}:`,
    size: `${roundTo(drive.Used + drive.Free, 2)}G`,
    used: `${drive.Used}G`,
    available: `${drive.Free}G`,
    use_percent: Math.min(100, drive.UsedPercent),
    mount_point: `${drive.Name}:\\`,
    smart_status: NOT_AVAILABLE,
  };
}

export class WindowsDiskCollector extends BaseCollector<DiskEntry[]> implements DiskCollector {
  readonly domain = 'disk';

  async collect(): Promise<DiskEntry[]> {
    const drives = await this.powershellJson(DRIVES_SCRIPT, driveSchema);
    if (drives.length > 0) return drives.map(driveToEntry);

    // MSYS and Cygwin ship df.
    const df = await this.optionalOutput('df', DF_ARGS);
    return df ? parseDfOutput(df) : [];
  }
}
