import { NOT_AVAILABLE, columns, parseNumericOrDefault } from '@hostpulse/shared';
import type { DiskEntry } from '@hostpulse/shared';
import type { MetricCollector } from '../BaseCollector.js';

export interface DiskCollector extends MetricCollector<DiskEntry[]> {
  readonly domain: 'disk';
}

// BSD df resets -h when it sees -P, so -h must come last.
export const DF_ARGS = ['-Ph'];

const PSEUDO_FILESYSTEMS = new Set([
  'tmpfs',
  'devtmpfs',
  'udev',
  'none',
  'shm',
  'proc',
  'sysfs',
  'cgroup',
  'overlay',
]);

export function isPseudoFilesystem(filesystem: string): boolean {
  return (
    PSEUDO_FILESYSTEMS.has(filesystem) ||
    filesystem.startsWith('devfs') ||
    filesystem.startsWith('map') ||
    filesystem.startsWith('/dev/loop')
  );
}

/**
 * Use percent of a df row. Column 5 with non-numeric characters stripped
 * wins; otherwise the first `<n>%` anywhere in the row; otherwise 0.
 */
export function usePercentOf(row: string[]): number {
  const column = parseNumericOrDefault(row[4]?.replace(/[^\d.]/g, ''), -1);
  if (column >= 0) return Math.min(100, column);

  const anywhere = /(\d+)%/.exec(row.join(' '));
  return anywhere ? Math.min(100, parseNumericOrDefault(anywhere[1], 0)) : 0;
}

/** Parse `df -Ph` output, header included. */
export function parseDfOutput(output: string): DiskEntry[] {
  const entries: DiskEntry[] = [];

  for (const line of output.split('\n').slice(1)) {
    const row = columns(line);
    if (row.length < 6) continue;

    const [filesystem, size, used, available] = row;
    if (isPseudoFilesystem(filesystem)) continue;

    entries.push({
      filesystem,
      size,
      used,
      available,
      use_percent: usePercentOf(row),
      mount_point: row.slice(5).join(' '),
      smart_status: NOT_AVAILABLE,
    });
  }

  return entries;
}
