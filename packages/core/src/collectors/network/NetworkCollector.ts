import { NOT_AVAILABLE, columns, emptyNetworkEntry, parseIntegerOrDefault } from '@hostpulse/shared';
import type { NetworkEntry } from '@hostpulse/shared';
import { BaseCollector, type MetricCollector } from '../BaseCollector.js';

export interface NetworkCollector extends MetricCollector<NetworkEntry[]> {
  readonly domain: 'network';
}

/** Interface names from `netstat -i`: loopback, header and down (`en1*`) rows dropped. */
export function parseNetstatInterfaces(output: string): string[] {
  const names = output
    .split('\n')
    .slice(1)
    .map((line) => columns(line)[0])
    .filter((name): name is string => Boolean(name))
    .filter((name) => name !== 'Name' && !name.startsWith('lo') && !name.endsWith('*'));
  return [...new Set(names)].sort();
}

/**
 * Counters of the first `netstat -ib` row for `name`. The Network and Address
 * columns may be blank, so counters are read from the end of the row:
 * `Ipkts Ierrs Ibytes Opkts Oerrs Obytes Coll`.
 */
export function parseNetstatCounters(output: string, name: string): NetworkEntry | null {
  const row = output
    .split('\n')
    .map(columns)
    .find((cols) => cols[0] === name);
  if (!row || row.length < 8) return null;

  const fromEnd = (offset: number): number => parseIntegerOrDefault(row[row.length - offset]);
  return {
    ...emptyNetworkEntry(name),
    rx_packets: fromEnd(7),
    rx_errors: fromEnd(6),
    rx_bytes: fromEnd(5),
    tx_packets: fromEnd(4),
    tx_errors: fromEnd(3),
    tx_bytes: fromEnd(2),
  };
}

/** `RX packets 1234  bytes 567890 (567.8 KB)` style counters. */
export function parseIfconfigCounters(output: string, entry: NetworkEntry): NetworkEntry {
  const lines = output.split('\n').map(columns);
  const rx = lines.find((cols) => cols[0] === 'RX' && cols[1] === 'packets');
  const tx = lines.find((cols) => cols[0] === 'TX' && cols[1] === 'packets');
  return {
    ...entry,
    rx_packets: parseIntegerOrDefault(rx?.[2]),
    rx_bytes: parseIntegerOrDefault(rx?.[4]),
    tx_packets: parseIntegerOrDefault(tx?.[2]),
    tx_bytes: parseIntegerOrDefault(tx?.[4]),
  };
}

/** First IPv4 `inet` address in `ip addr` or `ifconfig` output. */
export function parseInetAddress(output: string | null): string {
  const row = output
    ?.split('\n')
    .map(columns)
    .find((cols) => cols[0] === 'inet');
  const address = row?.[1]?.replace(/^addr:/, '').split('/')[0];
  return address || NOT_AVAILABLE;
}

/** Collectors that can read interface counters from netstat. */
export abstract class NetstatNetworkCollector
  extends BaseCollector<NetworkEntry[]>
  implements NetworkCollector
{
  readonly domain = 'network';

  protected async collectFromNetstat(
    interfaces: string[],
    address: (name: string) => Promise<string>,
  ): Promise<NetworkEntry[]> {
    const stats = await this.optionalOutput('netstat', ['-ib']);
    const entries: NetworkEntry[] = [];

    for (const name of interfaces) {
      let entry = (stats && parseNetstatCounters(stats, name)) || null;
      if (!entry) {
        const ifconfig = await this.optionalOutput('ifconfig', [name]);
        entry = ifconfig
          ? parseIfconfigCounters(ifconfig, emptyNetworkEntry(name))
          : emptyNetworkEntry(name);
      }
      entry.ip_address = await address(name);
      entries.push(entry);
    }

    return entries;
  }

  protected async netstatInterfaces(): Promise<string[]> {
    const netstat = await this.optionalOutput('netstat', ['-i']);
    return netstat ? parseNetstatInterfaces(netstat) : [];
  }
}
