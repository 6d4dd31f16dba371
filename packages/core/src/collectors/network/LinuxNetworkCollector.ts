import { emptyNetworkEntry, parseIntegerOrDefault } from '@hostpulse/shared';
import type { NetworkEntry } from '@hostpulse/shared';
import { BaseCollector } from '../BaseCollector.js';
import { parseInetAddress, type NetworkCollector } from './NetworkCollector.js';

const NET_DIR = '/sys/class/net';

const COUNTERS = [
  'rx_bytes',
  'tx_bytes',
  'rx_packets',
  'tx_packets',
  'rx_errors',
  'tx_errors',
] as const;

export class LinuxNetworkCollector
  extends BaseCollector<NetworkEntry[]>
  implements NetworkCollector
{
  readonly domain = 'network';

  async collect(): Promise<NetworkEntry[]> {
    const names = await this.shell.listDir(NET_DIR);
    if (!names) {
      this.unavailable(NET_DIR);
      return [];
    }

    const entries: NetworkEntry[] = [];
    for (const name of [...names].sort()) {
      if (name === 'lo') continue;
      const operstate = await this.shell.readFile(`${NET_DIR}/${name}/operstate`);
      if (operstate?.trim() === 'down') continue;

      const entry = emptyNetworkEntry(name);
      for (const counter of COUNTERS) {
        entry[counter] = parseIntegerOrDefault(
          await this.shell.readFile(`${NET_DIR}/${name}/statistics/${counter}`),
        );
      }
      entry.ip_address = await this.address(name);
      entries.push(entry);
    }

    return entries;
  }

  private async address(name: string): Promise<string> {
    if (await this.shell.hasCommand('ip')) {
      return parseInetAddress(await this.output('ip', ['addr', 'show', name]));
    }
    return parseInetAddress(await this.optionalOutput('ifconfig', [name]));
  }
}
