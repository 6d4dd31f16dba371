import { columns } from '@hostpulse/shared';
import type { NetworkEntry } from '@hostpulse/shared';
import { NetstatNetworkCollector, parseInetAddress } from './NetworkCollector.js';

export class MacNetworkCollector extends NetstatNetworkCollector {
  async collect(): Promise<NetworkEntry[]> {
    let interfaces = await this.netstatInterfaces();
    if (interfaces.length === 0) {
      const list = await this.optionalOutput('ifconfig', ['-l']);
      interfaces = list ? [...new Set(columns(list).filter((name) => !name.startsWith('lo')))].sort() : [];
    }

    return this.collectFromNetstat(interfaces, async (name) =>
      parseInetAddress(await this.optionalOutput('ifconfig', [name])),
    );
  }
}
