import { z } from 'zod';
import { NOT_AVAILABLE, columns, emptyNetworkEntry, firstLine } from '@hostpulse/shared';
import type { NetworkEntry } from '@hostpulse/shared';
import { quotePowerShell } from '../../exec/powershell.js';
import { NetstatNetworkCollector } from './NetworkCollector.js';

const ADAPTERS_SCRIPT =
  "Get-NetAdapter | Where-Object { $_.Status -eq 'Up' } | ForEach-Object { " +
  '[PSCustomObject]@{ Name=$_.Name; InterfaceDescription=$_.InterfaceDescription } } | ConvertTo-Json -Compress';

const adapterSchema = z.object({ Name: z.string().min(1) });

const counter = z.number().int().nonnegative().catch(0);
const packets = z.number().int().nonnegative().nullish().catch(null);

const statisticsSchema = z.object({
  ReceivedBytes: counter,
  SentBytes: counter,
  // Some drivers only fill the unicast counters.
  ReceivedPackets: packets,
  SentPackets: packets,
  ReceivedUnicastPackets: packets,
  SentUnicastPackets: packets,
});

/** IPv4 address listed for `name` in `ipconfig` output. */
export function parseIpconfigAddress(output: string, name: string): string {
  const lines = output.split(/\r?\n/);
  const start = lines.findIndex((line) => line.includes(name));
  if (start < 0) return NOT_AVAILABLE;

  const line = lines.slice(start, start + 6).find((l) => l.includes('IPv4'));
  return (line && columns(line).at(-1)) || NOT_AVAILABLE;
}

export class WindowsNetworkCollector extends NetstatNetworkCollector {
  async collect(): Promise<NetworkEntry[]> {
    const adapters = await this.powershellJson(ADAPTERS_SCRIPT, adapterSchema);

    const entries: NetworkEntry[] = [];
    for (const { Name } of adapters) {
      entries.push(await this.adapterEntry(Name));
    }
    if (entries.length > 0) return entries;

    const ipconfig = await this.optionalOutput('ipconfig');
    return this.collectFromNetstat(await this.netstatInterfaces(), async (name) =>
      ipconfig ? parseIpconfigAddress(ipconfig, name) : NOT_AVAILABLE,
    );
  }

  // Error counters are not exposed by this path and stay 0.
  private async adapterEntry(name: string): Promise<NetworkEntry> {
    const entry = emptyNetworkEntry(name);
    const quoted = quotePowerShell(name);

    const [stats] = await this.powershellJson(
      `Get-NetAdapterStatistics -Name ${quoted} | Select-Object ReceivedBytes, SentBytes, ` +
        'ReceivedPackets, SentPackets, ReceivedUnicastPackets, SentUnicastPackets | ConvertTo-Json -Compress',
      statisticsSchema,
    );
    if (stats) {
      entry.rx_bytes = stats.ReceivedBytes;
      entry.tx_bytes = stats.SentBytes;
      entry.rx_packets = stats.ReceivedPackets ?? stats.ReceivedUnicastPackets ?? 0;
      entry.tx_packets = stats.SentPackets ?? stats.SentUnicastPackets ?? 0;
    }

    const address = firstLine(
      await this.powershell(
        `(Get-NetIPAddress -InterfaceAlias ${quoted} -AddressFamily IPv4 -ErrorAction SilentlyContinue).IPAddress`,
      ),
    );
    entry.ip_address = address ?? NOT_AVAILABLE;
    return entry;
  }
}
