import { describe, it, expect } from 'vitest';
import {
  parseInetAddress,
  parseNetstatCounters,
  parseNetstatInterfaces,
} from '../collectors/network/NetworkCollector.js';
import { LinuxNetworkCollector } from '../collectors/network/LinuxNetworkCollector.js';
import { MacNetworkCollector } from '../collectors/network/MacNetworkCollector.js';
import {
  WindowsNetworkCollector,
  parseIpconfigAddress,
} from '../collectors/network/WindowsNetworkCollector.js';
import { FakeHostShell, testContext } from './helpers/fakeHost.js';

const NETSTAT_I = [
  'Name       Mtu   Network       Address            Ipkts Ierrs    Opkts Oerrs  Coll',
  'lo0        16384 <Link#1>                        1000     0     1000     0     0',
  'en0        1500  <Link#4>    aa:bb:cc:dd:ee:ff   50000     1    40000     2     0',
  'en0        1500  192.168.1     192.168.1.20      50000     -    40000     -     -',
  'en1*       1500  <Link#5>    aa:bb:cc:dd:ee:00       0     0        0     0     0',
].join('\n');

const NETSTAT_IB = [
  'Name       Mtu   Network       Address            Ipkts Ierrs     Ibytes    Opkts Oerrs     Obytes  Coll',
  'en0        1500  <Link#4>    aa:bb:cc:dd:ee:ff   50000     1   60000000    40000     2    5000000     0',
].join('\n');

const IFCONFIG_EN0 = [
  'en0: flags=8863<UP,BROADCAST,SMART,RUNNING,SIMPLEX,MULTICAST> mtu 1500',
  '\tether aa:bb:cc:dd:ee:ff',
  '\tinet 192.168.1.20 netmask 0xffffff00 broadcast 192.168.1.255',
].join('\n');

describe('parseNetstatInterfaces', () => {
  it('should drop loopback, header and down interfaces', () => {
    expect(parseNetstatInterfaces(NETSTAT_I)).toEqual(['en0']);
  });
});

describe('parseNetstatCounters', () => {
  it('should read counters from the end of the row', () => {
    expect(parseNetstatCounters(NETSTAT_IB, 'en0')).toEqual({
      interface: 'en0',
      ip_address: 'N/A',
      rx_bytes: 60000000,
      tx_bytes: 5000000,
      rx_packets: 50000,
      tx_packets: 40000,
      rx_errors: 1,
      tx_errors: 2,
    });
  });

  it('should return null for an unknown interface', () => {
    expect(parseNetstatCounters(NETSTAT_IB, 'en5')).toBeNull();
  });
});

describe('parseInetAddress', () => {
  it('should strip the prefix length and addr: label', () => {
    expect(parseInetAddress('    inet 192.168.1.10/24 brd 192.168.1.255 scope global eth0')).toBe(
      '192.168.1.10',
    );
    expect(parseInetAddress('          inet addr:10.0.0.5  Bcast:10.0.0.255  Mask:255.255.255.0')).toBe(
      '10.0.0.5',
    );
  });

  it('should return N/A without an IPv4 address', () => {
    expect(parseInetAddress('    inet6 fe80::1/64 scope link')).toBe('N/A');
    expect(parseInetAddress(null)).toBe('N/A');
  });
});

describe('LinuxNetworkCollector', () => {
  function linuxShell(): FakeHostShell {
    return new FakeHostShell()
      .withDir('/sys/class/net', ['wlan0', 'lo', 'eth0', 'docker0'])
      .withFile('/sys/class/net/wlan0/operstate', 'down\n')
      .withFile('/sys/class/net/eth0/operstate', 'up\n')
      .withFile('/sys/class/net/eth0/statistics/rx_bytes', '123456789\n')
      .withFile('/sys/class/net/eth0/statistics/tx_bytes', '987654\n')
      .withFile('/sys/class/net/eth0/statistics/rx_packets', '1000\n')
      .withFile('/sys/class/net/eth0/statistics/tx_packets', '900\n')
      .withFile('/sys/class/net/eth0/statistics/rx_errors', '0\n')
      .withFile('/sys/class/net/eth0/statistics/tx_errors', 'garbage\n');
  }

  it('should read counters for every active non-loopback interface', async () => {
    const shell = linuxShell().withCommand(
      'ip addr show eth0',
      '2: eth0: <BROADCAST,MULTICAST,UP> mtu 1500\n    inet 192.168.1.10/24 brd 192.168.1.255 scope global eth0\n',
    );

    const entries = await new LinuxNetworkCollector(testContext(shell)).collect();

    expect(entries.map((e) => e.interface)).toEqual(['docker0', 'eth0']);
    expect(entries[0].ip_address).toBe('N/A');
    expect(entries[1]).toEqual({
      interface: 'eth0',
      ip_address: '192.168.1.10',
      rx_bytes: 123456789,
      tx_bytes: 987654,
      rx_packets: 1000,
      tx_packets: 900,
      rx_errors: 0,
      tx_errors: 0,
    });
  });

  it('should fall back to ifconfig for the address', async () => {
    const shell = linuxShell().withCommand(
      'ifconfig eth0',
      'eth0      Link encap:Ethernet\n          inet addr:10.0.0.5  Bcast:10.0.0.255  Mask:255.255.255.0\n',
    );

    const entries = await new LinuxNetworkCollector(testContext(shell)).collect();

    expect(entries[1].ip_address).toBe('10.0.0.5');
  });

  it('should return an empty list without /sys/class/net', async () => {
    const entries = await new LinuxNetworkCollector(testContext(new FakeHostShell())).collect();

    expect(entries).toEqual([]);
  });
});

describe('MacNetworkCollector', () => {
  it('should combine netstat counters with the ifconfig address', async () => {
    const shell = new FakeHostShell()
      .withCommand('netstat -i', NETSTAT_I)
      .withCommand('netstat -ib', NETSTAT_IB)
      .withCommand('ifconfig en0', IFCONFIG_EN0);

    const entries = await new MacNetworkCollector(testContext(shell)).collect();

    expect(entries).toEqual([
      {
        interface: 'en0',
        ip_address: '192.168.1.20',
        rx_bytes: 60000000,
        tx_bytes: 5000000,
        rx_packets: 50000,
        tx_packets: 40000,
        rx_errors: 1,
        tx_errors: 2,
      },
    ]);
  });

  it('should read ifconfig counters when netstat -ib has no row', async () => {
    const shell = new FakeHostShell()
      .withCommand('netstat -i', NETSTAT_I)
      .withCommand(
        'ifconfig en0',
        `${IFCONFIG_EN0}\n\tRX packets 10  bytes 2000 (2.0 KB)\n\tTX packets 20  bytes 3000 (3.0 KB)\n`,
      );

    const [entry] = await new MacNetworkCollector(testContext(shell)).collect();

    expect(entry.rx_packets).toBe(10);
    expect(entry.rx_bytes).toBe(2000);
    expect(entry.tx_packets).toBe(20);
    expect(entry.tx_bytes).toBe(3000);
    expect(entry.ip_address).toBe('192.168.1.20');
  });

  it('should list interfaces with ifconfig -l when netstat is missing', async () => {
    const shell = new FakeHostShell().withCommand('ifconfig -l', 'lo0 gif0 en0\n');

    const entries = await new MacNetworkCollector(testContext(shell)).collect();

    expect(entries.map((e) => e.interface)).toEqual(['en0', 'gif0']);
  });
});

describe('parseIpconfigAddress', () => {
  const IPCONFIG = [
    'Windows IP Configuration',
    '',
    'Ethernet adapter Ethernet:',
    '',
    '   Connection-specific DNS Suffix  . :',
    '   IPv4 Address. . . . . . . . . . . : 192.168.1.40',
  ].join('\r\n');

  it('should read the IPv4 line under the adapter', () => {
    expect(parseIpconfigAddress(IPCONFIG, 'Ethernet')).toBe('192.168.1.40');
  });

  it('should return N/A for an unknown adapter', () => {
    expect(parseIpconfigAddress(IPCONFIG, 'Wi-Fi')).toBe('N/A');
  });
});

describe('WindowsNetworkCollector', () => {
  it('should read statistics for every adapter that is up', async () => {
    const shell = new FakeHostShell()
      .withPowerShell(
        'Get-NetAdapter |',
        JSON.stringify([
          { Name: 'Ethernet', InterfaceDescription: 'Test Ethernet Controller' },
          { Name: 'Wi-Fi', InterfaceDescription: 'Test Wireless Adapter' },
        ]),
      )
      .withPowerShell(
        "Statistics -Name 'Ethernet'",
        '{"ReceivedBytes":1000,"SentBytes":2000,"ReceivedPackets":10,"SentPackets":20}',
      )
      .withPowerShell(
        "Statistics -Name 'Wi-Fi'",
        '{"ReceivedBytes":500,"SentBytes":600,"ReceivedPackets":null,"SentPackets":null,' +
          '"ReceivedUnicastPackets":3,"SentUnicastPackets":4}',
      )
      .withPowerShell("-InterfaceAlias 'Ethernet'", '192.168.1.30\r\n');

    const entries = await new WindowsNetworkCollector(testContext(shell)).collect();

    expect(entries).toEqual([
      {
        interface: 'Ethernet',
        ip_address: '192.168.1.30',
        rx_bytes: 1000,
        tx_bytes: 2000,
        rx_packets: 10,
        tx_packets: 20,
        rx_errors: 0,
        tx_errors: 0,
      },
      {
        interface: 'Wi-Fi',
        ip_address: 'N/A',
        rx_bytes: 500,
        tx_bytes: 600,
        rx_packets: 3,
        tx_packets: 4,
        rx_errors: 0,
        tx_errors: 0,
      },
    ]);
  });
});
