import { describe, it, expect } from 'vitest';
import { emptyLoadMetrics } from '@hostpulse/shared';
import { parseLoadFigures } from '../collectors/load/LoadCollector.js';
import { LinuxLoadCollector } from '../collectors/load/LinuxLoadCollector.js';
import { MacLoadCollector } from '../collectors/load/MacLoadCollector.js';
import {
  SYSTEMINFO_FALLBACK,
  WindowsLoadCollector,
  approximateLoad,
} from '../collectors/load/WindowsLoadCollector.js';
import { FakeHostShell, testContext } from './helpers/fakeHost.js';

describe('parseLoadFigures', () => {
  it('should split comma separated figures', () => {
    expect(parseLoadFigures(' 10:00:00 up 1 day, load average: 0.52, 0.58, 0.59', 'load average:')).toEqual({
      load_1min: '0.52',
      load_5min: '0.58',
      load_15min: '0.59',
    });
  });

  it('should split space separated figures', () => {
    expect(parseLoadFigures('10:00 up 3 days, load averages: 1.23 1.45 1.67', 'load averages:')).toEqual({
      load_1min: '1.23',
      load_5min: '1.45',
      load_15min: '1.67',
    });
  });

  it('should default unreadable figures to 0.00', () => {
    expect(parseLoadFigures('load average: high, 0.58', 'load average:')).toEqual({
      load_1min: '0.00',
      load_5min: '0.58',
      load_15min: '0.00',
    });
  });
});

describe('approximateLoad', () => {
  it('should scale usage by the core count', () => {
    expect(approximateLoad(45, 8, true)).toBe('3.60');
  });

  it('should report the raw usage with precision off', () => {
    expect(approximateLoad(45, 8, false)).toBe('45');
  });

  it('should stay a valid decimal for zero usage', () => {
    expect(approximateLoad(0, 8, true)).toBe('0.00');
  });

  it('should keep exact hundredths of usage', () => {
    expect(approximateLoad(29, 1, true)).toBe('0.29');
    expect(approximateLoad(57, 2, true)).toBe('1.14');
  });
});

describe('LinuxLoadCollector', () => {
  it('should read load figures and uptime', async () => {
    const shell = new FakeHostShell()
      .withCommand('uptime', ' 10:00:00 up 1 day,  2:03,  1 user,  load average: 0.52, 0.58, 0.59\n')
      .withFile('/proc/uptime', '93784.52 300000.11\n');

    const metrics = await new LinuxLoadCollector(testContext(shell)).collect();

    expect(metrics).toEqual({
      load_1min: '0.52',
      load_5min: '0.58',
      load_15min: '0.59',
      uptime: '1d 2h 3m 4s',
      uptime_seconds: 93784,
    });
  });

  it('should return defaults without sources', async () => {
    const metrics = await new LinuxLoadCollector(testContext(new FakeHostShell())).collect();

    expect(metrics).toEqual(emptyLoadMetrics());
  });
});

describe('MacLoadCollector', () => {
  it('should derive uptime from the boot time', async () => {
    const shell = new FakeHostShell()
      .withCommand('uptime', '10:00  up 1 day,  2:03, 2 users, load averages: 1.23 1.45 1.67\n')
      .withCommand('sysctl -n kern.boottime', '{ sec = 1792303016, usec = 0 } Sun Oct 18 05:56:56 2026\n');

    const metrics = await new MacLoadCollector(testContext(shell)).collect();

    expect(metrics.uptime_seconds).toBe(93784);
    expect(metrics.uptime).toBe('1d 2h 3m 4s');
    expect(metrics.load_15min).toBe('1.67');
  });
});

describe('WindowsLoadCollector', () => {
  function windowsShell(): FakeHostShell {
    return new FakeHostShell()
      .withPowerShell('Processor Time', '45\r\n')
      .withPowerShell('NumberOfLogicalProcessors', '8\r\n');
  }

  it('should approximate load and convert the boot time', async () => {
    const shell = windowsShell()
      .withPowerShell('LastBootUpTime', '20261018055656.000000+000\r\n')
      .withPowerShell('ManagementDateTimeConverter', '1792303016\r\n');

    const metrics = await new WindowsLoadCollector(testContext(shell)).collect();

    expect(metrics).toEqual({
      load_1min: '3.60',
      load_5min: '3.60',
      load_15min: '3.60',
      uptime: '1d 2h 3m 4s',
      uptime_seconds: 93784,
    });
  });

  it('should point at systeminfo when the boot time cannot be converted', async () => {
    const shell = windowsShell().withCommand(
      'systeminfo',
      'Host Name:                 TEST-HOST\r\nSystem Boot Time:          10/18/2026, 5:56:56 AM\r\n',
    );

    const metrics = await new WindowsLoadCollector(testContext(shell)).collect();

    expect(metrics.uptime).toBe(SYSTEMINFO_FALLBACK);
    expect(metrics.uptime_seconds).toBe(0);
  });

  it('should keep a single core when the core count is unreadable', async () => {
    const shell = new FakeHostShell().withPowerShell('Processor Time', '50\r\n');

    const metrics = await new WindowsLoadCollector(testContext(shell)).collect();

    expect(metrics.load_1min).toBe('0.50');
    expect(metrics.uptime).toBe('0d 0h 0m 0s');
  });
});
