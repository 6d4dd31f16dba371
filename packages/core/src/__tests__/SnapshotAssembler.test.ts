import { describe, it, expect, vi } from 'vitest';
import { createLogger, snapshotSchema } from '@hostpulse/shared';
import type { Snapshot } from '@hostpulse/shared';
import { createCollectors, type CollectorSet } from '../collectors/index.js';
import { SnapshotAssembler } from '../snapshot/SnapshotAssembler.js';
import { evaluateAlerts } from '../alerts/evaluateAlerts.js';
import { FakeHostShell, FIXED_NOW, testContext } from './helpers/fakeHost.js';

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:Z|[+-]\d{2}:\d{2})$/;

function linuxHost(): FakeHostShell {
  return new FakeHostShell()
    .withCommand('top -bn1', '%Cpu(s):  30.0 us, 15.0 sy,  0.0 ni, 55.0 id,  0.0 wa\n')
    .withCommand('nproc', '8\n')
    .withCommand(
      'free -m',
      [
        '               total        used        free      shared  buff/cache   available',
        'Mem:           16000        8000        2000         500        6000        7500',
        'Swap:              0           0           0',
      ].join('\n'),
    )
    .withCommand(
      'df -Ph',
      'Filesystem      Size  Used Avail Use% Mounted on\n/dev/sda1        50G   36G   14G  72% /\n',
    );
}

/** Keeps the last written snapshot as JSON text. */
function memoryStore(): { path: string; written: string[]; write: (s: Snapshot) => Promise<void> } {
  const written: string[] = [];
  return {
    path: '/srv/hostpulse/reports/metrics.json',
    written,
    write: async (snapshot) => {
      written.push(JSON.stringify(snapshot));
    },
  };
}

function buildAssembler(collectors: CollectorSet, store = memoryStore()) {
  const logger = createLogger({ level: 'silent' });
  const assembler = new SnapshotAssembler({
    collectors,
    store,
    logger,
    now: () => FIXED_NOW,
    hostname: () => 'test-host',
  });
  return { assembler, store, logger };
}

describe('SnapshotAssembler', () => {
  it('should assemble, persist and return a complete snapshot', async () => {
    const context = testContext(linuxHost());
    const { assembler, store } = buildAssembler(createCollectors('linux', context));

    const snapshot = await assembler.collect();

    expect(snapshot.hostname).toBe('test-host');
    expect(snapshot.timestamp).toMatch(ISO_TIMESTAMP);
    expect(snapshot.cpu.cpu_usage_percent).toBe(45);
    expect(snapshot.cpu.cpu_cores).toBe(8);
    expect(snapshot.memory.memory_usage_percent).toBe(50);
    expect(snapshot.disk).toHaveLength(1);
    expect(snapshot.disk[0].use_percent).toBe(72);
    expect(snapshot.gpu).toEqual({ gpu_usage_percent: 'N/A', gpu_temperature: 'N/A', gpu_memory: 'N/A' });
    expect(snapshot.network).toEqual([]);

    expect(store.written).toHaveLength(1);
    expect(JSON.parse(store.written[0])).toEqual(snapshot);
    expect(snapshotSchema.safeParse(snapshot).success).toBe(true);
    expect(evaluateAlerts(snapshot, { cpu: 80, memory: 85, disk: 90 })).toEqual([]);
  });

  it('should freeze the returned snapshot', async () => {
    const { assembler } = buildAssembler(createCollectors('linux', testContext(linuxHost())));

    const snapshot = await assembler.collect();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.cpu)).toBe(true);
    expect(Object.isFrozen(snapshot.disk[0])).toBe(true);
  });

  it('should substitute defaults for a collector that throws', async () => {
    const collectors: CollectorSet = {
      ...createCollectors('linux', testContext(linuxHost())),
      cpu: {
        domain: 'cpu',
        collect: async () => {
          throw new Error('top crashed');
        },
      },
    };
    const { assembler, logger } = buildAssembler(collectors);
    const warn = vi.spyOn(logger, 'warn');

    const snapshot = await assembler.collect();

    expect(snapshot.cpu).toEqual({
      cpu_usage_percent: 0,
      cpu_cores: 0,
      cpu_model: 'Unknown',
      cpu_temperature: 'N/A',
      load_average: 'N/A',
    });
    expect(snapshot.memory.memory_usage_percent).toBe(50);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ domain: 'cpu' }),
      'Collector failed, using defaults',
    );
  });

  it('should fall back to unknown when the hostname cannot be read', async () => {
    const assembler = new SnapshotAssembler({
      collectors: createCollectors('unknown', testContext(new FakeHostShell())),
      store: memoryStore(),
      logger: createLogger({ level: 'silent' }),
      hostname: () => {
        throw new Error('uv_os_gethostname failed');
      },
    });

    const snapshot = await assembler.collect();

    expect(snapshot.hostname).toBe('unknown');
    expect(snapshotSchema.safeParse(snapshot).success).toBe(true);
  });

  it('should produce the same keys on every cycle', async () => {
    const { assembler, store } = buildAssembler(createCollectors('linux', testContext(linuxHost())));

    const first = await assembler.collect();
    const second = await assembler.collect();

    expect(Object.keys(second)).toEqual(Object.keys(first));
    expect(Object.keys(second.memory)).toEqual(Object.keys(first.memory));
    expect(store.written).toHaveLength(2);
  });

  it('should propagate store failures', async () => {
    const store = {
      ...memoryStore(),
      write: async () => {
        throw new Error('disk full');
      },
    };
    const { assembler } = buildAssembler(createCollectors('linux', testContext(linuxHost())), store);

    await expect(assembler.collect()).rejects.toThrow('disk full');
  });
});
