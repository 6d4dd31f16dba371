import { hostname } from 'node:os';
import { formatISO } from 'date-fns';
import {
  emptyCpuMetrics,
  emptyGpuMetrics,
  emptyLoadMetrics,
  emptyMemoryMetrics,
  getLogger,
} from '@hostpulse/shared';
import type { Logger, Snapshot } from '@hostpulse/shared';
import type { CollectorSet } from '../collectors/index.js';
import type { MetricCollector } from '../collectors/BaseCollector.js';
import type { SnapshotStore } from './SnapshotStore.js';

export interface SnapshotAssemblerOptions {
  collectors: CollectorSet;
  store: Pick<SnapshotStore, 'path' | 'write'>;
  logger?: Logger;
  now?: () => Date;
  hostname?: () => string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export class SnapshotAssembler {
  private readonly collectors: CollectorSet;
  private readonly store: Pick<SnapshotStore, 'path' | 'write'>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly hostname: () => string;

  constructor(options: SnapshotAssemblerOptions) {
    this.collectors = options.collectors;
    this.store = options.store;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => new Date());
    this.hostname = options.hostname ?? hostname;
  }

  /**
   * Run every collector in turn, persist the frozen snapshot and return it.
   * A collector that throws contributes its defaults instead.
   */
  async collect(): Promise<Snapshot> {
    const started = Date.now();
    const { cpu, gpu, disk, memory, network, system_load } = this.collectors;

    const snapshot: Snapshot = deepFreeze({
      timestamp: formatISO(this.now()),
      hostname: this.resolveHostname(),
      cpu: await this.run(cpu, emptyCpuMetrics),
      gpu: await this.run(gpu, emptyGpuMetrics),
      disk: await this.run(disk, () => []),
      memory: await this.run(memory, emptyMemoryMetrics),
      network: await this.run(network, () => []),
      system_load: await this.run(system_load, emptyLoadMetrics),
    });

    await this.store.write(snapshot);
    this.logger.info(
      { path: this.store.path, durationMs: Date.now() - started },
      'Snapshot collected',
    );
    return snapshot;
  }

  private async run<T>(collector: MetricCollector<T>, fallback: () => T): Promise<T> {
    try {
      return await collector.collect();
    } catch (err) {
      this.logger.warn({ err, domain: collector.domain }, 'Collector failed, using defaults');
      return fallback();
    }
  }

  private resolveHostname(): string {
    try {
      return this.hostname() || 'unknown';
    } catch (err) {
      this.logger.debug({ err }, 'Hostname unavailable');
      return 'unknown';
    }
  }
}
