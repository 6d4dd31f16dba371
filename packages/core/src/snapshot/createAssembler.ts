import { getLogger } from '@hostpulse/shared';
import type { Logger, MonitorConfig, Platform } from '@hostpulse/shared';
import { createCollectors } from '../collectors/index.js';
import { NodeHostShell, type HostShell } from '../exec/HostShell.js';
import { detectPlatform } from '../platform/detectPlatform.js';
import { SnapshotAssembler } from './SnapshotAssembler.js';
import { SnapshotStore } from './SnapshotStore.js';

export interface CreateAssemblerOptions {
  shell?: HostShell;
  logger?: Logger;
  /** Skip detection, e.g. in tests. */
  platform?: Platform;
  now?: () => Date;
  hostname?: () => string;
}

export interface AssemblerSetup {
  platform: Platform;
  assembler: SnapshotAssembler;
  store: SnapshotStore;
}

/** Detect the platform once and wire its collectors to the snapshot store. */
export async function createAssembler(
  config: MonitorConfig,
  options: CreateAssemblerOptions = {},
): Promise<AssemblerSetup> {
  const shell = options.shell ?? new NodeHostShell();
  const logger = options.logger ?? getLogger();
  const now = options.now ?? (() => new Date());
  const platform = options.platform ?? (await detectPlatform(shell));

  logger.debug({ platform }, 'Platform detected');

  const collectors = createCollectors(platform, {
    shell,
    privileged: config.privileged,
    precision: config.precision,
    now,
    logger,
  });
  const store = new SnapshotStore(config.metricsFile, logger);
  const assembler = new SnapshotAssembler({
    collectors,
    store,
    logger,
    now,
    hostname: options.hostname,
  });

  return { platform, assembler, store };
}
