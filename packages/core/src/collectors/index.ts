import type { Platform } from '@hostpulse/shared';
import type { CollectorContext } from './BaseCollector.js';
import type { CpuCollector } from './cpu/CpuCollector.js';
import { LinuxCpuCollector } from './cpu/LinuxCpuCollector.js';
import { MacCpuCollector } from './cpu/MacCpuCollector.js';
import { WindowsCpuCollector } from './cpu/WindowsCpuCollector.js';
import type { GpuCollector } from './gpu/GpuCollector.js';
import { LinuxGpuCollector } from './gpu/LinuxGpuCollector.js';
import { MacGpuCollector } from './gpu/MacGpuCollector.js';
import { WindowsGpuCollector } from './gpu/WindowsGpuCollector.js';
import type { DiskCollector } from './disk/DiskCollector.js';
import { PosixDiskCollector } from './disk/PosixDiskCollector.js';
import { WindowsDiskCollector } from './disk/WindowsDiskCollector.js';
import type { MemoryCollector } from './memory/MemoryCollector.js';
import { LinuxMemoryCollector } from './memory/LinuxMemoryCollector.js';
import { MacMemoryCollector } from './memory/MacMemoryCollector.js';
import { WindowsMemoryCollector } from './memory/WindowsMemoryCollector.js';
import type { NetworkCollector } from './network/NetworkCollector.js';
import { LinuxNetworkCollector } from './network/LinuxNetworkCollector.js';
import { MacNetworkCollector } from './network/MacNetworkCollector.js';
import { WindowsNetworkCollector } from './network/WindowsNetworkCollector.js';
import type { LoadCollector } from './load/LoadCollector.js';
import { LinuxLoadCollector } from './load/LinuxLoadCollector.js';
import { MacLoadCollector } from './load/MacLoadCollector.js';
import { WindowsLoadCollector } from './load/WindowsLoadCollector.js';

export interface CollectorSet {
  cpu: CpuCollector;
  gpu: GpuCollector;
  disk: DiskCollector;
  memory: MemoryCollector;
  network: NetworkCollector;
  system_load: LoadCollector;
}

/**
 * Pick one strategy per domain for the detected platform. Unknown hosts get
 * the Linux strategies, which fall back to defaults when their sources are
 * missing.
 */
export function createCollectors(platform: Platform, context: CollectorContext): CollectorSet {
  switch (platform) {
    case 'macos':
      return {
        cpu: new MacCpuCollector(context),
        gpu: new MacGpuCollector(context),
        disk: new PosixDiskCollector(context),
        memory: new MacMemoryCollector(context),
        network: new MacNetworkCollector(context),
        system_load: new MacLoadCollector(context),
      };
    case 'windows':
      return {
        cpu: new WindowsCpuCollector(context),
        gpu: new WindowsGpuCollector(context),
        disk: new WindowsDiskCollector(context),
        memory: new WindowsMemoryCollector(context),
        network: new WindowsNetworkCollector(context),
        system_load: new WindowsLoadCollector(context),
      };
    case 'linux':
    case 'unknown':
      return {
        cpu: new LinuxCpuCollector(context),
        gpu: new LinuxGpuCollector(context),
        disk: new PosixDiskCollector(context),
        memory: new LinuxMemoryCollector(context),
        network: new LinuxNetworkCollector(context),
        system_load: new LinuxLoadCollector(context),
      };
  }
}

export { BaseCollector } from './BaseCollector.js';
export type { CollectorContext, MetricCollector } from './BaseCollector.js';
