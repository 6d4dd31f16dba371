// Host access
export { NodeHostShell } from './exec/HostShell.js';
export type { HostShell, CommandResult, ExecOptions, NodeHostShellOptions } from './exec/HostShell.js';
export {
  findPowerShell,
  runPowerShell,
  queryManagement,
  queryPowerShellJson,
  quotePowerShell,
} from './exec/powershell.js';

// Platform
export { detectPlatform, platformFromOsType } from './platform/detectPlatform.js';
export type { DetectPlatformOptions } from './platform/detectPlatform.js';

// Collectors
export { createCollectors, BaseCollector } from './collectors/index.js';
export type { CollectorSet, CollectorContext, MetricCollector } from './collectors/index.js';

// Snapshot
export { SnapshotAssembler } from './snapshot/SnapshotAssembler.js';
export type { SnapshotAssemblerOptions } from './snapshot/SnapshotAssembler.js';
export { SnapshotStore } from './snapshot/SnapshotStore.js';
export { createAssembler } from './snapshot/createAssembler.js';
export type { CreateAssemblerOptions, AssemblerSetup } from './snapshot/createAssembler.js';

// Alerts and monitoring
export { evaluateAlerts } from './alerts/evaluateAlerts.js';
export { Monitor } from './monitor/Monitor.js';
export type { MonitorOptions, CycleResult } from './monitor/Monitor.js';

// Configuration
export { loadMonitorConfig } from './config/loadMonitorConfig.js';
export type { LoadMonitorConfigOptions, MonitorConfigOverrides } from './config/loadMonitorConfig.js';

// Report
export {
  renderDashboard,
  writeDashboard,
  escapeHtml,
  statusColor,
  mainDisks,
  activeInterfaces,
} from './report/renderDashboard.js';
