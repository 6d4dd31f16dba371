import type { Alert, AlertMetric, AlertThresholds, Snapshot } from '@hostpulse/shared';

const LABELS: Record<AlertMetric, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk',
};

function check(metric: AlertMetric, value: number, threshold: number): Alert | null {
  if (!(value > threshold)) return null;
  return {
    metric,
    value,
    threshold,
    message: `${LABELS[metric]} usage is high: ${value}% (threshold: ${threshold}%)`,
  };
}

/**
 * Usage figures strictly above their threshold. Only the first disk entry
 * is checked.
 */
export function evaluateAlerts(snapshot: Snapshot, thresholds: AlertThresholds): Alert[] {
  const firstDisk = snapshot.disk[0];
  const alerts = [
    check('cpu', snapshot.cpu.cpu_usage_percent, thresholds.cpu),
    check('memory', snapshot.memory.memory_usage_percent, thresholds.memory),
    firstDisk ? check('disk', firstDisk.use_percent, thresholds.disk) : null,
  ];
  return alerts.filter((alert): alert is Alert => alert !== null);
}
