import { z } from 'zod';

const count = z.number().nonnegative();
const percent = z.number().min(0).max(100);
const decimalText = z.string().regex(/^\d+(?:\.\d+)?$/);

export const cpuMetricsSchema = z.object({
  cpu_usage_percent: percent,
  cpu_cores: z.number().int().nonnegative(),
  cpu_model: z.string(),
  cpu_temperature: z.string(),
  load_average: z.string(),
});

export const gpuMetricsSchema = z.object({
  gpu_usage_percent: z.string(),
  gpu_temperature: z.string(),
  gpu_memory: z.string(),
});

export const diskEntrySchema = z.object({
  filesystem: z.string(),
  size: z.string(),
  used: z.string(),
  available: z.string(),
  use_percent: percent,
  mount_point: z.string(),
  smart_status: z.string(),
});

// Swap and memory percentages are left unbounded above: page file usage can
// exceed the allocated base size on Windows.
export const memoryMetricsSchema = z.object({
  memory_total_mb: count,
  memory_used_mb: count,
  memory_free_mb: count,
  memory_available_mb: count,
  memory_usage_percent: count,
  swap_total_mb: count,
  swap_used_mb: count,
  swap_free_mb: z.number(),
  swap_usage_percent: count,
});

export const networkEntrySchema = z.object({
  interface: z.string(),
  ip_address: z.string(),
  rx_bytes: count,
  tx_bytes: count,
  rx_packets: count,
  tx_packets: count,
  rx_errors: count,
  tx_errors: count,
});

export const loadMetricsSchema = z.object({
  load_1min: decimalText,
  load_5min: decimalText,
  load_15min: decimalText,
  uptime: z.string(),
  uptime_seconds: count,
});

export const snapshotSchema = z.object({
  timestamp: z.string().min(1),
  hostname: z.string(),
  cpu: cpuMetricsSchema,
  gpu: gpuMetricsSchema,
  disk: z.array(diskEntrySchema),
  memory: memoryMetricsSchema,
  network: z.array(networkEntrySchema),
  system_load: loadMetricsSchema,
});

export type ValidatedSnapshot = z.infer<typeof snapshotSchema>;
