export type Platform = 'linux' | 'macos' | 'windows' | 'unknown';

export type MetricDomain = 'cpu' | 'gpu' | 'disk' | 'memory' | 'network' | 'system_load';

export interface CpuMetrics {
  cpu_usage_percent: number;
  cpu_cores: number;
  cpu_model: string;
  cpu_temperature: string;
  load_average: string;
}

export interface GpuMetrics {
  /** Numeric percent, `Available (<name>)` or `N/A`. */
  gpu_usage_percent: string;
  gpu_temperature: string;
  gpu_memory: string;
}

export interface DiskEntry {
  filesystem: string;
  size: string;
  used: string;
  available: string;
  use_percent: number;
  mount_point: string;
  smart_status: string;
}

/** All sizes in megabytes. */
export interface MemoryMetrics {
  memory_total_mb: number;
  memory_used_mb: number;
  memory_free_mb: number;
  memory_available_mb: number;
  memory_usage_percent: number;
  swap_total_mb: number;
  swap_used_mb: number;
  swap_free_mb: number;
  swap_usage_percent: number;
}

export interface NetworkEntry {
  interface: string;
  ip_address: string;
  rx_bytes: number;
  tx_bytes: number;
  rx_packets: number;
  tx_packets: number;
  rx_errors: number;
  tx_errors: number;
}

export interface LoadMetrics {
  load_1min: string;
  load_5min: string;
  load_15min: string;
  uptime: string;
  uptime_seconds: number;
}

export interface Snapshot {
  timestamp: string;
  hostname: string;
  cpu: CpuMetrics;
  gpu: GpuMetrics;
  disk: DiskEntry[];
  memory: MemoryMetrics;
  network: NetworkEntry[];
  system_load: LoadMetrics;
}

export interface DomainResults {
  cpu: CpuMetrics;
  gpu: GpuMetrics;
  disk: DiskEntry[];
  memory: MemoryMetrics;
  network: NetworkEntry[];
  system_load: LoadMetrics;
}
