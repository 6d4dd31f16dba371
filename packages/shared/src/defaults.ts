import { NOT_AVAILABLE, UNKNOWN, ZERO_LOAD, ZERO_UPTIME } from './constants.js';
import type {
  CpuMetrics,
  DomainResults,
  GpuMetrics,
  LoadMetrics,
  MemoryMetrics,
  NetworkEntry,
} from './types/index.js';

// Fully defaulted domain results. A collector starts from these and overwrites
// only what its sources could provide, so no field is ever missing.

export function emptyCpuMetrics(): CpuMetrics {
  return {
    cpu_usage_percent: 0,
    cpu_cores: 0,
    cpu_model: UNKNOWN,
    cpu_temperature: NOT_AVAILABLE,
    load_average: NOT_AVAILABLE,
  };
}

export function emptyGpuMetrics(): GpuMetrics {
  return {
    gpu_usage_percent: NOT_AVAILABLE,
    gpu_temperature: NOT_AVAILABLE,
    gpu_memory: NOT_AVAILABLE,
  };
}

export function emptyMemoryMetrics(): MemoryMetrics {
  return {
    memory_total_mb: 0,
    memory_used_mb: 0,
    memory_free_mb: 0,
    memory_available_mb: 0,
    memory_usage_percent: 0,
    swap_total_mb: 0,
    swap_used_mb: 0,
    swap_free_mb: 0,
    swap_usage_percent: 0,
  };
}

export function emptyNetworkEntry(name: string): NetworkEntry {
  return {
    interface: name,
    ip_address: NOT_AVAILABLE,
    rx_bytes: 0,
    tx_bytes: 0,
    rx_packets: 0,
    tx_packets: 0,
    rx_errors: 0,
    tx_errors: 0,
  };
}

export function emptyLoadMetrics(): LoadMetrics {
  return {
    load_1min: ZERO_LOAD,
    load_5min: ZERO_LOAD,
    load_15min: ZERO_LOAD,
    uptime: ZERO_UPTIME,
    uptime_seconds: 0,
  };
}

export function emptyDomainResults(): DomainResults {
  return {
    cpu: emptyCpuMetrics(),
    gpu: emptyGpuMetrics(),
    disk: [],
    memory: emptyMemoryMetrics(),
    network: [],
    system_load: emptyLoadMetrics(),
  };
}
