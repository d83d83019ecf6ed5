/**
 * Which top-process list a process row was reported in.
 * Assigned by the server from `by_cpu` / `by_memory`, never sent by agents.
 */
export enum ProcessType {
  Cpu = "cpu",
  Memory = "memory",
}

export interface MemoryUsageMetric {
  total_mb: number;
  used_mb: number;
  free_mb: number;
  available_mb: number;
  percentage_used: number;
}

export interface CpuLoadMetric {
  load_1min: number;
  load_5min: number;
  load_15min: number;
}

export interface NetworkUsageMetric {
  received_bps: number;
  transmitted_bps: number;
}

export interface ProcessDetail {
  pid: number;
  user: string;
  cpu_percent: number;
  mem_percent: number;
  command: string;
}

export interface TopProcessesMetric {
  by_cpu: ProcessDetail[];
  by_memory: ProcessDetail[];
}

export interface DiskUsageMetric {
  filesystem: string;
  percentage_used: number;
  total_size: string;
  used_size: string;
  available_size: string;
}

export interface TopDiskConsumerMetric {
  size: string;
  path: string;
}

/**
 * Point-in-time performance measurements captured once per snapshot
 */
export interface MetricData {
  memory_usage: MemoryUsageMetric;
  cpu_load: CpuLoadMetric;
  network_usage: NetworkUsageMetric;
  top_processes: TopProcessesMetric;
  disk_usage: DiskUsageMetric[];
  top_disk_consumers: TopDiskConsumerMetric[];
}
