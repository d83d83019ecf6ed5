import {
  ProcessType,
  type CpuInfo,
  type CpuLoadMetric,
  type DiskInfo,
  type DiskUsageMetric,
  type MemoryInfo,
  type MemoryUsageMetric,
  type NetworkInterfaceInfo,
  type NetworkUsageMetric,
  type OsInfo,
  type ProcessDetail,
  type SystemInfo,
  type TopDiskConsumerMetric,
  type VirtualizationInfo,
  type WindowsUpdate,
} from "@hostwatch/shared";
import type { CreateSnapshotInput } from "../routes/schemas.js";
import { toHundredths } from "../utils/decimal.js";

export interface AssetGraph {
  hostname: string;
  os: OsInfo;
  system: SystemInfo;
  cpu: CpuInfo;
  memory: MemoryInfo;
  virtualization: VirtualizationInfo;
  disks: DiskInfo[];
  networkInterfaces: NetworkInterfaceInfo[];
  windowsUpdates: WindowsUpdate[];
}

export interface ProcessRecord extends ProcessDetail {
  process_type: ProcessType;
}

/**
 * Measurements ready for storage. Every decimal field
 * (percentages, loads, byte rates) holds integer hundredths.
 */
export interface MetricGraph {
  memoryUsage: MemoryUsageMetric;
  cpuLoad: CpuLoadMetric;
  networkUsage: NetworkUsageMetric;
  processes: ProcessRecord[];
  diskUsage: DiskUsageMetric[];
  topDiskConsumers: TopDiskConsumerMetric[];
}

/**
 * A validated snapshot as one in-memory unit, persisted in a single transaction
 */
export interface SnapshotGraph {
  timestamp: string;
  hostname: string;
  asset: AssetGraph;
  metrics: MetricGraph;
}

type ProcessInput = CreateSnapshotInput["metrics"]["top_processes"]["by_cpu"][number];

function toProcessRecord(process: ProcessInput, processType: ProcessType): ProcessRecord {
  return {
    process_type: processType,
    pid: process.pid,
    user: process.user,
    cpu_percent: toHundredths(process.cpu_percent),
    mem_percent: toHundredths(process.mem_percent),
    command: process.command,
  };
}

function buildAssetGraph(input: CreateSnapshotInput): AssetGraph {
  const asset = input.asset_info;
  return {
    hostname: asset.hostname ?? input.hostname,
    os: {
      pretty_name: asset.os.pretty_name,
      kernel_version: asset.os.kernel_version,
    },
    system: {
      manufacturer: asset.system.manufacturer,
      product_name: asset.system.product_name,
      serial_number: asset.system.serial_number,
      bios_version: asset.system.bios_version,
      chassis_type: asset.system.chassis_type,
      uptime_initial: asset.system.uptime_initial,
      last_update_check_time: asset.system.last_update_check_time,
      pending_updates_count: asset.system.pending_updates_count,
    },
    cpu: {
      model_name: asset.cpu.model_name,
      vendor_id: asset.cpu.vendor_id,
      total_logical_cpus: asset.cpu.total_logical_cpus,
      physical_cores_per_socket: asset.cpu.physical_cores_per_socket,
      architecture: asset.cpu.architecture,
    },
    memory: {
      total_mb: asset.memory.total_mb,
      speed: asset.memory.speed,
      modules_count: asset.memory.modules_count,
    },
    virtualization: {
      is_vm: asset.virtualization.is_vm,
      hypervisor: asset.virtualization.hypervisor,
    },
    disks: asset.disks.map((disk) => ({
      name: disk.name,
      size: disk.size,
      model: disk.model,
      serial: disk.serial,
    })),
    networkInterfaces: asset.network_interfaces.map((nic) => ({
      name: nic.name,
      mac_address: nic.mac_address,
      ipv4_address: nic.ipv4_address,
      ipv6_address: nic.ipv6_address,
    })),
    windowsUpdates: asset.windows_updates.map((update) => ({
      kb_id: update.kb_id,
      title: update.title,
      installed_on: update.installed_on,
      status: update.status,
    })),
  };
}

function buildMetricGraph(input: CreateSnapshotInput): MetricGraph {
  const metrics = input.metrics;
  return {
    memoryUsage: {
      total_mb: metrics.memory_usage.total_mb,
      used_mb: metrics.memory_usage.used_mb,
      free_mb: metrics.memory_usage.free_mb,
      available_mb: metrics.memory_usage.available_mb,
      percentage_used: toHundredths(metrics.memory_usage.percentage_used),
    },
    cpuLoad: {
      load_1min: toHundredths(metrics.cpu_load.load_1min),
      load_5min: toHundredths(metrics.cpu_load.load_5min),
      load_15min: toHundredths(metrics.cpu_load.load_15min),
    },
    networkUsage: {
      received_bps: toHundredths(metrics.network_usage.received_bps),
      transmitted_bps: toHundredths(metrics.network_usage.transmitted_bps),
    },
    processes: [
      ...metrics.top_processes.by_cpu.map((p) => toProcessRecord(p, ProcessType.Cpu)),
      ...metrics.top_processes.by_memory.map((p) => toProcessRecord(p, ProcessType.Memory)),
    ],
    diskUsage: metrics.disk_usage.map((usage) => ({
      filesystem: usage.filesystem,
      percentage_used: toHundredths(usage.percentage_used),
      total_size: usage.total_size,
      used_size: usage.used_size,
      available_size: usage.available_size,
    })),
    topDiskConsumers: metrics.top_disk_consumers.map((consumer) => ({
      size: consumer.size,
      path: consumer.path,
    })),
  };
}

/**
 * Turn a validated payload into the graph of records that make up one snapshot.
 * `by_cpu` and `by_memory` entries become process records tagged with their list.
 */
export function buildSnapshotGraph(input: CreateSnapshotInput): SnapshotGraph {
  return {
    timestamp: input.timestamp,
    hostname: input.hostname,
    asset: buildAssetGraph(input),
    metrics: buildMetricGraph(input),
  };
}
