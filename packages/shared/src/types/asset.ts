import type { WindowsUpdate } from "./windows-update.js";

export interface OsInfo {
  pretty_name: string;
  kernel_version: string;
}

export interface SystemInfo {
  manufacturer: string;
  product_name: string;
  serial_number: string;
  bios_version: string;
  chassis_type: string;
  uptime_initial: string;
  /** Last time the host checked for OS updates (ISO-8601 UTC) */
  last_update_check_time: string | null;
  pending_updates_count: number | null;
}

export interface CpuInfo {
  model_name: string;
  vendor_id: string;
  total_logical_cpus: number;
  physical_cores_per_socket: number;
  architecture: string;
}

export interface MemoryInfo {
  total_mb: number;
  speed: string;
  modules_count: number;
}

export interface VirtualizationInfo {
  is_vm: boolean;
  hypervisor: string;
}

export interface DiskInfo {
  name: string;
  size: string;
  model: string;
  serial: string;
}

export interface NetworkInterfaceInfo {
  name: string;
  mac_address: string;
  ipv4_address: string | null;
  ipv6_address: string | null;
}

/**
 * Static inventory facts about a host, captured once per snapshot
 */
export interface AssetInfo {
  id: number;
  snapshot_id: number;
  hostname: string;
  os: OsInfo;
  system: SystemInfo;
  cpu: CpuInfo;
  memory: MemoryInfo;
  virtualization: VirtualizationInfo;
  disks: DiskInfo[];
  network_interfaces: NetworkInterfaceInfo[];
  /** Empty for non-Windows hosts */
  windows_updates: WindowsUpdate[];
}

/**
 * Filters accepted by the asset list endpoint
 */
export interface AssetFilters {
  osPrettyName?: string;
  systemManufacturer?: string;
  memoryTotalMbGte?: number;
  isVm?: boolean;
}
