import { z } from "zod";
import { decimalField, percentageField } from "../utils/decimal.js";
import { timestampField } from "../utils/timestamps.js";

const text = (max: number) => z.string().max(max).default("");
const count = () => z.number().int().nonnegative().default(0);
const blankToNull = (value: unknown) => (value === "" ? null : value);

// Asset schemas
const OsInfoSchema = z.object({
  pretty_name: text(255),
  kernel_version: text(255),
});

const SystemInfoSchema = z.object({
  manufacturer: text(255),
  product_name: text(255),
  serial_number: text(255),
  bios_version: text(255),
  chassis_type: text(255),
  uptime_initial: text(255),
  last_update_check_time: timestampField().nullable().default(null),
  pending_updates_count: z.number().int().nonnegative().nullable().default(null),
});

const CpuInfoSchema = z.object({
  model_name: text(255),
  vendor_id: text(255),
  total_logical_cpus: count(),
  physical_cores_per_socket: count(),
  architecture: text(50),
});

const MemoryInfoSchema = z.object({
  total_mb: count(),
  speed: text(100),
  modules_count: count(),
});

const VirtualizationInfoSchema = z.object({
  is_vm: z.boolean().default(false),
  hypervisor: text(100),
});

const DiskInfoSchema = z.object({
  name: z.string().min(1).max(50),
  size: z.string().min(1).max(50),
  model: text(255),
  serial: text(255),
});

const NetworkInterfaceInfoSchema = z.object({
  name: z.string().min(1).max(50),
  mac_address: text(17),
  ipv4_address: z.preprocess(blankToNull, z.string().ip({ version: "v4" }).nullable().default(null)),
  ipv6_address: z.preprocess(blankToNull, z.string().ip({ version: "v6" }).nullable().default(null)),
});

const WindowsUpdateSchema = z.object({
  kb_id: z.string().min(1).max(50),
  title: text(512),
  installed_on: z.preprocess(blankToNull, timestampField().nullable().default(null)),
  status: text(50),
});

const AssetInfoSchema = z.object({
  hostname: z.string().min(1).max(255).optional(),
  os: OsInfoSchema,
  system: SystemInfoSchema,
  cpu: CpuInfoSchema,
  memory: MemoryInfoSchema,
  virtualization: VirtualizationInfoSchema,
  disks: z.array(DiskInfoSchema).default([]),
  network_interfaces: z.array(NetworkInterfaceInfoSchema).default([]),
  windows_updates: z.array(WindowsUpdateSchema).default([]),
});

// Metric schemas
const MemoryUsageMetricSchema = z.object({
  total_mb: z.number().int().nonnegative(),
  used_mb: z.number().int().nonnegative(),
  free_mb: z.number().int().nonnegative(),
  available_mb: z.number().int().nonnegative(),
  percentage_used: percentageField(),
});

const CpuLoadMetricSchema = z.object({
  load_1min: decimalField({ maxDigits: 5 }),
  load_5min: decimalField({ maxDigits: 5 }),
  load_15min: decimalField({ maxDigits: 5 }),
});

const NetworkUsageMetricSchema = z.object({
  received_bps: decimalField({ maxDigits: 15 }),
  transmitted_bps: decimalField({ maxDigits: 15 }),
});

const ProcessDetailSchema = z.object({
  pid: z.number().int().nonnegative(),
  user: z.string().max(255),
  // Multi-threaded processes report more than 100% CPU
  cpu_percent: decimalField({ maxDigits: 5 }),
  mem_percent: percentageField(),
  command: z.string(),
  process_type: z
    .undefined({ invalid_type_error: "process_type is assigned from by_cpu/by_memory and cannot be set" })
    .optional(),
});

const TopProcessesMetricSchema = z.object({
  by_cpu: z.array(ProcessDetailSchema).default([]),
  by_memory: z.array(ProcessDetailSchema).default([]),
});

const DiskUsageMetricSchema = z.object({
  filesystem: z.string().min(1).max(255),
  percentage_used: percentageField(),
  total_size: z.string().max(50),
  used_size: z.string().max(50),
  available_size: z.string().max(50),
});

const TopDiskConsumerMetricSchema = z.object({
  size: z.string().max(50),
  path: z.string().min(1).max(1024),
});

const MetricDataSchema = z.object({
  memory_usage: MemoryUsageMetricSchema,
  cpu_load: CpuLoadMetricSchema,
  network_usage: NetworkUsageMetricSchema,
  top_processes: TopProcessesMetricSchema,
  disk_usage: z.array(DiskUsageMetricSchema).default([]),
  top_disk_consumers: z.array(TopDiskConsumerMetricSchema).default([]),
});

// Snapshot schemas
export const CreateSnapshotSchema = z.object({
  timestamp: timestampField(),
  hostname: z.string().min(1).max(255),
  asset_info: AssetInfoSchema,
  metrics: MetricDataSchema,
});

// Query schemas. Empty values are treated as absent.
const blankToUndefined = (value: unknown) => (value === "" ? undefined : value);
const optionalText = () => z.preprocess(blankToUndefined, z.string().optional());
const optionalTimestamp = () => z.preprocess(blankToUndefined, timestampField().optional());

// Bounded so every value binds as a SQLite integer
const PageQuerySchema = z.object({
  limit: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER).optional()),
  offset: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).optional()),
});

export const ListSnapshotsQuerySchema = PageQuerySchema.extend({
  hostname: optionalText(),
  timestamp_gte: optionalTimestamp(),
  timestamp_lte: optionalTimestamp(),
});

export const ListAssetsQuerySchema = PageQuerySchema.extend({
  os_pretty_name: optionalText(),
  system_manufacturer: optionalText(),
  memory_total_mb_gte: z.preprocess(blankToUndefined, z.coerce.number().optional()),
  is_vm: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value),
    z
      .enum(["true", "false", "1", "0"])
      .transform((value) => value === "true" || value === "1")
      .optional()
  ),
});

export const ListWindowsUpdatesQuerySchema = PageQuerySchema.extend({
  kb_id: optionalText(),
  title: optionalText(),
  installed_on_gte: optionalTimestamp(),
  installed_on_lte: optionalTimestamp(),
  status: optionalText(),
});

export const IdParamsSchema = z.object({
  id: z.string().regex(/^\d+$/).transform(Number),
});

// Type exports
export type CreateSnapshotInput = z.infer<typeof CreateSnapshotSchema>;
export type ListSnapshotsQuery = z.infer<typeof ListSnapshotsQuerySchema>;
export type ListAssetsQuery = z.infer<typeof ListAssetsQuerySchema>;
export type ListWindowsUpdatesQuery = z.infer<typeof ListWindowsUpdatesQuerySchema>;
