import { getDatabase } from "../schema.js";
import {
  groupByParent,
  indexByParent,
  pageClause,
  requireChild,
  selectChildren,
  whereClause,
} from "../helpers.js";
import { getWindowsUpdatesByAssets, insertWindowsUpdates } from "./windows-updates.js";
import type { AssetGraph } from "../../services/snapshot-graph.js";
import type {
  AssetFilters,
  AssetInfo,
  CpuInfo,
  DiskInfo,
  ListResult,
  MemoryInfo,
  NetworkInterfaceInfo,
  OsInfo,
  Page,
  SystemInfo,
} from "@hostwatch/shared";

interface AssetInfoRow {
  id: number;
  snapshot_id: number;
  hostname: string;
}

type ChildRow<T> = T & { id: number; asset_info_id: number };

interface VirtualizationRow {
  id: number;
  asset_info_id: number;
  is_vm: number;
  hypervisor: string;
}

/**
 * Insert an asset and every record it owns. Runs inside the caller's transaction.
 */
export function insertAssetInfo(snapshotId: number, asset: AssetGraph): number {
  const db = getDatabase();

  const result = db
    .prepare<[number, string]>("INSERT INTO asset_info (snapshot_id, hostname) VALUES (?, ?)")
    .run(snapshotId, asset.hostname);
  const assetInfoId = Number(result.lastInsertRowid);

  db.prepare<[{ asset_info_id: number } & OsInfo]>(`
    INSERT INTO os_info (asset_info_id, pretty_name, kernel_version)
    VALUES (@asset_info_id, @pretty_name, @kernel_version)
  `).run({ asset_info_id: assetInfoId, ...asset.os });

  db.prepare<[{ asset_info_id: number } & SystemInfo]>(`
    INSERT INTO system_info (
      asset_info_id, manufacturer, product_name, serial_number, bios_version,
      chassis_type, uptime_initial, last_update_check_time, pending_updates_count
    )
    VALUES (
      @asset_info_id, @manufacturer, @product_name, @serial_number, @bios_version,
      @chassis_type, @uptime_initial, @last_update_check_time, @pending_updates_count
    )
  `).run({ asset_info_id: assetInfoId, ...asset.system });

  db.prepare<[{ asset_info_id: number } & CpuInfo]>(`
    INSERT INTO cpu_info (asset_info_id, model_name, vendor_id, total_logical_cpus, physical_cores_per_socket, architecture)
    VALUES (@asset_info_id, @model_name, @vendor_id, @total_logical_cpus, @physical_cores_per_socket, @architecture)
  `).run({ asset_info_id: assetInfoId, ...asset.cpu });

  db.prepare<[{ asset_info_id: number } & MemoryInfo]>(`
    INSERT INTO memory_info (asset_info_id, total_mb, speed, modules_count)
    VALUES (@asset_info_id, @total_mb, @speed, @modules_count)
  `).run({ asset_info_id: assetInfoId, ...asset.memory });

  // SQLite has no boolean type
  db.prepare<[number, number, string]>(`
    INSERT INTO virtualization_info (asset_info_id, is_vm, hypervisor) VALUES (?, ?, ?)
  `).run(assetInfoId, asset.virtualization.is_vm ? 1 : 0, asset.virtualization.hypervisor);

  const insertDisk = db.prepare<[{ asset_info_id: number } & DiskInfo]>(`
    INSERT INTO disk_info (asset_info_id, name, size, model, serial)
    VALUES (@asset_info_id, @name, @size, @model, @serial)
  `);
  for (const disk of asset.disks) {
    insertDisk.run({ asset_info_id: assetInfoId, ...disk });
  }

  const insertInterface = db.prepare<[{ asset_info_id: number } & NetworkInterfaceInfo]>(`
    INSERT INTO network_interface_info (asset_info_id, name, mac_address, ipv4_address, ipv6_address)
    VALUES (@asset_info_id, @name, @mac_address, @ipv4_address, @ipv6_address)
  `);
  for (const nic of asset.networkInterfaces) {
    insertInterface.run({ asset_info_id: assetInfoId, ...nic });
  }

  insertWindowsUpdates(assetInfoId, asset.windowsUpdates);

  return assetInfoId;
}

/**
 * Attach every child record to a batch of asset rows, one query per child table
 */
function hydrateAssets(rows: AssetInfoRow[]): AssetInfo[] {
  const ids = rows.map((row) => row.id);

  const os = indexByParent(selectChildren<ChildRow<OsInfo>>("os_info", "asset_info_id", ids), "asset_info_id");
  const system = indexByParent(
    selectChildren<ChildRow<SystemInfo>>("system_info", "asset_info_id", ids),
    "asset_info_id"
  );
  const cpu = indexByParent(selectChildren<ChildRow<CpuInfo>>("cpu_info", "asset_info_id", ids), "asset_info_id");
  const memory = indexByParent(
    selectChildren<ChildRow<MemoryInfo>>("memory_info", "asset_info_id", ids),
    "asset_info_id"
  );
  const virtualization = indexByParent(
    selectChildren<VirtualizationRow>("virtualization_info", "asset_info_id", ids),
    "asset_info_id"
  );
  const disks = groupByParent(selectChildren<ChildRow<DiskInfo>>("disk_info", "asset_info_id", ids), "asset_info_id");
  const nics = groupByParent(
    selectChildren<ChildRow<NetworkInterfaceInfo>>("network_interface_info", "asset_info_id", ids),
    "asset_info_id"
  );
  const updates = getWindowsUpdatesByAssets(ids);

  return rows.map((row) => {
    const osRow = requireChild(os, row.id, "os_info");
    const systemRow = requireChild(system, row.id, "system_info");
    const cpuRow = requireChild(cpu, row.id, "cpu_info");
    const memoryRow = requireChild(memory, row.id, "memory_info");
    const virtualizationRow = requireChild(virtualization, row.id, "virtualization_info");

    return {
      id: row.id,
      snapshot_id: row.snapshot_id,
      hostname: row.hostname,
      os: {
        pretty_name: osRow.pretty_name,
        kernel_version: osRow.kernel_version,
      },
      system: {
        manufacturer: systemRow.manufacturer,
        product_name: systemRow.product_name,
        serial_number: systemRow.serial_number,
        bios_version: systemRow.bios_version,
        chassis_type: systemRow.chassis_type,
        uptime_initial: systemRow.uptime_initial,
        last_update_check_time: systemRow.last_update_check_time,
        pending_updates_count: systemRow.pending_updates_count,
      },
      cpu: {
        model_name: cpuRow.model_name,
        vendor_id: cpuRow.vendor_id,
        total_logical_cpus: cpuRow.total_logical_cpus,
        physical_cores_per_socket: cpuRow.physical_cores_per_socket,
        architecture: cpuRow.architecture,
      },
      memory: {
        total_mb: memoryRow.total_mb,
        speed: memoryRow.speed,
        modules_count: memoryRow.modules_count,
      },
      virtualization: {
        is_vm: virtualizationRow.is_vm === 1,
        hypervisor: virtualizationRow.hypervisor,
      },
      disks: (disks.get(row.id) ?? []).map((disk) => ({
        name: disk.name,
        size: disk.size,
        model: disk.model,
        serial: disk.serial,
      })),
      network_interfaces: (nics.get(row.id) ?? []).map((nic) => ({
        name: nic.name,
        mac_address: nic.mac_address,
        ipv4_address: nic.ipv4_address,
        ipv6_address: nic.ipv6_address,
      })),
      windows_updates: updates.get(row.id) ?? [],
    };
  });
}

/**
 * Get the assets of many snapshots at once, keyed by snapshot ID
 */
export function getAssetsBySnapshots(snapshotIds: number[]): Map<number, AssetInfo> {
  const rows = selectChildren<AssetInfoRow>("asset_info", "snapshot_id", snapshotIds);
  return indexByParent(hydrateAssets(rows), "snapshot_id");
}

/**
 * Get an asset by ID
 */
export function getAssetById(id: number): AssetInfo | null {
  const db = getDatabase();
  const row = db.prepare<[number], AssetInfoRow>("SELECT * FROM asset_info WHERE id = ?").get(id);
  return row ? hydrateAssets([row])[0] : null;
}

/**
 * List assets ordered by the hostname of their snapshot.
 * Text filters are substring matches; `lower()` folds ASCII letters only.
 */
export function listAssets(filters: AssetFilters, page: Page = {}): ListResult<AssetInfo> {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: Array<string | number> = [];

  if (filters.osPrettyName !== undefined) {
    conditions.push("instr(lower(o.pretty_name), lower(?)) > 0");
    values.push(filters.osPrettyName);
  }

  if (filters.systemManufacturer !== undefined) {
    conditions.push("instr(lower(sy.manufacturer), lower(?)) > 0");
    values.push(filters.systemManufacturer);
  }

  if (filters.memoryTotalMbGte !== undefined) {
    conditions.push("m.total_mb >= ?");
    values.push(filters.memoryTotalMbGte);
  }

  if (filters.isVm !== undefined) {
    conditions.push("v.is_vm = ?");
    values.push(filters.isVm ? 1 : 0);
  }

  const from = `
    FROM asset_info a
    JOIN snapshots s ON s.id = a.snapshot_id
    JOIN os_info o ON o.asset_info_id = a.id
    JOIN system_info sy ON sy.asset_info_id = a.id
    JOIN memory_info m ON m.asset_info_id = a.id
    JOIN virtualization_info v ON v.asset_info_id = a.id
    ${whereClause(conditions)}
  `;
  const limit = pageClause(page);

  const countRow = db.prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count ${from}`).get(...values);
  const rows = db
    .prepare<unknown[], AssetInfoRow>(`SELECT a.* ${from} ORDER BY s.hostname, a.id ${limit.sql}`)
    .all(...values, ...limit.values);

  return { items: hydrateAssets(rows), count: countRow?.count ?? 0 };
}
