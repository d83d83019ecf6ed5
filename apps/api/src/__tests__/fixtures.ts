import { readFileSync } from "node:fs";
import type { AssetInfo, Snapshot } from "@hostwatch/shared";
import { getDatabase } from "../db/index.js";

/**
 * A snapshot as an agent posts it: the stored shape without generated identifiers
 */
export type SnapshotPayload = Omit<Snapshot, "id" | "asset_info"> & {
  asset_info: Omit<AssetInfo, "id" | "snapshot_id">;
};

const FIXTURES_DIR = new URL("./fixtures/", import.meta.url);

export function loadPayload(name: "linux-snapshot" | "windows-snapshot"): SnapshotPayload {
  const payload: SnapshotPayload = JSON.parse(readFileSync(new URL(`${name}.json`, FIXTURES_DIR), "utf-8"));
  return payload;
}

export const SNAPSHOT_TABLES = [
  "snapshots",
  "asset_info",
  "os_info",
  "system_info",
  "cpu_info",
  "memory_info",
  "virtualization_info",
  "disk_info",
  "network_interface_info",
  "windows_updates",
  "metric_data",
  "memory_usage_metrics",
  "cpu_load_metrics",
  "network_usage_metrics",
  "top_processes_metrics",
  "process_details",
  "disk_usage_metrics",
  "top_disk_consumer_metrics",
] as const;

export type SnapshotTable = (typeof SNAPSHOT_TABLES)[number];

export function countRows(table: SnapshotTable): number {
  const row = getDatabase().prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row?.count ?? 0;
}

export function countAllRows(): number {
  return SNAPSHOT_TABLES.reduce((total, table) => total + countRows(table), 0);
}
