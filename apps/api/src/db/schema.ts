import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

let db: Database.Database | null = null;

// Decimal columns (percentages, loads, byte rates) hold integer hundredths.
const SCHEMA = `
-- One report from one host
CREATE TABLE IF NOT EXISTS snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  hostname TEXT NOT NULL
);

-- Static inventory
CREATE TABLE IF NOT EXISTS asset_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  snapshot_id INTEGER NOT NULL UNIQUE REFERENCES snapshots(id) ON DELETE CASCADE,
  hostname TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS os_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL UNIQUE REFERENCES asset_info(id) ON DELETE CASCADE,
  pretty_name TEXT NOT NULL,
  kernel_version TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS system_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL UNIQUE REFERENCES asset_info(id) ON DELETE CASCADE,
  manufacturer TEXT NOT NULL,
  product_name TEXT NOT NULL,
  serial_number TEXT NOT NULL,
  bios_version TEXT NOT NULL,
  chassis_type TEXT NOT NULL,
  uptime_initial TEXT NOT NULL,
  last_update_check_time TEXT,
  pending_updates_count INTEGER
);

CREATE TABLE IF NOT EXISTS cpu_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL UNIQUE REFERENCES asset_info(id) ON DELETE CASCADE,
  model_name TEXT NOT NULL,
  vendor_id TEXT NOT NULL,
  total_logical_cpus INTEGER NOT NULL,
  physical_cores_per_socket INTEGER NOT NULL,
  architecture TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS memory_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL UNIQUE REFERENCES asset_info(id) ON DELETE CASCADE,
  total_mb INTEGER NOT NULL,
  speed TEXT NOT NULL,
  modules_count INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS virtualization_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL UNIQUE REFERENCES asset_info(id) ON DELETE CASCADE,
  is_vm INTEGER NOT NULL CHECK (is_vm IN (0, 1)),
  hypervisor TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS disk_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL REFERENCES asset_info(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  size TEXT NOT NULL,
  model TEXT NOT NULL,
  serial TEXT NOT NULL,
  UNIQUE(asset_info_id, name)
);

CREATE TABLE IF NOT EXISTS network_interface_info (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL REFERENCES asset_info(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  mac_address TEXT NOT NULL,
  ipv4_address TEXT,
  ipv6_address TEXT,
  UNIQUE(asset_info_id, name)
);

CREATE TABLE IF NOT EXISTS windows_updates (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  asset_info_id INTEGER NOT NULL REFERENCES asset_info(id) ON DELETE CASCADE,
  kb_id TEXT NOT NULL,
  title TEXT NOT NULL,
  installed_on TEXT,
  status TEXT NOT NULL
);

-- Point-in-time measurements
CREATE TABLE IF NOT EXISTS metric_data (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  snapshot_id INTEGER NOT NULL UNIQUE REFERENCES snapshots(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS memory_usage_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL UNIQUE REFERENCES metric_data(id) ON DELETE CASCADE,
  total_mb INTEGER NOT NULL,
  used_mb INTEGER NOT NULL,
  free_mb INTEGER NOT NULL,
  available_mb INTEGER NOT NULL,
  percentage_used INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS cpu_load_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL UNIQUE REFERENCES metric_data(id) ON DELETE CASCADE,
  load_1min INTEGER NOT NULL,
  load_5min INTEGER NOT NULL,
  load_15min INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS network_usage_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL UNIQUE REFERENCES metric_data(id) ON DELETE CASCADE,
  received_bps INTEGER NOT NULL,
  transmitted_bps INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS top_processes_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL UNIQUE REFERENCES metric_data(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS process_details (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  top_processes_metric_id INTEGER NOT NULL REFERENCES top_processes_metrics(id) ON DELETE CASCADE,
  process_type TEXT NOT NULL CHECK (process_type IN ('cpu', 'memory')),
  pid INTEGER NOT NULL,
  user TEXT NOT NULL,
  cpu_percent INTEGER NOT NULL,
  mem_percent INTEGER NOT NULL,
  command TEXT NOT NULL,
  UNIQUE(top_processes_metric_id, process_type, pid)
);

CREATE TABLE IF NOT EXISTS disk_usage_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL REFERENCES metric_data(id) ON DELETE CASCADE,
  filesystem TEXT NOT NULL,
  percentage_used INTEGER NOT NULL,
  total_size TEXT NOT NULL,
  used_size TEXT NOT NULL,
  available_size TEXT NOT NULL,
  UNIQUE(metric_data_id, filesystem)
);

CREATE TABLE IF NOT EXISTS top_disk_consumer_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  metric_data_id INTEGER NOT NULL REFERENCES metric_data(id) ON DELETE CASCADE,
  size TEXT NOT NULL,
  path TEXT NOT NULL,
  UNIQUE(metric_data_id, path)
);

-- Indexes for filters and child lookups
CREATE INDEX IF NOT EXISTS idx_snapshots_hostname ON snapshots(hostname COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp ON snapshots(timestamp);
CREATE INDEX IF NOT EXISTS idx_windows_updates_asset ON windows_updates(asset_info_id);
CREATE INDEX IF NOT EXISTS idx_windows_updates_installed ON windows_updates(installed_on);
CREATE INDEX IF NOT EXISTS idx_process_details_top ON process_details(top_processes_metric_id);
`;

/**
 * Initialize the database connection and schema
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(SCHEMA);

  return db;
}

/**
 * Get the database instance
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initializeDatabase() first.");
  }
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
