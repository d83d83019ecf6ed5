import { getDatabase } from "../schema.js";
import { groupByParent, pageClause, selectChildren, whereClause } from "../helpers.js";
import type {
  ListResult,
  Page,
  WindowsUpdate,
  WindowsUpdateFilters,
  WindowsUpdateRecord,
} from "@hostwatch/shared";

interface WindowsUpdateRow {
  id: number;
  asset_info_id: number;
  kb_id: string;
  title: string;
  installed_on: string | null;
  status: string;
}

interface WindowsUpdateRecordRow extends WindowsUpdateRow {
  hostname: string;
}

function rowToWindowsUpdate(row: WindowsUpdateRow): WindowsUpdate {
  return {
    kb_id: row.kb_id,
    title: row.title,
    installed_on: row.installed_on,
    status: row.status,
  };
}

function rowToRecord(row: WindowsUpdateRecordRow): WindowsUpdateRecord {
  return {
    id: row.id,
    asset_info_id: row.asset_info_id,
    hostname: row.hostname,
    ...rowToWindowsUpdate(row),
  };
}

const RECORD_FROM = `
  FROM windows_updates w
  JOIN asset_info a ON a.id = w.asset_info_id
  JOIN snapshots s ON s.id = a.snapshot_id
`;

/**
 * Insert the updates reported for an asset. Runs inside the caller's transaction.
 */
export function insertWindowsUpdates(assetInfoId: number, updates: WindowsUpdate[]): void {
  const db = getDatabase();
  const stmt = db.prepare<[number, string, string, string | null, string]>(`
    INSERT INTO windows_updates (asset_info_id, kb_id, title, installed_on, status)
    VALUES (?, ?, ?, ?, ?)
  `);

  for (const update of updates) {
    stmt.run(assetInfoId, update.kb_id, update.title, update.installed_on, update.status);
  }
}

/**
 * Get the updates of many assets at once, keyed by asset ID
 */
export function getWindowsUpdatesByAssets(assetInfoIds: number[]): Map<number, WindowsUpdate[]> {
  const rows = selectChildren<WindowsUpdateRow>("windows_updates", "asset_info_id", assetInfoIds);
  const grouped = groupByParent(rows, "asset_info_id");
  return new Map([...grouped].map(([assetInfoId, group]) => [assetInfoId, group.map(rowToWindowsUpdate)]));
}

/**
 * Get a Windows update by ID
 */
export function getWindowsUpdateById(id: number): WindowsUpdateRecord | null {
  const db = getDatabase();
  const stmt = db.prepare<[number], WindowsUpdateRecordRow>(`SELECT w.*, s.hostname ${RECORD_FROM} WHERE w.id = ?`);
  const row = stmt.get(id);
  return row ? rowToRecord(row) : null;
}

/**
 * List Windows updates, most recently installed first.
 * `kb_id` and `title` are substring matches; `lower()` folds ASCII letters only.
 */
export function listWindowsUpdates(
  filters: WindowsUpdateFilters,
  page: Page = {}
): ListResult<WindowsUpdateRecord> {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: Array<string | number> = [];

  if (filters.kbId !== undefined) {
    conditions.push("instr(lower(w.kb_id), lower(?)) > 0");
    values.push(filters.kbId);
  }

  if (filters.title !== undefined) {
    conditions.push("instr(lower(w.title), lower(?)) > 0");
    values.push(filters.title);
  }

  if (filters.installedOnGte !== undefined) {
    conditions.push("w.installed_on >= ?");
    values.push(filters.installedOnGte);
  }

  if (filters.installedOnLte !== undefined) {
    conditions.push("w.installed_on <= ?");
    values.push(filters.installedOnLte);
  }

  if (filters.status !== undefined) {
    conditions.push("w.status = ?");
    values.push(filters.status);
  }

  const where = whereClause(conditions);
  const limit = pageClause(page);

  const countRow = db.prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count ${RECORD_FROM} ${where}`).get(...values);
  const rows = db
    .prepare<unknown[], WindowsUpdateRecordRow>(`
      SELECT w.*, s.hostname ${RECORD_FROM} ${where}
      ORDER BY w.installed_on IS NULL, w.installed_on DESC, s.hostname, w.id
      ${limit.sql}
    `)
    .all(...values, ...limit.values);

  return { items: rows.map(rowToRecord), count: countRow?.count ?? 0 };
}
