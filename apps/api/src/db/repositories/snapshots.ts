import { getDatabase } from "../schema.js";
import { pageClause, whereClause } from "../helpers.js";
import { getAssetsBySnapshots, insertAssetInfo } from "./assets.js";
import { getMetricsBySnapshots, insertMetricData } from "./metrics.js";
import { SnapshotConflictError, isConstraintError } from "../../utils/errors.js";
import type { SnapshotGraph } from "../../services/snapshot-graph.js";
import type { ListResult, Page, Snapshot, SnapshotFilters } from "@hostwatch/shared";

interface SnapshotRow {
  id: number;
  timestamp: string;
  hostname: string;
}

function hydrateSnapshots(rows: SnapshotRow[]): Snapshot[] {
  const ids = rows.map((row) => row.id);
  const assets = getAssetsBySnapshots(ids);
  const metrics = getMetricsBySnapshots(ids);

  return rows.map((row) => {
    const assetInfo = assets.get(row.id);
    const metricData = metrics.get(row.id);
    if (!assetInfo || !metricData) {
      throw new Error(`Snapshot ${row.id} is missing its asset or metric records`);
    }
    return {
      id: row.id,
      timestamp: row.timestamp,
      hostname: row.hostname,
      asset_info: assetInfo,
      metrics: metricData,
    };
  });
}

/**
 * Persist a whole snapshot graph in one transaction and return the new snapshot ID.
 * Constraint violations roll everything back and surface as SnapshotConflictError.
 */
export function insertSnapshot(graph: SnapshotGraph): number {
  const db = getDatabase();

  const transaction = db.transaction((snapshot: SnapshotGraph) => {
    const result = db
      .prepare<[string, string]>("INSERT INTO snapshots (timestamp, hostname) VALUES (?, ?)")
      .run(snapshot.timestamp, snapshot.hostname);
    const snapshotId = Number(result.lastInsertRowid);

    insertAssetInfo(snapshotId, snapshot.asset);
    insertMetricData(snapshotId, snapshot.metrics);

    return snapshotId;
  });

  try {
    return transaction(graph);
  } catch (error) {
    if (isConstraintError(error)) {
      throw new SnapshotConflictError(error.message, error.code);
    }
    throw error;
  }
}

/**
 * Get a snapshot by ID with its full subtree
 */
export function getSnapshotById(id: number): Snapshot | null {
  const db = getDatabase();
  const row = db.prepare<[number], SnapshotRow>("SELECT * FROM snapshots WHERE id = ?").get(id);
  return row ? hydrateSnapshots([row])[0] : null;
}

/**
 * List snapshots, newest first. The hostname filter is an exact match whose
 * case folding (`COLLATE NOCASE`) covers ASCII letters only.
 */
export function listSnapshots(filters: SnapshotFilters, page: Page = {}): ListResult<Snapshot> {
  const db = getDatabase();
  const conditions: string[] = [];
  const values: string[] = [];

  if (filters.hostname !== undefined) {
    conditions.push("hostname = ? COLLATE NOCASE");
    values.push(filters.hostname);
  }

  if (filters.timestampGte !== undefined) {
    conditions.push("timestamp >= ?");
    values.push(filters.timestampGte);
  }

  if (filters.timestampLte !== undefined) {
    conditions.push("timestamp <= ?");
    values.push(filters.timestampLte);
  }

  const where = whereClause(conditions);
  const limit = pageClause(page);

  const countRow = db
    .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM snapshots ${where}`)
    .get(...values);
  const rows = db
    .prepare<unknown[], SnapshotRow>(
      `SELECT * FROM snapshots ${where} ORDER BY timestamp DESC, id DESC ${limit.sql}`
    )
    .all(...values, ...limit.values);

  return { items: hydrateSnapshots(rows), count: countRow?.count ?? 0 };
}

/**
 * Delete a snapshot; its whole subtree goes with it through ON DELETE CASCADE
 */
export function deleteSnapshot(id: number): boolean {
  const db = getDatabase();
  const result = db.prepare<[number]>("DELETE FROM snapshots WHERE id = ?").run(id);
  return result.changes > 0;
}
