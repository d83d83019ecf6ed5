import type { Page } from "@hostwatch/shared";
import { getDatabase } from "./schema.js";

/**
 * Load child rows for many parents in one query, ordered by insertion
 */
export function selectChildren<Row>(table: string, parentColumn: string, parentIds: number[]): Row[] {
  if (parentIds.length === 0) {
    return [];
  }
  const db = getDatabase();
  const stmt = db.prepare<[string], Row>(
    `SELECT * FROM ${table} WHERE ${parentColumn} IN (SELECT value FROM json_each(?)) ORDER BY id`
  );
  return stmt.all(JSON.stringify(parentIds));
}

/**
 * Group rows by a parent key (one-to-many)
 */
export function groupByParent<Row, K extends keyof Row>(rows: Row[], key: K): Map<Row[K], Row[]> {
  const groups = new Map<Row[K], Row[]>();
  for (const row of rows) {
    const group = groups.get(row[key]);
    if (group) {
      group.push(row);
    } else {
      groups.set(row[key], [row]);
    }
  }
  return groups;
}

/**
 * Index rows by a parent key (one-to-one)
 */
export function indexByParent<Row, K extends keyof Row>(rows: Row[], key: K): Map<Row[K], Row> {
  return new Map(rows.map((row) => [row[key], row]));
}

/**
 * Fetch a one-to-one child that every parent must have
 */
export function requireChild<Row>(children: Map<number, Row>, parentId: number, table: string): Row {
  const child = children.get(parentId);
  if (!child) {
    throw new Error(`Missing ${table} row for parent ${parentId}`);
  }
  return child;
}

/**
 * LIMIT/OFFSET clause and its bound values. SQLite needs a LIMIT before any OFFSET; -1 means none.
 */
export function pageClause(page: Page): { sql: string; values: number[] } {
  return {
    sql: "LIMIT ? OFFSET ?",
    values: [page.limit ?? -1, page.offset ?? 0],
  };
}

/**
 * Render collected conditions as a WHERE clause
 */
export function whereClause(conditions: string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}
