import type { ZodIssue } from "zod";

/**
 * Raised when a snapshot write violates a uniqueness or foreign-key constraint.
 * The surrounding transaction has already been rolled back.
 */
export class SnapshotConflictError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "SnapshotConflictError";
    this.code = code;
  }
}

/**
 * Whether an error is a SQLite constraint failure (SQLITE_CONSTRAINT_UNIQUE, _FOREIGNKEY, ...)
 */
export function isConstraintError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("SQLITE_CONSTRAINT")
  );
}

/**
 * Group zod issues by dotted field path, e.g. `asset_info.disks.0.name`
 */
export function formatIssues(issues: ZodIssue[]): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const issue of issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}
