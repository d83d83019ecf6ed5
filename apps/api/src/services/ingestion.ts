import type { Snapshot } from "@hostwatch/shared";
import { snapshotsRepo } from "../db/index.js";
import type { CreateSnapshotInput } from "../routes/schemas.js";
import { buildSnapshotGraph } from "./snapshot-graph.js";

/**
 * Build, persist and read back one snapshot.
 * Throws SnapshotConflictError when the write violates a constraint; nothing is kept in that case.
 */
export function ingestSnapshot(input: CreateSnapshotInput): Snapshot {
  const graph = buildSnapshotGraph(input);
  const snapshotId = snapshotsRepo.insertSnapshot(graph);

  const snapshot = snapshotsRepo.getSnapshotById(snapshotId);
  if (!snapshot) {
    throw new Error(`Snapshot ${snapshotId} was not found after insert`);
  }
  return snapshot;
}
