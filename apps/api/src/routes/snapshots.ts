import type { FastifyInstance } from "fastify";
import { snapshotsRepo } from "../db/index.js";
import { ingestSnapshot } from "../services/ingestion.js";
import { SnapshotConflictError, formatIssues } from "../utils/errors.js";
import { CreateSnapshotSchema, IdParamsSchema, ListSnapshotsQuerySchema } from "./schemas.js";
import type { ListRoutesOptions } from "./index.js";

export async function snapshotRoutes(fastify: FastifyInstance, options: ListRoutesOptions) {
  // Ingest a snapshot posted by an agent
  fastify.post("/snapshots", async (request, reply) => {
    const parseResult = CreateSnapshotSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: formatIssues(parseResult.error.issues) };
    }

    try {
      const snapshot = ingestSnapshot(parseResult.data);
      request.log.info({ snapshotId: snapshot.id, hostname: snapshot.hostname }, "Snapshot ingested");
      reply.status(201);
      return { snapshot };
    } catch (error) {
      if (error instanceof SnapshotConflictError) {
        request.log.warn({ code: error.code, hostname: parseResult.data.hostname }, "Snapshot rejected");
        reply.status(409);
        return { error: "Snapshot conflicts with a uniqueness constraint", details: error.message };
      }
      throw error;
    }
  });

  // List snapshots
  fastify.get("/snapshots", async (request, reply) => {
    const parseResult = ListSnapshotsQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid query parameters", details: formatIssues(parseResult.error.issues) };
    }

    const query = parseResult.data;
    const result = snapshotsRepo.listSnapshots(
      {
        hostname: query.hostname,
        timestampGte: query.timestamp_gte,
        timestampLte: query.timestamp_lte,
      },
      { limit: options.clampLimit(query.limit), offset: query.offset }
    );

    return { snapshots: result.items, count: result.count };
  });

  // Get a snapshot
  fastify.get("/snapshots/:id", async (request, reply) => {
    const params = IdParamsSchema.safeParse(request.params);
    const snapshot = params.success ? snapshotsRepo.getSnapshotById(params.data.id) : null;
    if (!snapshot) {
      reply.status(404);
      return { error: "Snapshot not found" };
    }
    return { snapshot };
  });

  // Delete a snapshot and everything it owns
  fastify.delete("/snapshots/:id", async (request, reply) => {
    const params = IdParamsSchema.safeParse(request.params);
    const deleted = params.success && snapshotsRepo.deleteSnapshot(params.data.id);
    if (!deleted) {
      reply.status(404);
      return { error: "Snapshot not found" };
    }
    return reply.status(204).send();
  });
}
