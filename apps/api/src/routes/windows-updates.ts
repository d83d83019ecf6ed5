import type { FastifyInstance } from "fastify";
import { windowsUpdatesRepo } from "../db/index.js";
import { formatIssues } from "../utils/errors.js";
import { IdParamsSchema, ListWindowsUpdatesQuerySchema } from "./schemas.js";
import type { ListRoutesOptions } from "./index.js";

export async function windowsUpdateRoutes(fastify: FastifyInstance, options: ListRoutesOptions) {
  // List Windows updates
  fastify.get("/windows-updates", async (request, reply) => {
    const parseResult = ListWindowsUpdatesQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid query parameters", details: formatIssues(parseResult.error.issues) };
    }

    const query = parseResult.data;
    const result = windowsUpdatesRepo.listWindowsUpdates(
      {
        kbId: query.kb_id,
        title: query.title,
        installedOnGte: query.installed_on_gte,
        installedOnLte: query.installed_on_lte,
        status: query.status,
      },
      { limit: options.clampLimit(query.limit), offset: query.offset }
    );

    return { windows_updates: result.items, count: result.count };
  });

  // Get a Windows update
  fastify.get("/windows-updates/:id", async (request, reply) => {
    const params = IdParamsSchema.safeParse(request.params);
    const update = params.success ? windowsUpdatesRepo.getWindowsUpdateById(params.data.id) : null;
    if (!update) {
      reply.status(404);
      return { error: "Windows update not found" };
    }
    return { windows_update: update };
  });
}
