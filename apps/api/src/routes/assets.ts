import type { FastifyInstance } from "fastify";
import { assetsRepo } from "../db/index.js";
import { formatIssues } from "../utils/errors.js";
import { IdParamsSchema, ListAssetsQuerySchema } from "./schemas.js";
import type { ListRoutesOptions } from "./index.js";

export async function assetRoutes(fastify: FastifyInstance, options: ListRoutesOptions) {
  // List assets
  fastify.get("/assets", async (request, reply) => {
    const parseResult = ListAssetsQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid query parameters", details: formatIssues(parseResult.error.issues) };
    }

    const query = parseResult.data;
    const result = assetsRepo.listAssets(
      {
        osPrettyName: query.os_pretty_name,
        systemManufacturer: query.system_manufacturer,
        memoryTotalMbGte: query.memory_total_mb_gte,
        isVm: query.is_vm,
      },
      { limit: options.clampLimit(query.limit), offset: query.offset }
    );

    return { assets: result.items, count: result.count };
  });

  // Get an asset
  fastify.get("/assets/:id", async (request, reply) => {
    const params = IdParamsSchema.safeParse(request.params);
    const asset = params.success ? assetsRepo.getAssetById(params.data.id) : null;
    if (!asset) {
      reply.status(404);
      return { error: "Asset not found" };
    }
    return { asset };
  });
}
