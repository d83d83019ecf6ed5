import "dotenv/config";
import { initializeDatabase, closeDatabase } from "./db/index.js";
import { getServerConfig } from "./config/server.js";
import { buildServer } from "./server.js";

async function start() {
  const config = getServerConfig();

  initializeDatabase(config.databasePath);
  console.log(`Database initialized at ${config.databasePath}`);

  const fastify = buildServer({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimit,
    maxPageSize: config.maxPageSize,
  });

  // Graceful shutdown
  const shutdown = async () => {
    fastify.log.info("Shutting down...");
    await fastify.close();
    closeDatabase();
    process.exit(0);
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    closeDatabase();
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  console.error("Failed to start API server:", err);
  process.exit(1);
});
