export { initializeDatabase, getDatabase, closeDatabase } from "./schema.js";
export * as snapshotsRepo from "./repositories/snapshots.js";
export * as assetsRepo from "./repositories/assets.js";
export * as windowsUpdatesRepo from "./repositories/windows-updates.js";
