export * from "./types/snapshot.js";
export * from "./types/asset.js";
export * from "./types/metrics.js";
export * from "./types/windows-update.js";
