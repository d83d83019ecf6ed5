export { snapshotRoutes } from "./snapshots.js";
export { assetRoutes } from "./assets.js";
export { windowsUpdateRoutes } from "./windows-updates.js";

export type ListRoutesOptions = {
  /** Cap a requested page size at the configured maximum */
  clampLimit: (limit: number | undefined) => number | undefined;
};
