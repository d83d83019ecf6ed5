import type { AssetInfo } from "./asset.js";
import type { MetricData } from "./metrics.js";

/**
 * One timestamped report from a single host
 */
export interface Snapshot {
  id: number;
  timestamp: string;
  hostname: string;
  asset_info: AssetInfo;
  metrics: MetricData;
}

export interface SnapshotFilters {
  hostname?: string;
  timestampGte?: string;
  timestampLte?: string;
}

/**
 * Paging options shared by every list endpoint
 */
export interface Page {
  limit?: number;
  offset?: number;
}

export interface ListResult<T> {
  items: T[];
  count: number;
}
