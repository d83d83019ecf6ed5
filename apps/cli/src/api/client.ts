import type {
  AssetFilters,
  AssetInfo,
  Page,
  Snapshot,
  SnapshotFilters,
  WindowsUpdateFilters,
  WindowsUpdateRecord,
} from "@hostwatch/shared";

export const DEFAULT_API_URL = "http://localhost:8000";

export interface ApiClientConfig {
  baseUrl: string;
}

export interface ListResponse<T> {
  items: T[];
  count: number;
}

type QueryValue = string | number | boolean | undefined;

/**
 * Non-2xx response from the API. `details` holds field errors for 400s
 * and the constraint message for 409s.
 */
export class ApiError extends Error {
  public readonly status: number;
  public readonly details: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

function toQueryString(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : "";
}

function readErrorBody(body: unknown, fallback: string): { message: string; details?: unknown } {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return { message: body.error, details: "details" in body ? body.details : undefined };
  }
  return { message: fallback };
}

export class ApiClient {
  public readonly baseUrl: string;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const response = await fetch(url, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      const errorBody: unknown = await response.json().catch(() => null);
      const { message, details } = readErrorBody(errorBody, `API error: ${response.status}`);
      throw new ApiError(response.status, message, details);
    }

    return response;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.send(method, path, body);
    return response.json() as Promise<T>;
  }

  // Resolves to null on 404
  private async find<T>(path: string): Promise<T | null> {
    try {
      return await this.request<T>("GET", path);
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  // Snapshots
  async listSnapshots(filters: SnapshotFilters = {}, page: Page = {}): Promise<ListResponse<Snapshot>> {
    const query = toQueryString({
      hostname: filters.hostname,
      timestamp_gte: filters.timestampGte,
      timestamp_lte: filters.timestampLte,
      limit: page.limit,
      offset: page.offset,
    });
    const result = await this.request<{ snapshots: Snapshot[]; count: number }>("GET", `/snapshots${query}`);
    return { items: result.snapshots, count: result.count };
  }

  async getSnapshot(id: number): Promise<Snapshot | null> {
    const result = await this.find<{ snapshot: Snapshot }>(`/snapshots/${id}`);
    return result?.snapshot ?? null;
  }

  /**
   * Submit a snapshot exactly as an agent would. The payload is validated by the server.
   */
  async createSnapshot(payload: unknown): Promise<Snapshot> {
    const result = await this.request<{ snapshot: Snapshot }>("POST", "/snapshots", payload);
    return result.snapshot;
  }

  async deleteSnapshot(id: number): Promise<boolean> {
    try {
      await this.send("DELETE", `/snapshots/${id}`);
      return true;
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return false;
      }
      throw error;
    }
  }

  // Assets
  async listAssets(filters: AssetFilters = {}, page: Page = {}): Promise<ListResponse<AssetInfo>> {
    const query = toQueryString({
      os_pretty_name: filters.osPrettyName,
      system_manufacturer: filters.systemManufacturer,
      memory_total_mb_gte: filters.memoryTotalMbGte,
      is_vm: filters.isVm,
      limit: page.limit,
      offset: page.offset,
    });
    const result = await this.request<{ assets: AssetInfo[]; count: number }>("GET", `/assets${query}`);
    return { items: result.assets, count: result.count };
  }

  async getAsset(id: number): Promise<AssetInfo | null> {
    const result = await this.find<{ asset: AssetInfo }>(`/assets/${id}`);
    return result?.asset ?? null;
  }

  // Windows updates
  async listWindowsUpdates(
    filters: WindowsUpdateFilters = {},
    page: Page = {}
  ): Promise<ListResponse<WindowsUpdateRecord>> {
    const query = toQueryString({
      kb_id: filters.kbId,
      title: filters.title,
      installed_on_gte: filters.installedOnGte,
      installed_on_lte: filters.installedOnLte,
      status: filters.status,
      limit: page.limit,
      offset: page.offset,
    });
    const result = await this.request<{ windows_updates: WindowsUpdateRecord[]; count: number }>(
      "GET",
      `/windows-updates${query}`
    );
    return { items: result.windows_updates, count: result.count };
  }

  async getWindowsUpdate(id: number): Promise<WindowsUpdateRecord | null> {
    const result = await this.find<{ windows_update: WindowsUpdateRecord }>(`/windows-updates/${id}`);
    return result?.windows_update ?? null;
  }

  // Health
  async health(): Promise<{ status: string }> {
    return this.request<{ status: string }>("GET", "/health");
  }
}

let client: ApiClient | null = null;

export function getApiClient(): ApiClient {
  const baseUrl = (process.env.API_URL || DEFAULT_API_URL).replace(/\/$/, "");
  if (!client || client.baseUrl !== baseUrl) {
    client = new ApiClient({ baseUrl });
  }
  return client;
}
