import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Snapshot } from "@hostwatch/shared";
import { initializeDatabase, closeDatabase, getDatabase } from "../db/index.js";
import { buildServer } from "../server.js";
import { countAllRows, countRows, loadPayload, type SnapshotPayload } from "./fixtures.js";

interface ErrorBody {
  error: string;
  details: Record<string, string[]>;
}

let app: ReturnType<typeof buildServer>;

async function postSnapshot(payload: unknown) {
  return app.inject({ method: "POST", url: "/snapshots", payload: JSON.stringify(payload), headers: { "content-type": "application/json" } });
}

async function createSnapshot(payload: SnapshotPayload): Promise<Snapshot> {
  const response = await postSnapshot(payload);
  expect(response.statusCode).toBe(201);
  return response.json<{ snapshot: Snapshot }>().snapshot;
}

function reportFrom(hostname: string, timestamp: string): SnapshotPayload {
  const payload = loadPayload("linux-snapshot");
  return {
    ...payload,
    hostname,
    timestamp,
    asset_info: { ...payload.asset_info, hostname },
  };
}

beforeEach(async () => {
  initializeDatabase(":memory:");
  app = buildServer();
  await app.ready();
});

afterEach(async () => {
  await app.close();
  closeDatabase();
});

// ---------------------------------------------------------------------------
// Ingestion
// ---------------------------------------------------------------------------

describe("POST /snapshots", () => {
  it("stores the whole snapshot and returns it with generated identifiers", async () => {
    const payload = loadPayload("linux-snapshot");
    const response = await postSnapshot(payload);

    expect(response.statusCode).toBe(201);
    const { snapshot } = response.json<{ snapshot: Snapshot }>();
    expect(snapshot).toEqual({
      ...payload,
      id: expect.any(Number),
      timestamp: "2024-05-01T12:00:00.000Z",
      asset_info: { ...payload.asset_info, id: expect.any(Number), snapshot_id: snapshot.id },
    });
  });

  it("persists one row per list element", async () => {
    await createSnapshot(loadPayload("linux-snapshot"));

    expect(countRows("snapshots")).toBe(1);
    expect(countRows("asset_info")).toBe(1);
    expect(countRows("os_info")).toBe(1);
    expect(countRows("system_info")).toBe(1);
    expect(countRows("cpu_info")).toBe(1);
    expect(countRows("memory_info")).toBe(1);
    expect(countRows("virtualization_info")).toBe(1);
    expect(countRows("disk_info")).toBe(2);
    expect(countRows("network_interface_info")).toBe(2);
    expect(countRows("windows_updates")).toBe(0);
    expect(countRows("metric_data")).toBe(1);
    expect(countRows("memory_usage_metrics")).toBe(1);
    expect(countRows("cpu_load_metrics")).toBe(1);
    expect(countRows("network_usage_metrics")).toBe(1);
    expect(countRows("top_processes_metrics")).toBe(1);
    expect(countRows("process_details")).toBe(3);
    expect(countRows("disk_usage_metrics")).toBe(1);
    expect(countRows("top_disk_consumer_metrics")).toBe(2);

    await createSnapshot(loadPayload("windows-snapshot"));

    expect(countRows("disk_info")).toBe(3);
    expect(countRows("network_interface_info")).toBe(3);
    expect(countRows("windows_updates")).toBe(3);
    expect(countRows("process_details")).toBe(6);
    expect(countRows("disk_usage_metrics")).toBe(2);
    expect(countRows("top_disk_consumer_metrics")).toBe(2);
  });

  it("tags process rows with the list they were reported in", async () => {
    await createSnapshot(loadPayload("linux-snapshot"));

    const rows = getDatabase()
      .prepare<[], { process_type: string; pid: number }>("SELECT process_type, pid FROM process_details ORDER BY id")
      .all();
    expect(rows).toEqual([
      { process_type: "cpu", pid: 1201 },
      { process_type: "cpu", pid: 980 },
      { process_type: "memory", pid: 980 },
    ]);
  });

  it("normalizes timestamps to UTC", async () => {
    const snapshot = await createSnapshot(loadPayload("windows-snapshot"));

    expect(snapshot.timestamp).toBe("2024-05-02T06:15:00.000Z");
    expect(snapshot.asset_info.system.last_update_check_time).toBe("2024-05-01T22:00:00.000Z");
    expect(snapshot.asset_info.windows_updates.map((u) => u.installed_on)).toEqual([
      "2024-01-15T00:00:00.000Z",
      "2023-11-20T08:30:00.000Z",
      null,
    ]);
  });

  it("keeps two decimal places on percentages, loads and rates", async () => {
    const payload = loadPayload("linux-snapshot");
    const snapshot = await createSnapshot({
      ...payload,
      metrics: {
        ...payload.metrics,
        cpu_load: { load_1min: 0.07, load_5min: 10.1, load_15min: 999.99 },
        network_usage: { received_bps: 9876543210123.45, transmitted_bps: 0 },
      },
    });

    expect(snapshot.metrics.cpu_load).toEqual({ load_1min: 0.07, load_5min: 10.1, load_15min: 999.99 });
    expect(snapshot.metrics.network_usage).toEqual({ received_bps: 9876543210123.45, transmitted_bps: 0 });
  });

  it("accepts decimals sent as strings", async () => {
    const payload = loadPayload("linux-snapshot");
    const response = await postSnapshot({
      ...payload,
      metrics: { ...payload.metrics, cpu_load: { load_1min: "1.50", load_5min: "0.75", load_15min: "2" } },
    });

    expect(response.statusCode).toBe(201);
    const { snapshot } = response.json<{ snapshot: Snapshot }>();
    expect(snapshot.metrics.cpu_load).toEqual({ load_1min: 1.5, load_5min: 0.75, load_15min: 2 });
  });

  it("defaults absent list fields to empty lists", async () => {
    const payload = loadPayload("linux-snapshot");
    const { disks, network_interfaces, windows_updates, ...asset } = payload.asset_info;
    const { disk_usage, top_disk_consumers, ...metrics } = payload.metrics;

    const response = await postSnapshot({
      ...payload,
      asset_info: asset,
      metrics: { ...metrics, top_processes: {} },
    });

    expect(response.statusCode).toBe(201);
    const { snapshot } = response.json<{ snapshot: Snapshot }>();
    expect(snapshot.asset_info.disks).toEqual([]);
    expect(snapshot.asset_info.network_interfaces).toEqual([]);
    expect(snapshot.asset_info.windows_updates).toEqual([]);
    expect(snapshot.metrics.disk_usage).toEqual([]);
    expect(snapshot.metrics.top_disk_consumers).toEqual([]);
    expect(snapshot.metrics.top_processes).toEqual({ by_cpu: [], by_memory: [] });
  });

  it("uses the snapshot hostname when the asset carries none", async () => {
    const payload = loadPayload("linux-snapshot");
    const { hostname, ...asset } = payload.asset_info;

    const response = await postSnapshot({ ...payload, asset_info: asset });

    expect(response.statusCode).toBe(201);
    expect(response.json<{ snapshot: Snapshot }>().snapshot.asset_info.hostname).toBe("web01");
  });

  it("rejects a payload missing a required section and writes nothing", async () => {
    const payload = loadPayload("linux-snapshot");
    const { cpu, ...asset } = payload.asset_info;

    const response = await postSnapshot({ ...payload, asset_info: asset });

    expect(response.statusCode).toBe(400);
    const body = response.json<ErrorBody>();
    expect(body.error).toBe("Invalid request body");
    expect(body.details).toEqual({ "asset_info.cpu": ["Required"] });
    expect(countAllRows()).toBe(0);
  });

  it("reports every missing metrics section", async () => {
    const payload = loadPayload("linux-snapshot");
    const { top_processes, network_usage, ...metrics } = payload.metrics;

    const response = await postSnapshot({ ...payload, metrics });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().details).toEqual({
      "metrics.network_usage": ["Required"],
      "metrics.top_processes": ["Required"],
    });
  });

  it("rejects a process_type sent by the agent", async () => {
    const payload = loadPayload("linux-snapshot");
    const [first] = payload.metrics.top_processes.by_cpu;

    const response = await postSnapshot({
      ...payload,
      metrics: {
        ...payload.metrics,
        top_processes: { by_cpu: [{ ...first, process_type: "memory" }], by_memory: [] },
      },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().details).toEqual({
      "metrics.top_processes.by_cpu.0.process_type": [
        "process_type is assigned from by_cpu/by_memory and cannot be set",
      ],
    });
    expect(countAllRows()).toBe(0);
  });

  it("rejects out-of-range percentages and excess decimal places", async () => {
    const payload = loadPayload("linux-snapshot");

    const response = await postSnapshot({
      ...payload,
      metrics: {
        ...payload.metrics,
        memory_usage: { ...payload.metrics.memory_usage, percentage_used: 100.5 },
        cpu_load: { ...payload.metrics.cpu_load, load_1min: 1.255 },
      },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().details).toEqual({
      "metrics.memory_usage.percentage_used": ["Ensure this value is less than or equal to 100"],
      "metrics.cpu_load.load_1min": ["Ensure that there are no more than 2 decimal places"],
    });
  });

  it("rejects wrong field types", async () => {
    const payload = loadPayload("linux-snapshot");

    const response = await postSnapshot({
      ...payload,
      timestamp: "yesterday",
      asset_info: {
        ...payload.asset_info,
        memory: { ...payload.asset_info.memory, total_mb: "lots" },
        network_interfaces: [{ name: "eth0", ipv4_address: "not-an-ip" }],
      },
    });

    expect(response.statusCode).toBe(400);
    const { details } = response.json<ErrorBody>();
    expect(Object.keys(details).sort()).toEqual([
      "asset_info.memory.total_mb",
      "asset_info.network_interfaces.0.ipv4_address",
      "timestamp",
    ]);
    expect(details["asset_info.memory.total_mb"]).toEqual(["Expected number, received string"]);
  });

  it("rejects a timestamp that is not on the calendar and writes nothing", async () => {
    const response = await postSnapshot({ ...loadPayload("linux-snapshot"), timestamp: "2024-02-31T10:00:00Z" });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().details).toEqual({
      timestamp: ["Datetime has wrong format. Use ISO-8601: YYYY-MM-DDThh:mm[:ss[.uuuuuu]][+HH:MM|-HH:MM|Z]"],
    });
    expect(countAllRows()).toBe(0);
  });

  it("accepts an offset given in whole hours", async () => {
    const snapshot = await createSnapshot({ ...loadPayload("linux-snapshot"), timestamp: "2024-05-01T12:00:00+05" });

    expect(snapshot.timestamp).toBe("2024-05-01T07:00:00.000Z");
  });

  it("stores blank IP addresses as null", async () => {
    const payload = loadPayload("linux-snapshot");
    const snapshot = await createSnapshot({
      ...payload,
      asset_info: {
        ...payload.asset_info,
        network_interfaces: [{ name: "eth0", mac_address: "", ipv4_address: "", ipv6_address: "" }],
      },
    });

    expect(snapshot.asset_info.network_interfaces).toEqual([
      { name: "eth0", mac_address: "", ipv4_address: null, ipv6_address: null },
    ]);
  });

  it("rejects a duplicate disk name without touching earlier snapshots", async () => {
    const first = await createSnapshot(loadPayload("linux-snapshot"));
    const rowsBefore = countAllRows();

    const payload = loadPayload("linux-snapshot");
    const [disk] = payload.asset_info.disks;
    const response = await postSnapshot({
      ...payload,
      asset_info: { ...payload.asset_info, disks: [disk, { ...disk, serial: "DISK-0099" }] },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json<{ error: string }>().error).toBe("Snapshot conflicts with a uniqueness constraint");
    expect(countAllRows()).toBe(rowsBefore);

    const stored = await app.inject({ method: "GET", url: `/snapshots/${first.id}` });
    expect(stored.json<{ snapshot: Snapshot }>().snapshot).toEqual(first);
  });

  it("rejects a duplicate filesystem in one report", async () => {
    const payload = loadPayload("linux-snapshot");
    const [usage] = payload.metrics.disk_usage;

    const response = await postSnapshot({
      ...payload,
      metrics: { ...payload.metrics, disk_usage: [usage, usage] },
    });

    expect(response.statusCode).toBe(409);
    expect(countAllRows()).toBe(0);
  });

  it("rejects a pid listed twice in the same process list", async () => {
    const payload = loadPayload("linux-snapshot");
    const [first] = payload.metrics.top_processes.by_cpu;

    const response = await postSnapshot({
      ...payload,
      metrics: {
        ...payload.metrics,
        top_processes: { by_cpu: [first, { ...first, command: "nginx: cache manager" }], by_memory: [first] },
      },
    });

    expect(response.statusCode).toBe(409);
    expect(countAllRows()).toBe(0);
  });

  it("never stores a process type other than cpu or memory", async () => {
    await createSnapshot(loadPayload("linux-snapshot"));
    const db = getDatabase();
    const top = db.prepare<[], { id: number }>("SELECT id FROM top_processes_metrics").get();

    expect(() =>
      db
        .prepare<[number]>(
          "INSERT INTO process_details (top_processes_metric_id, process_type, pid, user, cpu_percent, mem_percent, command) VALUES (?, 'disk', 1, 'root', 0, 0, 'sync')"
        )
        .run(top?.id ?? 0)
    ).toThrow(/CHECK constraint failed/);
  });

  it("returns 400 for malformed JSON", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/snapshots",
      payload: "{not json",
      headers: { "content-type": "application/json" },
    });

    expect(response.statusCode).toBe(400);
    expect(countAllRows()).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe("GET /snapshots", () => {
  it("lists snapshots newest first", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T12:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T11:00:00Z"));

    const response = await app.inject({ method: "GET", url: "/snapshots" });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ snapshots: Snapshot[]; count: number }>();
    expect(body.count).toBe(3);
    expect(body.snapshots.map((s) => s.timestamp)).toEqual([
      "2024-05-01T12:00:00.000Z",
      "2024-05-01T11:00:00.000Z",
      "2024-05-01T10:00:00.000Z",
    ]);
  });

  it("matches hostnames exactly, ignoring case", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));
    await createSnapshot(reportFrom("WEB01", "2024-05-01T11:00:00Z"));
    await createSnapshot(reportFrom("web01.example.com", "2024-05-01T12:00:00Z"));

    const response = await app.inject({ method: "GET", url: "/snapshots?hostname=WEB01" });

    const body = response.json<{ snapshots: Snapshot[]; count: number }>();
    expect(body.count).toBe(2);
    expect(body.snapshots.map((s) => s.hostname)).toEqual(["WEB01", "web01"]);
  });

  it("filters by timestamp range", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T11:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T12:00:00Z"));

    const response = await app.inject({
      method: "GET",
      url: "/snapshots?timestamp_gte=2024-05-01T10:30:00Z&timestamp_lte=2024-05-01T12:00:00Z",
    });

    const body = response.json<{ snapshots: Snapshot[] }>();
    expect(body.snapshots.map((s) => s.timestamp)).toEqual([
      "2024-05-01T12:00:00.000Z",
      "2024-05-01T11:00:00.000Z",
    ]);
  });

  it("returns an empty list when nothing matches", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));

    const response = await app.inject({ method: "GET", url: "/snapshots?hostname=db01" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ snapshots: [], count: 0 });
  });

  it("ignores empty filter values", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));

    const response = await app.inject({ method: "GET", url: "/snapshots?hostname=&timestamp_gte=" });

    expect(response.json<{ count: number }>().count).toBe(1);
  });

  it("rejects an unparseable timestamp filter", async () => {
    const response = await app.inject({ method: "GET", url: "/snapshots?timestamp_gte=last-week" });

    expect(response.statusCode).toBe(400);
    const body = response.json<ErrorBody>();
    expect(body.error).toBe("Invalid query parameters");
    expect(Object.keys(body.details)).toEqual(["timestamp_gte"]);
  });

  it.each(["2024-02-30", "2024-05-01T24:00:00Z"])("rejects the impossible timestamp filter %s", async (value) => {
    const response = await app.inject({ method: "GET", url: `/snapshots?timestamp_gte=${value}` });

    expect(response.statusCode).toBe(400);
    expect(Object.keys(response.json<ErrorBody>().details)).toEqual(["timestamp_gte"]);
  });

  it.each(["offset", "limit"])("rejects a %s too large to bind as an integer", async (name) => {
    const response = await app.inject({ method: "GET", url: `/snapshots?${name}=100000000000000000000` });

    expect(response.statusCode).toBe(400);
    const body = response.json<ErrorBody>();
    expect(body.error).toBe("Invalid query parameters");
    expect(Object.keys(body.details)).toEqual([name]);
  });

  it("folds case on ASCII letters only when matching hostnames", async () => {
    await createSnapshot(reportFrom("Sérveur", "2024-05-01T10:00:00Z"));

    const asciiFolded = await app.inject({ method: "GET", url: "/snapshots?hostname=S%C3%A9RVEUR" });
    const accentFolded = await app.inject({ method: "GET", url: "/snapshots?hostname=S%C3%89RVEUR" });

    expect(asciiFolded.json<{ count: number }>().count).toBe(1);
    expect(accentFolded.json<{ count: number }>().count).toBe(0);
  });

  it("pages with limit and offset", async () => {
    await createSnapshot(reportFrom("web01", "2024-05-01T10:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T11:00:00Z"));
    await createSnapshot(reportFrom("web01", "2024-05-01T12:00:00Z"));

    const response = await app.inject({ method: "GET", url: "/snapshots?limit=1&offset=1" });

    const body = response.json<{ snapshots: Snapshot[]; count: number }>();
    expect(body.count).toBe(3);
    expect(body.snapshots.map((s) => s.timestamp)).toEqual(["2024-05-01T11:00:00.000Z"]);
  });
});

describe("GET /snapshots/:id", () => {
  it("returns the same record that ingestion returned", async () => {
    const created = await createSnapshot(loadPayload("windows-snapshot"));

    const response = await app.inject({ method: "GET", url: `/snapshots/${created.id}` });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ snapshot: Snapshot }>().snapshot).toEqual(created);
  });

  it("returns 404 for unknown or malformed identifiers", async () => {
    const missing = await app.inject({ method: "GET", url: "/snapshots/999" });
    const malformed = await app.inject({ method: "GET", url: "/snapshots/abc" });

    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: "Snapshot not found" });
    expect(malformed.statusCode).toBe(404);
  });
});

describe("DELETE /snapshots/:id", () => {
  it("removes the snapshot and its whole subtree", async () => {
    const keep = await createSnapshot(loadPayload("linux-snapshot"));
    const rowsForOne = countAllRows();
    const created = await createSnapshot(loadPayload("windows-snapshot"));

    const response = await app.inject({ method: "DELETE", url: `/snapshots/${created.id}` });

    expect(response.statusCode).toBe(204);
    expect(response.body).toBe("");
    expect(countAllRows()).toBe(rowsForOne);
    expect(countRows("windows_updates")).toBe(0);

    const remaining = await app.inject({ method: "GET", url: `/snapshots/${keep.id}` });
    expect(remaining.json<{ snapshot: Snapshot }>().snapshot).toEqual(keep);
  });

  it("returns 404 when the snapshot does not exist", async () => {
    const response = await app.inject({ method: "DELETE", url: "/snapshots/42" });

    expect(response.statusCode).toBe(404);
  });
});
