import { vi } from "vitest";
import { stripVTControlCharacters } from "node:util";
import type { Snapshot } from "@hostwatch/shared";

export const API_URL = "http://hostwatch.test";

export function jsonResponse(status: number, body?: unknown): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/**
 * Replace global fetch with a mock answering every call with the given responses, in order
 */
export function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error("Unexpected fetch call");
    }
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/**
 * Capture console output with colors removed, one entry per call
 */
export function captureConsole() {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  const lines = (calls: unknown[][]) => calls.map((args) => stripVTControlCharacters(args.map(String).join(" ")));
  return {
    stdout: () => lines(log.mock.calls),
    stderr: () => lines(error.mock.calls),
  };
}

export function sampleSnapshot(): Snapshot {
  return {
    id: 7,
    timestamp: "2024-05-01T12:00:00.000Z",
    hostname: "web01",
    asset_info: {
      id: 3,
      snapshot_id: 7,
      hostname: "web01",
      os: { pretty_name: "Ubuntu 22.04.4 LTS", kernel_version: "5.15.0-105-generic" },
      system: {
        manufacturer: "Dell Inc.",
        product_name: "PowerEdge R640",
        serial_number: "TEST-SERIAL-0001",
        bios_version: "2.19.1",
        chassis_type: "Rack Mount Chassis",
        uptime_initial: "up 3 days",
        last_update_check_time: null,
        pending_updates_count: 4,
      },
      cpu: {
        model_name: "Intel(R) Xeon(R) Silver 4214 CPU @ 2.20GHz",
        vendor_id: "GenuineIntel",
        total_logical_cpus: 48,
        physical_cores_per_socket: 12,
        architecture: "x86_64",
      },
      memory: { total_mb: 64000, speed: "2666 MT/s", modules_count: 4 },
      virtualization: { is_vm: false, hypervisor: "" },
      disks: [{ name: "sda", size: "480G", model: "TEST-SSD-480", serial: "DISK-0001" }],
      network_interfaces: [
        { name: "eno1", mac_address: "00:11:22:33:44:55", ipv4_address: "10.0.0.11", ipv6_address: null },
      ],
      windows_updates: [],
    },
    metrics: {
      memory_usage: { total_mb: 64000, used_mb: 24000, free_mb: 8000, available_mb: 38000, percentage_used: 37.5 },
      cpu_load: { load_1min: 1.25, load_5min: 0.98, load_15min: 0.5 },
      network_usage: { received_bps: 125000.55, transmitted_bps: 98000.1 },
      top_processes: {
        by_cpu: [{ pid: 1201, user: "www-data", cpu_percent: 35.2, mem_percent: 2.1, command: "nginx: worker process" }],
        by_memory: [],
      },
      disk_usage: [
        { filesystem: "/dev/sda2", percentage_used: 61.3, total_size: "440G", used_size: "270G", available_size: "170G" },
      ],
      top_disk_consumers: [],
    },
  };
}
