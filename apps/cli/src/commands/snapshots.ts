import { readFileSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { fail, notFound, orDash, parseInteger, printCount } from "./output.js";
import type { ProcessDetail, Snapshot } from "@hostwatch/shared";

interface ListSnapshotsOptions {
  hostname?: string;
  since?: string;
  until?: string;
  limit?: number;
  offset?: number;
}

function formatSnapshotLine(snapshot: Snapshot): string {
  const { memory_usage, cpu_load } = snapshot.metrics;
  return [
    chalk.gray(`#${snapshot.id}`),
    snapshot.timestamp,
    chalk.bold(snapshot.hostname),
    `load ${cpu_load.load_1min}`,
    `mem ${memory_usage.percentage_used}%`,
  ].join("  ");
}

function formatProcesses(title: string, processes: ProcessDetail[]): void {
  if (processes.length === 0) {
    return;
  }
  console.log(`  ${title}:`);
  for (const p of processes) {
    console.log(`    ${String(p.pid).padEnd(8)} ${p.cpu_percent}% cpu  ${p.mem_percent}% mem  ${p.user}  ${chalk.gray(p.command)}`);
  }
}

function formatSnapshot(snapshot: Snapshot): void {
  const { asset_info: asset, metrics } = snapshot;

  console.log();
  console.log(chalk.bold(snapshot.hostname), chalk.gray(`(snapshot ${snapshot.id})`));
  console.log(`  Taken:   ${snapshot.timestamp}`);
  console.log(`  OS:      ${orDash(asset.os.pretty_name)}`);
  console.log(`  Asset:   ${asset.id}`);

  console.log(chalk.bold("\n  Metrics"));
  console.log(
    `  Memory:  ${metrics.memory_usage.used_mb}/${metrics.memory_usage.total_mb} MB (${metrics.memory_usage.percentage_used}%)`
  );
  console.log(
    `  Load:    ${metrics.cpu_load.load_1min} ${metrics.cpu_load.load_5min} ${metrics.cpu_load.load_15min}`
  );
  console.log(
    `  Network: ${metrics.network_usage.received_bps} B/s in, ${metrics.network_usage.transmitted_bps} B/s out`
  );

  for (const usage of metrics.disk_usage) {
    console.log(`  Disk:    ${usage.filesystem} ${usage.percentage_used}% of ${usage.total_size}`);
  }

  formatProcesses("Top by CPU", metrics.top_processes.by_cpu);
  formatProcesses("Top by memory", metrics.top_processes.by_memory);

  if (metrics.top_disk_consumers.length > 0) {
    console.log("  Largest paths:");
    for (const consumer of metrics.top_disk_consumers) {
      console.log(`    ${consumer.size.padEnd(8)} ${consumer.path}`);
    }
  }
}

export function registerSnapshotsCommand(program: Command): void {
  const snapshots = program
    .command("snapshots")
    .alias("snap")
    .description("Browse and submit host snapshots");

  // List snapshots
  snapshots
    .command("list")
    .alias("ls")
    .description("List snapshots, newest first")
    .option("-H, --hostname <hostname>", "Exact hostname (case-insensitive)")
    .option("--since <timestamp>", "Taken at or after this ISO-8601 time")
    .option("--until <timestamp>", "Taken at or before this ISO-8601 time")
    .option("-l, --limit <n>", "Maximum number of results", parseInteger)
    .option("--offset <n>", "Results to skip", parseInteger)
    .action(async (options: ListSnapshotsOptions) => {
      try {
        const api = getApiClient();
        const result = await api.listSnapshots(
          { hostname: options.hostname, timestampGte: options.since, timestampLte: options.until },
          { limit: options.limit, offset: options.offset }
        );

        if (result.items.length === 0) {
          console.log(chalk.yellow("No snapshots found"));
          return;
        }

        printCount("Snapshots", result.items.length, result.count);
        for (const snapshot of result.items) {
          console.log(`  ${formatSnapshotLine(snapshot)}`);
        }
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Show one snapshot
  snapshots
    .command("info <id>")
    .description("Show a snapshot with its metrics")
    .option("--json", "Print the raw JSON record")
    .action(async (rawId: string, options: { json?: boolean }) => {
      try {
        const id = parseInteger(rawId);
        const snapshot = await getApiClient().getSnapshot(id);

        if (!snapshot) {
          notFound("Snapshot", id);
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }
        formatSnapshot(snapshot);
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Submit a snapshot file
  snapshots
    .command("push <file>")
    .description("Submit a snapshot JSON file as an agent would")
    .action(async (file: string) => {
      try {
        const payload: unknown = JSON.parse(readFileSync(file, "utf-8"));
        const snapshot = await getApiClient().createSnapshot(payload);

        console.log(chalk.green(`✓ Snapshot ${snapshot.id} stored for ${snapshot.hostname}`));
        console.log(chalk.gray(`  Taken: ${snapshot.timestamp}`));
      } catch (error) {
        fail(error);
      }
    });

  // Delete a snapshot
  snapshots
    .command("delete <id>")
    .description("Delete a snapshot and everything recorded with it")
    .option("-f, --force", "Skip confirmation")
    .action(async (rawId: string, options: { force?: boolean }) => {
      try {
        const id = parseInteger(rawId);

        if (!options.force) {
          console.log(chalk.yellow(`\nAbout to delete snapshot ${id} with its asset and metric records.`));
          console.log(chalk.yellow("This action cannot be undone."));
          console.log(chalk.gray("\nRun with --force to skip this confirmation"));
          return;
        }

        const deleted = await getApiClient().deleteSnapshot(id);
        if (!deleted) {
          notFound("Snapshot", id);
          return;
        }
        console.log(chalk.green(`✓ Snapshot ${id} deleted`));
      } catch (error) {
        fail(error);
      }
    });
}
