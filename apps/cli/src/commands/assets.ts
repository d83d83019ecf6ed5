import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { fail, formatVm, notFound, orDash, parseInteger, printCount } from "./output.js";
import type { AssetInfo } from "@hostwatch/shared";

interface ListAssetsOptions {
  os?: string;
  manufacturer?: string;
  minMemory?: number;
  vm?: boolean;
  limit?: number;
  offset?: number;
}

function formatAsset(asset: AssetInfo, verbose = false): void {
  console.log();
  console.log(chalk.bold(asset.hostname), chalk.gray(`(asset ${asset.id}, snapshot ${asset.snapshot_id})`));
  console.log(`  OS:      ${orDash(asset.os.pretty_name)}`);
  console.log(`  System:  ${orDash(asset.system.manufacturer)} ${asset.system.product_name}`.trimEnd());
  console.log(`  CPU:     ${orDash(asset.cpu.model_name)} (${asset.cpu.total_logical_cpus} logical)`);
  console.log(`  Memory:  ${asset.memory.total_mb} MB`);
  console.log(`  Type:    ${formatVm(asset.virtualization.is_vm, asset.virtualization.hypervisor)}`);

  if (!verbose) {
    return;
  }

  console.log(`  Kernel:  ${orDash(asset.os.kernel_version)}`);
  console.log(`  Serial:  ${orDash(asset.system.serial_number)}`);
  console.log(`  BIOS:    ${orDash(asset.system.bios_version)}`);
  console.log(`  Uptime:  ${orDash(asset.system.uptime_initial)}`);
  if (asset.system.pending_updates_count !== null) {
    console.log(`  Pending updates: ${asset.system.pending_updates_count}`);
  }

  if (asset.disks.length > 0) {
    console.log("  Disks:");
    for (const disk of asset.disks) {
      console.log(`    ${disk.name.padEnd(16)} ${disk.size.padEnd(8)} ${chalk.gray(disk.model)}`);
    }
  }

  if (asset.network_interfaces.length > 0) {
    console.log("  Interfaces:");
    for (const nic of asset.network_interfaces) {
      const addresses = [nic.ipv4_address, nic.ipv6_address].filter((a) => a !== null).join(", ");
      console.log(`    ${nic.name.padEnd(16)} ${orDash(nic.mac_address)}  ${addresses}`);
    }
  }

  if (asset.windows_updates.length > 0) {
    console.log(`  Windows updates: ${asset.windows_updates.length}`);
  }
}

export function registerAssetsCommand(program: Command): void {
  const assets = program
    .command("assets")
    .alias("a")
    .description("Browse host inventory");

  // List assets
  assets
    .command("list")
    .alias("ls")
    .description("List assets ordered by hostname")
    .option("--os <text>", "OS name contains")
    .option("--manufacturer <text>", "System manufacturer contains")
    .option("--min-memory <mb>", "At least this much memory in MB", parseInteger)
    .option("--vm", "Only virtual machines")
    .option("--no-vm", "Only physical hosts")
    .option("-l, --limit <n>", "Maximum number of results", parseInteger)
    .option("--offset <n>", "Results to skip", parseInteger)
    .option("-v, --verbose", "Show detailed information")
    .action(async (options: ListAssetsOptions & { verbose?: boolean }) => {
      try {
        const result = await getApiClient().listAssets(
          {
            osPrettyName: options.os,
            systemManufacturer: options.manufacturer,
            memoryTotalMbGte: options.minMemory,
            isVm: options.vm,
          },
          { limit: options.limit, offset: options.offset }
        );

        if (result.items.length === 0) {
          console.log(chalk.yellow("No assets found"));
          return;
        }

        printCount("Assets", result.items.length, result.count);
        for (const asset of result.items) {
          formatAsset(asset, options.verbose);
        }
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Show one asset
  assets
    .command("info <id>")
    .description("Show an asset with its disks, interfaces and updates")
    .action(async (rawId: string) => {
      try {
        const id = parseInteger(rawId);
        const asset = await getApiClient().getAsset(id);

        if (!asset) {
          notFound("Asset", id);
          return;
        }

        formatAsset(asset, true);
        console.log();
      } catch (error) {
        fail(error);
      }
    });
}
