import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { fail, notFound, orDash, parseInteger, printCount } from "./output.js";
import type { WindowsUpdateRecord } from "@hostwatch/shared";

interface ListUpdatesOptions {
  kb?: string;
  title?: string;
  since?: string;
  until?: string;
  status?: string;
  limit?: number;
  offset?: number;
}

function formatStatus(status: string): string {
  switch (status.toLowerCase()) {
    case "succeeded":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "":
      return chalk.gray("unknown");
    default:
      return chalk.yellow(status);
  }
}

function formatUpdateLine(update: WindowsUpdateRecord): string {
  return [
    chalk.gray(`#${update.id}`),
    chalk.bold(update.kb_id),
    update.hostname,
    orDash(update.installed_on),
    formatStatus(update.status),
  ].join("  ");
}

export function registerUpdatesCommand(program: Command): void {
  const updates = program
    .command("updates")
    .alias("u")
    .description("Browse Windows updates reported by hosts");

  // List updates
  updates
    .command("list")
    .alias("ls")
    .description("List updates, most recently installed first")
    .option("--kb <text>", "KB identifier contains")
    .option("--title <text>", "Title contains")
    .option("--since <timestamp>", "Installed at or after this ISO-8601 time")
    .option("--until <timestamp>", "Installed at or before this ISO-8601 time")
    .option("-s, --status <status>", "Exact status, e.g. Succeeded")
    .option("-l, --limit <n>", "Maximum number of results", parseInteger)
    .option("--offset <n>", "Results to skip", parseInteger)
    .action(async (options: ListUpdatesOptions) => {
      try {
        const result = await getApiClient().listWindowsUpdates(
          {
            kbId: options.kb,
            title: options.title,
            installedOnGte: options.since,
            installedOnLte: options.until,
            status: options.status,
          },
          { limit: options.limit, offset: options.offset }
        );

        if (result.items.length === 0) {
          console.log(chalk.yellow("No updates found"));
          return;
        }

        printCount("Windows updates", result.items.length, result.count);
        for (const update of result.items) {
          console.log(`  ${formatUpdateLine(update)}`);
        }
        console.log();
      } catch (error) {
        fail(error);
      }
    });

  // Show one update
  updates
    .command("info <id>")
    .description("Show a Windows update")
    .action(async (rawId: string) => {
      try {
        const id = parseInteger(rawId);
        const update = await getApiClient().getWindowsUpdate(id);

        if (!update) {
          notFound("Windows update", id);
          return;
        }

        console.log();
        console.log(chalk.bold(update.kb_id), chalk.gray(`(update ${update.id})`));
        console.log(`  Title:     ${orDash(update.title)}`);
        console.log(`  Host:      ${update.hostname} ${chalk.gray(`(asset ${update.asset_info_id})`)}`);
        console.log(`  Installed: ${orDash(update.installed_on)}`);
        console.log(`  Status:    ${formatStatus(update.status)}`);
        console.log();
      } catch (error) {
        fail(error);
      }
    });
}
