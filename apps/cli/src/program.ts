import { Command } from "commander";
import chalk from "chalk";
import { DEFAULT_API_URL, getApiClient } from "./api/client.js";
import { fail } from "./commands/output.js";
import { registerSnapshotsCommand } from "./commands/snapshots.js";
import { registerAssetsCommand } from "./commands/assets.js";
import { registerUpdatesCommand } from "./commands/updates.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("hostwatch")
    .description("CLI for browsing host inventory and metrics snapshots")
    .version("0.1.0")
    .option("--api-url <url>", "API URL", process.env.API_URL || DEFAULT_API_URL);

  // Health check command
  program
    .command("health")
    .description("Check API health")
    .action(async () => {
      try {
        const result = await getApiClient().health();
        console.log(chalk.green("✓ API is healthy"));
        console.log(chalk.gray(`  Status: ${result.status}`));
      } catch (error) {
        console.error(chalk.red("✖ API is not reachable"));
        fail(error);
      }
    });

  // Register command groups
  registerSnapshotsCommand(program);
  registerAssetsCommand(program);
  registerUpdatesCommand(program);

  // Global options apply before any subcommand runs
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ apiUrl?: string }>();
    if (opts.apiUrl) {
      process.env.API_URL = opts.apiUrl;
    }
  });

  return program;
}
