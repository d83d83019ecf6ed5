import { InvalidArgumentError } from "commander";
import chalk from "chalk";
import { ApiError } from "../api/client.js";

/**
 * Report a failed command and mark the process as failed
 */
export function fail(error: unknown): void {
  if (error instanceof ApiError) {
    console.error(chalk.red(`Error (${error.status}):`), error.message);
    printDetails(error.details);
  } else {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
}

function printDetails(details: unknown): void {
  if (typeof details === "string") {
    console.error(chalk.gray(`  ${details}`));
    return;
  }
  if (typeof details !== "object" || details === null) {
    return;
  }
  for (const [field, messages] of Object.entries(details)) {
    const text = Array.isArray(messages) ? messages.join("; ") : String(messages);
    console.error(`  ${chalk.yellow(field)}: ${text}`);
  }
}

export function notFound(entity: string, id: number): void {
  console.error(chalk.red(`${entity} not found: ${id}`));
  process.exitCode = 1;
}

export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return Number(value);
}

export function printCount(label: string, shown: number, count: number): void {
  const suffix = shown < count ? ` (showing ${shown} of ${count})` : "";
  console.log(chalk.bold(`\n${label} (${count})${suffix}:`));
}

export function formatVm(isVm: boolean, hypervisor: string): string {
  if (!isVm) {
    return chalk.green("physical");
  }
  return chalk.blue(hypervisor ? `vm (${hypervisor})` : "vm");
}

export function orDash(value: string | number | null): string {
  return value === null || value === "" ? chalk.gray("-") : String(value);
}
