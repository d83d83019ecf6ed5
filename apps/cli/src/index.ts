#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { createProgram } from "./program.js";

const program = createProgram();

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exit(1);
});
