#!/usr/bin/env node

/**
 * Animalia CLI - GBIF species ETL into a local animal API
 */

import * as dotenv from "dotenv";
import { Command } from "commander";
import { createRunCommand } from "./commands/run.js";
import { createFetchCommand, createFetchClassesCommand } from "./commands/fetch.js";
import { createTransformCommand } from "./commands/transform.js";
import { createValidateCommand } from "./commands/validate.js";
import { createSendCommand } from "./commands/send.js";
import { createConfigCommand } from "./commands/config.js";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

const pkg = {
  name: "animalia",
  version: "0.1.0",
  description: "Fetch species from GBIF, normalise and validate them, and send them to a local API",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--config <path>", "JSON or YAML config file")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .option("--api-url <url>", "Target API endpoint")
    .option("--gbif-url <url>", "GBIF API base URL")
    .option("--timeout <seconds>", "HTTP timeout in seconds")
    .option("--raw-dir <path>", "Directory for raw GBIF payloads")
    .option("--processed-dir <path>", "Directory for processed files")
    .option("--production", "Production mode: no debug logs, no config dump");

  // `run` is the default, so `animalia "Panthera tigris"` runs the pipeline
  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createFetchCommand());
  program.addCommand(createFetchClassesCommand());
  program.addCommand(createTransformCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createSendCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  // .env values fill in variables the environment does not already set
  dotenv.config();

  const program = createProgram();
  await program.parseAsync(process.argv);
}

// Run CLI
main().catch((error: unknown) => {
  const message = errorMessage(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
