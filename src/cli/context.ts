/**
 * Shared setup for CLI commands: configuration, logging and HTTP client
 */

import type { Command } from "commander";
import { parseConfigFile } from "./config/parser.js";
import type { CliConfigOptions, PipelineConfig } from "../types/config.js";
import { createHttpClient } from "../lib/utils/http-client.js";
import type { AxiosInstance } from "axios";
import { loadPipelineConfig } from "../utils/config-loader.js";
import { exitCodeFor, toPipelineError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface CommandContext {
  config: PipelineConfig;
  http: AxiosInstance;
}

/**
 * Resolve configuration from the global options of `command` and the
 * process environment, and apply its log level
 */
export function createContext(command: Command): CommandContext {
  const cli = command.optsWithGlobals<CliConfigOptions>();
  const file = cli.config ? parseConfigFile(cli.config) : undefined;
  const config = loadPipelineConfig({ cli, env: process.env, file });

  logger.setLevel(config.logLevel);

  return {
    config,
    http: createHttpClient({ timeoutMs: config.httpTimeoutMs }),
  };
}

/**
 * Print a success response as JSON on stdout
 */
export function printResponse(phase: string, report: unknown): void {
  console.log(JSON.stringify({ status: "success", phase, report }, null, 2));
}

/**
 * Print an error response on stderr and exit with the code for its kind
 */
export function exitWithError(error: unknown, phase: string): never {
  const pipelineError = toPipelineError(error);
  console.error(JSON.stringify(pipelineError.toResponse(phase), null, 2));
  process.exit(exitCodeFor(pipelineError));
}
