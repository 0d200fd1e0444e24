/**
 * Config command - print the effective configuration
 */

import { Command } from "commander";
import { createContext, exitWithError, printResponse } from "../context.js";

export function createConfigCommand(): Command {
  return new Command("config")
    .description("Show the configuration after merging flags, environment and config file")
    .action((_options: unknown, command: Command) => {
      try {
        const { config } = createContext(command);
        printResponse("config", config);
        process.exit(0);
      } catch (error) {
        exitWithError(error, "config");
      }
    });
}
