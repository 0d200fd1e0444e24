/**
 * Validate command - split a transformed file into validated and rejected
 */

import { Command } from "commander";
import { join } from "path";
import { createContext, exitWithError, printResponse } from "../context.js";
import { validateFile } from "../../lib/validator/index.js";
import { TRANSFORMED_FILE_NAME } from "../../lib/transformer/index.js";

interface ValidateCliOptions {
  input?: string;
  outputDir?: string;
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate transformed records against the canonical schema")
    .option("--input <path>", `Transformed file (default: <processed dir>/${TRANSFORMED_FILE_NAME})`)
    .option("--output-dir <path>", "Directory for the two outputs (default: processed dir)")
    .action(async (options: ValidateCliOptions, command: Command) => {
      try {
        const { config } = createContext(command);
        const result = await validateFile(
          options.input ?? join(config.processedDataDir, TRANSFORMED_FILE_NAME),
          options.outputDir ?? config.processedDataDir,
        );

        printResponse("validation", {
          validated: result.validated.length,
          rejected: result.rejected.map(({ index, reason, detail }) => ({
            index,
            reason,
            detail,
          })),
          validatedPath: result.validatedPath,
          rejectedPath: result.rejectedPath,
        });
        process.exit(0);
      } catch (error) {
        exitWithError(error, "validation");
      }
    });
}
