/**
 * Transform command - every staged raw file into one canonical file
 */

import { Command } from "commander";
import { join } from "path";
import { createContext, exitWithError, printResponse } from "../context.js";
import { TRANSFORMED_FILE_NAME, transformDirectory } from "../../lib/transformer/index.js";

interface TransformCliOptions {
  inputDir?: string;
  output?: string;
}

export function createTransformCommand(): Command {
  return new Command("transform")
    .description("Transform staged gbif_*.json files into canonical records")
    .option("--input-dir <path>", "Raw directory (default: configured raw dir)")
    .option("--output <path>", `Output file (default: <processed dir>/${TRANSFORMED_FILE_NAME})`)
    .action(async (options: TransformCliOptions, command: Command) => {
      try {
        const { config } = createContext(command);
        const result = await transformDirectory(
          options.inputDir ?? config.rawDataDir,
          options.output ?? join(config.processedDataDir, TRANSFORMED_FILE_NAME),
        );

        printResponse("transform", {
          outputPath: result.outputPath,
          records: result.records.length,
          duplicates: result.duplicates,
        });
        process.exit(0);
      } catch (error) {
        exitWithError(error, "transform");
      }
    });
}
