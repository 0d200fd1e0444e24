/**
 * Run command - the full pipeline for one species
 */

import { Command } from "commander";
import { createContext, exitWithError } from "../context.js";
import {
  DEFAULT_SPECIES,
  runPipeline,
  summaryToReport,
} from "../../lib/orchestrator/index.js";
import { displayConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";

export function createRunCommand(): Command {
  return new Command("run")
    .description("Fetch, transform, validate and send one species")
    .argument("[species]", "Scientific name of the species", DEFAULT_SPECIES)
    .action(async (species: string, _options: unknown, command: Command) => {
      try {
        const { config, http } = createContext(command);
        if (!config.productionMode) {
          displayConfig(config);
        }
        logger.info(`Species: ${species}`);

        const summary = await runPipeline(species, { config, http });
        const aborted = summary.status === "Aborted";

        console.log(
          JSON.stringify(
            {
              status: aborted ? "error" : "success",
              phase: "pipeline",
              report: summaryToReport(summary),
            },
            null,
            2,
          ),
        );

        process.exit(aborted ? 1 : 0);
      } catch (error) {
        exitWithError(error, "pipeline");
      }
    });
}
