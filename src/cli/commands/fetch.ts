/**
 * Fetch commands - stage raw GBIF payloads without running later stages
 */

import { Command, InvalidArgumentError } from "commander";
import { createContext, exitWithError, printResponse } from "../context.js";
import { GbifClient } from "../../lib/fetcher/gbif-client.js";
import { fetchAll, fetchClassBatch } from "../../lib/fetcher/index.js";

export const DEFAULT_CLASSES = ["Mammalia", "Aves", "Reptilia", "Actinopterygii", "Amphibia"];

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function createFetchCommand(): Command {
  return new Command("fetch")
    .description("Fetch one or more species from GBIF into the raw directory")
    .argument("<species...>", "Scientific names")
    .action(async (species: string[], _options: unknown, command: Command) => {
      try {
        const { config, http } = createContext(command);
        const gbif = new GbifClient(http, config.gbifApiUrl);
        const result = await fetchAll(gbif, species, config.rawDataDir);

        printResponse("fetch", {
          fetched: result.fetched.map(({ species: name, usageKey, path }) => ({
            species: name,
            usageKey,
            path,
          })),
          failed: result.failed.map(({ species: name, error }) => ({
            species: name,
            error: error.message,
          })),
        });

        process.exit(result.fetched.length > 0 ? 0 : 1);
      } catch (error) {
        exitWithError(error, "fetch");
      }
    });
}

interface ClassBatchCliOptions {
  perClass?: number;
  maxRecords?: number;
}

export function createFetchClassesCommand(): Command {
  return new Command("fetch-classes")
    .description("Page through GBIF species of whole taxonomic classes")
    .argument("[classes...]", "Class names", DEFAULT_CLASSES)
    .option("--per-class <number>", "Species kept per class", parsePositiveInt)
    .option("--max-records <number>", "Search entries examined per class", parsePositiveInt)
    .action(
      async (classes: string[], options: ClassBatchCliOptions, command: Command) => {
        try {
          const { config, http } = createContext(command);
          const gbif = new GbifClient(http, config.gbifApiUrl);
          const result = await fetchClassBatch(gbif, classes, config.rawDataDir, {
            perClass: options.perClass ?? config.maxAnimalsPerClass,
            maxRecords: options.maxRecords ?? config.maxRecordsLimit,
            rateLimitDelayMs: config.gbifRateLimitDelayMs,
          });

          printResponse("fetch-classes", {
            path: result.path,
            speciesByClass: result.speciesByClass,
            failed: result.failed.map(({ species: className, error }) => ({
              className,
              error: error.message,
            })),
          });
          process.exit(0);
        } catch (error) {
          exitWithError(error, "fetch-classes");
        }
      },
    );
}
