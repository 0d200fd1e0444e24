/**
 * Fetcher module - retrieves species payloads from GBIF and stages them
 * verbatim under the raw data directory
 */

import { join } from "path";
import type { GbifClient } from "./gbif-client.js";
import { isLegitSpecies } from "./species-filter.js";
import type {
  ClassBatchOptions,
  ClassBatchResult,
  FetchAllResult,
  FetchedSpecies,
  FetchFailure,
  GbifSearchPage,
} from "./types.js";
import type { RawRecord } from "../../types/data-model.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { FetchError } from "../../utils/errors.js";
import { speciesFileStem, writeJSONFile } from "../../utils/staging.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./gbif-client.js";
export * from "./species-filter.js";

export const CLASS_BATCH_FILE_NAME = "gbif_full_batch.json";

// GBIF caps /species/search pages at this size
const MAX_PAGE_SIZE = 100;

/**
 * Staged raw file of a species
 */
export function rawFilePath(rawDataDir: string, species: string): string {
  return join(rawDataDir, `gbif_${speciesFileStem(species)}.json`);
}

/**
 * Fetch one species: resolve its usage key, download the taxon detail and
 * stage it unmodified.
 *
 * @throws FetchError on network failure, non-2xx status, or no match
 * @throws FileIOError when the staging file cannot be written
 */
export async function fetchSpecies(
  gbif: GbifClient,
  species: string,
  rawDataDir: string,
): Promise<FetchedSpecies> {
  logger.info(`Searching GBIF for "${species}"`);
  const usageKey = await gbif.resolveUsageKey(species);
  logger.debug("GBIF match found", { species, usageKey });

  const payload = await gbif.getSpecies(usageKey, species);

  const path = rawFilePath(rawDataDir, species);
  await writeJSONFile(path, payload);
  logger.info(`Raw payload staged for "${species}"`, { path, usageKey });

  return { species, usageKey, path, payload };
}

/**
 * Fetch a list of species. A species that fails is logged and recorded and
 * the loop moves on; configuration and staging write errors still stop the
 * batch.
 */
export async function fetchAll(
  gbif: GbifClient,
  speciesList: readonly string[],
  rawDataDir: string,
): Promise<FetchAllResult> {
  const fetched: FetchedSpecies[] = [];
  const failed: FetchFailure[] = [];

  logger.info("Fetching species", { count: speciesList.length });

  for (const species of speciesList) {
    try {
      fetched.push(await fetchSpecies(gbif, species, rawDataDir));
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      logger.error(`Fetch failed for "${species}"`, { error: err.message });
      failed.push({ species, error: err });
    }
  }

  logger.info("Fetch complete", { fetched: fetched.length, failed: failed.length });
  return { fetched, failed };
}

/**
 * Collect up to `perClass` species for each taxonomic class by paging
 * through `/species/search`, and stage them as one batch file keyed by
 * class. A failing request ends paging for its class only.
 */
export async function fetchClassBatch(
  gbif: GbifClient,
  classes: readonly string[],
  rawDataDir: string,
  options: ClassBatchOptions,
): Promise<ClassBatchResult> {
  const limiter = new RateLimiter(options.rateLimitDelayMs);
  const batch: Record<string, RawRecord[]> = {};
  const failed: FetchFailure[] = [];

  for (const className of classes) {
    logger.info(`Collecting ${options.perClass} species of class "${className}"`);

    const kept: RawRecord[] = [];
    let offset = 0;
    let examined = 0;

    while (kept.length < options.perClass && examined < options.maxRecords) {
      const limit = Math.min(MAX_PAGE_SIZE, options.perClass - kept.length);
      await limiter.throttle();

      let page: GbifSearchPage;
      try {
        page = await gbif.searchSpecies(
          { rank: "SPECIES", class: className, limit, offset },
          className,
        );
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        logger.error(`Paging stopped for class "${className}"`, {
          offset,
          error: err.message,
        });
        failed.push({ species: className, error: err });
        break;
      }

      const accepted = page.results.filter(isLegitSpecies);
      kept.push(...accepted);
      examined += page.results.length;
      offset += limit;

      logger.debug("Search page received", {
        className,
        offset,
        results: page.results.length,
        accepted: accepted.length,
        kept: kept.length,
      });

      if (page.results.length === 0 || page.endOfRecords) {
        break;
      }
    }

    const classSpecies = kept.slice(0, options.perClass);
    batch[className] = classSpecies;
    logger.info(`Class "${className}": ${classSpecies.length} species kept`);
  }

  const path = join(rawDataDir, CLASS_BATCH_FILE_NAME);
  await writeJSONFile(path, batch);

  const speciesByClass = Object.fromEntries(
    Object.entries(batch).map(([className, entries]) => [className, entries.length]),
  );
  logger.info("Class batch staged", { path, speciesByClass });

  return { path, speciesByClass, failed };
}
