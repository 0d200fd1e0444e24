/**
 * Fetcher module types
 */

import type { RawRecord } from "../../types/data-model.js";
import type { FetchError } from "../../utils/errors.js";

/**
 * Query parameters of GBIF's `/species/search`
 */
export interface GbifSearchParams {
  q?: string;
  rank?: string;
  class?: string;
  limit?: number;
  offset?: number;
}

/**
 * One page of `/species/search` results
 */
export interface GbifSearchPage {
  results: RawRecord[];
  endOfRecords: boolean;
}

export interface FetchedSpecies {
  species: string;
  usageKey: number;
  path: string; // staged raw file
  payload: RawRecord;
}

export interface FetchFailure {
  species: string;
  error: FetchError;
}

export interface FetchAllResult {
  fetched: FetchedSpecies[];
  failed: FetchFailure[];
}

export interface ClassBatchOptions {
  perClass: number; // species kept per class
  maxRecords: number; // search entries examined per class before giving up
  rateLimitDelayMs: number;
}

export interface ClassBatchResult {
  path: string;
  speciesByClass: Record<string, number>;
  failed: FetchFailure[];
}
