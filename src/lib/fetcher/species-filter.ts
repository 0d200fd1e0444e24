/**
 * Filtering of bulk GBIF search results
 */

import type { RawRecord } from "../../types/data-model.js";

// Name fragments that mark an entry as out of scope for an animal catalogue:
// microbes and fungi, unplaced or unidentified taxa, open nomenclature and
// hybrids
export const EXCLUDED_NAME_TERMS = [
  "bacter",
  "virus",
  "fung",
  "incertae",
  "unclassified",
  "unidentified",
  "sp.",
  "hybr.",
] as const;

/**
 * True when the entry's scientific name contains none of the excluded terms
 *
 * @example
 * isLegitSpecies({ scientificName: "Panthera tigris" }); // true
 * isLegitSpecies({ scientificName: "Bacteria sp." }); // false
 */
export function isLegitSpecies(entry: RawRecord): boolean {
  const name =
    typeof entry.scientificName === "string" ? entry.scientificName.toLowerCase() : "";
  return !EXCLUDED_NAME_TERMS.some((term) => name.includes(term));
}
