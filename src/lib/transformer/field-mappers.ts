/**
 * Raw GBIF value → canonical field mappers
 */

import type { CanonicalField, RawRecord } from "../../types/data-model.js";
import { isRawRecord } from "../../types/data-model.js";

export type FieldCleaner = (value: unknown) => string | null;

/**
 * Trim, collapse inner whitespace, and turn scalars into strings. Anything
 * that is not a string, finite number or boolean is dropped.
 */
export function cleanText(value: unknown): string | null {
  if (typeof value === "string") {
    const cleaned = value.trim().replace(/\s+/g, " ");
    return cleaned === "" ? null : cleaned;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  return null;
}

/**
 * Descriptions arrive either as a string or as GBIF's list of
 * `{ description, type, language }` objects; the first usable one wins.
 */
export function cleanDescription(value: unknown): string | null {
  if (Array.isArray(value)) {
    for (const entry of value) {
      const cleaned = cleanDescription(entry);
      if (cleaned !== null) return cleaned;
    }
    return null;
  }
  if (isRawRecord(value)) {
    return cleanText(value.description);
  }
  return cleanText(value);
}

/**
 * IUCN status as a bare code, or GBIF's `{ category, code }` object.
 * The value is not checked against the enumeration here.
 */
export function cleanStatus(value: unknown): string | null {
  if (isRawRecord(value)) {
    return cleanText(value.code);
  }
  return cleanText(value);
}

export interface FieldMapping {
  sources: readonly string[]; // raw keys, first usable value wins
  clean: FieldCleaner;
}

/**
 * Renaming table. Keyed by the canonical field names themselves, so a field
 * missing from the table, or a misspelled one, fails to compile.
 */
export const FIELD_MAPPINGS: { readonly [K in CanonicalField]: FieldMapping } = {
  nom: { sources: ["scientificName", "canonicalName"], clean: cleanText },
  nom_commun: { sources: ["commonName", "vernacularName"], clean: cleanText },
  rang: { sources: ["rank"], clean: cleanText },
  statutUICN: {
    sources: ["iucnStatus", "iucnRedListCategory", "threatStatus"],
    clean: cleanStatus,
  },
  ordre: { sources: ["order"], clean: cleanText },
  famille: { sources: ["family"], clean: cleanText },
  genre: { sources: ["genus"], clean: cleanText },
  descriptions: { sources: ["description", "descriptions"], clean: cleanDescription },
  imageUrl: { sources: ["imageUrl", "image"], clean: cleanText },
};

/**
 * Resolve one canonical field from a raw record
 */
export function mapField(raw: RawRecord, field: CanonicalField): string | null {
  const { sources, clean } = FIELD_MAPPINGS[field];
  for (const source of sources) {
    const cleaned = clean(raw[source]);
    if (cleaned !== null) return cleaned;
  }
  return null;
}
