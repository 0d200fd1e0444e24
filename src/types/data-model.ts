/**
 * Core data model types for the animal pipeline
 * These structures flow through the stages: fetch → transform → validate → send
 */

/**
 * RawRecord - a JSON object as returned by the upstream API. Its shape is
 * owned by GBIF, so every value is unknown until narrowed.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Names of the canonical record fields, in serialisation order. This list is
 * the single source of truth: the record type, the renaming table and the
 * JSON Schema are all derived from or checked against it.
 */
export const CANONICAL_FIELDS = [
  "nom",
  "nom_commun",
  "rang",
  "statutUICN",
  "ordre",
  "famille",
  "genre",
  "descriptions",
  "imageUrl",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type OptionalCanonicalField = Exclude<CanonicalField, "nom">;

/**
 * IUCN Red List categories accepted in `statutUICN`
 */
export const IUCN_STATUSES = ["EX", "EW", "CR", "EN", "VU", "NT", "LC", "DD"] as const;

export type IucnStatus = (typeof IUCN_STATUSES)[number];

/**
 * AnimalRecord - the pipeline's normalised record. `nom` is the scientific
 * name and identifies the record within a run; absent optional values are
 * null.
 */
export type AnimalRecord = { nom: string } & {
  [K in OptionalCanonicalField]: string | null;
};

/**
 * ValidatedRecord - a record that passed the canonical schema. Optional keys
 * may be missing when the record did not come from the Transformer.
 */
export type ValidatedRecord = { nom: string } & {
  [K in OptionalCanonicalField]?: string | null;
};

/**
 * ValidationRejection - a record that failed the canonical schema, with the
 * reason of the first failing rule. A recorded outcome, not an exception.
 */
export interface ValidationRejection {
  index: number;
  record: unknown;
  reason: string;
  detail: string;
}

/**
 * Counts reported at the end of a pipeline run
 */
export interface PipelineCounts {
  fetched: number;
  transformed: number;
  validated: number;
  rejected: number;
  sent: number;
  failed: number;
}

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
