/**
 * Validator module types
 */

import type {
  ValidatedRecord,
  ValidationRejection,
} from "../../types/data-model.js";

/**
 * Outcome of checking a single record against the canonical schema
 */
export type RecordCheck =
  | { valid: true; record: ValidatedRecord }
  | { valid: false; reason: string; detail: string };

/**
 * Partition of a record collection. Both lists keep input order and are
 * disjoint.
 */
export interface ValidationResult {
  validated: ValidatedRecord[];
  rejected: ValidationRejection[];
}

export interface ValidateFileResult extends ValidationResult {
  validatedPath: string;
  rejectedPath: string;
}
