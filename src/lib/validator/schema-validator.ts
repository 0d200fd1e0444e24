/**
 * Canonical record validation using Ajv
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import {
  CANONICAL_FIELDS,
  IUCN_STATUSES,
  isRawRecord,
  type CanonicalField,
  type ValidatedRecord,
} from "../../types/data-model.js";
import { isHttpUrl } from "../../utils/config-loader.js";
import type { RecordCheck } from "./types.js";

/**
 * Shared Ajv factory: union types allowed (nullable fields are
 * `["string", "null"]`), every error collected, and an `http-url` format
 * backed by the WHATWG URL parser.
 */
export function createAjv(): Ajv {
  const ajv = new Ajv({
    allErrors: true,
    allowUnionTypes: true,
  });
  ajv.addFormat("http-url", { type: "string", validate: isHttpUrl });
  return ajv;
}

const nullableString: SchemaObject = { type: ["string", "null"] };

const canonicalProperties: Record<CanonicalField, SchemaObject> = {
  nom: { type: "string", minLength: 1, pattern: "\\S" },
  nom_commun: nullableString,
  rang: nullableString,
  statutUICN: { type: ["string", "null"], enum: [...IUCN_STATUSES, null] },
  ordre: nullableString,
  famille: nullableString,
  genre: nullableString,
  descriptions: nullableString,
  imageUrl: { type: ["string", "null"], format: "http-url" },
};

/**
 * JSON Schema (draft-07) of the canonical animal record
 */
export const ANIMAL_RECORD_SCHEMA: SchemaObject = {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "AnimalRecord",
  type: "object",
  required: ["nom"],
  additionalProperties: false,
  properties: canonicalProperties,
};

// Rule precedence: when several rules fail, the lowest rank is reported
enum RuleRank {
  SHAPE = 0,
  REQUIRED = 1,
  ENUM = 2,
  TYPE = 3,
  FORMAT = 4,
  UNKNOWN_FIELD = 5,
}

interface Violation {
  rank: RuleRank;
  fieldOrder: number;
  reason: string;
  detail: string;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function fieldOrder(field: string): number {
  const index = CANONICAL_FIELDS.findIndex((name) => name === field);
  return index === -1 ? CANONICAL_FIELDS.length : index;
}

function missingNom(detail: string): Violation {
  return {
    rank: RuleRank.REQUIRED,
    fieldOrder: 0,
    reason: "missing required field: nom",
    detail,
  };
}

/**
 * Map one Ajv error onto the rule that produced it
 */
function toViolation(error: ErrorObject, record: unknown): Violation {
  if (error.instancePath === "") {
    if (error.keyword === "required") {
      return missingNom("nom is absent");
    }
    if (error.keyword === "additionalProperties") {
      const key = String(error.params.additionalProperty);
      return {
        rank: RuleRank.UNKNOWN_FIELD,
        fieldOrder: CANONICAL_FIELDS.length,
        reason: `unexpected field: ${key}`,
        detail: `"${key}" is not a canonical field`,
      };
    }
    return {
      rank: RuleRank.SHAPE,
      fieldOrder: -1,
      reason: "record is not an object",
      detail: `expected a JSON object, got ${describeValue(record)}`,
    };
  }

  const field = error.instancePath.slice(1);
  const value = isRawRecord(record) ? record[field] : undefined;

  if (field === "nom" && (value === null || typeof value === "string")) {
    return missingNom(value === null ? "nom is null" : "nom is empty");
  }

  switch (error.keyword) {
    case "enum":
      return {
        rank: RuleRank.ENUM,
        fieldOrder: fieldOrder(field),
        reason: `invalid ${field}`,
        detail: `${JSON.stringify(value)} is not one of ${IUCN_STATUSES.join(", ")}`,
      };
    case "format":
      return {
        rank: RuleRank.FORMAT,
        fieldOrder: fieldOrder(field),
        reason: `invalid ${field}`,
        detail: `${JSON.stringify(value)} is not an absolute http(s) URL`,
      };
    default:
      return {
        rank: RuleRank.TYPE,
        fieldOrder: fieldOrder(field),
        reason: `invalid type for ${field}: expected string`,
        detail: `got ${describeValue(value)}`,
      };
  }
}

function compareViolations(a: Violation, b: Violation): number {
  return a.rank - b.rank || a.fieldOrder - b.fieldOrder;
}

/**
 * Validator for canonical animal records
 */
export class AnimalRecordValidator {
  private validateFn: ValidateFunction<ValidatedRecord>;

  constructor(schema: SchemaObject = ANIMAL_RECORD_SCHEMA) {
    this.validateFn = createAjv().compile<ValidatedRecord>(schema);
  }

  /**
   * Check one record. On failure the reason of the highest-precedence
   * failing rule is returned, so the outcome does not depend on the order
   * Ajv reports errors in.
   */
  check(record: unknown): RecordCheck {
    if (this.validateFn(record)) {
      return { valid: true, record };
    }

    const violations = (this.validateFn.errors ?? [])
      .map((error) => toViolation(error, record))
      .sort(compareViolations);

    const first = violations[0];
    if (!first) {
      return { valid: false, reason: "invalid record", detail: "schema check failed" };
    }
    return { valid: false, reason: first.reason, detail: first.detail };
  }
}
